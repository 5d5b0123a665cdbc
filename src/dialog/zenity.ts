/**
 * dialog/zenity.ts
 *
 * GTK save dialog through `zenity --file-selection --save`.
 */

import { CommandRunner, DialogBackend, DialogBackendOptions, SaveDialogRequest } from '../core/types';
import { runCommand } from '../core/exec';
import { dialogBackends } from '../core/registry';
import { scopedLogger } from '../core/logger';
import { interpretChooserResult } from './chooser_result';

const log = scopedLogger('dialog/zenity');

export function zenityArgs(request: SaveDialogRequest): string[] {
  return [
    '--file-selection',
    '--save',
    `--title=${request.title}`,
    `--filename=${request.defaultName}`,
    ...request.filters.map(f => `--file-filter=${f.label} | ${f.pattern}`)
  ];
}

export class ZenityDialog implements DialogBackend {
  readonly name = 'zenity';
  private readonly run: CommandRunner;

  constructor(options: DialogBackendOptions = {}) {
    this.run = options.run ?? runCommand;
  }

  async showSaveDialog(request: SaveDialogRequest): Promise<string | null> {
    log.debug({ title: request.title }, 'Opening save dialog');
    // No timeout: the user may take as long as they like
    const result = await this.run('zenity', zenityArgs(request));
    return interpretChooserResult(this.name, result);
  }
}

dialogBackends.register({
  name: 'zenity',
  detect: env => Boolean(env.WAYLAND_DISPLAY || env.DISPLAY),
  create: options => new ZenityDialog(options)
});
