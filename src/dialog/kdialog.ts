/**
 * dialog/kdialog.ts
 *
 * KDE save dialog through `kdialog --getsavefilename`.
 * Filters are passed as newline-separated "pattern|label" entries.
 */

import { CommandRunner, DialogBackend, DialogBackendOptions, SaveDialogRequest } from '../core/types';
import { runCommand } from '../core/exec';
import { dialogBackends } from '../core/registry';
import { scopedLogger } from '../core/logger';
import { interpretChooserResult } from './chooser_result';

const log = scopedLogger('dialog/kdialog');

export function kdialogArgs(request: SaveDialogRequest): string[] {
  return [
    '--title',
    request.title,
    '--getsavefilename',
    request.defaultName,
    request.filters.map(f => `${f.pattern}|${f.label}`).join('\n')
  ];
}

export function isKdeSession(env: NodeJS.ProcessEnv): boolean {
  if (env.KDE_FULL_SESSION) return true;
  return (env.XDG_CURRENT_DESKTOP ?? '').split(':').some(d => d.toUpperCase() === 'KDE');
}

export class KDialog implements DialogBackend {
  readonly name = 'kdialog';
  private readonly run: CommandRunner;

  constructor(options: DialogBackendOptions = {}) {
    this.run = options.run ?? runCommand;
  }

  async showSaveDialog(request: SaveDialogRequest): Promise<string | null> {
    log.debug({ title: request.title }, 'Opening save dialog');
    const result = await this.run('kdialog', kdialogArgs(request));
    return interpretChooserResult(this.name, result);
  }
}

dialogBackends.register({
  name: 'kdialog',
  detect: isKdeSession,
  create: options => new KDialog(options)
});
