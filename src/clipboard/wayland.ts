/**
 * clipboard/wayland.ts
 *
 * Wayland clipboard through wl-clipboard's `wl-paste`.
 */

import { ClipboardBackend, ClipboardBackendOptions, ClipboardTarget, CommandRunner } from '../core/types';
import { ClipboardReadError } from '../core/errors';
import { runCommand } from '../core/exec';
import { clipboardBackends } from '../core/registry';
import { scopedLogger } from '../core/logger';
import { parseTargetList } from './selector';

const log = scopedLogger('clipboard/wayland');

// wl-paste's diagnostics for "the clipboard has nothing (for this type)"
const NOTHING_COPIED = /nothing is copied|no selection|no suitable type of content/i;

export class WaylandClipboard implements ClipboardBackend {
  readonly name = 'wayland';
  private readonly run: CommandRunner;
  private readonly timeoutMs: number;

  constructor(options: ClipboardBackendOptions) {
    this.timeoutMs = options.timeoutMs;
    this.run = options.run ?? runCommand;
  }

  async listTargets(): Promise<ClipboardTarget[]> {
    const result = await this.run('wl-paste', ['--list-types'], { timeoutMs: this.timeoutMs });
    if (result.exitCode !== 0) {
      this.assertNothingCopied(result.exitCode, result.stderr);
      return [];
    }
    return parseTargetList(result.stdout);
  }

  async read(target: ClipboardTarget): Promise<Buffer> {
    const result = await this.run(
      'wl-paste',
      ['--no-newline', '--type', target],
      { timeoutMs: this.timeoutMs }
    );
    if (result.exitCode !== 0) {
      this.assertNothingCopied(result.exitCode, result.stderr, target);
      return Buffer.alloc(0);
    }
    return result.stdout;
  }

  /** Swallows the "empty clipboard" exit; anything else is a real failure. */
  private assertNothingCopied(exitCode: number, stderr: Buffer, target?: ClipboardTarget): void {
    const message = stderr.toString('utf-8').trim();
    if (NOTHING_COPIED.test(message)) {
      log.debug({ exitCode, target, message }, 'Clipboard has nothing to offer');
      return;
    }
    throw new ClipboardReadError(
      this.name,
      message || `wl-paste exited with status ${exitCode}`,
      { exitCode, target }
    );
  }
}

clipboardBackends.register({
  name: 'wayland',
  detect: env => Boolean(env.WAYLAND_DISPLAY),
  create: options => new WaylandClipboard(options)
});
