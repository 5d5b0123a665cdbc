/**
 * clipboard/x11.ts
 *
 * X11 CLIPBOARD selection through `xclip`. Asking for the TARGETS target
 * lists what the owner offers; any other target returns its content.
 */

import { ClipboardBackend, ClipboardBackendOptions, ClipboardTarget, CommandRunner } from '../core/types';
import { ClipboardReadError } from '../core/errors';
import { runCommand } from '../core/exec';
import { clipboardBackends } from '../core/registry';
import { scopedLogger } from '../core/logger';
import { parseTargetList } from './selector';

const log = scopedLogger('clipboard/x11');

// "Error: target image/png not available" — also what an unowned selection produces
const TARGET_NOT_AVAILABLE = /target .* not available/i;

export class X11Clipboard implements ClipboardBackend {
  readonly name = 'x11';
  private readonly run: CommandRunner;
  private readonly timeoutMs: number;

  constructor(options: ClipboardBackendOptions) {
    this.timeoutMs = options.timeoutMs;
    this.run = options.run ?? runCommand;
  }

  async listTargets(): Promise<ClipboardTarget[]> {
    const payload = await this.xclip('TARGETS');
    return parseTargetList(payload);
  }

  read(target: ClipboardTarget): Promise<Buffer> {
    return this.xclip(target);
  }

  private async xclip(target: ClipboardTarget): Promise<Buffer> {
    const result = await this.run(
      'xclip',
      ['-selection', 'clipboard', '-t', target, '-o'],
      { timeoutMs: this.timeoutMs }
    );
    if (result.exitCode === 0) return result.stdout;

    const message = result.stderr.toString('utf-8').trim();
    if (TARGET_NOT_AVAILABLE.test(message)) {
      log.debug({ target, message }, 'Target not available');
      return Buffer.alloc(0);
    }
    throw new ClipboardReadError(
      this.name,
      message || `xclip exited with status ${result.exitCode}`,
      { exitCode: result.exitCode, target }
    );
  }
}

clipboardBackends.register({
  name: 'x11',
  detect: env => Boolean(env.DISPLAY),
  create: options => new X11Clipboard(options)
});
