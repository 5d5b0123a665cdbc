/**
 * core/exec.ts
 *
 * Runs the desktop helper tools (wl-paste, xclip, zenity, kdialog) as child
 * processes. Output is collected as raw Buffers since clipboard payloads can
 * be binary. A non-zero exit is not an error here: callers know what each
 * tool's exit codes mean.
 */

import { execFile } from 'child_process';
import { CommandResult, RunOptions } from './types';
import { CommandNotFoundError, CommandTimeoutError, ExecutionError } from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('core/exec');

const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024; // large screenshots

export function runCommand(
  file: string,
  args: readonly string[],
  options: RunOptions = {}
): Promise<CommandResult> {
  const timeoutMs = options.timeoutMs ?? 0;
  log.debug({ file, args, timeoutMs }, 'Spawning');

  return new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { encoding: 'buffer', timeout: timeoutMs, maxBuffer: options.maxBuffer ?? DEFAULT_MAX_BUFFER },
      (error, stdout, stderr) => {
        if (!error) {
          log.debug({ file, bytes: stdout.length }, 'Exited cleanly');
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }

        // `code` is the exit status for a process that ran, or an errno string when spawn failed
        const code: unknown = error.code;

        if (code === 'ENOENT') {
          reject(new CommandNotFoundError(file));
          return;
        }
        if (error.killed && timeoutMs > 0) {
          reject(new CommandTimeoutError(file, timeoutMs));
          return;
        }
        if (typeof code === 'number') {
          log.debug({ file, exitCode: code }, 'Exited with non-zero status');
          resolve({ exitCode: code, stdout, stderr });
          return;
        }

        reject(new ExecutionError(file, error.message, { signal: error.signal ?? undefined }));
      }
    );
  });
}
