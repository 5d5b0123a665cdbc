/**
 * dialog/chooser_result.ts
 *
 * zenity and kdialog share the same exit-code convention:
 * 0 = accepted (path on stdout), 1 = canceled or closed, anything else = failure.
 */

import { CommandResult } from '../core/types';
import { DialogError } from '../core/errors';

export function interpretChooserResult(backend: string, result: CommandResult): string | null {
  if (result.exitCode === 1) return null;

  if (result.exitCode !== 0) {
    const message = result.stderr.toString('utf-8').trim();
    throw new DialogError(
      backend,
      message || `${backend} exited with status ${result.exitCode}`,
      { exitCode: result.exitCode }
    );
  }

  // Only the line terminator is stripped; a path may legitimately end in spaces
  const path = result.stdout.toString('utf-8').replace(/\r?\n$/, '');
  return path.length > 0 ? path : null;
}
