/**
 * core/errors.ts
 *
 * Typed error hierarchy. Every throw site uses one of these.
 * The `code` property is what ends up in a failed ExportOutcome.
 */

import { types } from 'util';

export class SaveCbError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // fix instanceof in TS
  }
}

// ---------------------------------------------------------------------------
// Child process errors
// ---------------------------------------------------------------------------

/** The helper binary (wl-paste, xclip, zenity …) is not on PATH. */
export class CommandNotFoundError extends SaveCbError {
  constructor(command: string) {
    super(`Command not found: "${command}"`, 'COMMAND_NOT_FOUND', { command });
  }
}

/** The helper did not answer within the configured timeout and was killed. */
export class CommandTimeoutError extends SaveCbError {
  constructor(command: string, timeoutMs: number) {
    super(
      `"${command}" did not respond within ${timeoutMs}ms`,
      'TIMEOUT',
      { command, timeoutMs }
    );
  }
}

/** The helper could not be run to completion (signal, buffer overflow …). */
export class ExecutionError extends SaveCbError {
  constructor(command: string, message: string, details?: Record<string, unknown>) {
    super(message, 'EXECUTION_ERROR', { command, ...details });
  }
}

// ---------------------------------------------------------------------------
// Collaborator errors
// ---------------------------------------------------------------------------

export class ClipboardReadError extends SaveCbError {
  constructor(backend: string, message: string, details?: Record<string, unknown>) {
    super(message, 'CLIPBOARD_READ_ERROR', { backend, ...details });
  }
}

export class DialogError extends SaveCbError {
  constructor(backend: string, message: string, details?: Record<string, unknown>) {
    super(message, 'DIALOG_ERROR', { backend, ...details });
  }
}

// ---------------------------------------------------------------------------
// Persistence errors
// ---------------------------------------------------------------------------

export class ImageEncodeError extends SaveCbError {
  constructor(format: string, message: string) {
    super(message, 'IMAGE_ENCODE_ERROR', { format });
  }
}

/** Carries the underlying I/O message unchanged; that is what the user sees. */
export class FileWriteError extends SaveCbError {
  constructor(path: string, message: string) {
    super(message, 'FILE_WRITE_ERROR', { path });
  }
}

// ---------------------------------------------------------------------------
// Backend resolution errors
// ---------------------------------------------------------------------------

export class NoBackendError extends SaveCbError {
  constructor(kind: string, tried: string[]) {
    super(
      `No ${kind} backend detected (tried: ${tried.join(', ') || 'none'})`,
      'NO_BACKEND',
      { kind, tried }
    );
  }
}

export class UnknownBackendError extends SaveCbError {
  constructor(kind: string, name: string) {
    super(`Unknown ${kind} backend: "${name}"`, 'UNKNOWN_BACKEND', { kind, name });
  }
}

// ---------------------------------------------------------------------------
// Usage errors
// ---------------------------------------------------------------------------

/** An operation was called in a state that does not allow it. */
export class InvalidStateError extends SaveCbError {
  constructor(message: string, state: string) {
    super(message, 'INVALID_STATE', { state });
  }
}

// ---------------------------------------------------------------------------

// Errors raised by Node's own modules may come from another realm (a vm
// context, the Jest sandbox) where `instanceof Error` is false.
function hasMessage(e: unknown): e is { message: string } {
  return typeof e === 'object' && e !== null && 'message' in e && typeof e.message === 'string';
}

export function describeError(e: unknown): { code: string; message: string } {
  if (e instanceof SaveCbError) return { code: e.code, message: e.message };
  if (e instanceof Error || types.isNativeError(e) || hasMessage(e)) {
    return { code: 'UNEXPECTED_ERROR', message: e.message };
  }
  return { code: 'UNEXPECTED_ERROR', message: String(e) };
}
