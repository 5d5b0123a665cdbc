/**
 * Shared fakes for the exporter and backend tests.
 */

import {
  ClipboardBackend,
  ClipboardTarget,
  CommandResult,
  CommandRunner,
  DialogBackend,
  Reporter,
  RunOptions,
  SaveDialogRequest
} from '../core/types';

export function result(exitCode: number, stdout = '', stderr = ''): CommandResult {
  return { exitCode, stdout: Buffer.from(stdout), stderr: Buffer.from(stderr) };
}

export interface RecordedCall {
  file: string;
  args: string[];
  options?: RunOptions;
}

/** A CommandRunner that answers each call with the next scripted result (or throws it). */
export function scriptedRunner(...script: Array<CommandResult | Error>): { run: CommandRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const run: CommandRunner = async (file, args, options) => {
    calls.push({ file, args: [...args], options });
    const next = script.shift();
    if (next === undefined) throw new Error(`Unexpected call: ${file} ${args.join(' ')}`);
    if (next instanceof Error) throw next;
    return next;
  };
  return { run, calls };
}

export class FakeClipboard implements ClipboardBackend {
  readonly name = 'fake-clipboard';
  readonly reads: ClipboardTarget[] = [];

  constructor(
    private readonly targets: ClipboardTarget[],
    private readonly payloads: Record<ClipboardTarget, Buffer | string> = {},
    private readonly failWith?: Error
  ) {}

  async listTargets(): Promise<ClipboardTarget[]> {
    if (this.failWith) throw this.failWith;
    return [...this.targets];
  }

  async read(target: ClipboardTarget): Promise<Buffer> {
    this.reads.push(target);
    const payload = this.payloads[target] ?? '';
    return typeof payload === 'string' ? Buffer.from(payload, 'utf-8') : payload;
  }
}

export class FakeDialog implements DialogBackend {
  readonly name = 'fake-dialog';
  readonly requests: SaveDialogRequest[] = [];

  constructor(private readonly answer: string | null | Error) {}

  async showSaveDialog(request: SaveDialogRequest): Promise<string | null> {
    this.requests.push(request);
    if (this.answer instanceof Error) throw this.answer;
    return this.answer;
  }
}

export class RecordingReporter implements Reporter {
  readonly out: string[] = [];
  readonly err: string[] = [];

  info(message: string): void {
    this.out.push(message);
  }

  error(message: string): void {
    this.err.push(message);
  }
}
