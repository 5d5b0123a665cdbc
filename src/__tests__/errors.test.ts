import * as vm from 'vm';
import { promises as fs } from 'fs';
import { FileWriteError, InvalidStateError, describeError } from '../core/errors';

describe('describeError', () => {
  it('keeps the code of a SaveCbError', () => {
    expect(describeError(new FileWriteError('/tmp/x', 'disk full'))).toEqual({
      code: 'FILE_WRITE_ERROR',
      message: 'disk full'
    });
  });

  it('uses the bare message of an error from another realm', () => {
    const foreign: unknown = vm.runInNewContext('new Error("boom")');

    expect(foreign instanceof Error).toBe(false);
    expect(describeError(foreign)).toEqual({ code: 'UNEXPECTED_ERROR', message: 'boom' });
  });

  it('uses the bare message of an fs error', async () => {
    const error: unknown = await fs.readFile('/nonexistent/savecb/file').catch((e: unknown) => e);

    expect(describeError(error).message).toMatch(/^ENOENT: no such file or directory/);
  });

  it('accepts any object carrying a string message', () => {
    expect(describeError({ message: 'plain' })).toEqual({ code: 'UNEXPECTED_ERROR', message: 'plain' });
  });

  it('stringifies anything else', () => {
    expect(describeError(42)).toEqual({ code: 'UNEXPECTED_ERROR', message: '42' });
    expect(describeError({ message: 7 }).message).toBe('[object Object]');
  });

  it('gives InvalidStateError its own code', () => {
    expect(describeError(new InvalidStateError('nope', 'terminated')).code).toBe('INVALID_STATE');
  });
});
