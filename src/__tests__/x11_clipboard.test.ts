import { X11Clipboard } from '../clipboard/x11';
import { ClipboardReadError } from '../core/errors';
import { result, scriptedRunner } from './helpers';

describe('X11 clipboard (xclip)', () => {
  it('asks for the TARGETS target to enumerate', async () => {
    const { run, calls } = scriptedRunner(result(0, 'TARGETS\nTIMESTAMP\nimage/png\n'));
    const clipboard = new X11Clipboard({ timeoutMs: 2000, run });

    await expect(clipboard.listTargets()).resolves.toEqual(['TARGETS', 'TIMESTAMP', 'image/png']);
    expect(calls).toEqual([{
      file: 'xclip',
      args: ['-selection', 'clipboard', '-t', 'TARGETS', '-o'],
      options: { timeoutMs: 2000 }
    }]);
  });

  it('treats an unowned selection as an empty clipboard', async () => {
    const { run } = scriptedRunner(result(1, '', 'Error: target TARGETS not available\n'));
    const clipboard = new X11Clipboard({ timeoutMs: 2000, run });

    await expect(clipboard.listTargets()).resolves.toEqual([]);
  });

  it('reads binary payloads untouched', async () => {
    const png = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
    const { run, calls } = scriptedRunner({ exitCode: 0, stdout: png, stderr: Buffer.alloc(0) });
    const clipboard = new X11Clipboard({ timeoutMs: 2000, run });

    const payload = await clipboard.read('image/png');

    expect(payload.equals(png)).toBe(true);
    expect(calls[0].args).toEqual(['-selection', 'clipboard', '-t', 'image/png', '-o']);
  });

  it('returns an empty payload when the target disappeared', async () => {
    const { run } = scriptedRunner(result(1, '', 'Error: target image/png not available\n'));
    const clipboard = new X11Clipboard({ timeoutMs: 2000, run });

    await expect(clipboard.read('image/png')).resolves.toHaveLength(0);
  });

  it('raises ClipboardReadError when the display cannot be opened', async () => {
    const { run } = scriptedRunner(result(1, '', "Error: Can't open display: :0\n"));
    const clipboard = new X11Clipboard({ timeoutMs: 2000, run });

    const failure = clipboard.listTargets();
    await expect(failure).rejects.toBeInstanceOf(ClipboardReadError);
    await expect(failure).rejects.toHaveProperty('message', "Error: Can't open display: :0");
  });
});
