import { WaylandClipboard } from '../clipboard/wayland';
import { ClipboardReadError, CommandTimeoutError } from '../core/errors';
import { result, scriptedRunner } from './helpers';

describe('Wayland clipboard (wl-paste)', () => {
  it('lists targets with --list-types under the configured timeout', async () => {
    const { run, calls } = scriptedRunner(result(0, 'image/png\ntext/plain;charset=utf-8\nUTF8_STRING\n'));
    const clipboard = new WaylandClipboard({ timeoutMs: 1500, run });

    await expect(clipboard.listTargets()).resolves.toEqual(['image/png', 'text/plain;charset=utf-8', 'UTF8_STRING']);
    expect(calls).toEqual([{ file: 'wl-paste', args: ['--list-types'], options: { timeoutMs: 1500 } }]);
  });

  it('reports no targets when nothing is copied', async () => {
    const { run } = scriptedRunner(result(1, '', 'Nothing is copied\n'));
    const clipboard = new WaylandClipboard({ timeoutMs: 1500, run });

    await expect(clipboard.listTargets()).resolves.toEqual([]);
  });

  it('raises ClipboardReadError for any other failure', async () => {
    const { run } = scriptedRunner(result(1, '', 'Failed to connect to a Wayland server\n'));
    const clipboard = new WaylandClipboard({ timeoutMs: 1500, run });

    const failure = clipboard.listTargets();
    await expect(failure).rejects.toBeInstanceOf(ClipboardReadError);
    await expect(failure).rejects.toHaveProperty('message', 'Failed to connect to a Wayland server');
  });

  it('names the exit status when wl-paste prints nothing', async () => {
    const { run } = scriptedRunner(result(2));
    const clipboard = new WaylandClipboard({ timeoutMs: 1500, run });

    await expect(clipboard.listTargets()).rejects.toHaveProperty('message', 'wl-paste exited with status 2');
  });

  it('reads a target without the trailing newline wl-paste adds by default', async () => {
    const { run, calls } = scriptedRunner(result(0, 'hello'));
    const clipboard = new WaylandClipboard({ timeoutMs: 1500, run });

    const payload = await clipboard.read('UTF8_STRING');

    expect(payload.toString()).toBe('hello');
    expect(calls[0].args).toEqual(['--no-newline', '--type', 'UTF8_STRING']);
  });

  it('returns an empty payload when the owner no longer offers the type', async () => {
    const { run } = scriptedRunner(result(1, '', 'No suitable type of content copied\n'));
    const clipboard = new WaylandClipboard({ timeoutMs: 1500, run });

    const payload = await clipboard.read('image/png');

    expect(payload.length).toBe(0);
  });

  it('lets a timeout propagate', async () => {
    const { run } = scriptedRunner(new CommandTimeoutError('wl-paste', 1500));
    const clipboard = new WaylandClipboard({ timeoutMs: 1500, run });

    await expect(clipboard.read('image/png')).rejects.toBeInstanceOf(CommandTimeoutError);
  });
});
