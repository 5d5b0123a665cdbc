/**
 * core/exporter.ts
 *
 * ClipboardExporter runs one clipboard-to-file transfer:
 *
 *   init → enumerating-targets → retrieving-content
 *        → showing-image-dialog | showing-text-dialog | no-format-found
 *        → saved | canceled | save-failed
 *        → terminated
 *
 * Every exchange (targets, payload, dialog) is awaited in turn, so exactly one
 * is ever in flight. Nothing is retried. Clipboard, dialog and write failures
 * never escape run(): each is reported to the user and returned as an
 * ExportOutcome.
 */

import {
  ClipboardBackend,
  ClipboardContent,
  ContentKind,
  DialogBackend,
  ExportOutcome,
  ExporterState,
  Reporter,
  SaveCbConfig
} from './types';
import { InvalidStateError, describeError } from './errors';
import { scopedLogger } from './logger';
import { selectTarget } from '../clipboard/selector';
import { retrieveContent } from '../clipboard/retriever';
import { saveDialogFor } from '../dialog/filters';
import { saveText } from '../persist/text_writer';
import { saveImage } from '../persist/image_writer';

const log = scopedLogger('core/exporter');

export const UNSUPPORTED_MESSAGE = 'Clipboard is empty or contains an unsupported format.';

const LABELS: Record<ContentKind, { noun: string; failure: string }> = {
  image: { noun: 'Image', failure: 'Error saving image' },
  text:  { noun: 'Text', failure: 'Error saving text file' }
};

export interface ExporterDeps {
  clipboard: ClipboardBackend;
  dialog: DialogBackend;
  reporter: Reporter;
  config: Pick<SaveCbConfig, 'jpegQuality'>;
}

export class ClipboardExporter {
  private current: ExporterState = 'init';
  private readonly history: ExporterState[] = ['init'];

  constructor(private readonly deps: ExporterDeps) {}

  get state(): ExporterState {
    return this.current;
  }

  /** Every state visited so far, starting with 'init'. */
  get transitions(): readonly ExporterState[] {
    return this.history;
  }

  async run(): Promise<ExportOutcome> {
    if (this.current !== 'init') {
      throw new InvalidStateError('ClipboardExporter.run() may only be called once', this.current);
    }

    const outcome = await this.transfer();
    this.transition('terminated');
    log.info({ outcome: outcome.status }, 'Export finished');
    return outcome;
  }

  // -----------------------------------------------------------------------

  private async transfer(): Promise<ExportOutcome> {
    const { clipboard, reporter } = this.deps;

    let content: ClipboardContent;
    try {
      this.transition('enumerating-targets');
      const targets = await clipboard.listTargets();
      log.debug({ backend: clipboard.name, targets }, 'Targets enumerated');

      const target = selectTarget(targets);
      if (target === null) {
        this.transition('no-format-found');
        reporter.info(UNSUPPORTED_MESSAGE);
        reporter.info(`Found targets: ${targets.length > 0 ? targets.join(', ') : '(none)'}`);
        return { status: 'no-format', targets };
      }

      this.transition('retrieving-content');
      const result = await retrieveContent(clipboard, target);
      if (result.kind === 'empty' || result.kind === 'undecodable') {
        log.info({ target, result: result.kind }, 'Nothing to save');
        reporter.info(UNSUPPORTED_MESSAGE);
        return { status: 'empty', target };
      }
      content = result;
    } catch (e) {
      const { code, message } = describeError(e);
      log.warn({ code, error: message }, 'Clipboard exchange failed');
      reporter.error(`Error reading clipboard: ${message}`);
      return { status: 'failed', code, error: message };
    }

    if (content.kind === 'image') {
      const { bitmap } = content;
      return this.persist('image', (path) => saveImage(path, bitmap, this.deps.config));
    }
    const { text } = content;
    return this.persist('text', (path) => saveText(path, text));
  }

  private async persist(
    kind: ContentKind,
    write: (path: string) => Promise<unknown>
  ): Promise<ExportOutcome> {
    const { dialog, reporter } = this.deps;
    const labels = LABELS[kind];

    reporter.info(`${labels.noun} data detected. Opening save dialog...`);
    this.transition(kind === 'image' ? 'showing-image-dialog' : 'showing-text-dialog');

    let path: string | null;
    try {
      path = await dialog.showSaveDialog(saveDialogFor(kind));
    } catch (e) {
      const { code, message } = describeError(e);
      log.warn({ backend: dialog.name, code, error: message }, 'Save dialog failed');
      reporter.error(`Error opening save dialog: ${message}`);
      return { status: 'failed', code, error: message };
    }

    if (path === null) {
      this.transition('canceled');
      reporter.info(`${labels.noun} save canceled.`);
      return { status: 'canceled', kind };
    }

    try {
      await write(path);
    } catch (e) {
      const { code, message } = describeError(e);
      this.transition('save-failed');
      log.warn({ path, code, error: message }, 'Save failed');
      reporter.error(`${labels.failure}: ${message}`);
      return { status: 'save-failed', kind, path, error: message };
    }

    this.transition('saved');
    reporter.info(`${labels.noun} successfully saved to: ${path}`);
    return { status: 'saved', kind, path };
  }

  private transition(next: ExporterState): void {
    log.debug({ from: this.current, to: next }, 'State transition');
    this.current = next;
    this.history.push(next);
  }
}
