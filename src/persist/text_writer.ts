/**
 * persist/text_writer.ts
 */

import { promises as fs } from 'fs';
import { FileWriteError, describeError } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('persist/text_writer');

/** Writes the text verbatim as UTF-8, replacing whatever was at `path`. */
export async function saveText(path: string, text: string): Promise<void> {
  try {
    await fs.writeFile(path, text, 'utf-8');
  } catch (e) {
    throw new FileWriteError(path, describeError(e).message);
  }
  log.debug({ path, chars: text.length }, 'Text written');
}
