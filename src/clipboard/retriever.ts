/**
 * clipboard/retriever.ts
 *
 * Requests the payload of the selected target and decides what it is.
 * Image targets are decoded to a Bitmap through sharp; everything else must
 * be valid UTF-8 to count as text, and is kept byte for byte (a BOM
 * included).
 */

import sharp from 'sharp';
import { Bitmap, ClipboardBackend, ClipboardTarget, RetrievalResult } from '../core/types';
import { describeError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { isImageTarget } from './selector';

const log = scopedLogger('clipboard/retriever');

export async function decodeBitmap(payload: Buffer): Promise<Bitmap | null> {
  try {
    const { data, info } = await sharp(payload).raw().toBuffer({ resolveWithObject: true });
    return { width: info.width, height: info.height, channels: info.channels, pixels: data };
  } catch (e) {
    log.debug({ bytes: payload.length, error: describeError(e).message }, 'Payload is not a decodable image');
    return null;
  }
}

export function decodeText(payload: Buffer): string | null {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(payload);
  } catch (e) {
    log.debug({ bytes: payload.length, error: describeError(e).message }, 'Payload is not valid UTF-8');
    return null;
  }
}

export async function retrieveContent(
  backend: ClipboardBackend,
  target: ClipboardTarget
): Promise<RetrievalResult> {
  const payload = await backend.read(target);
  log.debug({ backend: backend.name, target, bytes: payload.length }, 'Payload received');

  if (payload.length === 0) {
    return { kind: 'empty', target };
  }

  if (isImageTarget(target)) {
    const bitmap = await decodeBitmap(payload);
    return bitmap ? { kind: 'image', target, bitmap } : { kind: 'undecodable', target };
  }

  const text = decodeText(payload);
  return text !== null ? { kind: 'text', target, text } : { kind: 'undecodable', target };
}
