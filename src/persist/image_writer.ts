/**
 * persist/image_writer.ts
 *
 * Encodes a Bitmap with sharp and writes it out. The codec comes from the
 * path alone: ".jpg"/".jpeg" means JPEG, every other name (".png", ".bmp",
 * ".gif", no extension at all) gets PNG bytes.
 */

import { promises as fs } from 'fs';
import sharp from 'sharp';
import { Bitmap } from '../core/types';
import { FileWriteError, ImageEncodeError, describeError } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('persist/image_writer');

export type ImageCodec = 'png' | 'jpeg';

export interface ImageWriteOptions {
  jpegQuality: number;
}

// Case-sensitive, like the suffix check it mirrors: "photo.JPG" is written as PNG
export function codecForPath(path: string): ImageCodec {
  return path.endsWith('.jpg') || path.endsWith('.jpeg') ? 'jpeg' : 'png';
}

export async function encodeBitmap(
  bitmap: Bitmap,
  codec: ImageCodec,
  options: ImageWriteOptions
): Promise<Buffer> {
  const { width, height, channels } = bitmap;

  try {
    const image = sharp(bitmap.pixels, { raw: { width, height, channels } });
    if (codec === 'jpeg') {
      // JPEG has no alpha channel
      return await image.flatten({ background: '#ffffff' }).jpeg({ quality: options.jpegQuality }).toBuffer();
    }
    return await image.png().toBuffer();
  } catch (e) {
    throw new ImageEncodeError(codec, describeError(e).message);
  }
}

export async function saveImage(path: string, bitmap: Bitmap, options: ImageWriteOptions): Promise<ImageCodec> {
  const codec = codecForPath(path);
  const encoded = await encodeBitmap(bitmap, codec, options);

  try {
    await fs.writeFile(path, encoded);
  } catch (e) {
    throw new FileWriteError(path, describeError(e).message);
  }

  log.debug({ path, codec, bytes: encoded.length, width: bitmap.width, height: bitmap.height }, 'Image written');
  return codec;
}
