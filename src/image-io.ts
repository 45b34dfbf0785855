/**
 * Format-detecting image file I/O
 *
 * Reads PPM (P6/P3) or PNG files, choosing the decoder from the magic
 * bytes rather than the file extension, and writes either format.
 */

import type { Image } from './image.js';
import { readFileBytes, writeEncodedImage } from './ppm-file.js';
import { decodePpm } from './ppm-parser.js';
import { encodePpm } from './ppm-writer.js';
import { imageToPng, pngToImage } from './png-interop.js';
import type { ImageReadResult, ImageWriteOptions } from './types.js';
import { detectImageFormat } from './utils.js';

/**
 * Decode an in-memory PPM or PNG file
 */
export function decodeImage(bytes: Uint8Array): ImageReadResult {
  const format = detectImageFormat(bytes);
  switch (format) {
    case 'ppm':
      return decodePpm(bytes);
    case 'png':
      return pngToImage(bytes);
    default:
      return { ok: false, error: 'Unrecognised image format' };
  }
}

/**
 * Read a PPM or PNG file. Resolves { ok: false } for missing files, I/O
 * errors, unknown formats and malformed contents.
 */
export async function readImage(path: string): Promise<ImageReadResult> {
  let bytes: Uint8Array;
  try {
    bytes = await readFileBytes(path);
  } catch (err) {
    return { ok: false, error: `Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}` };
  }
  return decodeImage(bytes);
}

/**
 * Encode a true-color image in the requested format (binary PPM by default)
 */
export function encodeImage(image: Image<'true-color'>, options: ImageWriteOptions = {}): Uint8Array {
  const format = options.format ?? 'ppm-binary';
  switch (format) {
    case 'ppm-binary':
      return encodePpm(image, { binary: true });
    case 'ppm-text':
      return encodePpm(image, { binary: false });
    case 'png':
      return imageToPng(image);
    default:
      throw new Error(`Unsupported output format: ${String(format)}`);
  }
}

/**
 * Write a true-color image to path. Resolves true on success and false
 * for an empty image or an I/O error.
 */
export async function writeImage(
  image: Image<'true-color'>,
  path: string,
  options: ImageWriteOptions = {}
): Promise<boolean> {
  return writeEncodedImage(image, path, (source) => encodeImage(source, options));
}
