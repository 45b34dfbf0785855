/**
 * PNG interchange
 *
 * Converts true-color images to and from 8-bit PNG through pngjs, so filter
 * results can be inspected with ordinary image viewers. PNG alpha is
 * written fully opaque and ignored on read.
 */

import { PNG } from 'pngjs';
import { TRUE_COLOR_DEPTH } from './color-depth.js';
import { Image } from './image.js';
import type { ImageReadResult } from './types.js';
import { isPngSignature } from './utils.js';

/**
 * Encode a true-color image as an RGBA PNG
 */
export function imageToPng(image: Image<'true-color'>): Uint8Array {
  if (image.isEmpty()) {
    throw new Error('Cannot encode an empty image as PNG');
  }

  const png = new PNG({ width: image.width, height: image.height });
  for (let y = 0; y < image.height; y++) {
    for (let x = 0; x < image.width; x++) {
      const pixel = image.pixel(x, y);
      const offset = (y * image.width + x) * 4;
      png.data[offset] = pixel.red;
      png.data[offset + 1] = pixel.green;
      png.data[offset + 2] = pixel.blue;
      png.data[offset + 3] = 255;
    }
  }

  const encoded = PNG.sync.write(png);
  return new Uint8Array(encoded.buffer, encoded.byteOffset, encoded.byteLength);
}

/**
 * Decode a PNG into a true-color image. Any PNG pngjs understands is
 * accepted (pngjs normalizes to 8-bit RGBA); malformed data resolves
 * { ok: false }.
 */
export function pngToImage(bytes: Uint8Array): ImageReadResult {
  if (!isPngSignature(bytes)) {
    return { ok: false, error: 'Invalid PNG signature' };
  }

  let png: PNG;
  try {
    png = PNG.sync.read(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  } catch (err) {
    return { ok: false, error: `Invalid PNG: ${err instanceof Error ? err.message : String(err)}` };
  }

  if (png.width <= 0 || png.height <= 0) {
    return { ok: false, error: `Invalid PNG dimensions: ${png.width}x${png.height}` };
  }

  const image = new Image(TRUE_COLOR_DEPTH, png.width, png.height);
  for (let y = 0; y < png.height; y++) {
    for (let x = 0; x < png.width; x++) {
      const offset = (y * png.width + x) * 4;
      image.pixel(x, y).assign(png.data[offset], png.data[offset + 1], png.data[offset + 2]);
    }
  }
  return { ok: true, image };
}
