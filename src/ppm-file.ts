/**
 * PPM file I/O
 *
 * Thin file layer over the in-memory codec. Reading and writing never throw
 * for environmental problems (missing file, permission denied, disk full):
 * reads resolve { ok: false }, writes resolve false.
 */

import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { Image } from './image.js';
import { decodePpm } from './ppm-parser.js';
import { encodePpm } from './ppm-writer.js';
import type { ImageReadResult, PpmWriteOptions } from './types.js';

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read the whole file at path. The handle is closed on every path out.
 */
export async function readFileBytes(path: string): Promise<Uint8Array> {
  const handle: FileHandle = await open(path, 'r');
  try {
    const buffer = await handle.readFile();
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  } finally {
    await handle.close();
  }
}

/**
 * Write bytes to path, creating or truncating the file. Resolves false
 * (after a console warning) when the file cannot be opened or written.
 */
export async function writeFileBytes(path: string, bytes: Uint8Array): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'w');
  } catch (err) {
    warn(`Cannot open ${path} for writing: ${describeError(err)}`);
    return false;
  }

  let ok = true;
  try {
    await handle.writeFile(bytes);
  } catch (err) {
    warn(`Failed writing ${path}: ${describeError(err)}`);
    ok = false;
  }

  try {
    await handle.close();
  } catch (err) {
    warn(`Failed closing ${path}: ${describeError(err)}`);
    ok = false;
  }

  return ok;
}

/**
 * Encode image and write it to path. An empty image has no valid encoding,
 * so it resolves false with a warning, the same as an I/O error.
 */
export async function writeEncodedImage(
  image: Image<'true-color'>,
  path: string,
  encode: (image: Image<'true-color'>) => Uint8Array
): Promise<boolean> {
  if (image.isEmpty()) {
    warn(`Cannot write an empty image to ${path}`);
    return false;
  }
  return writeFileBytes(path, encode(image));
}

/**
 * Write image to a PPM file at path. Binary (P6) samples are the default;
 * pass { binary: false } for text (P3) samples. Resolves true on success
 * and false for an empty image or an I/O error.
 */
export async function writePpm(
  image: Image<'true-color'>,
  path: string,
  options: PpmWriteOptions = {}
): Promise<boolean> {
  return writeEncodedImage(image, path, (source) => encodePpm(source, options));
}

/**
 * Read a P6 or P3 PPM file. Resolves { ok: false } for missing files, I/O
 * errors and malformed contents; no partially decoded image is ever
 * returned.
 */
export async function readPpm(path: string): Promise<ImageReadResult> {
  let bytes: Uint8Array;
  try {
    bytes = await readFileBytes(path);
  } catch (err) {
    return { ok: false, error: `Cannot read ${path}: ${describeError(err)}` };
  }
  return decodePpm(bytes);
}

function warn(message: string): void {
  if (typeof console !== 'undefined' && console.warn) {
    console.warn(message);
  }
}
