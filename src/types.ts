import type { Image } from './image.js';

/**
 * Tag identifying one of the supported color depths
 * - 'true-color': 8-bit integer samples, maximum 255
 * - 'hdr': floating point samples normalized to [0, 1]
 */
export type DepthKind = 'true-color' | 'hdr';

/**
 * RGB channel indices
 */
export enum RgbIndex {
  RED = 0,
  GREEN = 1,
  BLUE = 2
}

/**
 * Channel values as a plain tuple, in red, green, blue order
 */
export type RgbTuple = [number, number, number];

/**
 * PPM sample encodings
 * - 'binary': "raw" P6 samples
 * - 'text': ASCII P3 samples
 */
export type PpmVariant = 'binary' | 'text';

/**
 * PPM image header information
 */
export interface PpmHeader {
  variant: PpmVariant;
  width: number;
  height: number;
  /** Largest sample value present in the file (1-65535) */
  maxval: number;
}

/**
 * Options for PPM encoding
 */
export interface PpmWriteOptions {
  /**
   * Use binary (P6) samples. Binary files are smaller, so this is the
   * default. When false, text (P3) samples are written, one row per line.
   */
  binary?: boolean;
}

/**
 * Outcome of decoding an image. Decoding never throws on malformed data and
 * never returns a partially decoded image.
 */
export type ImageReadResult =
  | { ok: true; image: Image<'true-color'> }
  | { ok: false; error: string };

/**
 * Image formats recognised from magic bytes
 */
export type ImageFormat = 'ppm' | 'png' | 'unknown';

/**
 * Output encodings supported by writeImage
 */
export type ImageOutputFormat = 'ppm-binary' | 'ppm-text' | 'png';

/**
 * Options for writeImage
 */
export interface ImageWriteOptions {
  /**
   * Output encoding
   * - 'ppm-binary': P6 (default)
   * - 'ppm-text': P3
   * - 'png': 8-bit RGBA PNG with opaque alpha
   */
  format?: ImageOutputFormat;
}
