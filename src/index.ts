/**
 * RGB Raster Filters
 *
 * Raster images over a small closed set of color depths, a PPM codec and
 * convolution filters, for Node.js.
 *
 * Key features:
 * - 8-bit ("true color") and normalized floating point ("HDR") depths with
 *   lossy, deterministic conversion between them
 * - PPM read/write, binary (P6) and text (P3), 8- and 16-bit samples, with
 *   header comments
 * - Filters: clear/scale channel, crop, edge padding, grayscale, Sobel edge
 *   detection and box blur
 * - PNG interchange for viewing results
 *
 * @example
 * import { readPpm, boxBlur, writePpm } from 'raster-filters';
 *
 * const result = await readPpm('photo.ppm');
 * if (result.ok) {
 *   await writePpm(boxBlur(result.image, 3), 'blurred.ppm');
 * }
 */

// Color depths and values
export {
  TRUE_COLOR_DEPTH,
  HDR_COLOR_DEPTH,
  getColorDepth
} from './color-depth.js';
export type { ColorDepth } from './color-depth.js';
export { Pixel, isRgbIndex } from './pixel.js';
export { hexColor, namedColor, parseColor, NAMED_COLORS } from './colors.js';
export type { ColorName, ColorSpec } from './colors.js';
export { Image } from './image.js';

// PPM codec
export { PpmParser, PpmFormatError, parsePpmHeader, decodePpm } from './ppm-parser.js';
export { encodePpm, createPpmHeader, PPM_MAXVAL } from './ppm-writer.js';
export { readPpm, writePpm } from './ppm-file.js';

// Filters
export {
  clearComponent,
  scaleComponent,
  crop,
  extendEdges,
  cropExtendedEdges
} from './filters.js';
export {
  grayscale,
  edgeDetect,
  boxBlur,
  applyKernel,
  boxKernel,
  SOBEL_X,
  SOBEL_Y,
  LUMA_WEIGHTS
} from './convolution.js';
export type { Kernel } from './convolution.js';

// Other formats
export { imageToPng, pngToImage } from './png-interop.js';
export { readImage, writeImage, decodeImage, encodeImage } from './image-io.js';

export * from './types.js';
export {
  detectImageFormat,
  detectPpmVariant,
  isPngSignature,
  PNG_SIGNATURE,
  PPM_MAGIC
} from './utils.js';
