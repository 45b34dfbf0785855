import { HDR_COLOR_DEPTH } from './color-depth.js';
import { Image } from './image.js';
import { isRgbIndex } from './pixel.js';
import type { DepthKind, RgbIndex } from './types.js';

/**
 * Throw unless before has pixels to filter
 */
export function requireNonEmpty<K extends DepthKind>(before: Image<K>, filter: string): void {
  if (before.isEmpty()) {
    throw new Error(`${filter} requires a non-empty image`);
  }
}

function requireChannel(channel: number): void {
  if (!isRgbIndex(channel)) {
    throw new RangeError(`Invalid RGB index: ${channel}`);
  }
}

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Copy before, setting one channel of every pixel to zero. For example
 * clearing RgbIndex.RED leaves green and blue unchanged and every red
 * intensity at 0.
 */
export function clearComponent<K extends DepthKind>(before: Image<K>, channel: RgbIndex): Image<K> {
  requireNonEmpty(before, 'clearComponent');
  requireChannel(channel);

  const after = before.clone();
  for (let y = 0; y < after.height; y++) {
    for (let x = 0; x < after.width; x++) {
      after.pixel(x, y).set(channel, 0);
    }
  }
  return after;
}

/**
 * Copy before, multiplying one channel of every pixel by factor. The
 * arithmetic is done in HDR depth and the scaled intensity is capped at
 * full intensity before converting back to the image's depth.
 */
export function scaleComponent<K extends DepthKind>(
  before: Image<K>,
  channel: RgbIndex,
  factor: number
): Image<K> {
  requireNonEmpty(before, 'scaleComponent');
  requireChannel(channel);
  if (!Number.isFinite(factor) || factor < 0) {
    throw new RangeError(`Scale factor must be a finite non-negative number, got ${factor}`);
  }

  const after = new Image(before.depth, before.width, before.height);
  for (let y = 0; y < before.height; y++) {
    for (let x = 0; x < before.width; x++) {
      const hdr = before.pixel(x, y).convertTo(HDR_COLOR_DEPTH);
      hdr.set(channel, Math.min(hdr.get(channel) * factor, HDR_COLOR_DEPTH.maxValue));
      after.setPixel(x, y, hdr.convertTo(before.depth));
    }
  }
  return after;
}

/**
 * Copy the rectangle with top-left corner (left, top) and the given
 * dimensions out of before. The rectangle must lie entirely inside before.
 */
export function crop<K extends DepthKind>(
  before: Image<K>,
  left: number,
  top: number,
  width: number,
  height: number
): Image<K> {
  requireNonEmpty(before, 'crop');
  requirePositiveInteger('Crop width', width);
  requirePositiveInteger('Crop height', height);
  if (
    !before.isX(left) ||
    !before.isY(top) ||
    !before.isX(left + width - 1) ||
    !before.isY(top + height - 1)
  ) {
    throw new RangeError(
      `Crop rectangle ${width}x${height} at (${left}, ${top}) exceeds ${before.width}x${before.height} image`
    );
  }

  const after = new Image(before.depth, width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      after.setPixel(x, y, before.pixel(left + x, top + y));
    }
  }
  return after;
}

/**
 * Extend the edges of an image by padRadius pixels on every side, as a
 * preprocessing step for convolution filters. The layout of the result is
 *
 *     +-+-------+-+
 *     |A|   B   |C|
 *     +-+-------+-+
 *     | |       | |
 *     |D|   E   |F|
 *     | |       | |
 *     +-+-------+-+
 *     |G|   H   |I|
 *     +-+-------+-+
 *
 * where E is a copy of before; B and H repeat the top and bottom rows; D and
 * F repeat the leftmost and rightmost columns; and the corner squares A, C,
 * G and I repeat the nearest corner pixel. The result measures
 * (width + 2 * padRadius) x (height + 2 * padRadius).
 */
export function extendEdges<K extends DepthKind>(before: Image<K>, padRadius: number): Image<K> {
  requireNonEmpty(before, 'extendEdges');
  requirePositiveInteger('Pad radius', padRadius);

  const after = new Image(before.depth, before.width + 2 * padRadius, before.height + 2 * padRadius);
  const lastX = before.width - 1;
  const lastY = before.height - 1;

  // Every output pixel copies the nearest pixel of before: clamping the
  // source coordinate covers the center, the strips and the corners alike.
  for (let y = 0; y < after.height; y++) {
    const sourceY = Math.min(Math.max(y - padRadius, 0), lastY);
    for (let x = 0; x < after.width; x++) {
      const sourceX = Math.min(Math.max(x - padRadius, 0), lastX);
      after.setPixel(x, y, before.pixel(sourceX, sourceY));
    }
  }
  return after;
}

/**
 * Undo extendEdges: crop padRadius pixels from every side of before
 */
export function cropExtendedEdges<K extends DepthKind>(before: Image<K>, padRadius: number): Image<K> {
  requireNonEmpty(before, 'cropExtendedEdges');
  requirePositiveInteger('Pad radius', padRadius);
  if (before.width <= 2 * padRadius || before.height <= 2 * padRadius) {
    throw new RangeError(
      `Pad radius ${padRadius} leaves nothing of ${before.width}x${before.height} image`
    );
  }

  return crop(before, padRadius, padRadius, before.width - 2 * padRadius, before.height - 2 * padRadius);
}
