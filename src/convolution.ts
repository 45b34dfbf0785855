/**
 * Convolution filters
 *
 * Grayscale conversion, Sobel edge detection and box blur. Kernels are
 * evaluated against a clamp-to-edge padded copy of the input (see
 * extendEdges), so they never read outside the buffer, and results are
 * written to a separate image, so no kernel reads a pixel that has already
 * been overwritten.
 */

import { Image } from './image.js';
import { Pixel } from './pixel.js';
import { cropExtendedEdges, extendEdges, requireNonEmpty } from './filters.js';
import { RgbIndex } from './types.js';
import type { DepthKind } from './types.js';

/**
 * Square convolution kernel with odd side length, indexed [row][column]
 */
export type Kernel = readonly (readonly number[])[];

/**
 * Sobel kernel for the horizontal gradient
 */
export const SOBEL_X: Kernel = [
  [-1, 0, 1],
  [-2, 0, 2],
  [-1, 0, 1]
];

/**
 * Sobel kernel for the vertical gradient
 */
export const SOBEL_Y: Kernel = [
  [-1, -2, -1],
  [0, 0, 0],
  [1, 2, 1]
];

/**
 * Luma weights for red, green and blue
 */
export const LUMA_WEIGHTS = { red: 0.2, green: 0.7, blue: 0.1 } as const;

/**
 * Unit-weight kernel of side 2 * radius + 1. Summing with it and dividing
 * by its size gives the neighbourhood mean.
 */
export function boxKernel(radius: number): Kernel {
  if (!Number.isInteger(radius) || radius <= 0) {
    throw new RangeError(`Box radius must be a positive integer, got ${radius}`);
  }
  const side = 2 * radius + 1;
  return Array.from({ length: side }, () => new Array<number>(side).fill(1));
}

/**
 * Weighted sum of one channel over the kernel-sized neighbourhood centred
 * on (x, y). The whole neighbourhood must lie inside image.
 */
export function applyKernel<K extends DepthKind>(
  image: Image<K>,
  x: number,
  y: number,
  kernel: Kernel,
  channel: RgbIndex
): number {
  const side = kernel.length;
  if (side % 2 !== 1 || kernel.some((row) => row.length !== side)) {
    throw new Error(`Kernel must be square with odd side length, got ${side} rows`);
  }
  const radius = (side - 1) / 2;
  if (!image.isX(x - radius) || !image.isX(x + radius) || !image.isY(y - radius) || !image.isY(y + radius)) {
    throw new RangeError(`Kernel of radius ${radius} at (${x}, ${y}) reads outside ${image.width}x${image.height} image`);
  }

  let sum = 0;
  for (let j = 0; j < side; j++) {
    const row = kernel[j];
    for (let i = 0; i < side; i++) {
      const weight = row[i];
      if (weight !== 0) {
        sum += weight * image.pixel(x + i - radius, y + j - radius).get(channel);
      }
    }
  }
  return sum;
}

/**
 * Convert to grayscale. Every pixel becomes a gray whose intensity is the
 * luma 0.2 R + 0.7 G + 0.1 B, stored in the image's own sample type
 * (integer depths truncate).
 */
export function grayscale<K extends DepthKind>(before: Image<K>): Image<K> {
  requireNonEmpty(before, 'grayscale');

  const depth = before.depth;
  const after = new Image(depth, before.width, before.height);
  for (let y = 0; y < before.height; y++) {
    for (let x = 0; x < before.width; x++) {
      const pixel = before.pixel(x, y);
      const luma =
        pixel.red * LUMA_WEIGHTS.red + pixel.green * LUMA_WEIGHTS.green + pixel.blue * LUMA_WEIGHTS.blue;
      const gray = depth.clamp(depth.narrow(luma));
      after.pixel(x, y).assign(gray, gray, gray);
    }
  }
  return after;
}

/**
 * Sobel edge detection. before is converted to grayscale and padded by one
 * pixel; each interior pixel of the padded image gets the gradient
 * magnitude sqrt(gx^2 + gy^2), clamped to the depth's range, in all three
 * channels; the padding is then cropped away again.
 */
export function edgeDetect<K extends DepthKind>(before: Image<K>): Image<K> {
  requireNonEmpty(before, 'edgeDetect');

  const depth = before.depth;
  const padded = extendEdges(grayscale(before), 1);
  const magnitudes = new Image(depth, padded.width, padded.height);

  for (let y = 1; y < padded.height - 1; y++) {
    for (let x = 1; x < padded.width - 1; x++) {
      // The grayscale image has equal channels, so red stands for all three
      const gx = applyKernel(padded, x, y, SOBEL_X, RgbIndex.RED);
      const gy = applyKernel(padded, x, y, SOBEL_Y, RgbIndex.RED);
      const magnitude = depth.clamp(depth.narrow(Math.sqrt(gx * gx + gy * gy)));
      magnitudes.pixel(x, y).assign(magnitude, magnitude, magnitude);
    }
  }

  return cropExtendedEdges(magnitudes, 1);
}

/**
 * Box blur. Each output channel is the mean of that channel over the
 * (2 * radius + 1)^2 neighbourhood of the pixel, with clamp-to-edge
 * padding so border pixels also average over a full window. Means are
 * stored in the image's own sample type (integer depths truncate).
 */
export function boxBlur<K extends DepthKind>(before: Image<K>, radius: number): Image<K> {
  requireNonEmpty(before, 'boxBlur');
  const kernel = boxKernel(radius);
  const count = kernel.length * kernel.length;

  const depth = before.depth;
  const padded = extendEdges(before, radius);
  const after = new Image(depth, before.width, before.height);
  // Mean taken as centre plus mean deviation: a flat window yields the
  // centre sample exactly, also in HDR depth
  const mean = (x: number, y: number, channel: RgbIndex): number => {
    const center = padded.pixel(x, y).get(channel);
    let deviation = 0;
    for (let j = 0; j < kernel.length; j++) {
      for (let i = 0; i < kernel.length; i++) {
        const sample = padded.pixel(x + i - radius, y + j - radius).get(channel);
        deviation += kernel[j][i] * (sample - center);
      }
    }
    return depth.clamp(depth.narrow(center + deviation / count));
  };

  for (let y = 0; y < before.height; y++) {
    for (let x = 0; x < before.width; x++) {
      const px = x + radius;
      const py = y + radius;
      after.setPixel(
        x,
        y,
        Pixel.of(depth, mean(px, py, RgbIndex.RED), mean(px, py, RgbIndex.GREEN), mean(px, py, RgbIndex.BLUE))
      );
    }
  }
  return after;
}
