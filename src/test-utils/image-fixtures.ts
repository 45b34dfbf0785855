/**
 * Test Image Fixture Utilities
 *
 * Creates simple test images and PPM files in memory for testing.
 */

import { TRUE_COLOR_DEPTH } from '../color-depth.js';
import { NAMED_COLORS } from '../colors.js';
import { Image } from '../image.js';
import { Pixel } from '../pixel.js';
import type { PpmVariant, RgbTuple } from '../types.js';
import { stringToBytes, writeUInt16BE } from '../utils.js';

/**
 * Build raw PPM bytes for a solid-color image with an arbitrary maxval.
 * Samples are given in the file's own [0, maxval] range.
 */
export function createTestPpm(
  width: number,
  height: number,
  color: RgbTuple,
  variant: PpmVariant = 'binary',
  maxval = 255
): Uint8Array {
  const magic = variant === 'binary' ? 'P6' : 'P3';
  const header = stringToBytes(`${magic}\n${width} ${height}\n${maxval}\n`);

  let body: Uint8Array;
  if (variant === 'text') {
    const line = `${color[0]} ${color[1]} ${color[2]}\n`;
    body = stringToBytes(line.repeat(width * height));
  } else if (maxval < 256) {
    body = new Uint8Array(width * height * 3);
    for (let i = 0; i < width * height; i++) {
      body[i * 3] = color[0];
      body[i * 3 + 1] = color[1];
      body[i * 3 + 2] = color[2];
    }
  } else {
    body = new Uint8Array(width * height * 6);
    for (let i = 0; i < width * height; i++) {
      writeUInt16BE(body, color[0], i * 6);
      writeUInt16BE(body, color[1], i * 6 + 2);
      writeUInt16BE(body, color[2], i * 6 + 4);
    }
  }

  const output = new Uint8Array(header.length + body.length);
  output.set(header, 0);
  output.set(body, header.length);
  return output;
}

/**
 * Create a gradient image: red grows left to right, blue top to bottom
 */
export function createGradientImage(width: number, height: number): Image<'true-color'> {
  const image = new Image(TRUE_COLOR_DEPTH, width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      image.pixel(x, y).assign(Math.floor((x / width) * 255), (x * 7 + y * 13) % 256, Math.floor((y / height) * 255));
    }
  }
  return image;
}

/**
 * Create an 80x80 white image with four 10x10 squares (red, green, blue and
 * maroon), a standard input for blur tests
 */
export function createBlurPattern(): Image<'true-color'> {
  const image = new Image(TRUE_COLOR_DEPTH, 80, 80, NAMED_COLORS.white());
  const squares: Array<[number, number, Pixel<'true-color'>]> = [
    [20, 20, NAMED_COLORS.red()],
    [50, 20, NAMED_COLORS.green()],
    [20, 50, NAMED_COLORS.blue()],
    [50, 50, NAMED_COLORS.maroon()]
  ];

  for (const [left, top, color] of squares) {
    for (let dy = 0; dy < 10; dy++) {
      for (let dx = 0; dx < 10; dx++) {
        image.setPixel(left + dx, top + dy, color);
      }
    }
  }
  return image;
}

/**
 * Create image bytes with specific magic bytes for format detection testing
 */
export function createMagicBytesTest(format: 'ppm-binary' | 'ppm-text' | 'png'): Uint8Array {
  switch (format) {
    case 'ppm-binary':
      return stringToBytes('P6 1 1 255\n\0\0\0');

    case 'ppm-text':
      return stringToBytes('P3 1 1 255\n 0 0 0\n');

    case 'png':
      // PNG signature: 89 50 4E 47 0D 0A 1A 0A
      return new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, ...new Array<number>(24).fill(0)]);

    default:
      throw new Error(`Unknown format: ${String(format)}`);
  }
}
