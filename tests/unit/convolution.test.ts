import { describe, test } from 'node:test';
import assert from 'node:assert';
import { HDR_COLOR_DEPTH, TRUE_COLOR_DEPTH } from '../../src/color-depth.js';
import { NAMED_COLORS } from '../../src/colors.js';
import { applyKernel, boxBlur, boxKernel, edgeDetect, grayscale, SOBEL_X, SOBEL_Y } from '../../src/convolution.js';
import { Image } from '../../src/image.js';
import { Pixel } from '../../src/pixel.js';
import { RgbIndex } from '../../src/types.js';
import { createBlurPattern } from '../../src/test-utils/image-fixtures.js';

/**
 * Build a true-color image from rows of gray levels
 */
function grayImage(rows: number[][]): Image<'true-color'> {
  const image = new Image(TRUE_COLOR_DEPTH, rows[0].length, rows.length);
  rows.forEach((row, y) => {
    row.forEach((level, x) => image.pixel(x, y).assign(level, level, level));
  });
  return image;
}

function redChannel(image: Image<'true-color'>): number[][] {
  const rows: number[][] = [];
  for (let y = 0; y < image.height; y++) {
    const row: number[] = [];
    for (let x = 0; x < image.width; x++) {
      row.push(image.pixel(x, y).red);
    }
    rows.push(row);
  }
  return rows;
}

describe('boxKernel', () => {
  test('is a square of ones', () => {
    assert.deepStrictEqual(boxKernel(1), [
      [1, 1, 1],
      [1, 1, 1],
      [1, 1, 1]
    ]);
    assert.strictEqual(boxKernel(3).length, 7);
  });

  test('rejects a non-positive radius', () => {
    assert.throws(() => boxKernel(0), /Box radius must be a positive integer, got 0/);
  });
});

describe('applyKernel', () => {
  // red = x + 3y
  const ramp = new Image(TRUE_COLOR_DEPTH, 3, 3);
  for (let y = 0; y < 3; y++) {
    for (let x = 0; x < 3; x++) {
      ramp.pixel(x, y).red = x + 3 * y;
    }
  }

  test('sums the weighted neighbourhood', () => {
    assert.strictEqual(applyKernel(ramp, 1, 1, boxKernel(1), RgbIndex.RED), 36);
    assert.strictEqual(applyKernel(ramp, 1, 1, SOBEL_X, RgbIndex.RED), 8);
    assert.strictEqual(applyKernel(ramp, 1, 1, SOBEL_Y, RgbIndex.RED), 24);
    assert.strictEqual(applyKernel(ramp, 1, 1, boxKernel(1), RgbIndex.GREEN), 0);
  });

  test('refuses to read outside the image', () => {
    assert.throws(() => applyKernel(ramp, 0, 0, SOBEL_X, RgbIndex.RED), /reads outside 3x3 image/);
  });

  test('requires a square kernel with odd side', () => {
    assert.throws(() => applyKernel(ramp, 1, 1, [[1, 1]], RgbIndex.RED), /Kernel must be square/);
    assert.throws(() => applyKernel(ramp, 1, 1, [[1, 1], [1, 1]], RgbIndex.RED), /Kernel must be square/);
  });
});

describe('grayscale', () => {
  test('weights red, green and blue by 0.2, 0.7 and 0.1', () => {
    const image = new Image(TRUE_COLOR_DEPTH, 3, 2);
    image.pixel(0, 0).assign(100, 200, 50);
    image.pixel(1, 0).assign(255, 255, 255);
    image.pixel(2, 0).assign(0, 0, 0);
    image.pixel(0, 1).assign(255, 0, 0);
    image.pixel(1, 1).assign(0, 255, 0);
    image.pixel(2, 1).assign(0, 0, 255);

    const gray = grayscale(image);
    // 178.5 and 25.5 truncate
    assert.deepStrictEqual(redChannel(gray), [
      [165, 255, 0],
      [51, 178, 25]
    ]);
    assert.deepStrictEqual(gray.pixel(0, 0).toArray(), [165, 165, 165]);
  });

  test('keeps fractional intensities in HDR depth', () => {
    const image = new Image(HDR_COLOR_DEPTH, 2, 2, Pixel.of(HDR_COLOR_DEPTH, 0.5, 0.5, 0.5));
    const expected = new Image(HDR_COLOR_DEPTH, 2, 2, Pixel.of(HDR_COLOR_DEPTH, 0.5, 0.5, 0.5));
    assert.ok(grayscale(image).almostEqual(expected, 1e-9));
  });

  test('rejects an empty image', () => {
    assert.throws(() => grayscale(new Image(TRUE_COLOR_DEPTH)), /grayscale requires a non-empty image/);
  });
});

describe('edgeDetect', () => {
  test('a flat image has no edges', () => {
    const silver = new Image(TRUE_COLOR_DEPTH, 5, 4, NAMED_COLORS.silver());
    assert.ok(edgeDetect(silver).equals(new Image(TRUE_COLOR_DEPTH, 5, 4)));

    const hdr = new Image(HDR_COLOR_DEPTH, 3, 3, Pixel.of(HDR_COLOR_DEPTH, 0.2, 0.4, 0.6));
    assert.ok(edgeDetect(hdr).almostEqual(new Image(HDR_COLOR_DEPTH, 3, 3), 1e-9));
  });

  test('responds to a horizontal step', () => {
    assert.deepStrictEqual(redChannel(edgeDetect(grayImage([[0, 0, 50]]))), [[0, 200, 200]]);
  });

  test('responds to a vertical step', () => {
    assert.deepStrictEqual(redChannel(edgeDetect(grayImage([[0], [0], [50]]))), [[0], [200], [200]]);
  });

  test('combines both gradients into a magnitude', () => {
    const edges = edgeDetect(grayImage([
      [0, 0],
      [0, 50]
    ]));
    // sqrt(50^2 + 50^2), sqrt(50^2 + 150^2) and sqrt(150^2 + 150^2), truncated
    assert.deepStrictEqual(redChannel(edges), [
      [70, 158],
      [158, 212]
    ]);
  });

  test('clamps strong edges to full intensity', () => {
    const edges = edgeDetect(grayImage([[0, 0, 255, 255]]));
    assert.deepStrictEqual(redChannel(edges), [[0, 255, 255, 0]]);
    assert.deepStrictEqual(edges.pixel(1, 0).toArray(), [255, 255, 255]);
  });
});

describe('boxBlur', () => {
  test('a flat image stays flat', () => {
    const teal = new Image(TRUE_COLOR_DEPTH, 7, 5, NAMED_COLORS.teal());
    assert.ok(boxBlur(teal, 2).equals(teal));

    const hdr = new Image(HDR_COLOR_DEPTH, 4, 4, Pixel.of(HDR_COLOR_DEPTH, 0.3, 0.6, 0.9));
    assert.ok(boxBlur(hdr, 1).equals(hdr));
    assert.deepStrictEqual(boxBlur(hdr, 2).pixel(1, 1).toArray(), [0.3, 0.6, 0.9]);
  });

  test('averages over the neighbourhood with repeated edges', () => {
    const image = new Image(TRUE_COLOR_DEPTH, 3, 1);
    image.pixel(0, 0).red = 0;
    image.pixel(1, 0).red = 30;
    image.pixel(2, 0).red = 60;
    const blurred = boxBlur(image, 1);
    assert.deepStrictEqual(redChannel(blurred), [[10, 30, 50]]);
    assert.strictEqual(blurred.pixel(1, 0).green, 0);
  });

  test('truncates means in true-color depth', () => {
    // windows sum to 0, 30 and 60 over nine pixels
    assert.deepStrictEqual(redChannel(boxBlur(grayImage([[0, 0, 10]]), 1)), [[0, 3, 6]]);
  });

  test('softens the edges of the test pattern', () => {
    const pattern = createBlurPattern();
    const blurred = boxBlur(pattern, 3);
    assert.strictEqual(blurred.width, 80);
    assert.strictEqual(blurred.height, 80);
    assert.deepStrictEqual(blurred.pixel(5, 5).toArray(), [255, 255, 255]);
    assert.deepStrictEqual(blurred.pixel(25, 25).toArray(), [255, 0, 0]);
    // three of seven window columns are red: 4 * 7 * 255 / 49
    assert.deepStrictEqual(blurred.pixel(19, 25).toArray(), [255, 145, 145]);
  });

  test('rejects a bad radius or an empty image', () => {
    assert.throws(() => boxBlur(new Image(TRUE_COLOR_DEPTH, 2, 2), 0), RangeError);
    assert.throws(() => boxBlur(new Image(TRUE_COLOR_DEPTH), 1), /boxBlur requires a non-empty image/);
  });
});
