import { test } from 'node:test';
import assert from 'node:assert';
import { PNG } from 'pngjs';
import { TRUE_COLOR_DEPTH } from '../../src/color-depth.js';
import { Image } from '../../src/image.js';
import { imageToPng, pngToImage } from '../../src/png-interop.js';
import { isPngSignature, stringToBytes } from '../../src/utils.js';
import { createGradientImage, createMagicBytesTest } from '../../src/test-utils/image-fixtures.js';

test('imageToPng writes an opaque RGBA PNG', () => {
  const image = createGradientImage(6, 4);
  const bytes = imageToPng(image);
  assert.ok(isPngSignature(bytes));

  const png = PNG.sync.read(Buffer.from(bytes));
  assert.strictEqual(png.width, 6);
  assert.strictEqual(png.height, 4);

  const offset = (2 * 6 + 3) * 4;
  assert.deepStrictEqual(Array.from(png.data.subarray(offset, offset + 4)), [...image.pixel(3, 2).toArray(), 255]);
});

test('pngToImage reads back what imageToPng wrote', () => {
  const image = createGradientImage(13, 7);
  const result = pngToImage(imageToPng(image));
  assert.ok(result.ok);
  assert.ok(result.image.equals(image));
});

test('pngToImage drops alpha', () => {
  const png = new PNG({ width: 1, height: 1 });
  png.data[0] = 10;
  png.data[1] = 20;
  png.data[2] = 30;
  png.data[3] = 0;
  const result = pngToImage(PNG.sync.write(png));
  assert.ok(result.ok);
  assert.deepStrictEqual(result.image.pixel(0, 0).toArray(), [10, 20, 30]);
});

test('pngToImage rejects data without the PNG signature', () => {
  const result = pngToImage(stringToBytes('P6 1 1 255\n\0\0\0'));
  assert.deepStrictEqual(result, { ok: false, error: 'Invalid PNG signature' });
});

test('pngToImage reports malformed chunks instead of throwing', () => {
  const result = pngToImage(createMagicBytesTest('png'));
  assert.ok(!result.ok);
  assert.match(result.error, /^Invalid PNG: /);
});

test('imageToPng refuses an empty image', () => {
  assert.throws(() => imageToPng(new Image(TRUE_COLOR_DEPTH)), /Cannot encode an empty image as PNG/);
});
