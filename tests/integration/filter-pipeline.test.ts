import { after, before, describe, test } from 'node:test';
import assert from 'node:assert';
import * as path from 'node:path';
import { HDR_COLOR_DEPTH, TRUE_COLOR_DEPTH } from '../../src/color-depth.js';
import { boxBlur, edgeDetect, grayscale } from '../../src/convolution.js';
import { clearComponent, crop, cropExtendedEdges, extendEdges, scaleComponent } from '../../src/filters.js';
import type { Image } from '../../src/image.js';
import { readImage, writeImage } from '../../src/image-io.js';
import { readPpm, writePpm } from '../../src/ppm-file.js';
import { RgbIndex } from '../../src/types.js';
import type { ImageReadResult } from '../../src/types.js';
import { createBlurPattern, createGradientImage } from '../../src/test-utils/image-fixtures.js';
import { createScratchDir, fixturePath, removeScratchDir } from '../utils/test-paths.js';

function decoded(result: ImageReadResult): Image<'true-color'> {
  assert.ok(result.ok, result.ok ? undefined : result.error);
  return result.image;
}

describe('filter pipelines', () => {
  let scratch = '';

  before(() => {
    scratch = createScratchDir();
  });

  after(() => {
    removeScratchDir(scratch);
  });

  test('a padded image survives a trip through a file', async () => {
    const original = decoded(await readPpm(fixturePath('commented-3x2.ppm')));
    const file = path.join(scratch, 'padded.ppm');
    assert.strictEqual(await writePpm(extendEdges(original, 4), file), true);

    const padded = decoded(await readPpm(file));
    assert.strictEqual(padded.width, 11);
    assert.strictEqual(padded.height, 10);
    assert.ok(cropExtendedEdges(padded, 4).equals(original));
  });

  test('filters give the same result in either depth', () => {
    const image = createGradientImage(12, 9);
    const viaHdr = crop(clearComponent(image.convertTo(HDR_COLOR_DEPTH), RgbIndex.BLUE), 2, 1, 6, 5);
    const direct = crop(clearComponent(image, RgbIndex.BLUE), 2, 1, 6, 5);
    assert.ok(viaHdr.convertTo(TRUE_COLOR_DEPTH).equals(direct));
  });

  test('HDR filtering stays close to true-color filtering', () => {
    const image = createGradientImage(10, 10);
    const viaHdr = scaleComponent(image.convertTo(HDR_COLOR_DEPTH), RgbIndex.GREEN, 0.5).convertTo(TRUE_COLOR_DEPTH);
    const direct = scaleComponent(image, RgbIndex.GREEN, 0.5);
    assert.ok(viaHdr.almostEqual(direct, 1));
  });

  test('blurred and edge-detected patterns can be saved as PNG and PPM', async () => {
    const blurred = boxBlur(createBlurPattern(), 2);
    const edges = edgeDetect(blurred);
    const gray = grayscale(blurred);

    for (const [name, image] of [['blurred', blurred], ['edges', edges], ['gray', gray]] as const) {
      for (const format of ['png', 'ppm-binary'] as const) {
        const file = path.join(scratch, `${name}.${format === 'png' ? 'png' : 'ppm'}`);
        assert.strictEqual(await writeImage(image, file, { format }), true);
        assert.ok(decoded(await readImage(file)).equals(image), `${name} as ${format}`);
      }
    }
  });

  test('edges of the test pattern lie around the squares', () => {
    const edges = edgeDetect(createBlurPattern());
    assert.deepStrictEqual(edges.pixel(5, 5).toArray(), [0, 0, 0]);
    assert.deepStrictEqual(edges.pixel(25, 25).toArray(), [0, 0, 0]);
    assert.strictEqual(edges.pixel(20, 25).red, 255);
  });
});
