/**
 * Basic usage example for raster-filters
 *
 * Builds a small test pattern, runs it through each filter and writes the
 * results next to this file as PPM and PNG.
 */

import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  boxBlur,
  clearComponent,
  edgeDetect,
  grayscale,
  HDR_COLOR_DEPTH,
  Image,
  NAMED_COLORS,
  readPpm,
  RgbIndex,
  scaleComponent,
  TRUE_COLOR_DEPTH,
  writeImage,
  writePpm
} from '../src/index.js';

const outputDir = dirname(fileURLToPath(import.meta.url));

function createPattern(): Image<'true-color'> {
  const image = new Image(TRUE_COLOR_DEPTH, 60, 40, NAMED_COLORS.silver());
  for (let y = 10; y < 30; y++) {
    for (let x = 10; x < 25; x++) {
      image.setPixel(x, y, NAMED_COLORS.maroon());
    }
    for (let x = 35; x < 50; x++) {
      image.setPixel(x, y, NAMED_COLORS.teal());
    }
  }
  return image;
}

async function main(): Promise<void> {
  const pattern = createPattern();
  console.log(`Pattern: ${pattern.width}x${pattern.height}, ~${pattern.estimateBytes()} bytes`);

  const steps: Array<[string, Image<'true-color'>]> = [
    ['pattern', pattern],
    ['no-green', clearComponent(pattern, RgbIndex.GREEN)],
    ['gray', grayscale(pattern)],
    ['blurred', boxBlur(pattern, 3)],
    ['edges', edgeDetect(pattern)],
    // Scale in HDR depth and bring the result back for saving
    ['brighter', scaleComponent(pattern.convertTo(HDR_COLOR_DEPTH), RgbIndex.RED, 1.5).convertTo(TRUE_COLOR_DEPTH)]
  ];

  for (const [name, image] of steps) {
    const ppmPath = join(outputDir, `${name}.ppm`);
    const pngPath = join(outputDir, `${name}.png`);
    const saved = (await writePpm(image, ppmPath)) && (await writeImage(image, pngPath, { format: 'png' }));
    console.log(`${saved ? '✓' : '✗'} ${name}`);
  }

  const reread = await readPpm(join(outputDir, 'pattern.ppm'));
  if (reread.ok) {
    console.log(`Read back pattern.ppm: identical = ${reread.image.equals(pattern)}`);
  } else {
    console.error(`Read back failed: ${reread.error}`);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
