import type { Image } from './image.js';
import type { PpmWriteOptions } from './types.js';
import { PPM_MAGIC, stringToBytes } from './utils.js';

/**
 * maxval written to every header; samples are 8-bit
 */
export const PPM_MAXVAL = 255;

/**
 * Create the header "<magic> <width> <height> 255\n"
 */
export function createPpmHeader(width: number, height: number, binary: boolean): Uint8Array {
  const magic = binary ? PPM_MAGIC.binary : PPM_MAGIC.text;
  return stringToBytes(`${magic} ${width} ${height} ${PPM_MAXVAL}\n`);
}

/**
 * Encode pixel rows as raw bytes, three per pixel, top to bottom
 */
function encodeBinarySamples(image: Image<'true-color'>): Uint8Array {
  const body = new Uint8Array(image.width * image.height * 3);
  let offset = 0;
  for (let y = 0; y < image.height; y++) {
    for (let x = 0; x < image.width; x++) {
      const pixel = image.pixel(x, y);
      body[offset++] = pixel.red;
      body[offset++] = pixel.green;
      body[offset++] = pixel.blue;
    }
  }
  return body;
}

/**
 * Encode pixel rows as decimal text. Every pixel is written as " R G B",
 * so each line starts with a space, and every row ends with a newline.
 */
function encodeTextSamples(image: Image<'true-color'>): Uint8Array {
  const lines: string[] = [];
  for (let y = 0; y < image.height; y++) {
    let line = '';
    for (let x = 0; x < image.width; x++) {
      const pixel = image.pixel(x, y);
      line += ` ${pixel.red} ${pixel.green} ${pixel.blue}`;
    }
    lines.push(line + '\n');
  }
  return stringToBytes(lines.join(''));
}

/**
 * Encode a true-color image as a PPM file (P6 by default, P3 when
 * options.binary is false). The image must not be empty.
 */
export function encodePpm(image: Image<'true-color'>, options: PpmWriteOptions = {}): Uint8Array {
  if (image.isEmpty()) {
    throw new Error('Cannot encode an empty image as PPM');
  }

  const binary = options.binary ?? true;
  const header = createPpmHeader(image.width, image.height, binary);
  const body = binary ? encodeBinarySamples(image) : encodeTextSamples(image);

  const output = new Uint8Array(header.length + body.length);
  output.set(header, 0);
  output.set(body, header.length);
  return output;
}
