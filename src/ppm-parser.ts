import { TRUE_COLOR_DEPTH } from './color-depth.js';
import { Image } from './image.js';
import type { ImageReadResult, PpmHeader } from './types.js';
import {
  detectPpmVariant,
  isDigitByte,
  isWhitespaceByte,
  readUInt16BE
} from './utils.js';

const HASH = 0x23; // '#'
const NEWLINE = 0x0a;
const PLUS = 0x2b;
const MINUS = 0x2d;

const INT32_MAX = 0x7fffffff;

/**
 * Thrown by PpmParser when the data is not a well-formed PPM file
 */
export class PpmFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PpmFormatError';
  }
}

/**
 * Parse a PPM file (P6 binary or P3 text samples) held in memory
 */
export class PpmParser {
  private data: Uint8Array;
  private offset: number;

  constructor(data: Uint8Array) {
    this.data = data;
    this.offset = 0;
  }

  /**
   * Read the header: magic, width, height and maxval, followed by exactly
   * one whitespace byte. Whitespace and '#' comments may appear between
   * the magic and each number.
   */
  readHeader(): PpmHeader {
    this.offset = 0;

    if (this.data.length < 2) {
      throw new PpmFormatError('File too short for PPM magic');
    }
    const variant = detectPpmVariant(this.data);
    if (variant === null) {
      throw new PpmFormatError('Invalid PPM magic, expected P6 or P3');
    }
    this.offset = 2;

    this.skipWhitespaceAndComments();
    const width = this.readInteger('width');
    this.skipWhitespaceAndComments();
    const height = this.readInteger('height');
    this.skipWhitespaceAndComments();
    const maxval = this.readInteger('maxval');

    // Exactly one whitespace byte separates maxval from the samples, so the
    // general skipping rule does not apply here.
    if (this.offset >= this.data.length || !isWhitespaceByte(this.data[this.offset])) {
      throw new PpmFormatError('Expected a single whitespace byte after maxval');
    }
    this.offset++;

    if (width <= 0) {
      throw new PpmFormatError(`Invalid width: ${width}`);
    }
    if (height <= 0) {
      throw new PpmFormatError(`Invalid height: ${height}`);
    }
    if (maxval <= 0 || maxval >= 65536) {
      throw new PpmFormatError(`Invalid maxval: ${maxval}`);
    }

    return { variant, width, height, maxval };
  }

  /**
   * Read the samples that follow the header into a true-color image. Each
   * sample is rescaled from [0, maxval] to [0, 255] by multiplying before
   * dividing, with the quotient truncated.
   */
  readImage(header: PpmHeader): Image<'true-color'> {
    const sampleCount = header.width * header.height * 3;
    const bytesPerSample = header.variant === 'binary' && header.maxval >= 256 ? 2 : 1;
    // Every sample takes at least one byte in either variant
    if (this.data.length - this.offset < sampleCount * bytesPerSample) {
      throw new PpmFormatError(
        `Truncated pixel data: ${header.width}x${header.height} image needs at least ` +
        `${sampleCount * bytesPerSample} bytes, found ${this.data.length - this.offset}`
      );
    }

    const image = new Image(TRUE_COLOR_DEPTH, header.width, header.height);
    for (let y = 0; y < header.height; y++) {
      for (let x = 0; x < header.width; x++) {
        const r = this.readSample(header);
        const g = this.readSample(header);
        const b = this.readSample(header);
        image.pixel(x, y).assign(r, g, b);
      }
    }
    return image;
  }

  private readSample(header: PpmHeader): number {
    let raw: number;

    if (header.variant === 'binary') {
      if (header.maxval < 256) {
        if (this.offset >= this.data.length) {
          throw new PpmFormatError('Truncated pixel data');
        }
        raw = this.data[this.offset];
        this.offset += 1;
      } else {
        if (this.offset + 2 > this.data.length) {
          throw new PpmFormatError('Truncated pixel data');
        }
        raw = readUInt16BE(this.data, this.offset);
        this.offset += 2;
      }
    } else {
      raw = this.readInteger('sample');
    }

    if (raw < 0 || raw > header.maxval) {
      throw new PpmFormatError(`Sample ${raw} is outside [0, ${header.maxval}]`);
    }

    return Math.floor((raw * 255) / header.maxval);
  }

  /**
   * Skip any run of whitespace bytes and comments. A comment starts with
   * '#' and runs through the end of its line.
   */
  private skipWhitespaceAndComments(): void {
    while (this.offset < this.data.length) {
      const byte = this.data[this.offset];
      if (isWhitespaceByte(byte)) {
        this.offset++;
      } else if (byte === HASH) {
        while (this.offset < this.data.length && this.data[this.offset] !== NEWLINE) {
          this.offset++;
        }
        // consume the newline itself
        if (this.offset < this.data.length) {
          this.offset++;
        }
      } else {
        break;
      }
    }
  }

  /**
   * Read a decimal integer the way formatted stream extraction does:
   * leading whitespace (but not comments) is skipped, then an optional
   * sign and at least one digit. Parsing stops at the first non-digit.
   */
  private readInteger(name: string): number {
    while (this.offset < this.data.length && isWhitespaceByte(this.data[this.offset])) {
      this.offset++;
    }

    let sign = 1;
    const first = this.data[this.offset];
    if (first === PLUS || first === MINUS) {
      sign = first === MINUS ? -1 : 1;
      this.offset++;
    }

    if (this.offset >= this.data.length || !isDigitByte(this.data[this.offset])) {
      throw new PpmFormatError(`Expected ${name} at byte ${this.offset}`);
    }

    let value = 0;
    while (this.offset < this.data.length && isDigitByte(this.data[this.offset])) {
      value = value * 10 + (this.data[this.offset] - 0x30);
      if (value > INT32_MAX + (sign < 0 ? 1 : 0)) {
        throw new PpmFormatError(`${name} out of range`);
      }
      this.offset++;
    }

    return value === 0 ? 0 : sign * value;
  }
}

/**
 * Parse a PPM header from bytes. Throws PpmFormatError on malformed input.
 */
export function parsePpmHeader(data: Uint8Array): PpmHeader {
  return new PpmParser(data).readHeader();
}

/**
 * Decode a PPM file held in memory. Never throws on malformed data: any
 * problem is reported as { ok: false } and no partial image is returned.
 */
export function decodePpm(data: Uint8Array): ImageReadResult {
  try {
    const parser = new PpmParser(data);
    const header = parser.readHeader();
    return { ok: true, image: parser.readImage(header) };
  } catch (err) {
    if (err instanceof PpmFormatError) {
      return { ok: false, error: err.message };
    }
    throw err;
  }
}
