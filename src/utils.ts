import type { ImageFormat, PpmVariant } from './types.js';

/**
 * Read a 16-bit big-endian unsigned integer
 */
export function readUInt16BE(buffer: Uint8Array, offset: number): number {
  return ((buffer[offset] << 8) | buffer[offset + 1]) >>> 0;
}

/**
 * Write a 16-bit big-endian unsigned integer
 */
export function writeUInt16BE(buffer: Uint8Array, value: number, offset: number): void {
  buffer[offset] = (value >>> 8) & 0xff;
  buffer[offset + 1] = value & 0xff;
}

/**
 * Convert string to Uint8Array (ASCII)
 */
export function stringToBytes(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i);
  }
  return bytes;
}

/**
 * Convert Uint8Array to string (ASCII)
 */
export function bytesToString(bytes: Uint8Array, start = 0, length = bytes.length - start): string {
  let str = '';
  for (let i = start; i < start + length; i++) {
    str += String.fromCharCode(bytes[i]);
  }
  return str;
}

/**
 * True for the bytes the C locale classifies as whitespace:
 * space, \t, \n, \v, \f and \r
 */
export function isWhitespaceByte(byte: number): boolean {
  return byte === 0x20 || (byte >= 0x09 && byte <= 0x0d);
}

/**
 * True for ASCII '0' through '9'
 */
export function isDigitByte(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x39;
}

/**
 * PPM magic strings
 */
export const PPM_MAGIC: Readonly<Record<PpmVariant, string>> = {
  binary: 'P6',
  text: 'P3'
};

/**
 * Identify the PPM variant from the first two bytes, or null when the bytes
 * are not a PPM magic string
 */
export function detectPpmVariant(data: Uint8Array): PpmVariant | null {
  if (data.length < 2 || data[0] !== 0x50) return null; // 'P'
  if (data[1] === 0x36) return 'binary'; // '6'
  if (data[1] === 0x33) return 'text'; // '3'
  return null;
}

/**
 * PNG file signature
 */
export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

/**
 * Verify PNG signature
 */
export function isPngSignature(data: Uint8Array): boolean {
  if (data.length < 8) return false;
  for (let i = 0; i < 8; i++) {
    if (data[i] !== PNG_SIGNATURE[i]) return false;
  }
  return true;
}

/**
 * Detect image format from magic bytes
 */
export function detectImageFormat(data: Uint8Array): ImageFormat {
  if (isPngSignature(data)) return 'png';
  if (detectPpmVariant(data) !== null) return 'ppm';
  return 'unknown';
}
