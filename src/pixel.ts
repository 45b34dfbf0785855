import type { ColorDepth } from './color-depth.js';
import { RgbIndex } from './types.js';
import type { DepthKind, RgbTuple } from './types.js';

/**
 * Return true iff i is a valid RgbIndex
 */
export function isRgbIndex(i: number): i is RgbIndex {
  return Number.isInteger(i) && i >= RgbIndex.RED && i <= RgbIndex.BLUE;
}

/**
 * One (red, green, blue) color encoded in a specific color depth.
 *
 * Every channel is kept within [0, depth.maxValue]; writing a value outside
 * that range throws a RangeError. Pixels are values: images copy them on
 * write, and clone() gives an independent copy.
 */
export class Pixel<K extends DepthKind> {
  readonly depth: ColorDepth<K>;
  private readonly components: RgbTuple = [0, 0, 0];

  constructor(depth: ColorDepth<K>, red = 0, green = 0, blue = 0) {
    this.depth = depth;
    this.assign(red, green, blue);
  }

  /**
   * Create a pixel from channel values
   */
  static of<K extends DepthKind>(depth: ColorDepth<K>, red: number, green: number, blue: number): Pixel<K> {
    return new Pixel(depth, red, green, blue);
  }

  /**
   * Create a pixel with every channel at zero intensity
   */
  static black<K extends DepthKind>(depth: ColorDepth<K>): Pixel<K> {
    return new Pixel(depth);
  }

  get red(): number {
    return this.components[RgbIndex.RED];
  }

  set red(value: number) {
    this.set(RgbIndex.RED, value);
  }

  get green(): number {
    return this.components[RgbIndex.GREEN];
  }

  set green(value: number) {
    this.set(RgbIndex.GREEN, value);
  }

  get blue(): number {
    return this.components[RgbIndex.BLUE];
  }

  set blue(value: number) {
    this.set(RgbIndex.BLUE, value);
  }

  /**
   * Read one channel by index
   */
  get(index: RgbIndex): number {
    checkIndex(index);
    return this.components[index];
  }

  /**
   * Write one channel by index
   */
  set(index: RgbIndex, value: number): void {
    checkIndex(index);
    this.components[index] = this.checkedValue(value);
  }

  /**
   * Write all three channels. Nothing changes unless every value is valid.
   */
  assign(red: number, green: number, blue: number): void {
    const r = this.checkedValue(red);
    const g = this.checkedValue(green);
    const b = this.checkedValue(blue);
    this.components[RgbIndex.RED] = r;
    this.components[RgbIndex.GREEN] = g;
    this.components[RgbIndex.BLUE] = b;
  }

  /**
   * Copy the channels of another pixel of the same depth into this one
   */
  copyFrom(other: Pixel<K>): void {
    this.components[RgbIndex.RED] = other.red;
    this.components[RgbIndex.GREEN] = other.green;
    this.components[RgbIndex.BLUE] = other.blue;
  }

  /**
   * Convert this pixel to another color depth, channel by channel
   */
  convertTo<T extends DepthKind>(target: ColorDepth<T>): Pixel<T> {
    const convert = (x: number): number => this.depth.convertTo(target, x);
    return new Pixel(target, convert(this.red), convert(this.green), convert(this.blue));
  }

  equals(other: Pixel<K>): boolean {
    return (
      this.depth.kind === other.depth.kind &&
      this.red === other.red &&
      this.green === other.green &&
      this.blue === other.blue
    );
  }

  /**
   * True when every channel differs from the corresponding channel of other
   * by at most delta
   */
  almostEqual(other: Pixel<K>, delta: number): boolean {
    if (!(delta > 0)) {
      throw new RangeError(`almostEqual delta must be positive, got ${delta}`);
    }
    for (let i = 0; i < 3; i++) {
      const lhs = this.components[i];
      const rhs = other.components[i];
      if (lhs !== rhs && Math.abs(lhs - rhs) > delta) {
        return false;
      }
    }
    return true;
  }

  clone(): Pixel<K> {
    return new Pixel(this.depth, this.red, this.green, this.blue);
  }

  toArray(): RgbTuple {
    return [this.red, this.green, this.blue];
  }

  toString(): string {
    return `rgb(${this.red}, ${this.green}, ${this.blue})`;
  }

  private checkedValue(value: number): number {
    if (!this.depth.isValue(value)) {
      throw new RangeError(
        `Channel value ${value} is outside [0, ${this.depth.maxValue}] for ${this.depth.kind} depth`
      );
    }
    return this.depth.narrow(value);
  }
}

function checkIndex(index: number): void {
  if (!isRgbIndex(index)) {
    throw new RangeError(`Invalid RGB index: ${index}`);
  }
}
