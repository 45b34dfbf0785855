import type { ColorDepth } from './color-depth.js';
import { Pixel } from './pixel.js';
import type { DepthKind } from './types.js';

type Row<K extends DepthKind> = Pixel<K>[];

function checkDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`Image ${name} must be a positive integer, got ${value}`);
  }
}

/**
 * A raster image: width x height pixels encoded in one color depth.
 *
 * An image is normally non-empty, with positive width and height. It may
 * also be empty, with zero width, zero height and no pixel storage; this is
 * the state of a freshly constructed image without dimensions and of an
 * image after clear(). Emptiness is all-or-nothing.
 *
 * Pixels are stored row-major. The image owns every stored pixel: pixels
 * passed in are copied, so no pixel object is shared between images.
 */
export class Image<K extends DepthKind> {
  readonly depth: ColorDepth<K>;
  private rows: Row<K>[] = [];

  constructor(depth: ColorDepth<K>);
  constructor(depth: ColorDepth<K>, width: number, height: number, fill?: Pixel<K>);
  constructor(depth: ColorDepth<K>, width?: number, height?: number, fill?: Pixel<K>) {
    this.depth = depth;

    if (width === undefined && height === undefined) {
      return;
    }

    checkDimension('width', width ?? 0);
    checkDimension('height', height ?? 0);
    this.resize(width ?? 0, height ?? 0, fill);
  }

  /**
   * Width in pixels, 0 when empty
   */
  get width(): number {
    return this.rows.length === 0 ? 0 : this.rows[0].length;
  }

  /**
   * Height in pixels, 0 when empty
   */
  get height(): number {
    return this.rows.length;
  }

  isEmpty(): boolean {
    return this.rows.length === 0;
  }

  /**
   * True iff x is a valid x-coordinate of this (non-empty) image
   */
  isX(x: number): boolean {
    return !this.isEmpty() && Number.isInteger(x) && x >= 0 && x < this.width;
  }

  /**
   * True iff y is a valid y-coordinate of this (non-empty) image
   */
  isY(y: number): boolean {
    return !this.isEmpty() && Number.isInteger(y) && y >= 0 && y < this.height;
  }

  /**
   * The pixel stored at (x, y). Changes made to the returned pixel are
   * changes to this image.
   */
  pixel(x: number, y: number): Pixel<K> {
    this.checkCoordinates(x, y);
    return this.rows[y][x];
  }

  /**
   * Store a copy of pixel at (x, y)
   */
  setPixel(x: number, y: number, pixel: Pixel<K>): void {
    this.checkCoordinates(x, y);
    this.rows[y][x].copyFrom(pixel);
  }

  /**
   * Change the dimensions to newWidth x newHeight, both positive. When the
   * dimensions already match this is a no-op. Otherwise pixels at the
   * top-left corner are kept, truncated rows and columns are discarded, and
   * new pixels are initialized to fill (black by default).
   */
  resize(newWidth: number, newHeight: number, fill: Pixel<K> = Pixel.black(this.depth)): void {
    checkDimension('width', newWidth);
    checkDimension('height', newHeight);

    if (newWidth === this.width && newHeight === this.height) {
      return;
    }

    const rows = this.rows.slice(0, newHeight);
    for (const row of rows) {
      row.length = Math.min(row.length, newWidth);
      while (row.length < newWidth) {
        row.push(fill.clone());
      }
    }
    while (rows.length < newHeight) {
      const row: Row<K> = [];
      for (let x = 0; x < newWidth; x++) {
        row.push(fill.clone());
      }
      rows.push(row);
    }
    this.rows = rows;
  }

  /**
   * Take the dimensions of other, which may be of any depth. When other is
   * empty this image becomes empty; otherwise it is resized.
   */
  sameSize<T extends DepthKind>(other: Image<T>, fill?: Pixel<K>): void {
    if (other.isEmpty()) {
      this.clear();
    } else {
      this.resize(other.width, other.height, fill);
    }
  }

  /**
   * Overwrite every pixel with a copy of pixel
   */
  fill(pixel: Pixel<K>): void {
    for (const row of this.rows) {
      for (const stored of row) {
        stored.copyFrom(pixel);
      }
    }
  }

  /**
   * Make this image empty
   */
  clear(): void {
    this.rows = [];
  }

  /**
   * Deep copy
   */
  clone(): Image<K> {
    const copy = new Image(this.depth);
    copy.rows = this.rows.map((row) => row.map((pixel) => pixel.clone()));
    return copy;
  }

  /**
   * Exchange contents with other
   */
  swap(other: Image<K>): void {
    const rows = this.rows;
    this.rows = other.rows;
    other.rows = rows;
  }

  /**
   * Convert every pixel to another color depth. An empty image converts to
   * an empty image.
   */
  convertTo<T extends DepthKind>(target: ColorDepth<T>): Image<T> {
    const result = new Image(target);
    if (this.isEmpty()) {
      return result;
    }
    result.resize(this.width, this.height);
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        result.setPixel(x, y, this.rows[y][x].convertTo(target));
      }
    }
    return result;
  }

  /**
   * Exact equality: same depth, same dimensions, identical pixels
   */
  equals(other: Image<K>): boolean {
    if (this.depth.kind !== other.depth.kind) return false;
    if (this.width !== other.width || this.height !== other.height) return false;
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (!this.rows[y][x].equals(other.rows[y][x])) return false;
      }
    }
    return true;
  }

  /**
   * True when both images have the same emptiness and dimensions and every
   * pixel is almost equal to its counterpart within delta
   */
  almostEqual(other: Image<K>, delta: number): boolean {
    if (this.isEmpty() || other.isEmpty()) {
      return this.isEmpty() && other.isEmpty();
    }
    if (this.width !== other.width || this.height !== other.height) return false;
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (!this.rows[y][x].almostEqual(other.rows[y][x], delta)) return false;
      }
    }
    return true;
  }

  /**
   * Estimate of the bytes used by pixel data: width * height * bytes per
   * pixel. Does not include object overhead. Returns 0 when empty.
   */
  estimateBytes(): number {
    return this.width * this.height * 3 * this.depth.bytesPerComponent;
  }

  private checkCoordinates(x: number, y: number): void {
    if (this.isEmpty()) {
      throw new RangeError('Cannot access pixels of an empty image');
    }
    if (!this.isX(x) || !this.isY(y)) {
      throw new RangeError(`Pixel (${x}, ${y}) is outside ${this.width}x${this.height} image`);
    }
  }
}
