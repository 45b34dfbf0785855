import type { DepthKind } from './types.js';

/**
 * A color depth is an encoding scheme for one channel intensity: the storage
 * type of a sample and the value of the maximum possible intensity.
 *
 * Depths form a closed set. Each one is a plain object sharing this
 * interface, and the kind tag is carried as a type parameter so that pixels
 * and images of different depths cannot be mixed by accident.
 */
export interface ColorDepth<K extends DepthKind> {
  readonly kind: K;
  /** Maximum intensity; always positive */
  readonly maxValue: number;
  /** Whether samples are stored as integers */
  readonly integral: boolean;
  /** Storage size of one sample, used for memory estimates */
  readonly bytesPerComponent: number;

  /**
   * Return x if 0 <= x <= maxValue, 0 if x < 0, and maxValue if x > maxValue
   */
  clamp(x: number): number;

  /**
   * True iff x is a valid intensity, i.e. 0 <= x <= maxValue
   */
  isValue(x: number): boolean;

  /**
   * Return x as a fraction of maxValue
   */
  normalize(x: number): number;

  /**
   * Store a real number in this depth's sample type. Integral depths
   * truncate toward zero.
   */
  narrow(x: number): number;

  /**
   * Convert an intensity of this depth into the equivalent intensity of
   * another depth. Integral targets truncate rather than round, so the
   * conversion is lossy in both directions.
   */
  convertTo<T extends DepthKind>(target: ColorDepth<T>, x: number): number;
}

function createColorDepth<K extends DepthKind>(
  kind: K,
  maxValue: number,
  integral: boolean,
  bytesPerComponent: number
): ColorDepth<K> {
  if (!(maxValue > 0)) {
    throw new Error(`Color depth maximum must be positive, got ${maxValue}`);
  }

  const depth: ColorDepth<K> = {
    kind,
    maxValue,
    integral,
    bytesPerComponent,
    clamp(x: number): number {
      if (x < 0) return 0;
      if (x > maxValue) return maxValue;
      return x;
    },
    isValue(x: number): boolean {
      return x >= 0 && x <= maxValue;
    },
    normalize(x: number): number {
      return x / maxValue;
    },
    narrow(x: number): number {
      return integral ? Math.trunc(x) : x;
    },
    convertTo<T extends DepthKind>(target: ColorDepth<T>, x: number): number {
      return target.narrow(depth.normalize(x) * target.maxValue);
    }
  };

  return Object.freeze(depth);
}

/**
 * 8-bit integer samples in [0, 255]
 */
export const TRUE_COLOR_DEPTH: ColorDepth<'true-color'> = createColorDepth('true-color', 255, true, 1);

/**
 * Floating point samples in [0, 1]. Samples are JavaScript numbers (IEEE-754
 * doubles), which keeps 8-bit -> HDR -> 8-bit conversion exact for every
 * 8-bit value.
 */
export const HDR_COLOR_DEPTH: ColorDepth<'hdr'> = createColorDepth('hdr', 1, false, 8);

const DEPTHS: { [K in DepthKind]: ColorDepth<K> } = {
  'true-color': TRUE_COLOR_DEPTH,
  hdr: HDR_COLOR_DEPTH
};

/**
 * Look up a color depth by its kind
 */
export function getColorDepth<K extends DepthKind>(kind: K): ColorDepth<K> {
  const depth: ColorDepth<K> | undefined = DEPTHS[kind];
  if (depth === undefined) {
    throw new Error(`Unknown color depth: ${String(kind)}`);
  }
  return depth;
}
