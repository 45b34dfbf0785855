import { TRUE_COLOR_DEPTH } from './color-depth.js';
import { Pixel } from './pixel.js';

/**
 * The sixteen basic HTML color names
 */
export type ColorName =
  | 'aqua'
  | 'black'
  | 'blue'
  | 'fuchsia'
  | 'gray'
  | 'green'
  | 'lime'
  | 'maroon'
  | 'navy'
  | 'olive'
  | 'purple'
  | 'red'
  | 'silver'
  | 'teal'
  | 'white'
  | 'yellow';

/**
 * Color specification accepted by parseColor
 */
export type ColorSpec = string | [number, number, number];

/**
 * Convert a 24-bit hexadecimal HTML color code such as 0xC0C0C0 into a
 * true-color pixel
 */
export function hexColor(hex: number): Pixel<'true-color'> {
  if (!Number.isInteger(hex) || hex < 0 || hex > 0xffffff) {
    throw new RangeError(`Hex color must be an integer in [0x000000, 0xFFFFFF], got ${hex}`);
  }
  return Pixel.of(TRUE_COLOR_DEPTH, (hex >> 16) & 0xff, (hex >> 8) & 0xff, hex & 0xff);
}

const HTML_COLORS: Record<ColorName, number> = {
  aqua: 0x00ffff,
  black: 0x000000,
  blue: 0x0000ff,
  fuchsia: 0xff00ff,
  gray: 0x808080,
  green: 0x008000,
  lime: 0x00ff00,
  maroon: 0x800000,
  navy: 0x000080,
  olive: 0x808000,
  purple: 0x800080,
  red: 0xff0000,
  silver: 0xc0c0c0,
  teal: 0x008080,
  white: 0xffffff,
  yellow: 0xffff00
};

function isColorName(name: string): name is ColorName {
  return Object.prototype.hasOwnProperty.call(HTML_COLORS, name);
}

/**
 * Return a fresh pixel for an HTML color name (case-insensitive)
 */
export function namedColor(name: string): Pixel<'true-color'> {
  const lower = name.toLowerCase();
  if (!isColorName(lower)) {
    throw new Error(`Unknown color name: ${name}`);
  }
  return hexColor(HTML_COLORS[lower]);
}

/**
 * Factories for the HTML colors. Each call returns a new pixel, so callers
 * can mutate the result freely.
 */
export const NAMED_COLORS: { readonly [N in ColorName]: () => Pixel<'true-color'> } = {
  aqua: () => hexColor(HTML_COLORS.aqua),
  black: () => hexColor(HTML_COLORS.black),
  blue: () => hexColor(HTML_COLORS.blue),
  fuchsia: () => hexColor(HTML_COLORS.fuchsia),
  gray: () => hexColor(HTML_COLORS.gray),
  green: () => hexColor(HTML_COLORS.green),
  lime: () => hexColor(HTML_COLORS.lime),
  maroon: () => hexColor(HTML_COLORS.maroon),
  navy: () => hexColor(HTML_COLORS.navy),
  olive: () => hexColor(HTML_COLORS.olive),
  purple: () => hexColor(HTML_COLORS.purple),
  red: () => hexColor(HTML_COLORS.red),
  silver: () => hexColor(HTML_COLORS.silver),
  teal: () => hexColor(HTML_COLORS.teal),
  white: () => hexColor(HTML_COLORS.white),
  yellow: () => hexColor(HTML_COLORS.yellow)
};

/**
 * Parse a color specification into a true-color pixel
 *
 * Supports:
 * - Hex colors: '#RRGGBB', '#RGB'
 * - RGB arrays: [r, g, b] with integer values 0-255
 * - HTML color names: 'silver', 'maroon', ...
 *
 * @example
 * parseColor('#C0C0C0')     // silver
 * parseColor([128, 0, 0])   // maroon
 * parseColor('Teal')        // teal
 */
export function parseColor(color: ColorSpec): Pixel<'true-color'> {
  if (Array.isArray(color)) {
    const [r, g, b] = color;
    if (!Number.isInteger(r) || !Number.isInteger(g) || !Number.isInteger(b) ||
        r < 0 || r > 255 || g < 0 || g > 255 || b < 0 || b > 255) {
      throw new Error('RGB color values must be integers between 0 and 255');
    }
    return Pixel.of(TRUE_COLOR_DEPTH, r, g, b);
  }

  if (color.startsWith('#')) {
    const hex = color.slice(1);
    let expanded: string;

    if (hex.length === 3) {
      expanded = hex[0] + hex[0] + hex[1] + hex[1] + hex[2] + hex[2];
    } else if (hex.length === 6) {
      expanded = hex;
    } else {
      throw new Error(`Invalid hex color format: ${color}. Expected #RGB or #RRGGBB`);
    }

    if (!/^[0-9a-fA-F]{6}$/.test(expanded)) {
      throw new Error(`Invalid hex color: ${color}`);
    }

    return hexColor(parseInt(expanded, 16));
  }

  if (isColorName(color.toLowerCase())) {
    return namedColor(color);
  }

  throw new Error(`Unsupported color format: ${color}. Use hex (#RRGGBB), RGB array [r,g,b], or a color name`);
}
