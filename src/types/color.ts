/**
 * Color types.
 *
 * Colors are 8-bit RGB with an optional alpha channel (0-255, opaque by default).
 */

/**
 * An RGBA tuple, each channel an integer between 0 and 255 (inclusive).
 */
export type Rgba = [number, number, number, number];

/**
 * Color spaces available for interpolation.
 * LAB is perceptually uniform and the default; LCH and HSV take the shortest hue path.
 */
export const COLOR_SPACES = ['rgb', 'hsv', 'lab', 'lch'] as const;

export type ColorSpace = (typeof COLOR_SPACES)[number];

/**
 * Anything a color can be created from: a hex string, a color name, or an RGB(A) array.
 */
export type ColorInput = string | readonly [number, number, number] | readonly [number, number, number, number];

/**
 * Returns true if the channel value is a valid 8-bit color channel (integer 0-255).
 */
export function isValidChannel(val: unknown): val is number {
    return typeof val === 'number' && Number.isInteger(val) && val >= 0 && val <= 255;
}
