import { type ColorInput, type ColorSpace, type Rgba, isValidChannel } from '../types/color.js';
import * as errors from '../errors.js';

type Triple = [number, number, number];

const NAMED_COLORS: Readonly<Record<string, Triple>> = {
  red: [255, 0, 0],
  green: [0, 255, 0],
  blue: [0, 0, 255],
  white: [255, 255, 255],
  black: [0, 0, 0],
  yellow: [255, 255, 0],
  cyan: [0, 255, 255],
  magenta: [255, 0, 255],
  orange: [255, 165, 0],
  purple: [128, 0, 128],
  pink: [255, 192, 203],
  brown: [165, 42, 42],
  gray: [128, 128, 128],
  grey: [128, 128, 128],
};

/**
 * Immutable RGB(A) color with perceptual interpolation.
 *
 * `ColorClass.NONE` is the "no color" sentinel: interpolating to or from it
 * switches to the other color instead of blending.
 */
export class ColorClass {
  static readonly NONE: ColorClass = new ColorClass(0, 0, 0, 0, true);

  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
  private readonly _none: boolean;

  constructor(r: number, g: number, b: number, a = 255, none = false) {
    if (!none && ![r, g, b, a].every(isValidChannel)) {
      throw new errors.InvalidArgumentError(
        errors.invalidArgument(`Color channels must be integers 0-255, got (${[r, g, b, a].join(', ')}).`),
      );
    }
    this.r = r;
    this.g = g;
    this.b = b;
    this.a = a;
    this._none = none;
  }

  /**
   * Parses `#RGB`, `#RRGGBB`, a known color name, `none`, or an RGB(A) array.
   */
  static from(input: ColorInput | ColorClass): ColorClass {
    if (input instanceof ColorClass) {
      return input;
    }
    if (typeof input !== 'string') {
      const [r, g, b, a] = input;
      return new ColorClass(r, g, b, a ?? 255);
    }

    const value = input.trim().toLowerCase();
    if (value === 'none') {
      return ColorClass.NONE;
    }
    const hex = parseHex(value);
    if (hex) {
      return new ColorClass(hex[0], hex[1], hex[2]);
    }
    const named = NAMED_COLORS[value];
    if (named) {
      return new ColorClass(named[0], named[1], named[2]);
    }
    throw new errors.InvalidArgumentError(errors.unknownColor(input));
  }

  isNone(): boolean {
    return this._none;
  }

  equals(other: ColorClass): boolean {
    if (this._none || other._none) {
      return this._none === other._none;
    }
    return this.r === other.r && this.g === other.g && this.b === other.b && this.a === other.a;
  }

  toHex(): string {
    if (this._none) return 'none';
    return '#' + [this.r, this.g, this.b].map(c => c.toString(16).padStart(2, '0')).join('');
  }

  toRgba(): Rgba {
    return [this.r, this.g, this.b, this.a];
  }

  toJSON(): string {
    return this.toHex();
  }

  /**
   * Blends toward `other`. LAB by default, which keeps mid-tones saturated
   * (red to blue passes through a vivid magenta, not a flat purple).
   * Alpha is blended linearly in every space.
   */
  interpolate(other: ColorClass, t: number, space: ColorSpace = 'lab'): ColorClass {
    if (this._none) return other;
    if (other._none) return this;

    let rgb: Triple;
    switch (space) {
      case 'rgb':
        rgb = [
          Math.trunc(this.r + (other.r - this.r) * t),
          Math.trunc(this.g + (other.g - this.g) * t),
          Math.trunc(this.b + (other.b - this.b) * t),
        ];
        break;
      case 'hsv':
        rgb = interpolateHsv(this, other, t);
        break;
      case 'lch':
        rgb = interpolateLch(this, other, t);
        break;
      case 'lab':
      default:
        rgb = interpolateLab(this, other, t);
        break;
    }
    const alpha = clampChannel(Math.trunc(this.a + (other.a - this.a) * t));
    return new ColorClass(rgb[0], rgb[1], rgb[2], alpha);
  }
}

function parseHex(value: string): Triple | null {
  const short = /^#([0-9a-f])([0-9a-f])([0-9a-f])$/.exec(value);
  if (short) {
    return [parseInt(short[1] + short[1], 16), parseInt(short[2] + short[2], 16), parseInt(short[3] + short[3], 16)];
  }
  const long = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/.exec(value);
  if (long) {
    return [parseInt(long[1], 16), parseInt(long[2], 16), parseInt(long[3], 16)];
  }
  return null;
}

function clampChannel(value: number): number {
  return Math.max(0, Math.min(255, value));
}

// ---------------------------------------------------------------------------
// Hue helpers
// ---------------------------------------------------------------------------

/**
 * Interpolates hue in degrees along the shorter arc, result in [0, 360).
 */
function lerpHue(start: number, end: number, t: number): number {
  let h1 = start;
  let h2 = end;
  if (Math.abs(h2 - h1) > 180) {
    if (h2 > h1) {
      h1 += 360;
    } else {
      h2 += 360;
    }
  }
  const h = (h1 + (h2 - h1) * t) % 360;
  return h < 0 ? h + 360 : h;
}

// ---------------------------------------------------------------------------
// HSV
// ---------------------------------------------------------------------------

/** HSV with h in [0, 360), s and v in [0, 100]. */
function rgbToHsv(c: ColorClass): Triple {
  const r = c.r / 255;
  const g = c.g / 255;
  const b = c.b / 255;
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const v = max;
  if (max === min) {
    return [0, 0, v * 100];
  }
  const s = (max - min) / max;
  const rc = (max - r) / (max - min);
  const gc = (max - g) / (max - min);
  const bc = (max - b) / (max - min);
  let h: number;
  if (r === max) {
    h = bc - gc;
  } else if (g === max) {
    h = 2 + rc - bc;
  } else {
    h = 4 + gc - rc;
  }
  h = (((h / 6) % 1) + 1) % 1;
  return [h * 360, s * 100, v * 100];
}

function hsvToRgb(h: number, s: number, v: number): Triple {
  const hh = h / 360;
  const ss = s / 100;
  const vv = v / 100;
  let r: number;
  let g: number;
  let b: number;
  if (ss === 0) {
    r = g = b = vv;
  } else {
    const i = Math.floor(hh * 6);
    const f = hh * 6 - i;
    const p = vv * (1 - ss);
    const q = vv * (1 - ss * f);
    const w = vv * (1 - ss * (1 - f));
    switch (((i % 6) + 6) % 6) {
      case 0: [r, g, b] = [vv, w, p]; break;
      case 1: [r, g, b] = [q, vv, p]; break;
      case 2: [r, g, b] = [p, vv, w]; break;
      case 3: [r, g, b] = [p, q, vv]; break;
      case 4: [r, g, b] = [w, p, vv]; break;
      default: [r, g, b] = [vv, p, q]; break;
    }
  }
  return [
    clampChannel(Math.trunc(r * 255)),
    clampChannel(Math.trunc(g * 255)),
    clampChannel(Math.trunc(b * 255)),
  ];
}

function interpolateHsv(start: ColorClass, end: ColorClass, t: number): Triple {
  const [h1, s1, v1] = rgbToHsv(start);
  const [h2, s2, v2] = rgbToHsv(end);
  return hsvToRgb(lerpHue(h1, h2, t), s1 + (s2 - s1) * t, v1 + (v2 - v1) * t);
}

// ---------------------------------------------------------------------------
// LAB / LCH (sRGB, D65 white point)
// ---------------------------------------------------------------------------

const WHITE_X = 0.95047;
const WHITE_Y = 1.0;
const WHITE_Z = 1.08883;
const LAB_EPSILON = 0.008856;

function toLinear(channel: number): number {
  const c = channel / 255;
  return c > 0.04045 ? ((c + 0.055) / 1.055) ** 2.4 : c / 12.92;
}

function fromLinear(c: number): number {
  const v = c > 0.0031308 ? 1.055 * c ** (1 / 2.4) - 0.055 : 12.92 * c;
  return clampChannel(Math.floor(v * 255 + 0.5));
}

function labPivot(v: number): number {
  return v > LAB_EPSILON ? Math.cbrt(v) : 7.787 * v + 16 / 116;
}

function labUnpivot(v: number): number {
  const cube = v ** 3;
  return cube > LAB_EPSILON ? cube : (v - 16 / 116) / 7.787;
}

export function rgbToLab(c: ColorClass): Triple {
  const r = toLinear(c.r);
  const g = toLinear(c.g);
  const b = toLinear(c.b);

  const x = labPivot((r * 0.4124564 + g * 0.3575761 + b * 0.1804375) / WHITE_X);
  const y = labPivot((r * 0.2126729 + g * 0.7151522 + b * 0.072175) / WHITE_Y);
  const z = labPivot((r * 0.0193339 + g * 0.119192 + b * 0.9503041) / WHITE_Z);

  return [116 * y - 16, 500 * (x - y), 200 * (y - z)];
}

export function labToRgb(lab: Triple): Triple {
  const [l, a, bb] = lab;
  const fy = (l + 16) / 116;
  const fx = a / 500 + fy;
  const fz = fy - bb / 200;

  const x = WHITE_X * labUnpivot(fx);
  const y = WHITE_Y * labUnpivot(fy);
  const z = WHITE_Z * labUnpivot(fz);

  return [
    fromLinear(x * 3.2404542 + y * -1.5371385 + z * -0.4985314),
    fromLinear(x * -0.969266 + y * 1.8760108 + z * 0.041556),
    fromLinear(x * 0.0556434 + y * -0.2040259 + z * 1.0572252),
  ];
}

function interpolateLab(start: ColorClass, end: ColorClass, t: number): Triple {
  const s = rgbToLab(start);
  const e = rgbToLab(end);
  return labToRgb([
    s[0] + (e[0] - s[0]) * t,
    s[1] + (e[1] - s[1]) * t,
    s[2] + (e[2] - s[2]) * t,
  ]);
}

function rgbToLch(c: ColorClass): Triple {
  const [l, a, b] = rgbToLab(c);
  let h = (Math.atan2(b, a) * 180) / Math.PI;
  if (h < 0) h += 360;
  return [l, Math.sqrt(a * a + b * b), h];
}

function interpolateLch(start: ColorClass, end: ColorClass, t: number): Triple {
  const s = rgbToLch(start);
  const e = rgbToLch(end);
  const l = s[0] + (e[0] - s[0]) * t;
  const c = s[1] + (e[1] - s[1]) * t;
  const hRad = (lerpHue(s[2], e[2], t) * Math.PI) / 180;
  return labToRgb([l, c * Math.cos(hRad), c * Math.sin(hRad)]);
}
