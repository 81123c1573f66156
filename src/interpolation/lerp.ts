import * as errors from '../errors.js';

/**
 * Linear interpolation between two numbers. Exact at t = 0 and t = 1.
 */
export function lerp(start: number, end: number, t: number): number {
    return (1 - t) * start + t * end;
}

/**
 * Interpolates angles in degrees along the shortest arc.
 * `null` counts as 0. Intermediate results are not normalized: angle(350, 10, 0.5) is 360.
 * The endpoints t = 0 and t = 1 return the inputs unchanged.
 */
export function angle(start: number | null, end: number | null, t: number): number {
    const a = start ?? 0;
    const b = end ?? 0;
    if (t === 0) return a;
    if (t === 1) return b;
    const s = mod360(a);
    let diff = mod360(b) - s;
    if (diff > 180) {
        diff -= 360;
    } else if (diff < -180) {
        diff += 360;
    }
    return s + diff * t;
}

/**
 * Discrete switch at the halfway point.
 */
export function step<T>(start: T, end: T, t: number): T {
    return t < 0.5 ? start : end;
}

/**
 * Midpoint of two angles in degrees, averaged as unit vectors. Result in [0, 360).
 */
export function circularMidpoint(a: number, b: number): number {
    const ra = (a * Math.PI) / 180;
    const rb = (b * Math.PI) / 180;
    const x = Math.cos(ra) + Math.cos(rb);
    const y = Math.sin(ra) + Math.sin(rb);
    return mod360((Math.atan2(y, x) * 180) / Math.PI);
}

/**
 * `count` evenly spaced values strictly between `start` and `end`.
 */
export function inbetween(start: number, end: number, count: number): number[] {
    if (!Number.isInteger(count) || count < 0) {
        throw new errors.InvalidArgumentError(
            errors.invalidArgument(`inbetween count must be a non-negative integer, got ${String(count)}.`),
        );
    }
    const values: number[] = [];
    for (let i = 1; i <= count; i++) {
        values.push(lerp(start, end, i / (count + 1)));
    }
    return values;
}

function mod360(value: number): number {
    return ((value % 360) + 360) % 360;
}
