import { type Point } from '../types/vertex.js';

const TWO_PI = 2 * Math.PI;

/**
 * Arithmetic mean of a point list. Returns the origin for an empty list.
 */
export function centroid(points: readonly Point[]): Point {
    if (points.length === 0) {
        return { x: 0, y: 0 };
    }
    let sx = 0;
    let sy = 0;
    for (const p of points) {
        sx += p.x;
        sy += p.y;
    }
    return { x: sx / points.length, y: sy / points.length };
}

/**
 * Angle of a point as seen from a center, in radians within [0, 2π).
 * 0 points north (negative y in screen space) and angles grow clockwise.
 */
export function angleFromCentroid(p: Point, center: Point): number {
    const angle = Math.atan2(p.x - center.x, -(p.y - center.y));
    return angle < 0 ? angle + TWO_PI : angle;
}

/**
 * Shortest circular distance between two angles in radians. Never exceeds π.
 */
export function angleDistance(a1: number, a2: number): number {
    const diff = (((a2 - a1) % TWO_PI) + TWO_PI) % TWO_PI;
    return diff > Math.PI ? TWO_PI - diff : diff;
}

export function distance(a: Point, b: Point): number {
    return Math.hypot(b.x - a.x, b.y - a.y);
}

/**
 * Rotates copies of the points about the origin by the given degrees.
 */
export function rotateVertices(points: readonly Point[], degrees: number): Point[] {
    if (degrees === 0) {
        return points.map(p => ({ x: p.x, y: p.y }));
    }
    const rad = (degrees * Math.PI) / 180;
    const cos = Math.cos(rad);
    const sin = Math.sin(rad);
    return points.map(p => ({
        x: p.x * cos - p.y * sin,
        y: p.x * sin + p.y * cos,
    }));
}

/**
 * Rotates a list left by `offset` positions, in place.
 * [1, 2, 3, 4, 5] with offset 2 becomes [3, 4, 5, 1, 2].
 */
export function rotateListInPlace<T>(list: T[], offset: number): T[] {
    const n = list.length;
    if (n === 0) return list;
    const k = ((offset % n) + n) % n;
    if (k === 0) return list;
    const head = list.splice(0, k);
    list.push(...head);
    return list;
}

export function lerpPoint(a: Point, b: Point, t: number): Point {
    return lerpPointInto({ x: 0, y: 0 }, a, b, t);
}

/**
 * Writes the interpolated point into `out` and returns it.
 */
export function lerpPointInto(out: Point, a: Point, b: Point, t: number): Point {
    out.x = (1 - t) * a.x + t * b.x;
    out.y = (1 - t) * a.y + t * b.y;
    return out;
}

export function clonePoints(points: readonly Point[]): Point[] {
    return points.map(p => ({ x: p.x, y: p.y }));
}
