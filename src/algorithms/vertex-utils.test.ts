import { describe, it, expect } from 'vitest';
import {
    angleDistance,
    angleFromCentroid,
    centroid,
    distance,
    lerpPoint,
    lerpPointInto,
    rotateListInPlace,
    rotateVertices,
} from './vertex-utils.js';

describe('vertex-utils', () => {
    it('centroid is the vertex mean, or the origin for no points', () => {
        expect(centroid([{ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 2, y: 2 }, { x: 0, y: 2 }])).toEqual({ x: 1, y: 1 });
        expect(centroid([])).toEqual({ x: 0, y: 0 });
    });

    it('angleFromCentroid starts north and grows clockwise', () => {
        const c = { x: 0, y: 0 };
        expect(angleFromCentroid({ x: 0, y: -1 }, c)).toBe(0);
        expect(angleFromCentroid({ x: 1, y: 0 }, c)).toBeCloseTo(Math.PI / 2);
        expect(angleFromCentroid({ x: 0, y: 1 }, c)).toBeCloseTo(Math.PI);
        expect(angleFromCentroid({ x: -1, y: 0 }, c)).toBeCloseTo((3 * Math.PI) / 2);
    });

    it('angleDistance takes the short way around', () => {
        expect(angleDistance(0.1, 2 * Math.PI - 0.1)).toBeCloseTo(0.2);
        expect(angleDistance(0, Math.PI)).toBeCloseTo(Math.PI);
        expect(angleDistance(1, 1)).toBe(0);
    });

    it('distance is euclidean', () => {
        expect(distance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
    });

    it('rotateVertices returns rotated copies', () => {
        const points = [{ x: 1, y: 0 }];
        const rotated = rotateVertices(points, 90);
        expect(rotated[0].x).toBeCloseTo(0);
        expect(rotated[0].y).toBeCloseTo(1);
        expect(points[0]).toEqual({ x: 1, y: 0 });

        const same = rotateVertices(points, 0);
        expect(same).toEqual(points);
        expect(same[0]).not.toBe(points[0]);
    });

    it('rotateListInPlace rotates left and wraps negative offsets', () => {
        expect(rotateListInPlace([1, 2, 3, 4, 5], 2)).toEqual([3, 4, 5, 1, 2]);
        expect(rotateListInPlace([1, 2, 3, 4, 5], -1)).toEqual([5, 1, 2, 3, 4]);
        expect(rotateListInPlace([1, 2, 3], 3)).toEqual([1, 2, 3]);
        expect(rotateListInPlace([], 4)).toEqual([]);
    });

    it('lerpPoint hits both endpoints exactly', () => {
        const a = { x: 0.1, y: -3 };
        const b = { x: 0.7, y: 9 };
        expect(lerpPoint(a, b, 0)).toEqual(a);
        expect(lerpPoint(a, b, 1)).toEqual(b);
        expect(lerpPoint({ x: 0, y: 0 }, { x: 10, y: 20 }, 0.25)).toEqual({ x: 2.5, y: 5 });
    });

    it('lerpPointInto writes into the given point', () => {
        const out = { x: 0, y: 0 };
        const result = lerpPointInto(out, { x: 0, y: 0 }, { x: 4, y: 8 }, 0.5);
        expect(result).toBe(out);
        expect(out).toEqual({ x: 2, y: 4 });
    });
});
