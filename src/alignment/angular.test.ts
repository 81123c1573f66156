import { describe, it, expect } from 'vitest';
import { AngularAligner } from './angular.js';
import { LengthMismatchError } from '../errors.js';

const context = { rotation1: 0, rotation2: 0, closed1: true, closed2: true };

/** North, east, south, west: clockwise from the top in screen space. */
const diamond = () => [
    { x: 0, y: -1 },
    { x: 1, y: 0 },
    { x: 0, y: 1 },
    { x: -1, y: 0 },
];

describe('AngularAligner', () => {
    it('leaves identical loops unchanged', () => {
        const [a, b] = new AngularAligner().align(diamond(), diamond(), context);
        expect(a).toEqual(diamond());
        expect(b).toEqual(diamond());
    });

    it('undoes a cyclic shift of the second loop', () => {
        const shifted = [...diamond().slice(1), diamond()[0]];
        const [, b] = new AngularAligner().align(diamond(), shifted, context);
        expect(b).toEqual(diamond());
    });

    it('aligns in world orientation', () => {
        const [, b] = new AngularAligner().align(diamond(), diamond(), { ...context, rotation2: 90 });
        expect(b).toEqual([
            { x: -1, y: 0 },
            { x: 0, y: -1 },
            { x: 1, y: 0 },
            { x: 0, y: 1 },
        ]);
    });

    it('lets rotationTarget replace the second rotation', () => {
        const [, b] = new AngularAligner().align(
            diamond(),
            diamond(),
            { ...context, rotation2: 90 },
            { rotationTarget: 0 },
        );
        expect(b).toEqual(diamond());
    });

    it('returns copies and leaves the inputs alone', () => {
        const v1 = diamond();
        const v2 = [...diamond().slice(1), diamond()[0]];
        const [a, b] = new AngularAligner().align(v1, v2, context);
        expect(a[0]).not.toBe(v1[0]);
        expect(b[0]).not.toBe(v2[3]);
        expect(v2[0]).toEqual({ x: 1, y: 0 });
    });

    it('accepts a custom distance function', () => {
        const aligner = new AngularAligner((_a, _b, offset) => (offset === 2 ? 0 : 1));
        expect(aligner.norm).toBe('custom');
        const [, b] = aligner.align(diamond(), diamond(), context);
        expect(b).toEqual([diamond()[2], diamond()[3], diamond()[0], diamond()[1]]);
    });

    it('reports its norm', () => {
        expect(new AngularAligner('linf').norm).toBe('linf');
        expect(new AngularAligner().name).toBe('angular');
    });

    it('handles empty input', () => {
        expect(new AngularAligner().align([], [], context)).toEqual([[], []]);
    });

    it('rejects lists of different lengths', () => {
        expect(() => new AngularAligner().align(diamond(), diamond().slice(1), context)).toThrow(LengthMismatchError);
    });
});
