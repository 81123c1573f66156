import { type AlignmentContext, type Point } from '../types/vertex.js';
import { LengthMismatchError } from '../errors.js';

export interface AlignOptions {
    /** Overrides `context.rotation2`, for aligning against a rotation still being animated */
    rotationTarget?: number;
}

/**
 * Reorders the second of two equal-length vertex sequences so that a 1:1
 * interpolation between them does not twist.
 */
export interface AlignerStrategy {
    readonly name: 'angular' | 'euclidean' | 'sequential';
    align(
        verts1: readonly Point[],
        verts2: readonly Point[],
        context: AlignmentContext,
        options?: AlignOptions,
    ): [Point[], Point[]];
}

export function assertSameLength(verts1: readonly Point[], verts2: readonly Point[]): void {
    if (verts1.length !== verts2.length) {
        throw new LengthMismatchError(verts1.length, verts2.length);
    }
}

/**
 * The offset in [0, n) with the lowest score. Ties keep the lower offset.
 */
export function bestOffset(n: number, score: (offset: number) => number): number {
    let best = 0;
    let min = Infinity;
    for (let offset = 0; offset < n; offset++) {
        const value = score(offset);
        if (value < min) {
            min = value;
            best = offset;
        }
    }
    return best;
}
