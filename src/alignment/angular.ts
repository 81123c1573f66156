import { type AlignmentContext, type Point } from '../types/vertex.js';
import {
    angleFromCentroid,
    centroid,
    clonePoints,
    rotateListInPlace,
    rotateVertices,
} from '../algorithms/vertex-utils.js';
import { type AlignOptions, type AlignerStrategy, assertSameLength, bestOffset } from './aligner.js';
import { type DistanceFunction, type NormSpec, angularDistance, resolveDistance } from './norm.js';

/**
 * Closed ↔ closed alignment by angular position around each shape's own centroid.
 *
 * Both lists are rotated into world orientation first, then every cyclic offset
 * of the second list is scored against the first. O(n²).
 */
export class AngularAligner implements AlignerStrategy {
    readonly name = 'angular';
    readonly norm: string;
    private readonly distanceFn: DistanceFunction<number>;

    /**
     * @param norm - 'l1', 'l2', 'linf', or a custom `(angles1, angles2, offset) => number`
     */
    constructor(norm: NormSpec<number> = 'l1') {
        this.norm = typeof norm === 'function' ? 'custom' : norm;
        this.distanceFn = resolveDistance(norm, angularDistance);
    }

    align(
        verts1: readonly Point[],
        verts2: readonly Point[],
        context: AlignmentContext,
        options: AlignOptions = {},
    ): [Point[], Point[]] {
        assertSameLength(verts1, verts2);
        const n = verts1.length;
        if (n === 0) {
            return [[], []];
        }

        const work1 = rotateVertices(verts1, context.rotation1);
        const work2 = rotateVertices(verts2, options.rotationTarget ?? context.rotation2);

        const c1 = centroid(work1);
        const c2 = centroid(work2);
        const angles1 = work1.map(p => angleFromCentroid(p, c1));
        const angles2 = work2.map(p => angleFromCentroid(p, c2));

        const offset = bestOffset(n, o => this.distanceFn(angles1, angles2, o));
        return [clonePoints(verts1), rotateListInPlace(clonePoints(verts2), offset)];
    }
}
