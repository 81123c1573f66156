import { type AlignmentContext, type Point } from '../types/vertex.js';
import { clonePoints, rotateListInPlace, rotateVertices } from '../algorithms/vertex-utils.js';
import { type AlignOptions, type AlignerStrategy, assertSameLength, bestOffset } from './aligner.js';
import { type DistanceFunction, type NormSpec, euclideanDistance, resolveDistance } from './norm.js';
import { logger } from '../logger.js';

/**
 * Open ↔ closed alignment by straight-line distance.
 *
 * The open list stays fixed; the closed list is rotated to the best offset and
 * its last vertex is then reset to its first, since rotating breaks closure.
 */
export class EuclideanAligner implements AlignerStrategy {
    readonly name = 'euclidean';
    readonly norm: string;
    private readonly distanceFn: DistanceFunction<Point>;

    /**
     * @param norm - 'l1', 'l2', 'linf', or a custom `(openVerts, closedVerts, offset) => number`
     */
    constructor(norm: NormSpec<Point> = 'l1') {
        this.norm = typeof norm === 'function' ? 'custom' : norm;
        this.distanceFn = resolveDistance(norm, euclideanDistance);
    }

    align(
        verts1: readonly Point[],
        verts2: readonly Point[],
        context: AlignmentContext,
        options: AlignOptions = {},
    ): [Point[], Point[]] {
        assertSameLength(verts1, verts2);

        if (context.closed1 === context.closed2) {
            logger.error(
                `EuclideanAligner called with ${context.closed1 ? 'both closed' : 'both open'} shapes. ` +
                'It only handles open/closed pairs; returning unaligned vertices.',
            );
            return [clonePoints(verts1), clonePoints(verts2)];
        }

        const n = verts1.length;
        if (n === 0) {
            return [[], []];
        }

        const work1 = rotateVertices(verts1, context.rotation1);
        const work2 = rotateVertices(verts2, options.rotationTarget ?? context.rotation2);

        const firstIsOpen = !context.closed1;
        const openWork = firstIsOpen ? work1 : work2;
        const closedWork = firstIsOpen ? work2 : work1;

        const offset = bestOffset(n, o => this.distanceFn(openWork, closedWork, o));

        const closedAligned = rotateListInPlace(clonePoints(firstIsOpen ? verts2 : verts1), offset);
        closedAligned[n - 1] = { x: closedAligned[0].x, y: closedAligned[0].y };
        const openAligned = clonePoints(firstIsOpen ? verts1 : verts2);

        return firstIsOpen ? [openAligned, closedAligned] : [closedAligned, openAligned];
    }
}
