import { type AlignmentContext, type Point } from '../types/vertex.js';
import { clonePoints, distance } from '../algorithms/vertex-utils.js';
import { type AlignerStrategy, assertSameLength } from './aligner.js';

function totalDistance(verts1: readonly Point[], verts2: readonly Point[]): number {
    let total = 0;
    for (let i = 0; i < verts1.length; i++) {
        total += distance(verts1[i], verts2[i]);
    }
    return total;
}

/**
 * Open ↔ open alignment. Start already matches start; the only choice is
 * whether to walk the second list backwards.
 */
export class SequentialAligner implements AlignerStrategy {
    readonly name = 'sequential';

    align(verts1: readonly Point[], verts2: readonly Point[], _context?: AlignmentContext): [Point[], Point[]] {
        assertSameLength(verts1, verts2);
        const reversed = [...verts2].reverse();
        const useReversed = totalDistance(verts1, reversed) < totalDistance(verts1, verts2);
        return [clonePoints(verts1), clonePoints(useReversed ? reversed : verts2)];
    }
}
