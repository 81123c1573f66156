import { type Point } from '../types/vertex.js';
import { type MapperStrategy } from '../types/config.js';
import { type VertexLoopClass } from '../classes/vertex-loop.js';
import { distance } from '../algorithms/vertex-utils.js';
import { createZeroLoops } from './zero-loop.js';

/**
 * Two equal-length lists: `matched1[i]` interpolates into `matched2[i]`.
 */
export type LoopPairs = [VertexLoopClass[], VertexLoopClass[]];

/**
 * Decides which loop of one shape becomes which loop of another when the
 * counts may differ (holes appearing, disappearing, merging or splitting).
 */
export interface LoopMapperStrategy {
    readonly name: MapperStrategy;
    map(loops1: readonly VertexLoopClass[], loops2: readonly VertexLoopClass[]): LoopPairs;
}

/**
 * Cases every strategy treats alike: an empty side pairs each loop on the
 * other side with its own zero-loop. Returns null when both sides have loops.
 */
export function mapDegenerate(
    loops1: readonly VertexLoopClass[],
    loops2: readonly VertexLoopClass[],
): LoopPairs | null {
    if (loops1.length === 0 && loops2.length === 0) {
        return [[], []];
    }
    if (loops2.length === 0) {
        return [[...loops1], createZeroLoops(loops1)];
    }
    if (loops1.length === 0) {
        return [createZeroLoops(loops2), [...loops2]];
    }
    return null;
}

export function centroidsOf(loops: readonly VertexLoopClass[]): Point[] {
    return loops.map(loop => loop.centroid());
}

/**
 * Index of the candidate nearest to `target`, skipping `used`.
 * Ties go to the lowest index; -1 when every candidate is used.
 */
export function nearestIndex(target: Point, candidates: readonly Point[], used?: ReadonlySet<number>): number {
    let best = -1;
    let bestDist = Infinity;
    candidates.forEach((c, i) => {
        if (used?.has(i)) return;
        const d = distance(target, c);
        if (d < bestDist) {
            bestDist = d;
            best = i;
        }
    });
    return best;
}

/**
 * One-to-one greedy matching for equal counts: each destination, in order,
 * takes its nearest unused source.
 */
export function greedyMatchEqual(
    loops1: readonly VertexLoopClass[],
    loops2: readonly VertexLoopClass[],
): LoopPairs {
    const centroids1 = centroidsOf(loops1);
    const centroids2 = centroidsOf(loops2);
    const used = new Set<number>();
    const matched1: VertexLoopClass[] = [];
    const matched2: VertexLoopClass[] = [];

    centroids2.forEach((c2, i) => {
        const j = nearestIndex(c2, centroids1, used);
        if (j < 0) return;
        used.add(j);
        matched1.push(loops1[j]);
        matched2.push(loops2[i]);
    });
    return [matched1, matched2];
}

/**
 * Every destination takes its nearest source; sources may repeat (splitting).
 */
export function eachDestinationNearestSource(
    loops1: readonly VertexLoopClass[],
    loops2: readonly VertexLoopClass[],
): LoopPairs {
    const centroids1 = centroidsOf(loops1);
    const matched1 = centroidsOf(loops2).map(c2 => loops1[nearestIndex(c2, centroids1)]);
    return [matched1, [...loops2]];
}

/**
 * Every source takes its nearest destination; destinations may repeat (merging).
 */
export function eachSourceNearestDestination(
    loops1: readonly VertexLoopClass[],
    loops2: readonly VertexLoopClass[],
): LoopPairs {
    const centroids2 = centroidsOf(loops2);
    const matched2 = centroidsOf(loops1).map(c1 => loops2[nearestIndex(c1, centroids2)]);
    return [[...loops1], matched2];
}
