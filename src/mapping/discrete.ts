import { type Point } from '../types/vertex.js';
import { type VertexLoopClass } from '../classes/vertex-loop.js';
import { distance } from '../algorithms/vertex-utils.js';
import { type LoopMapperStrategy, type LoopPairs, centroidsOf, greedyMatchEqual, mapDegenerate } from './mapper.js';
import { createZeroLoops } from './zero-loop.js';

/**
 * Picks `count` candidates by repeatedly taking the remaining one with the
 * smallest distance to any target. Returns indices in pick order.
 */
function selectClosest(candidates: readonly Point[], targets: readonly Point[], count: number): number[] {
    const minDistances = candidates.map(c => Math.min(...targets.map(t => distance(c, t))));
    const available = new Set(candidates.map((_, i) => i));
    const selected: number[] = [];

    while (selected.length < count && available.size > 0) {
        let best = -1;
        let bestDist = Infinity;
        for (const i of available) {
            if (minDistances[i] < bestDist) {
                bestDist = minDistances[i];
                best = i;
            }
        }
        if (best < 0) break;
        selected.push(best);
        available.delete(best);
    }
    return selected;
}

/**
 * One-to-one movement without fan-in or fan-out. The loops closest to the
 * other side move; the surplus shrinks away (or grows in) at its own position.
 */
export class DiscreteMapper implements LoopMapperStrategy {
    readonly name = 'discrete';

    map(loops1: readonly VertexLoopClass[], loops2: readonly VertexLoopClass[]): LoopPairs {
        const degenerate = mapDegenerate(loops1, loops2);
        if (degenerate) return degenerate;

        const n = loops1.length;
        const m = loops2.length;
        if (n === m) {
            return greedyMatchEqual(loops1, loops2);
        }

        if (n > m) {
            const selected = selectClosest(centroidsOf(loops1), centroidsOf(loops2), m);
            const rest = loops1.filter((_, i) => !selected.includes(i));
            const [moved1, moved2] = greedyMatchEqual(selected.map(i => loops1[i]), loops2);
            return [[...moved1, ...rest], [...moved2, ...createZeroLoops(rest)]];
        }

        const selected = selectClosest(centroidsOf(loops2), centroidsOf(loops1), n);
        const rest = loops2.filter((_, i) => !selected.includes(i));
        const [moved1, moved2] = greedyMatchEqual(loops1, selected.map(i => loops2[i]));
        return [[...moved1, ...createZeroLoops(rest)], [...moved2, ...rest]];
    }
}
