import { type VertexLoopClass } from '../classes/vertex-loop.js';
import {
    type LoopMapperStrategy,
    type LoopPairs,
    eachDestinationNearestSource,
    eachSourceNearestDestination,
    greedyMatchEqual,
    mapDegenerate,
} from './mapper.js';

/**
 * Nearest-centroid matching. One-to-one for equal counts (greedy, not
 * globally optimal); otherwise the larger side fans into its nearest
 * neighbours on the smaller side. O(n·m).
 */
export class GreedyNearestMapper implements LoopMapperStrategy {
    readonly name = 'greedy';

    map(loops1: readonly VertexLoopClass[], loops2: readonly VertexLoopClass[]): LoopPairs {
        const degenerate = mapDegenerate(loops1, loops2);
        if (degenerate) return degenerate;

        if (loops1.length === loops2.length) {
            return greedyMatchEqual(loops1, loops2);
        }
        if (loops1.length < loops2.length) {
            return eachDestinationNearestSource(loops1, loops2);
        }
        return eachSourceNearestDestination(loops1, loops2);
    }
}
