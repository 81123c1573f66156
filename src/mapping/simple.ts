import { type VertexLoopClass } from '../classes/vertex-loop.js';
import { type LoopMapperStrategy, type LoopPairs, mapDegenerate } from './mapper.js';
import { createZeroLoops } from './zero-loop.js';

/**
 * No correspondence at all: every source shrinks away where it is and every
 * destination grows in where it is. Produces n + m pairs.
 */
export class SimpleMapper implements LoopMapperStrategy {
    readonly name = 'simple';

    map(loops1: readonly VertexLoopClass[], loops2: readonly VertexLoopClass[]): LoopPairs {
        const degenerate = mapDegenerate(loops1, loops2);
        if (degenerate) return degenerate;

        return [
            [...loops1, ...createZeroLoops(loops2)],
            [...createZeroLoops(loops1), ...loops2],
        ];
    }
}
