import { createRequire } from 'node:module';
import { type VertexLoopClass } from '../classes/vertex-loop.js';
import { distance } from '../algorithms/vertex-utils.js';
import { MissingOptionalDependencyError } from '../errors.js';
import { type LoopMapperStrategy, type LoopPairs, centroidsOf, mapDegenerate } from './mapper.js';

/**
 * Solves a square assignment problem: returns [row, column] pairs.
 */
export type AssignmentSolver = (costMatrix: number[][]) => Array<[number, number]>;

export const DEFAULT_SOLVER_MODULE = 'munkres-js';

function isSolver(value: unknown): value is AssignmentSolver {
    return typeof value === 'function';
}

/**
 * Loads the solver from an optional CommonJS package, accepting either a
 * function export or a `default` function export.
 */
export function loadSolver(moduleName: string = DEFAULT_SOLVER_MODULE): AssignmentSolver {
    const require = createRequire(import.meta.url);
    let loaded: unknown;
    try {
        loaded = require(moduleName);
    } catch {
        throw new MissingOptionalDependencyError(moduleName, 'hungarian');
    }
    if (isSolver(loaded)) {
        return loaded;
    }
    if (typeof loaded === 'object' && loaded !== null && 'default' in loaded && isSolver(loaded.default)) {
        return loaded.default;
    }
    throw new MissingOptionalDependencyError(moduleName, 'hungarian');
}

export interface HungarianMapperOptions {
    /** Package to load the solver from */
    moduleName?: string;
    /** Use this solver instead of loading one */
    solver?: AssignmentSolver;
}

/**
 * Globally optimal matching: minimum total centroid distance, via the
 * Hungarian algorithm. O(n³).
 *
 * Unequal counts are made square by repeating the smaller side cyclically;
 * replica slots map back to their original loops, so a loop on the smaller
 * side may be matched several times.
 */
export class HungarianMapper implements LoopMapperStrategy {
    readonly name = 'hungarian';
    private readonly solver: AssignmentSolver;

    /**
     * Throws MissingOptionalDependencyError when no solver can be loaded.
     */
    constructor(options: HungarianMapperOptions = {}) {
        this.solver = options.solver ?? loadSolver(options.moduleName);
    }

    map(loops1: readonly VertexLoopClass[], loops2: readonly VertexLoopClass[]): LoopPairs {
        const degenerate = mapDegenerate(loops1, loops2);
        if (degenerate) return degenerate;

        const n = loops1.length;
        const m = loops2.length;
        const size = Math.max(n, m);
        // rowSource[r] / colDest[c]: original index behind each matrix slot
        const rowSource = Array.from({ length: size }, (_, r) => r % n);
        const colDest = Array.from({ length: size }, (_, c) => c % m);

        const centroids1 = centroidsOf(loops1);
        const centroids2 = centroidsOf(loops2);
        const cost = rowSource.map(i => colDest.map(j => distance(centroids1[i], centroids2[j])));

        const assignment = [...this.solver(cost)].sort((a, b) => a[0] - b[0]);
        return [
            assignment.map(([row]) => loops1[rowSource[row]]),
            assignment.map(([, col]) => loops2[colDest[col]]),
        ];
    }
}
