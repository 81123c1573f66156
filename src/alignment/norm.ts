import { type Point } from '../types/vertex.js';
import { type AlignmentNorm, ALIGNMENT_NORMS } from '../types/config.js';
import { angleDistance, distance } from '../algorithms/vertex-utils.js';
import * as errors from '../errors.js';

/**
 * Scores one candidate offset: compares `a[i]` with `b[(i + offset) % n]`.
 */
export type DistanceFunction<T> = (a: readonly T[], b: readonly T[], offset: number) => number;

/**
 * A built-in norm name or a custom distance function.
 */
export type NormSpec<T> = AlignmentNorm | DistanceFunction<T>;

const NORM_NAMES: ReadonlySet<string> = new Set(ALIGNMENT_NORMS);

export function isAlignmentNorm(value: unknown): value is AlignmentNorm {
    return typeof value === 'string' && NORM_NAMES.has(value);
}

/**
 * Parses a norm name, case-insensitively.
 */
export function parseNorm(value: string): AlignmentNorm {
    const lower = value.toLowerCase();
    if (!isAlignmentNorm(lower)) {
        throw new errors.InvalidArgumentError(
            errors.invalidArgument(`Invalid norm '${value}'. Valid options: 'l1', 'l2', 'linf'.`),
        );
    }
    return lower;
}

/**
 * Aggregates per-vertex distances under a norm.
 * L1 sums, L2 is the root mean square, L∞ takes the worst pair.
 */
export function normed<T>(norm: AlignmentNorm, pairDistance: (a: T, b: T) => number): DistanceFunction<T> {
    return (a, b, offset) => {
        const n = a.length;
        if (n === 0) return 0;
        let acc = 0;
        for (let i = 0; i < n; i++) {
            const d = pairDistance(a[i], b[(i + offset) % n]);
            if (norm === 'l1') {
                acc += d;
            } else if (norm === 'l2') {
                acc += d * d;
            } else if (d > acc) {
                acc = d;
            }
        }
        return norm === 'l2' ? Math.sqrt(acc / n) : acc;
    };
}

/** Distance between angle sequences (radians). */
export function angularDistance(norm: AlignmentNorm): DistanceFunction<number> {
    return normed(norm, angleDistance);
}

/** Distance between point sequences. */
export function euclideanDistance(norm: AlignmentNorm): DistanceFunction<Point> {
    return normed(norm, distance);
}

/**
 * Resolves a norm spec into a distance function built from `builtIn` for named norms.
 */
export function resolveDistance<T>(
    spec: NormSpec<T>,
    builtIn: (norm: AlignmentNorm) => DistanceFunction<T>,
): DistanceFunction<T> {
    return typeof spec === 'function' ? spec : builtIn(spec);
}
