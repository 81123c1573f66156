import { type Point } from '../types/vertex.js';
import { centroid, distance } from './vertex-utils.js';
import { SeededRandom } from './random.js';

const CONVERGENCE_EPSILON = 1e-6;

export interface KMeansOptions {
    maxIterations: number;
    randomSeed: number;
}

/**
 * k-means++ seeding: the first center is a uniform pick, each further one is
 * drawn with probability proportional to its squared distance from the nearest center.
 */
export function kmeansPlusPlusInit(points: readonly Point[], k: number, random: SeededRandom): Point[] {
    const centers: Point[] = [random.choice(points)];
    while (centers.length < k) {
        const weights = points.map(p => {
            let min = Infinity;
            for (const c of centers) {
                const d = distance(p, c);
                if (d < min) min = d;
            }
            return min * min;
        });
        const total = weights.reduce((sum, w) => sum + w, 0);
        if (total === 0) {
            centers.push(random.choice(points));
            continue;
        }
        const r = random.uniform(0, total);
        let cumulative = 0;
        let picked = points.length - 1;
        for (let i = 0; i < weights.length; i++) {
            cumulative += weights[i];
            if (cumulative >= r) {
                picked = i;
                break;
            }
        }
        centers.push(points[picked]);
    }
    return centers;
}

function nearestCenter(p: Point, centers: readonly Point[]): number {
    let best = 0;
    let bestDist = Infinity;
    centers.forEach((c, i) => {
        const d = distance(p, c);
        if (d < bestDist) {
            bestDist = d;
            best = i;
        }
    });
    return best;
}

function centersEqual(a: readonly Point[], b: readonly Point[]): boolean {
    return a.every((p, i) =>
        Math.abs(p.x - b[i].x) <= CONVERGENCE_EPSILON && Math.abs(p.y - b[i].y) <= CONVERGENCE_EPSILON,
    );
}

/**
 * Groups points into `k` clusters and returns one cluster index per point.
 * With `k >= points.length` every point is its own cluster.
 * Runs until the centers move less than 1e-6 or `maxIterations` passes are done.
 */
export function kmeans(points: readonly Point[], k: number, options: KMeansOptions): number[] {
    if (k >= points.length) {
        return points.map((_, i) => i);
    }

    const random = new SeededRandom(options.randomSeed);
    let centers = kmeansPlusPlusInit(points, k, random);
    let clusters = points.map(p => nearestCenter(p, centers));

    for (let iteration = 0; iteration < Math.max(1, options.maxIterations); iteration++) {
        clusters = points.map(p => nearestCenter(p, centers));

        const next = centers.map((old, i) => {
            const members = points.filter((_, j) => clusters[j] === i);
            return members.length > 0 ? centroid(members) : old;
        });

        if (centersEqual(centers, next)) {
            break;
        }
        centers = next;
    }
    return clusters;
}

/**
 * Moves points out of oversized clusters until no cluster strays from the
 * ideal size n/k by more than max(1, 40% of ideal), or sizes differ by at most one.
 * Each move takes the point of the largest cluster nearest to the smallest
 * cluster's center. Centers are measured once, before any move.
 */
export function balanceClusters(points: readonly Point[], assignment: readonly number[], k: number): number[] {
    const n = points.length;
    const clusters = [...assignment];
    if (n <= k) {
        return clusters;
    }

    const ideal = n / k;
    const maxDeviation = Math.max(1, ideal * 0.4);

    const centers: Point[] = [];
    for (let i = 0; i < k; i++) {
        const members = points.filter((_, j) => clusters[j] === i);
        centers.push(members.length > 0 ? centroid(members) : { x: 0, y: 0 });
    }

    for (let iteration = 0; iteration < n; iteration++) {
        const sizes = Array.from({ length: k }, (_, i) => clusters.filter(c => c === i).length);
        let largest = 0;
        let smallest = 0;
        for (let i = 1; i < k; i++) {
            if (sizes[i] > sizes[largest]) largest = i;
            if (sizes[i] < sizes[smallest]) smallest = i;
        }

        const maxSize = sizes[largest];
        const minSize = sizes[smallest];
        if (maxSize - minSize <= 1) {
            break;
        }
        if (Math.abs(maxSize - ideal) <= maxDeviation && Math.abs(minSize - ideal) <= maxDeviation) {
            break;
        }

        let candidate = -1;
        let candidateDist = Infinity;
        clusters.forEach((c, j) => {
            if (c !== largest) return;
            const d = distance(points[j], centers[smallest]);
            if (d < candidateDist) {
                candidateDist = d;
                candidate = j;
            }
        });
        if (candidate < 0) {
            break;
        }
        clusters[candidate] = smallest;
    }
    return clusters;
}
