import { type ClusteringConfig } from '../types/config.js';
import { type VertexLoopClass } from '../classes/vertex-loop.js';
import { balanceClusters, kmeans } from '../algorithms/kmeans.js';
import { centroid } from '../algorithms/vertex-utils.js';
import {
    type LoopMapperStrategy,
    type LoopPairs,
    centroidsOf,
    eachDestinationNearestSource,
    greedyMatchEqual,
    mapDegenerate,
    nearestIndex,
} from './mapper.js';
import { createZeroLoop } from './zero-loop.js';

export const DEFAULT_CLUSTERING: ClusteringConfig = {
    maxIterations: 50,
    randomSeed: 42,
    balanceClusters: true,
};

/**
 * Spatially coherent merging. When sources outnumber destinations, sources are
 * grouped by seeded k-means (k = destination count) and each group moves as a
 * whole onto its own destination.
 *
 * Splitting (fewer sources) is not cluster-aware: each destination simply takes
 * its nearest source.
 */
export class ClusteringMapper implements LoopMapperStrategy {
    readonly name = 'clustering';
    readonly options: ClusteringConfig;

    constructor(options: Partial<ClusteringConfig> = {}) {
        this.options = { ...DEFAULT_CLUSTERING, ...options };
    }

    map(loops1: readonly VertexLoopClass[], loops2: readonly VertexLoopClass[]): LoopPairs {
        const degenerate = mapDegenerate(loops1, loops2);
        if (degenerate) return degenerate;

        if (loops1.length === loops2.length) {
            return greedyMatchEqual(loops1, loops2);
        }
        if (loops1.length > loops2.length) {
            return this.mapMerging(loops1, loops2);
        }
        return eachDestinationNearestSource(loops1, loops2);
    }

    private mapMerging(loops1: readonly VertexLoopClass[], loops2: readonly VertexLoopClass[]): LoopPairs {
        const k = loops2.length;
        const sourceCentroids = centroidsOf(loops1);
        let clusters = kmeans(sourceCentroids, k, this.options);
        if (this.options.balanceClusters) {
            clusters = balanceClusters(sourceCentroids, clusters, k);
        }

        const destCentroids = centroidsOf(loops2);
        const usedDests = new Set<number>();
        const matched1: VertexLoopClass[] = [];
        const matched2: VertexLoopClass[] = [];

        for (let cluster = 0; cluster < k; cluster++) {
            const members = clusters.flatMap((c, i) => (c === cluster ? [i] : []));
            if (members.length === 0) continue;

            const clusterCenter = centroid(members.map(i => sourceCentroids[i]));
            const dest = nearestIndex(clusterCenter, destCentroids, usedDests);
            if (dest < 0) continue;
            usedDests.add(dest);

            for (const i of members) {
                matched1.push(loops1[i]);
                matched2.push(loops2[dest]);
            }
        }

        // Destinations no cluster claimed grow in place.
        loops2.forEach((loop, j) => {
            if (usedDests.has(j)) return;
            matched1.push(createZeroLoop(loop));
            matched2.push(loop);
        });

        return [matched1, matched2];
    }
}
