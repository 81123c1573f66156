/**
 * Configuration types.
 *
 * Defaults apply to every morph; timelines and individual segments can
 * override the mapper strategy and alignment norm.
 */

import { type LogLevel } from '../logger.js';
import { type MAPPER_STRATEGIES } from '../errors.js';

export type MapperStrategy = (typeof MAPPER_STRATEGIES)[number];

export const ALIGNMENT_NORMS = ['l1', 'l2', 'linf'] as const;

export type AlignmentNorm = (typeof ALIGNMENT_NORMS)[number];

export interface ClusteringConfig {
    balanceClusters: boolean;
    maxIterations: number;
    randomSeed: number;
}

export interface MorphingConfig {
    vertexLoopMapper: MapperStrategy;
    vertexAlignmentNorm: AlignmentNorm;
    /** Overrides vertexAlignmentNorm for closed/closed pairs */
    angularAlignmentNorm?: AlignmentNorm;
    /** Overrides vertexAlignmentNorm for open/closed pairs */
    euclideanAlignmentNorm?: AlignmentNorm;
    clustering: ClusteringConfig;
}

export interface MorphConfig {
    morphing: MorphingConfig;
    state: {
        /** Vertex resolution for generated shapes */
        numVertices: number;
    };
    logging: {
        level: LogLevel;
    };
}

/**
 * A partial config as accepted by file loading and the config tool.
 */
export interface MorphConfigUpdate {
    morphing?: Partial<Omit<MorphingConfig, 'clustering'>> & { clustering?: Partial<ClusteringConfig> };
    state?: Partial<MorphConfig['state']>;
    logging?: Partial<MorphConfig['logging']>;
}

export function defaultConfig(): MorphConfig {
    return {
        morphing: {
            vertexLoopMapper: 'clustering',
            vertexAlignmentNorm: 'l1',
            clustering: {
                balanceClusters: true,
                maxIterations: 50,
                randomSeed: 42,
            },
        },
        state: {
            numVertices: 128,
        },
        logging: {
            level: 'warn',
        },
    };
}
