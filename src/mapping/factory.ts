import { type MapperStrategy } from '../types/config.js';
import { getSettings } from '../classes/settings.js';
import * as errors from '../errors.js';
import { type LoopMapperStrategy } from './mapper.js';
import { ClusteringMapper } from './clustering.js';
import { DiscreteMapper } from './discrete.js';
import { GreedyNearestMapper } from './greedy.js';
import { HungarianMapper } from './hungarian.js';
import { SimpleMapper } from './simple.js';

const STRATEGY_NAMES: ReadonlySet<string> = new Set(errors.MAPPER_STRATEGIES);

export function isMapperStrategy(value: unknown): value is MapperStrategy {
    return typeof value === 'string' && STRATEGY_NAMES.has(value);
}

/**
 * Builds a mapper by name. Without a name the configured default is used;
 * the clustering mapper takes its options from the config.
 */
export function createMapper(strategy?: string): LoopMapperStrategy {
    const morphing = getSettings().config.morphing;
    const name = strategy ?? morphing.vertexLoopMapper;
    if (!isMapperStrategy(name)) {
        throw new errors.InvalidArgumentError(errors.unknownMapperStrategy(name));
    }

    switch (name) {
        case 'simple':
            return new SimpleMapper();
        case 'greedy':
            return new GreedyNearestMapper();
        case 'discrete':
            return new DiscreteMapper();
        case 'hungarian':
            return new HungarianMapper();
        case 'clustering':
            return new ClusteringMapper(morphing.clustering);
    }
}
