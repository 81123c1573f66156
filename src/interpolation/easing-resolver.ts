import { type StateClass } from '../classes/state.js';
import { type EasingFunction, type EasingTable, linear } from './easing.js';

/**
 * Picks the easing for one animated field.
 *
 * Priority, highest first:
 * 1. segment override (one keystate segment, one call)
 * 2. instance override (given when the animated element was built)
 * 3. the state type's default table
 * 4. linear
 */
export class EasingResolver {
    readonly propertyEasing: EasingTable;

    constructor(propertyEasing: EasingTable = {}) {
        this.propertyEasing = propertyEasing;
    }

    resolve(state: StateClass, fieldName: string, segmentOverrides?: EasingTable): EasingFunction {
        const segment = segmentOverrides?.[fieldName];
        if (segment) {
            return segment;
        }
        return this.resolveForTimeline(state, fieldName);
    }

    /**
     * Fallback for property timelines, whose segments carry their own easing: levels 2 to 4.
     */
    resolveForTimeline(state: StateClass | null, fieldName: string): EasingFunction {
        const instance = this.propertyEasing[fieldName];
        if (instance) {
            return instance;
        }
        const typeDefault = state?.defaultEasingFor(fieldName);
        if (typeDefault) {
            return typeDefault;
        }
        return linear;
    }
}

/**
 * Stateless form of {@link EasingResolver.resolve}.
 */
export function resolveEasing(
    state: StateClass,
    fieldName: string,
    segmentOverrides?: EasingTable,
    instanceOverrides?: EasingTable,
): EasingFunction {
    return new EasingResolver(instanceOverrides).resolve(state, fieldName, segmentOverrides);
}
