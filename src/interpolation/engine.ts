import { type Point } from '../types/vertex.js';
import { ColorClass } from '../classes/color.js';
import { VertexContoursClass } from '../classes/vertex-contours.js';
import { VertexLoopClass } from '../classes/vertex-loop.js';
import { type FieldValue, type StateClass, fieldValuesEqual } from '../classes/state.js';
import { type ColorSpace } from '../types/color.js';
import { lerpPointInto } from '../algorithms/vertex-utils.js';
import { VertexCountMismatchError } from '../errors.js';
import { logger } from '../logger.js';
import { type EasingTable } from './easing.js';
import { EasingResolver } from './easing-resolver.js';
import { angle, lerp, step } from './lerp.js';
import { type VertexBuffer } from './vertex-buffer.js';

export interface InterpolationEngineOptions {
    /** Instance-level easing overrides, keyed by field name */
    propertyEasing?: EasingTable;
    /** Color space for color fields */
    colorSpace?: ColorSpace;
}

/**
 * Lerps `a` into `b` writing into `out`, which must hold at least `a.length` points.
 * Returns a loop viewing the first `a.length` points of `out`.
 */
function lerpLoop(a: VertexLoopClass, b: VertexLoopClass, t: number, out: Point[], closed: boolean): VertexLoopClass {
    const n = a.length;
    for (let i = 0; i < n; i++) {
        lerpPointInto(out[i], a.vertices[i], b.vertices[i], t);
    }
    if (closed && n > 1) {
        out[n - 1].x = out[0].x;
        out[n - 1].y = out[0].y;
    }
    return VertexLoopClass.wrap(out.slice(0, n), closed);
}

function freshPoints(n: number): Point[] {
    return Array.from({ length: n }, () => ({ x: 0, y: 0 }));
}

/**
 * Produces in-between states.
 *
 * Field dispatch, first match wins: vertex contours, colors, angle fields,
 * numbers, then a discrete step at the halfway point for everything else.
 */
export class InterpolationEngine {
    readonly resolver: EasingResolver;
    readonly colorSpace: ColorSpace;

    constructor(options: InterpolationEngineOptions = {}) {
        this.resolver = new EasingResolver(options.propertyEasing);
        this.colorSpace = options.colorSpace ?? 'lab';
    }

    /**
     * Builds the state at time `t`.
     *
     * Fields in `propertyKeystateFields` are managed elsewhere and left as the
     * clone has them. The clone comes from `start` while t < 0.5 and from `end`
     * after, so untouched fields and metadata switch sides at the halfway point.
     */
    createEasedState(
        start: StateClass,
        end: StateClass,
        t: number,
        segmentOverrides?: EasingTable,
        propertyKeystateFields: ReadonlySet<string> = new Set(),
        buffer?: VertexBuffer,
    ): StateClass {
        const values: Record<string, FieldValue> = {};

        for (const field of start.fieldNames) {
            if (propertyKeystateFields.has(field)) continue;

            const a = start.get(field) ?? null;
            const b = end.get(field) ?? null;

            if (start.isNonInterpolatable(field)) {
                values[field] = step(a, b, t);
                continue;
            }
            if (fieldValuesEqual(a, b)) {
                values[field] = a;
                continue;
            }

            const easing = this.resolver.resolve(start, field, segmentOverrides);
            values[field] = this.interpolateValue(start, end, field, a, b, easing(t), buffer);
        }

        return (t < 0.5 ? start : end).with(values);
    }

    /**
     * Interpolates one field value at an already-eased time.
     */
    interpolateValue(
        startState: StateClass,
        endState: StateClass,
        field: string,
        a: FieldValue,
        b: FieldValue,
        easedT: number,
        buffer?: VertexBuffer,
    ): FieldValue {
        if (a instanceof VertexContoursClass && b instanceof VertexContoursClass) {
            return this.interpolateContours(a, b, easedT, startState.closed && endState.closed, buffer);
        }
        if (a instanceof VertexContoursClass || b instanceof VertexContoursClass) {
            logger.warn(`Field '${field}' has contours on one side only; switching at t=0.5.`);
            return step(a, b, easedT);
        }
        if (a instanceof ColorClass && b instanceof ColorClass) {
            return a.interpolate(b, easedT, this.colorSpace);
        }
        if (startState.isAngle(field) && (typeof a === 'number' || a === null) && (typeof b === 'number' || b === null)) {
            return angle(a, b, easedT);
        }
        if (typeof a === 'number' && typeof b === 'number') {
            return lerp(a, b, easedT);
        }
        return step(a, b, easedT);
    }

    /**
     * Lerps two contours vertex by vertex.
     *
     * Outer counts must match. The outer loop is closed (last vertex = first)
     * only when both shapes are closed; holes always are, and an open result
     * has none. Hole lists that do not line up switch at t=0.5 instead of blending.
     */
    interpolateContours(
        a: VertexContoursClass,
        b: VertexContoursClass,
        t: number,
        closed: boolean,
        buffer?: VertexBuffer,
    ): VertexContoursClass {
        const n = a.outer.length;
        if (n !== b.outer.length) {
            throw new VertexCountMismatchError(n, b.outer.length);
        }

        const outer = lerpLoop(a.outer, b.outer, t, buffer ? buffer.outerPoints(n) : freshPoints(n), closed);

        let holes: readonly VertexLoopClass[];
        if (!closed) {
            if (a.numHoles > 0 || b.numHoles > 0) {
                logger.warn('Holes dropped: an open outline cannot carry holes.');
            }
            holes = [];
        } else if (a.numHoles !== b.numHoles) {
            logger.warn(
                `Hole counts differ (${String(a.numHoles)} != ${String(b.numHoles)}); ` +
                'switching at t=0.5. Map loops before interpolating.',
            );
            holes = step(a.holes, b.holes, t);
        } else {
            holes = a.holes.map((h1, i) => {
                const h2 = b.holes[i];
                if (h1.length !== h2.length) {
                    return step(h1, h2, t);
                }
                const out = buffer ? buffer.holePoints(i, h1.length) : freshPoints(h1.length);
                return lerpLoop(h1, h2, t, out, true);
            });
        }

        return new VertexContoursClass(outer, holes);
    }
}
