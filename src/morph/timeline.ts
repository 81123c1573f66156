import { type AlignmentNorm } from '../types/config.js';
import { type ColorSpace } from '../types/color.js';
import { type FieldValue, type StateClass } from '../classes/state.js';
import { type EasingFunction, type EasingTable } from '../interpolation/easing.js';
import { InterpolationEngine } from '../interpolation/engine.js';
import { type VertexBuffer } from '../interpolation/vertex-buffer.js';
import { type LoopMapperStrategy } from '../mapping/mapper.js';
import * as errors from '../errors.js';
import { alignContours } from './prepare.js';

/**
 * A state pinned to a point in normalized time. The segment starting here
 * uses this keystate's easing, mapper and norm overrides.
 */
export interface Keystate {
    time: number;
    state: StateClass;
    easing?: EasingTable;
    mapper?: LoopMapperStrategy | string;
    norm?: AlignmentNorm;
}

/**
 * A keyframe for one field, animated independently of the keystates.
 */
export interface PropertyKeyframe {
    time: number;
    value: FieldValue;
    /** Easing into the next keyframe */
    easing?: EasingFunction;
}

export interface TimelineOptions {
    /** Instance-level easing overrides */
    propertyEasing?: EasingTable;
    /** Default mapper for every segment */
    mapper?: LoopMapperStrategy | string;
    /** Default alignment norm for every segment */
    norm?: AlignmentNorm;
    colorSpace?: ColorSpace;
    /** Per-field keyframes; these fields ignore the keystates' values */
    propertyKeystates?: Readonly<Record<string, readonly PropertyKeyframe[]>>;
    /** Scratch space for contour output, reused on every evaluate() */
    buffer?: VertexBuffer;
}

function assertTimes(times: readonly number[]): void {
    times.forEach((time, i) => {
        if (!(time >= 0 && time <= 1)) {
            throw new errors.InvalidArgumentError(errors.timeOutOfRange(time));
        }
        if (i > 0 && time <= times[i - 1]) {
            throw new errors.InvalidArgumentError(errors.keystateTimesNotIncreasing(i));
        }
    });
}

/**
 * Index of the segment [times[i], times[i + 1]] holding t. Times before the
 * first or after the last clamp to the first or last segment.
 */
function segmentAt(times: readonly number[], t: number): number {
    for (let i = 0; i < times.length - 2; i++) {
        if (t < times[i + 1]) return i;
    }
    return times.length - 2;
}

function localTime(t: number, t0: number, t1: number): number {
    return Math.min(1, Math.max(0, (t - t0) / (t1 - t0)));
}

/**
 * An animated element: a sequence of keystates over normalized time.
 *
 * Contours of each segment are aligned and hole-mapped on first use and kept,
 * so repeated evaluate() calls only interpolate.
 */
export class TimelineClass {
    readonly keystates: readonly Keystate[];
    readonly engine: InterpolationEngine;

    private readonly _options: TimelineOptions;
    private readonly _times: number[];
    private readonly _aligned = new Map<number, [StateClass, StateClass]>();
    private readonly _propertyFields: ReadonlySet<string>;

    constructor(keystates: readonly Keystate[], options: TimelineOptions = {}) {
        if (keystates.length < 2) {
            throw new errors.InvalidArgumentError(errors.timelineTooShort());
        }
        this._times = keystates.map(k => k.time);
        assertTimes(this._times);

        const propertyKeystates = options.propertyKeystates ?? {};
        for (const frames of Object.values(propertyKeystates)) {
            assertTimes(frames.map(f => f.time));
        }

        this.keystates = [...keystates];
        this._options = options;
        this._propertyFields = new Set(
            Object.entries(propertyKeystates)
                .filter(([, frames]) => frames.length > 0)
                .map(([field]) => field),
        );
        this.engine = new InterpolationEngine({
            propertyEasing: options.propertyEasing,
            colorSpace: options.colorSpace,
        });
    }

    get numSegments(): number {
        return this.keystates.length - 1;
    }

    /**
     * The aligned start and end states of a segment, computed once.
     */
    alignedSegment(index: number): [StateClass, StateClass] {
        const cached = this._aligned.get(index);
        if (cached) {
            return cached;
        }
        const from = this.keystates[index];
        const to = this.keystates[index + 1];
        const pair = alignContours(from.state, to.state, {
            mapper: from.mapper ?? this._options.mapper,
            norm: from.norm ?? this._options.norm,
        });
        this._aligned.set(index, pair);
        return pair;
    }

    /**
     * The element's state at time t in [0, 1].
     */
    evaluate(t: number): StateClass {
        if (!(t >= 0 && t <= 1)) {
            throw new errors.InvalidArgumentError(errors.timeOutOfRange(t));
        }

        const index = segmentAt(this._times, t);
        const from = this.keystates[index];
        const to = this.keystates[index + 1];
        const [start, end] = this.alignedSegment(index);
        const local = localTime(t, from.time, to.time);

        const state = this.engine.createEasedState(
            start,
            end,
            local,
            from.easing,
            this._propertyFields,
            this._options.buffer,
        );
        if (this._propertyFields.size === 0) {
            return state;
        }

        const values: Record<string, FieldValue> = {};
        for (const field of this._propertyFields) {
            values[field] = this.evaluateProperty(field, t, start, end);
        }
        return state.with(values);
    }

    private evaluateProperty(field: string, t: number, start: StateClass, end: StateClass): FieldValue {
        const frames = this._options.propertyKeystates?.[field] ?? [];
        if (frames.length === 1 || t <= frames[0].time) {
            return frames[0].value;
        }
        const last = frames[frames.length - 1];
        if (t >= last.time) {
            return last.value;
        }

        const index = segmentAt(frames.map(f => f.time), t);
        const a = frames[index];
        const b = frames[index + 1];
        const easing = a.easing ?? this.engine.resolver.resolveForTimeline(start, field);
        const eased = easing(localTime(t, a.time, b.time));
        return this.engine.interpolateValue(start, end, field, a.value, b.value, eased);
    }
}
