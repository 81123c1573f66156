import { describe, it, expect, beforeEach } from 'vitest';
import { TimelineClass } from './timeline.js';
import { StateClass } from '../classes/state.js';
import { SettingsClass } from '../classes/settings.js';
import { VertexBuffer } from '../interpolation/vertex-buffer.js';
import { inQuad, linear } from '../interpolation/easing.js';
import { createShapeState } from '../shapes/create-state.js';
import { InvalidArgumentError } from '../errors.js';

const box = (x: number, extra: Record<string, number> = {}) => new StateClass('box', { x, ...extra });

describe('TimelineClass', () => {
    beforeEach(() => {
        SettingsClass.reset();
    });

    describe('validation', () => {
        it('needs at least two keystates', () => {
            expect(() => new TimelineClass([{ time: 0, state: box(0) }])).toThrow(
                'A timeline needs at least two keystates.',
            );
        });

        it('needs strictly increasing times', () => {
            expect(
                () =>
                    new TimelineClass([
                        { time: 0, state: box(0) },
                        { time: 0.5, state: box(1) },
                        { time: 0.5, state: box(2) },
                    ]),
            ).toThrow('Keystate 2 must have a time greater than the previous keystate.');
        });

        it('needs times within [0, 1]', () => {
            expect(
                () =>
                    new TimelineClass([
                        { time: 0, state: box(0) },
                        { time: 1.5, state: box(1) },
                    ]),
            ).toThrow(InvalidArgumentError);
        });

        it('rejects evaluation outside [0, 1]', () => {
            const timeline = new TimelineClass([
                { time: 0, state: box(0) },
                { time: 1, state: box(1) },
            ]);
            expect(() => timeline.evaluate(1.01)).toThrow('Time must be within [0, 1], got 1.01.');
        });
    });

    describe('evaluate', () => {
        const timeline = () =>
            new TimelineClass([
                { time: 0, state: box(0) },
                { time: 0.5, state: box(10) },
                { time: 1, state: box(30) },
            ]);

        it('hits every keystate exactly', () => {
            const t = timeline();
            expect(t.numSegments).toBe(2);
            expect(t.evaluate(0).get('x')).toBe(0);
            expect(t.evaluate(0.5).get('x')).toBe(10);
            expect(t.evaluate(1).get('x')).toBe(30);
        });

        it('remaps time within each segment', () => {
            const t = timeline();
            expect(t.evaluate(0.25).get('x')).toBe(5);
            expect(t.evaluate(0.75).get('x')).toBe(20);
        });

        it('applies the starting keystate easing to its segment', () => {
            const t = new TimelineClass([
                { time: 0, state: box(0), easing: { x: linear } },
                { time: 1, state: box(10) },
            ]);
            expect(t.evaluate(0.1).get('x')).toBe(1);
        });

        it('applies instance easing below segment easing', () => {
            const t = new TimelineClass(
                [
                    { time: 0, state: box(0) },
                    { time: 1, state: box(10) },
                ],
                { propertyEasing: { x: inQuad } },
            );
            expect(t.evaluate(0.5).get('x')).toBe(2.5);
        });

        it('holds the first and last keystate outside their times', () => {
            const t = new TimelineClass([
                { time: 0.2, state: box(0) },
                { time: 0.8, state: box(10) },
            ]);
            expect(t.evaluate(0.1).get('x')).toBe(0);
            expect(t.evaluate(0.9).get('x')).toBe(10);
        });
    });

    describe('property keystates', () => {
        it('animate a field independently of the keystates', () => {
            const t = new TimelineClass(
                [
                    { time: 0, state: box(0, { opacity: 1 }) },
                    { time: 1, state: box(10, { opacity: 1 }) },
                ],
                {
                    propertyKeystates: {
                        opacity: [
                            { time: 0, value: 0 },
                            { time: 1, value: 1 },
                        ],
                    },
                },
            );
            expect(t.evaluate(0.5).get('opacity')).toBe(0.5);
            expect(t.evaluate(0.5).get('x')).toBe(5);
        });

        it('use their own easing and hold outside their range', () => {
            const t = new TimelineClass(
                [
                    { time: 0, state: box(100) },
                    { time: 1, state: box(200) },
                ],
                {
                    propertyKeystates: {
                        x: [
                            { time: 0.2, value: 0, easing: inQuad },
                            { time: 0.6, value: 10 },
                        ],
                    },
                },
            );
            expect(t.evaluate(0.4).get('x')).toBeCloseTo(2.5, 12);
            expect(t.evaluate(0.1).get('x')).toBe(0);
            expect(t.evaluate(0.9).get('x')).toBe(10);
        });

        it('rejects out-of-order keyframes', () => {
            expect(
                () =>
                    new TimelineClass(
                        [
                            { time: 0, state: box(0) },
                            { time: 1, state: box(1) },
                        ],
                        {
                            propertyKeystates: {
                                x: [
                                    { time: 0.6, value: 0 },
                                    { time: 0.2, value: 1 },
                                ],
                            },
                        },
                    ),
            ).toThrow(InvalidArgumentError);
        });
    });

    describe('shapes', () => {
        const circle = createShapeState({ type: 'circle', radius: 10, numVertices: 16 });
        const ring = createShapeState({ type: 'ring', outerRadius: 10, innerRadius: 4, numVertices: 16 });

        it('aligns each segment once', () => {
            const t = new TimelineClass([
                { time: 0, state: circle },
                { time: 1, state: ring },
            ]);
            expect(t.alignedSegment(0)).toBe(t.alignedSegment(0));
        });

        it('uses the per-segment mapper', () => {
            const t = new TimelineClass(
                [
                    { time: 0, state: ring, mapper: 'simple' },
                    { time: 0.5, state: ring },
                    { time: 1, state: circle },
                ],
                { mapper: 'greedy' },
            );
            expect(t.alignedSegment(0)[0].getContours()?.numHoles).toBe(2);
            expect(t.alignedSegment(1)[0].getContours()?.numHoles).toBe(1);
        });

        it('writes contour output into its buffer', () => {
            const buffer = new VertexBuffer();
            const t = new TimelineClass(
                [
                    { time: 0, state: circle },
                    { time: 1, state: ring },
                ],
                { buffer },
            );
            const mid = t.evaluate(0.5);
            expect(mid.getContours()?.outer.vertices[0]).toBe(buffer.outer[0]);
            expect(mid.getContours()?.numHoles).toBe(1);
        });
    });
});
