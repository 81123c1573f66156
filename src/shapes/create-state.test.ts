import { describe, it, expect, beforeEach } from 'vitest';
import { DEFAULT_HOLE_VERTICES, createShapeState, generateContours } from './create-state.js';
import { VERTEX_TRAITS } from '../classes/state.js';
import { ColorClass } from '../classes/color.js';
import { SettingsClass, getSettings } from '../classes/settings.js';
import { type ShapeSpec } from '../types/shape.js';

describe('createShapeState', () => {
    beforeEach(() => {
        SettingsClass.reset();
    });

    it('builds a vertex state with default appearance', () => {
        const spec: ShapeSpec = { type: 'circle', radius: 10, numVertices: 16 };
        const state = createShapeState(spec);
        expect(state.type).toBe('circle');
        expect(state.traits).toBe(VERTEX_TRAITS);
        expect(state.meta).toEqual({ spec });
        expect(state.get('numVertices')).toBe(16);
        expect(state.closed).toBe(true);
        expect(state.get('fillColor')).toEqual(new ColorClass(0, 0, 0));
        expect(state.get('strokeColor')).toBe(ColorClass.NONE);
        expect(state.get('strokeWidth')).toBe(1);
        expect(state.getContours()?.outer.length).toBe(16);
    });

    it('takes appearance from the spec', () => {
        const state = createShapeState({
            type: 'rectangle',
            width: 4,
            height: 2,
            numVertices: 8,
            x: 3,
            rotation: 45,
            fillColor: 'red',
            strokeColor: [0, 0, 255],
            strokeWidth: 2,
        });
        expect(state.get('x')).toBe(3);
        expect(state.rotation).toBe(45);
        expect(state.get('fillColor')).toEqual(new ColorClass(255, 0, 0));
        expect(state.get('strokeColor')).toEqual(new ColorClass(0, 0, 255));
        expect(state.get('strokeWidth')).toBe(2);
    });

    it('defaults the vertex count from the config', () => {
        expect(createShapeState({ type: 'circle', radius: 1 }).get('numVertices')).toBe(128);
        getSettings().update({ state: { numVertices: 32 } });
        expect(createShapeState({ type: 'circle', radius: 1 }).getContours()?.outer.length).toBe(32);
    });

    it('marks lines as open', () => {
        const state = createShapeState({ type: 'line', x1: 0, y1: 0, x2: 5, y2: 0, numVertices: 6 });
        expect(state.closed).toBe(false);
        expect(state.get('closed')).toBe(false);
    });
});

describe('generateContours', () => {
    it('gives a ring one concentric hole', () => {
        const ring = generateContours({ type: 'ring', outerRadius: 10, innerRadius: 5 }, 24);
        expect(ring.numHoles).toBe(1);
        expect(ring.holes[0].length).toBe(24);
        expect(ring.holes[0].vertices[0].y).toBeCloseTo(-5, 9);

        const sparse = generateContours({ type: 'ring', outerRadius: 10, innerRadius: 5, holeVertices: 8 }, 24);
        expect(sparse.holes[0].length).toBe(8);
    });

    it('places perforations where the spec puts them', () => {
        const contours = generateContours(
            {
                type: 'perforated',
                outline: 'rectangle',
                width: 100,
                height: 50,
                holes: [{ x: 10, y: 0, radius: 5 }, { x: -20, y: 5, radius: 3, numVertices: 12 }],
            },
            40,
        );
        expect(contours.outer.length).toBe(40);
        expect(contours.bounds()).toEqual({ minX: -50, minY: -25, maxX: 50, maxY: 25 });
        expect(contours.holes.map(h => h.length)).toEqual([DEFAULT_HOLE_VERTICES, 12]);
        expect(contours.holes[0].centroid().x).toBeCloseTo(10, 9);
        expect(contours.holes[0].centroid().y).toBeCloseTo(0, 9);
    });

    it('uses an ellipse outline for circular perforated shapes', () => {
        const contours = generateContours(
            { type: 'perforated', outline: 'circle', width: 40, height: 20, holes: [] },
            5,
        );
        expect(contours.outer.vertices[1].x).toBeCloseTo(20, 9);
        expect(contours.outer.vertices[0].y).toBeCloseTo(-10, 9);
    });
});
