import { describe, it, expect } from 'vitest';
import {
    circleLoop,
    ellipseLoop,
    lineLoop,
    polygonOutline,
    rectangleLoop,
    regularPolygonLoop,
    starLoop,
} from './generators.js';
import { type VertexLoopClass } from '../classes/vertex-loop.js';
import { InvalidArgumentError } from '../errors.js';

function expectPoints(loop: VertexLoopClass, expected: Array<[number, number]>): void {
    expect(loop.length).toBe(expected.length);
    expected.forEach(([x, y], i) => {
        expect(loop.vertices[i].x).toBeCloseTo(x, 9);
        expect(loop.vertices[i].y).toBeCloseTo(y, 9);
    });
}

describe('circleLoop', () => {
    it('starts north, runs clockwise and repeats the first vertex', () => {
        const loop = circleLoop(10, 5);
        expect(loop.closed).toBe(true);
        expectPoints(loop, [[0, -10], [10, 0], [0, 10], [-10, 0], [0, -10]]);
        expect(loop.vertices[4]).toEqual(loop.vertices[0]);
    });

    it('honours center and start angle', () => {
        expectPoints(circleLoop(1, 3, 5, 5, 90), [[6, 5], [4, 5], [6, 5]]);
    });

    it('needs at least 3 vertices', () => {
        expect(() => circleLoop(1, 2)).toThrow('A circle needs at least 3 vertices, got 2.');
        expect(() => circleLoop(1, 4.5)).toThrow(InvalidArgumentError);
    });
});

describe('ellipseLoop', () => {
    it('uses separate radii', () => {
        expectPoints(ellipseLoop(20, 10, 5), [[0, -10], [20, 0], [0, 10], [-20, 0], [0, -10]]);
    });
});

describe('rectangleLoop', () => {
    it('spreads vertices along the perimeter from the top-left corner', () => {
        expectPoints(rectangleLoop(4, 2, 7), [
            [-2, -1],
            [0, -1],
            [2, -1],
            [2, 1],
            [0, 1],
            [-2, 1],
            [-2, -1],
        ]);
    });

    it('needs at least 4 vertices', () => {
        expect(() => rectangleLoop(4, 2, 3)).toThrow('A rectangle needs at least 4 vertices, got 3.');
    });
});

describe('polygonOutline', () => {
    it('skips zero-length sides', () => {
        const corners = [
            { x: 0, y: 0 },
            { x: 0, y: 0 },
            { x: 4, y: 0 },
            { x: 4, y: 4 },
        ];
        const loop = polygonOutline(corners, 4);
        expect(loop.vertices[0]).toEqual({ x: 0, y: 0 });
        expect(loop.length).toBe(4);
    });
});

describe('regularPolygonLoop', () => {
    it('puts the first corner north', () => {
        expectPoints(regularPolygonLoop(4, 10, 5), [[0, -10], [10, 0], [0, 10], [-10, 0], [0, -10]]);
    });

    it('needs a vertex per corner plus the closing one', () => {
        expect(() => regularPolygonLoop(6, 10, 6)).toThrow('A polygon needs at least 7 vertices, got 6.');
    });
});

describe('starLoop', () => {
    it('alternates outer and inner corners', () => {
        const loop = starLoop(5, 10, 4, 11);
        expect(loop.length).toBe(11);
        expect(loop.vertices[0].x).toBeCloseTo(0, 9);
        expect(loop.vertices[0].y).toBeCloseTo(-10, 9);
        expect(loop.vertices[1].x).toBeCloseTo(4 * Math.sin(Math.PI / 5), 9);
        expect(loop.vertices[1].y).toBeCloseTo(-4 * Math.cos(Math.PI / 5), 9);
        expect(Math.hypot(loop.vertices[2].x, loop.vertices[2].y)).toBeCloseTo(10, 9);
    });

    it('needs room for every corner', () => {
        expect(() => starLoop(5, 10, 4, 10)).toThrow(InvalidArgumentError);
    });
});

describe('lineLoop', () => {
    it('is open with both endpoints included', () => {
        const loop = lineLoop(0, 0, 10, 0, 6);
        expect(loop.closed).toBe(false);
        expectPoints(loop, [[0, 0], [2, 0], [4, 0], [6, 0], [8, 0], [10, 0]]);
    });

    it('needs at least 2 vertices', () => {
        expect(() => lineLoop(0, 0, 1, 1, 1)).toThrow('A line needs at least 2 vertices, got 1.');
    });
});
