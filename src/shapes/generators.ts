import { type Point } from '../types/vertex.js';
import { VertexLoopClass } from '../classes/vertex-loop.js';
import * as errors from '../errors.js';

function requireVertices(shape: string, numVertices: number, minimum: number): void {
    if (!Number.isInteger(numVertices) || numVertices < minimum) {
        throw new errors.InvalidArgumentError(
            errors.invalidArgument(`A ${shape} needs at least ${String(minimum)} vertices, got ${String(numVertices)}.`),
        );
    }
}

/**
 * Point at `radians` from north, clockwise, on an ellipse around (cx, cy).
 */
function onEllipse(cx: number, cy: number, rx: number, ry: number, radians: number): Point {
    return { x: cx + rx * Math.sin(radians), y: cy - ry * Math.cos(radians) };
}

/**
 * Closes a list of distinct vertices by repeating the first one.
 */
function closeLoop(vertices: Point[]): VertexLoopClass {
    vertices.push({ x: vertices[0].x, y: vertices[0].y });
    return new VertexLoopClass(vertices, true);
}

export function ellipseLoop(rx: number, ry: number, numVertices: number, cx = 0, cy = 0, startAngle = 0): VertexLoopClass {
    requireVertices('ellipse', numVertices, 3);
    const start = (startAngle * Math.PI) / 180;
    const distinct = numVertices - 1;
    const vertices: Point[] = [];
    for (let i = 0; i < distinct; i++) {
        vertices.push(onEllipse(cx, cy, rx, ry, start + (2 * Math.PI * i) / distinct));
    }
    return closeLoop(vertices);
}

/**
 * `numVertices` points on a circle, starting north and running clockwise.
 * The last vertex repeats the first.
 */
export function circleLoop(radius: number, numVertices: number, cx = 0, cy = 0, startAngle = 0): VertexLoopClass {
    requireVertices('circle', numVertices, 3);
    return ellipseLoop(radius, radius, numVertices, cx, cy, startAngle);
}

/**
 * Spreads `numVertices` points evenly by arc length around a closed polygon
 * given by its corners. The last vertex repeats the first.
 */
export function polygonOutline(corners: readonly Point[], numVertices: number): VertexLoopClass {
    requireVertices('polygon outline', numVertices, 3);
    const sides = corners.map((c, i) => {
        const next = corners[(i + 1) % corners.length];
        return Math.hypot(next.x - c.x, next.y - c.y);
    });
    const perimeter = sides.reduce((sum, s) => sum + s, 0);
    const distinct = numVertices - 1;
    const vertices: Point[] = [];

    for (let i = 0; i < distinct; i++) {
        const target = (i / distinct) * perimeter;
        let cumulative = 0;
        for (let side = 0; side < corners.length; side++) {
            const length = sides[side];
            if (length > 0 && cumulative + length >= target) {
                const from = corners[side];
                const to = corners[(side + 1) % corners.length];
                const t = (target - cumulative) / length;
                vertices.push({ x: from.x + t * (to.x - from.x), y: from.y + t * (to.y - from.y) });
                break;
            }
            cumulative += length;
        }
    }
    return closeLoop(vertices);
}

/**
 * Axis-aligned rectangle starting at its top-left corner, running clockwise.
 */
export function rectangleLoop(width: number, height: number, numVertices: number, cx = 0, cy = 0): VertexLoopClass {
    requireVertices('rectangle', numVertices, 4);
    const hw = width / 2;
    const hh = height / 2;
    return polygonOutline(
        [
            { x: cx - hw, y: cy - hh },
            { x: cx + hw, y: cy - hh },
            { x: cx + hw, y: cy + hh },
            { x: cx - hw, y: cy + hh },
        ],
        numVertices,
    );
}

/**
 * Regular polygon with its first corner pointing north.
 */
export function regularPolygonLoop(sides: number, radius: number, numVertices: number): VertexLoopClass {
    requireVertices('polygon', sides, 3);
    requireVertices('polygon', numVertices, sides + 1);
    const corners = Array.from({ length: sides }, (_, k) =>
        onEllipse(0, 0, radius, radius, (2 * Math.PI * k) / sides),
    );
    return polygonOutline(corners, numVertices);
}

/**
 * Star alternating outer and inner corners, the first spike pointing north.
 */
export function starLoop(points: number, outerRadius: number, innerRadius: number, numVertices: number): VertexLoopClass {
    requireVertices('star', points, 2);
    requireVertices('star', numVertices, 2 * points + 1);
    const corners = Array.from({ length: 2 * points }, (_, k) => {
        const r = k % 2 === 0 ? outerRadius : innerRadius;
        return onEllipse(0, 0, r, r, (Math.PI * k) / points);
    });
    return polygonOutline(corners, numVertices);
}

/**
 * Open polyline with evenly spaced vertices, both endpoints included.
 */
export function lineLoop(x1: number, y1: number, x2: number, y2: number, numVertices: number): VertexLoopClass {
    requireVertices('line', numVertices, 2);
    const vertices: Point[] = [];
    for (let i = 0; i < numVertices; i++) {
        const t = i / (numVertices - 1);
        vertices.push({ x: x1 + (x2 - x1) * t, y: y1 + (y2 - y1) * t });
    }
    return new VertexLoopClass(vertices, false);
}
