/**
 * Core geometry types.
 *
 * Points are mutable. Interpolation writes into caller-owned
 * buffers instead of allocating a new point per vertex per frame.
 */

/**
 * A 2D coordinate.
 */
export interface Point {
    x: number;
    y: number;
}

/**
 * Axis-aligned bounding box.
 */
export interface Bounds {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

/**
 * A vertex as it appears on the wire: [x, y].
 */
export type VertexTuple = [number, number];

/**
 * JSON shape of a single vertex loop.
 */
export interface VertexLoopData {
    vertices: VertexTuple[];
    closed: boolean;
}

/**
 * JSON shape of an outer loop plus holes.
 */
export interface VertexContoursData {
    outer: VertexLoopData;
    holes: VertexLoopData[];
}

/**
 * World-orientation context for aligning two vertex sequences.
 * Rotations are in degrees; vertices themselves are stored unrotated.
 */
export interface AlignmentContext {
    rotation1: number;
    rotation2: number;
    closed1: boolean;
    closed2: boolean;
}

export function point(x: number, y: number): Point {
    return { x, y };
}

export function toPoints(tuples: ReadonlyArray<readonly [number, number]>): Point[] {
    return tuples.map(([x, y]) => ({ x, y }));
}

export function toTuples(points: readonly Point[]): VertexTuple[] {
    return points.map(p => [p.x, p.y]);
}
