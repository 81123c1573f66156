/**
 * Core types for parametric shapes.
 *
 * A shape spec describes a vertex shape by its parameters; the generators in
 * src/shapes turn it into contours centred on the origin. Position, scale and
 * rotation live in the state's base fields, not in the geometry.
 */

import { type ColorInput } from './color.js';

/**
 * Appearance fields shared by every vertex shape.
 */
export interface BaseShapeSpec {
  /** Number of vertices on the outer loop; shapes that morph must agree on it */
  numVertices?: number;
  x?: number;
  y?: number;
  scale?: number;
  opacity?: number;
  /** Degrees, clockwise */
  rotation?: number;
  fillColor?: ColorInput;
  strokeColor?: ColorInput;
  strokeWidth?: number;
}

export interface CircleSpec extends BaseShapeSpec {
  type: 'circle';
  radius: number;
}

export interface EllipseSpec extends BaseShapeSpec {
  type: 'ellipse';
  rx: number;
  ry: number;
}

export interface RectangleSpec extends BaseShapeSpec {
  type: 'rectangle';
  width: number;
  height: number;
}

export interface PolygonSpec extends BaseShapeSpec {
  type: 'polygon';
  /** Number of corners */
  sides: number;
  radius: number;
}

export interface StarSpec extends BaseShapeSpec {
  type: 'star';
  /** Number of spikes */
  points: number;
  outerRadius: number;
  innerRadius: number;
}

/**
 * An open polyline from (x1, y1) to (x2, y2).
 */
export interface LineSpec extends BaseShapeSpec {
  type: 'line';
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

/**
 * A circle with one concentric circular hole.
 */
export interface RingSpec extends BaseShapeSpec {
  type: 'ring';
  outerRadius: number;
  innerRadius: number;
  /** Vertex count of the hole; defaults to numVertices */
  holeVertices?: number;
}

/**
 * A circle or rectangle outline with circular holes placed freely.
 */
export interface PerforatedSpec extends BaseShapeSpec {
  type: 'perforated';
  outline: 'circle' | 'rectangle';
  width: number;
  height: number;
  holes: Array<{ x: number; y: number; radius: number; numVertices?: number }>;
}

/**
 * A ShapeSpec is a discriminated union of supported shape types.
 */
export type ShapeSpec =
  | CircleSpec
  | EllipseSpec
  | RectangleSpec
  | PolygonSpec
  | StarSpec
  | LineSpec
  | RingSpec
  | PerforatedSpec;

export type ShapeType = ShapeSpec['type'];
