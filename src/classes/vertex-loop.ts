import { type Bounds, type Point, type VertexLoopData } from '../types/vertex.js';
import { centroid as meanCentroid, clonePoints } from '../algorithms/vertex-utils.js';
import * as errors from '../errors.js';

/** Below this absolute area a closed loop falls back to the mean centroid. */
const DEGENERATE_AREA = 1e-10;

/**
 * An ordered sequence of vertices forming one contour.
 *
 * Closed loops use polygon formulas for area and centroid; open loops use the
 * vertex mean. The "last vertex equals first" convention is applied by the
 * interpolation engine, not assumed here.
 */
export class VertexLoopClass {
  readonly vertices: Point[];
  readonly closed: boolean;

  /**
   * Copies the given vertices unless `copy` is false, in which case the loop
   * adopts the array as-is (used for views over caller-owned buffers).
   */
  constructor(vertices: readonly Point[], closed = true, copy = true) {
    if (vertices.length === 0) {
      throw new errors.InvalidArgumentError(errors.emptyVertexLoop());
    }
    this.vertices = copy ? clonePoints(vertices) : [...vertices];
    this.closed = closed;
  }

  /**
   * A loop over the given point objects without copying them.
   */
  static wrap(vertices: readonly Point[], closed = true): VertexLoopClass {
    return new VertexLoopClass(vertices, closed, false);
  }

  get length(): number {
    return this.vertices.length;
  }

  /**
   * Signed polygon area (shoelace). Negative for clockwise loops in a y-up frame.
   * Open loops and loops with fewer than 3 vertices have no area.
   */
  signedArea(): number {
    if (!this.closed || this.vertices.length < 3) {
      return 0;
    }
    let sum = 0;
    const n = this.vertices.length;
    for (let i = 0; i < n; i++) {
      const a = this.vertices[i];
      const b = this.vertices[(i + 1) % n];
      sum += a.x * b.y - b.x * a.y;
    }
    return sum / 2;
  }

  area(): number {
    return Math.abs(this.signedArea());
  }

  isClockwise(): boolean {
    return this.signedArea() < 0;
  }

  /**
   * Area-weighted centroid for closed loops, vertex mean otherwise.
   */
  centroid(): Point {
    if (!this.closed || this.vertices.length < 3) {
      return meanCentroid(this.vertices);
    }

    let cx = 0;
    let cy = 0;
    let area = 0;
    const n = this.vertices.length;
    for (let i = 0; i < n; i++) {
      const a = this.vertices[i];
      const b = this.vertices[(i + 1) % n];
      const cross = a.x * b.y - b.x * a.y;
      area += cross;
      cx += (a.x + b.x) * cross;
      cy += (a.y + b.y) * cross;
    }
    area *= 0.5;

    if (Math.abs(area) < DEGENERATE_AREA) {
      return meanCentroid(this.vertices);
    }
    return { x: cx / (6 * area), y: cy / (6 * area) };
  }

  bounds(): Bounds {
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (const p of this.vertices) {
      if (p.x < minX) minX = p.x;
      if (p.y < minY) minY = p.y;
      if (p.x > maxX) maxX = p.x;
      if (p.y > maxY) maxY = p.y;
    }
    return { minX, minY, maxX, maxY };
  }

  /**
   * Returns a new loop with the vertex order reversed.
   */
  reverse(): VertexLoopClass {
    return new VertexLoopClass([...this.vertices].reverse(), this.closed);
  }

  clone(): VertexLoopClass {
    return new VertexLoopClass(this.vertices, this.closed);
  }

  // ------------------------------------------------------------------------
  // In-place transforms
  // ------------------------------------------------------------------------

  translate(dx: number, dy: number): this {
    for (const p of this.vertices) {
      p.x += dx;
      p.y += dy;
    }
    return this;
  }

  /**
   * Scales about `center` (the origin by default). `sy` defaults to `sx`.
   */
  scale(sx: number, sy: number = sx, center: Point = { x: 0, y: 0 }): this {
    for (const p of this.vertices) {
      p.x = center.x + (p.x - center.x) * sx;
      p.y = center.y + (p.y - center.y) * sy;
    }
    return this;
  }

  rotate(degrees: number, center: Point = { x: 0, y: 0 }): this {
    const rad = (degrees * Math.PI) / 180;
    const cos = Math.cos(rad);
    const sin = Math.sin(rad);
    for (const p of this.vertices) {
      const dx = p.x - center.x;
      const dy = p.y - center.y;
      p.x = center.x + dx * cos - dy * sin;
      p.y = center.y + dx * sin + dy * cos;
    }
    return this;
  }

  // ------------------------------------------------------------------------
  // Serialization
  // ------------------------------------------------------------------------

  toJSON(): VertexLoopData {
    return {
      vertices: this.vertices.map(p => [p.x, p.y]),
      closed: this.closed,
    };
  }

  static fromJSON(data: VertexLoopData): VertexLoopClass {
    return new VertexLoopClass(
      data.vertices.map(([x, y]) => ({ x, y })),
      data.closed,
    );
  }
}
