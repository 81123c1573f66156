import { type Bounds, type Point, type VertexContoursData } from '../types/vertex.js';
import { VertexLoopClass } from './vertex-loop.js';
import * as errors from '../errors.js';

/**
 * A shape outline: one outer loop plus zero or more holes.
 * Hole order matters for loop matching but not for rendering.
 */
export class VertexContoursClass {
  readonly outer: VertexLoopClass;
  readonly holes: readonly VertexLoopClass[];

  constructor(outer: VertexLoopClass, holes: readonly VertexLoopClass[] = []) {
    if (holes.length > 0 && !outer.closed) {
      throw new errors.InvalidArgumentError(errors.openOuterWithHoles());
    }
    holes.forEach((hole, i) => {
      if (!hole.closed) {
        throw new errors.InvalidArgumentError(errors.openHole(i));
      }
    });
    this.outer = outer;
    this.holes = [...holes];
  }

  static fromSingleLoop(loop: VertexLoopClass): VertexContoursClass {
    return new VertexContoursClass(loop);
  }

  /**
   * Builds contours from raw point lists. Holes are always closed.
   */
  static fromVertexLists(
    outer: readonly Point[],
    holes: ReadonlyArray<readonly Point[]> = [],
    closed = true,
  ): VertexContoursClass {
    return new VertexContoursClass(
      new VertexLoopClass(outer, closed),
      holes.map(h => new VertexLoopClass(h, true)),
    );
  }

  get hasHoles(): boolean {
    return this.holes.length > 0;
  }

  get numHoles(): number {
    return this.holes.length;
  }

  /** Outer loop first, then holes in order. */
  allLoops(): VertexLoopClass[] {
    return [this.outer, ...this.holes];
  }

  totalVertices(): number {
    return this.allLoops().reduce((sum, loop) => sum + loop.length, 0);
  }

  bounds(): Bounds {
    return this.outer.bounds();
  }

  centroid(): Point {
    return this.outer.centroid();
  }

  clone(): VertexContoursClass {
    return new VertexContoursClass(this.outer.clone(), this.holes.map(h => h.clone()));
  }

  toJSON(): VertexContoursData {
    return {
      outer: this.outer.toJSON(),
      holes: this.holes.map(h => h.toJSON()),
    };
  }

  static fromJSON(data: VertexContoursData): VertexContoursClass {
    return new VertexContoursClass(
      VertexLoopClass.fromJSON(data.outer),
      data.holes.map(h => VertexLoopClass.fromJSON(h)),
    );
  }
}
