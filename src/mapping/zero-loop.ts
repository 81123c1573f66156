import { VertexLoopClass } from '../classes/vertex-loop.js';

/**
 * A closed loop with the reference's vertex count, every vertex collapsed onto
 * the reference centroid. Interpolating to or from it reads as shrinking or
 * growing in place.
 */
export function createZeroLoop(reference: VertexLoopClass): VertexLoopClass {
  const center = reference.centroid();
  return new VertexLoopClass(
    reference.vertices.map(() => ({ x: center.x, y: center.y })),
    true,
  );
}

export function createZeroLoops(references: readonly VertexLoopClass[]): VertexLoopClass[] {
  return references.map(createZeroLoop);
}
