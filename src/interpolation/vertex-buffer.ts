import { type Point } from '../types/vertex.js';

/**
 * Caller-owned scratch space for contour interpolation.
 *
 * Holds one point array for the outer loop and one per hole. Arrays grow on
 * demand and never shrink. The engine writes into these points and returns
 * loops that view them, so a result is only valid until the buffer's next use.
 * Give each animated element its own buffer.
 */
export class VertexBuffer {
    readonly outer: Point[] = [];
    readonly holes: Point[][] = [];

    constructor(outerSize = 0, holeSizes: readonly number[] = []) {
        this.outerPoints(outerSize);
        holeSizes.forEach((size, i) => this.holePoints(i, size));
    }

    /** The outer array, grown to at least `size` points. */
    outerPoints(size: number): Point[] {
        grow(this.outer, size);
        return this.outer;
    }

    /** The array for hole `index`, grown to at least `size` points. */
    holePoints(index: number, size: number): Point[] {
        while (this.holes.length <= index) {
            this.holes.push([]);
        }
        const hole = this.holes[index];
        grow(hole, size);
        return hole;
    }
}

function grow(points: Point[], size: number): void {
    while (points.length < size) {
        points.push({ x: 0, y: 0 });
    }
}
