import { type ShapeSpec } from '../types/shape.js';
import { VertexContoursClass } from '../classes/vertex-contours.js';
import { type VertexLoopClass } from '../classes/vertex-loop.js';
import { ColorClass } from '../classes/color.js';
import { CONTOURS_FIELD, StateClass, VERTEX_TRAITS } from '../classes/state.js';
import { getSettings } from '../classes/settings.js';
import {
    circleLoop,
    ellipseLoop,
    lineLoop,
    rectangleLoop,
    regularPolygonLoop,
    starLoop,
} from './generators.js';

export const DEFAULT_HOLE_VERTICES = 32;

/**
 * Generates the contours of a shape spec, centred on the origin.
 */
export function generateContours(spec: ShapeSpec, numVertices: number): VertexContoursClass {
    switch (spec.type) {
        case 'circle':
            return VertexContoursClass.fromSingleLoop(circleLoop(spec.radius, numVertices));
        case 'ellipse':
            return VertexContoursClass.fromSingleLoop(ellipseLoop(spec.rx, spec.ry, numVertices));
        case 'rectangle':
            return VertexContoursClass.fromSingleLoop(rectangleLoop(spec.width, spec.height, numVertices));
        case 'polygon':
            return VertexContoursClass.fromSingleLoop(regularPolygonLoop(spec.sides, spec.radius, numVertices));
        case 'star':
            return VertexContoursClass.fromSingleLoop(
                starLoop(spec.points, spec.outerRadius, spec.innerRadius, numVertices),
            );
        case 'line':
            return VertexContoursClass.fromSingleLoop(lineLoop(spec.x1, spec.y1, spec.x2, spec.y2, numVertices));
        case 'ring':
            return new VertexContoursClass(circleLoop(spec.outerRadius, numVertices), [
                circleLoop(spec.innerRadius, spec.holeVertices ?? numVertices),
            ]);
        case 'perforated': {
            const outer: VertexLoopClass = spec.outline === 'circle'
                ? ellipseLoop(spec.width / 2, spec.height / 2, numVertices)
                : rectangleLoop(spec.width, spec.height, numVertices);
            const holes = spec.holes.map(h =>
                circleLoop(h.radius, h.numVertices ?? DEFAULT_HOLE_VERTICES, h.x, h.y),
            );
            return new VertexContoursClass(outer, holes);
        }
    }
}

/**
 * Builds a vertex state from a shape spec. The vertex count defaults to the
 * configured `state.numVertices`; the spec itself is kept in `meta.spec`.
 */
export function createShapeState(spec: ShapeSpec): StateClass {
    const numVertices = spec.numVertices ?? getSettings().config.state.numVertices;
    const contours = generateContours(spec, numVertices);

    return new StateClass(
        spec.type,
        {
            x: spec.x ?? 0,
            y: spec.y ?? 0,
            scale: spec.scale ?? 1,
            opacity: spec.opacity ?? 1,
            rotation: spec.rotation ?? 0,
            closed: contours.outer.closed,
            numVertices,
            fillColor: spec.fillColor === undefined ? ColorClass.from('black') : ColorClass.from(spec.fillColor),
            strokeColor: spec.strokeColor === undefined ? ColorClass.NONE : ColorClass.from(spec.strokeColor),
            strokeWidth: spec.strokeWidth ?? 1,
            [CONTOURS_FIELD]: contours,
        },
        VERTEX_TRAITS,
        { spec },
    );
}
