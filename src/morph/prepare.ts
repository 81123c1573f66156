import { type AlignmentNorm } from '../types/config.js';
import { VertexContoursClass } from '../classes/vertex-contours.js';
import { VertexLoopClass } from '../classes/vertex-loop.js';
import { CONTOURS_FIELD, type StateClass } from '../classes/state.js';
import { type AlignerStrategy } from '../alignment/aligner.js';
import { AngularAligner } from '../alignment/angular.js';
import { getAligner } from '../alignment/factory.js';
import { type LoopMapperStrategy } from '../mapping/mapper.js';
import { createMapper } from '../mapping/factory.js';
import { VertexCountMismatchError } from '../errors.js';
import { logger } from '../logger.js';

export interface AlignContoursOptions {
    /** Replaces the closure-selected aligner for the outer loops */
    aligner?: AlignerStrategy;
    /** Norm for the closure-selected aligner */
    norm?: AlignmentNorm;
    /** Mapper instance or strategy name; defaults to the configured strategy */
    mapper?: LoopMapperStrategy | string;
    /** Rotation the end state is aligned against instead of its own */
    rotationTarget?: number;
}

const HOLE_CONTEXT = { rotation1: 0, rotation2: 0, closed1: true, closed2: true };

/**
 * Pairs two contours for interpolation: outer loops are aligned, holes are
 * mapped so both sides have the same count, and each equal-length hole pair
 * is aligned angularly.
 */
export function alignContourPair(
    contours1: VertexContoursClass,
    contours2: VertexContoursClass,
    context: { rotation1: number; rotation2: number },
    options: AlignContoursOptions = {},
): [VertexContoursClass, VertexContoursClass] {
    const closed1 = contours1.outer.closed;
    const closed2 = contours2.outer.closed;
    if (contours1.outer.length !== contours2.outer.length) {
        throw new VertexCountMismatchError(contours1.outer.length, contours2.outer.length);
    }

    const aligner = options.aligner ?? getAligner(closed1, closed2, options.norm);
    const [outer1, outer2] = aligner.align(
        contours1.outer.vertices,
        contours2.outer.vertices,
        { ...context, closed1, closed2 },
        { rotationTarget: options.rotationTarget },
    );

    const outerLoop1 = new VertexLoopClass(outer1, closed1);
    const outerLoop2 = new VertexLoopClass(outer2, closed2);
    if (!closed1 || !closed2) {
        // Only the closed side can have holes; the engine drops them.
        return [
            new VertexContoursClass(outerLoop1, contours1.holes),
            new VertexContoursClass(outerLoop2, contours2.holes),
        ];
    }

    const mapper = typeof options.mapper === 'object' ? options.mapper : createMapper(options.mapper);
    const [holes1, holes2] = mapper.map(contours1.holes, contours2.holes);
    logger.debug(
        `Aligned outer loops with ${aligner.name}; mapped ${String(contours1.numHoles)} -> ` +
        `${String(contours2.numHoles)} holes with ${mapper.name} into ${String(holes1.length)} pairs.`,
    );

    const holeAligner = new AngularAligner();
    const aligned1: VertexLoopClass[] = [];
    const aligned2: VertexLoopClass[] = [];
    holes1.forEach((h1, i) => {
        const h2 = holes2[i];
        if (h1.length !== h2.length) {
            aligned1.push(h1);
            aligned2.push(h2);
            return;
        }
        const [v1, v2] = holeAligner.align(h1.vertices, h2.vertices, HOLE_CONTEXT);
        aligned1.push(new VertexLoopClass(v1, true));
        aligned2.push(new VertexLoopClass(v2, true));
    });

    return [
        new VertexContoursClass(outerLoop1, aligned1),
        new VertexContoursClass(outerLoop2, aligned2),
    ];
}

/**
 * Returns both states with aligned contours in their `contours` field.
 * States without contours are returned unchanged.
 */
export function alignContours(
    start: StateClass,
    end: StateClass,
    options: AlignContoursOptions = {},
): [StateClass, StateClass] {
    const contours1 = start.getContours();
    const contours2 = end.getContours();
    if (!contours1 || !contours2) {
        return [start, end];
    }

    const [aligned1, aligned2] = alignContourPair(
        contours1,
        contours2,
        { rotation1: start.rotation, rotation2: end.rotation },
        options,
    );
    return [start.with({ [CONTOURS_FIELD]: aligned1 }), end.with({ [CONTOURS_FIELD]: aligned2 })];
}
