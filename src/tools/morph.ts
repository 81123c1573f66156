import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ALIGNMENT_NORMS, type AlignmentNorm } from '../types/config.js';
import { COLOR_SPACES, type ColorInput, type ColorSpace } from '../types/color.js';
import { type ShapeSpec } from '../types/shape.js';
import { type VertexLoopData, type VertexTuple, toPoints, toTuples } from '../types/vertex.js';
import { ColorClass } from '../classes/color.js';
import { VertexLoopClass } from '../classes/vertex-loop.js';
import { getAligner } from '../alignment/factory.js';
import { createMapper } from '../mapping/factory.js';
import { getEasing, type EasingTable } from '../interpolation/easing.js';
import { InterpolationEngine } from '../interpolation/engine.js';
import { angle } from '../interpolation/lerp.js';
import { createShapeState } from '../shapes/create-state.js';
import { alignContours } from '../morph/prepare.js';
import * as errors from '../errors.js';

const vertexSchema = z.tuple([z.number(), z.number()]);

const loopSchema = z.object({
    vertices: z.array(vertexSchema).min(1),
    closed: z.boolean().optional(),
});

const channel = z.number().int().min(0).max(255);

const colorSchema = z.union([
    z.string(),
    z.tuple([channel, channel, channel]),
    z.tuple([channel, channel, channel, channel]),
]);

const baseShapeSchema = z.object({
    numVertices: z.number().int().min(2).optional(),
    x: z.number().optional(),
    y: z.number().optional(),
    scale: z.number().optional(),
    opacity: z.number().min(0).max(1).optional(),
    rotation: z.number().optional(),
    fillColor: colorSchema.optional(),
    strokeColor: colorSchema.optional(),
    strokeWidth: z.number().min(0).optional(),
});

const positive = z.number().positive();

/**
 * Zod schema for a parametric shape, discriminated on `type`.
 */
export const shapeSchema = z.discriminatedUnion('type', [
    baseShapeSchema.extend({ type: z.literal('circle'), radius: positive }),
    baseShapeSchema.extend({ type: z.literal('ellipse'), rx: positive, ry: positive }),
    baseShapeSchema.extend({ type: z.literal('rectangle'), width: positive, height: positive }),
    baseShapeSchema.extend({ type: z.literal('polygon'), sides: z.number().int().min(3), radius: positive }),
    baseShapeSchema.extend({
        type: z.literal('star'),
        points: z.number().int().min(2),
        outerRadius: positive,
        innerRadius: positive,
    }),
    baseShapeSchema.extend({
        type: z.literal('line'),
        x1: z.number(),
        y1: z.number(),
        x2: z.number(),
        y2: z.number(),
    }),
    baseShapeSchema.extend({
        type: z.literal('ring'),
        outerRadius: positive,
        innerRadius: positive,
        holeVertices: z.number().int().min(3).optional(),
    }),
    baseShapeSchema.extend({
        type: z.literal('perforated'),
        outline: z.enum(['circle', 'rectangle']),
        width: positive,
        height: positive,
        holes: z.array(z.object({
            x: z.number(),
            y: z.number(),
            radius: positive,
            numVertices: z.number().int().min(3).optional(),
        })),
    }),
]);

/**
 * Zod input schema for the `morph` tool.
 */
const morphInputSchema = {
    action: z.enum(['align', 'map_loops', 'interpolate', 'color', 'angle']).describe('Morph action to perform'),
    vertices1: z.array(vertexSchema).optional().describe('First vertex list [[x, y], ...] for align'),
    vertices2: z.array(vertexSchema).optional().describe('Second vertex list for align; must match vertices1 in length'),
    closed1: z.boolean().optional().describe('Whether vertices1 is a closed loop (default true)'),
    closed2: z.boolean().optional().describe('Whether vertices2 is a closed loop (default true)'),
    rotation1: z.number().optional().describe('World rotation of vertices1 in degrees'),
    rotation2: z.number().optional().describe('World rotation of vertices2 in degrees'),
    norm: z.enum(ALIGNMENT_NORMS).optional().describe('Alignment norm: l1, l2 or linf'),
    loops1: z.array(loopSchema).optional().describe('Source loops for map_loops'),
    loops2: z.array(loopSchema).optional().describe('Destination loops for map_loops'),
    strategy: z.enum(errors.MAPPER_STRATEGIES).optional().describe('Loop mapper strategy (default from config)'),
    shape1: shapeSchema.optional().describe('Start shape for interpolate'),
    shape2: shapeSchema.optional().describe('End shape for interpolate'),
    t: z.number().min(0).max(1).optional().describe('Normalized time in [0, 1]'),
    easing: z.string().optional().describe('Easing name applied to every field, e.g. "in_out_cubic"'),
    color1: colorSchema.optional().describe('Start color: hex, name, or [r, g, b(, a)]'),
    color2: colorSchema.optional().describe('End color'),
    space: z.enum(COLOR_SPACES).optional().describe('Color space for color interpolation (default lab)'),
    start: z.number().optional().describe('Start angle in degrees for angle'),
    end: z.number().optional().describe('End angle in degrees for angle'),
};

/**
 * Registers the `morph` tool on the MCP server.
 */
export function registerMorphTool(server: McpServer): void {
    server.registerTool(
        'morph',
        {
            title: 'Morph',
            description: 'Align vertex sequences, map loops between shapes and compute in-between states. Actions: align, map_loops, interpolate, color, angle.',
            inputSchema: morphInputSchema,
        },
        async (args) => {
            try {
                switch (args.action) {
                    case 'align':
                        return handleAlign(args);
                    case 'map_loops':
                        return handleMapLoops(args.loops1, args.loops2, args.strategy);
                    case 'interpolate':
                        return handleInterpolate(args);
                    case 'color':
                        return handleColor(args.color1, args.color2, args.t, args.space);
                    case 'angle':
                        return handleAngle(args.start, args.end, args.t);
                    default:
                        return errors.invalidArgument(`Unknown morph action: ${String(args.action)}`);
                }
            } catch (e: unknown) {
                return errors.toErrorResponse(e);
            }
        },
    );
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function ok(data: object) {
    return { content: [{ type: 'text' as const, text: JSON.stringify(data) }] };
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

function handleAlign(args: {
    vertices1?: VertexTuple[];
    vertices2?: VertexTuple[];
    closed1?: boolean;
    closed2?: boolean;
    rotation1?: number;
    rotation2?: number;
    norm?: AlignmentNorm;
}) {
    if (!args.vertices1 || !args.vertices2) {
        return errors.invalidArgument('morph align requires "vertices1" and "vertices2".');
    }
    const closed1 = args.closed1 ?? true;
    const closed2 = args.closed2 ?? true;
    const aligner = getAligner(closed1, closed2, args.norm);
    const [aligned1, aligned2] = aligner.align(
        toPoints(args.vertices1),
        toPoints(args.vertices2),
        { rotation1: args.rotation1 ?? 0, rotation2: args.rotation2 ?? 0, closed1, closed2 },
    );
    return ok({ aligner: aligner.name, vertices1: toTuples(aligned1), vertices2: toTuples(aligned2) });
}

function handleMapLoops(
    loops1: Array<{ vertices: VertexTuple[]; closed?: boolean }> | undefined,
    loops2: Array<{ vertices: VertexTuple[]; closed?: boolean }> | undefined,
    strategy: string | undefined,
) {
    if (!loops1 || !loops2) {
        return errors.invalidArgument('morph map_loops requires "loops1" and "loops2".');
    }
    const toLoop = (l: { vertices: VertexTuple[]; closed?: boolean }): VertexLoopClass =>
        VertexLoopClass.fromJSON({ vertices: l.vertices, closed: l.closed ?? true });

    const mapper = createMapper(strategy);
    const [mapped1, mapped2] = mapper.map(loops1.map(toLoop), loops2.map(toLoop));
    const toData = (l: VertexLoopClass): VertexLoopData => l.toJSON();
    return ok({
        strategy: mapper.name,
        pairs: mapped1.length,
        loops1: mapped1.map(toData),
        loops2: mapped2.map(toData),
    });
}

function handleInterpolate(args: {
    shape1?: ShapeSpec;
    shape2?: ShapeSpec;
    t?: number;
    easing?: string;
    strategy?: string;
    norm?: AlignmentNorm;
    space?: ColorSpace;
}) {
    if (!args.shape1 || !args.shape2 || args.t === undefined) {
        return errors.invalidArgument('morph interpolate requires "shape1", "shape2" and "t".');
    }

    const [start, end] = alignContours(createShapeState(args.shape1), createShapeState(args.shape2), {
        mapper: args.strategy,
        norm: args.norm,
    });

    let overrides: EasingTable | undefined;
    if (args.easing !== undefined) {
        const easing = getEasing(args.easing);
        overrides = Object.fromEntries(start.fieldNames.map(field => [field, easing]));
    }

    const engine = new InterpolationEngine({ colorSpace: args.space });
    const state = engine.createEasedState(start, end, args.t, overrides);
    return ok({ t: args.t, state: state.toJSON() });
}

function handleColor(
    color1: ColorInput | undefined,
    color2: ColorInput | undefined,
    t: number | undefined,
    space: ColorSpace | undefined,
) {
    if (color1 === undefined || color2 === undefined || t === undefined) {
        return errors.invalidArgument('morph color requires "color1", "color2" and "t".');
    }
    const result = ColorClass.from(color1).interpolate(ColorClass.from(color2), t, space);
    return ok({ hex: result.toHex(), rgba: result.isNone() ? null : result.toRgba() });
}

function handleAngle(start: number | undefined, end: number | undefined, t: number | undefined) {
    if (start === undefined || end === undefined || t === undefined) {
        return errors.invalidArgument('morph angle requires "start", "end" and "t".');
    }
    return ok({ angle: angle(start, end, t) });
}
