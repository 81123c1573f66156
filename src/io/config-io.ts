import * as fs from 'fs/promises';
import { z } from 'zod';
import { type MorphConfig, type MorphConfigUpdate, ALIGNMENT_NORMS } from '../types/config.js';
import { LOG_LEVELS } from '../logger.js';
import * as errors from '../errors.js';

const normSchema = z.enum(ALIGNMENT_NORMS);

/**
 * A partial config. Unknown keys are rejected so typos surface instead of being ignored.
 */
export const morphConfigUpdateSchema = z
    .object({
        morphing: z
            .object({
                vertexLoopMapper: z.enum(errors.MAPPER_STRATEGIES).optional(),
                vertexAlignmentNorm: normSchema.optional(),
                angularAlignmentNorm: normSchema.optional(),
                euclideanAlignmentNorm: normSchema.optional(),
                clustering: z
                    .object({
                        balanceClusters: z.boolean().optional(),
                        maxIterations: z.number().int().positive().optional(),
                        randomSeed: z.number().int().optional(),
                    })
                    .strict()
                    .optional(),
            })
            .strict()
            .optional(),
        state: z
            .object({
                numVertices: z.number().int().min(3).optional(),
            })
            .strict()
            .optional(),
        logging: z
            .object({
                level: z.enum(LOG_LEVELS).optional(),
            })
            .strict()
            .optional(),
    })
    .strict();

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
    return e instanceof Error && 'code' in e;
}

/**
 * Loads a partial config from a JSON file.
 *
 * @param path - Path to the config JSON file
 */
export async function loadConfigFile(path: string): Promise<MorphConfigUpdate> {
    let fileContent: string;
    try {
        fileContent = await fs.readFile(path, 'utf8');
    } catch (e: unknown) {
        if (isErrnoException(e) && e.code === 'ENOENT') {
            throw new errors.MorphError(errors.configFileNotFound(path));
        }
        throw e;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fileContent);
    } catch (e: unknown) {
        const detail = e instanceof Error ? e.message : String(e);
        throw new errors.MorphError(errors.invalidConfigFile(path, `not valid JSON (${detail})`));
    }

    const result = morphConfigUpdateSchema.safeParse(parsed);
    if (!result.success) {
        const detail = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new errors.MorphError(errors.invalidConfigFile(path, detail));
    }
    return result.data;
}

/**
 * Saves a full config as pretty-printed JSON, creating parent directories.
 */
export async function saveConfigFile(path: string, config: MorphConfig): Promise<void> {
    const lastSlash = path.lastIndexOf('/');
    if (lastSlash > 0) {
        await fs.mkdir(path.substring(0, lastSlash), { recursive: true });
    }
    await fs.writeFile(path, JSON.stringify(config, null, 2), 'utf8');
}
