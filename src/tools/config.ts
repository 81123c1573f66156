import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type MorphConfigUpdate } from '../types/config.js';
import { SettingsClass, getSettings } from '../classes/settings.js';
import { loadConfigFile, morphConfigUpdateSchema, saveConfigFile } from '../io/config-io.js';
import * as errors from '../errors.js';
import * as path from 'node:path';

/**
 * Zod input schema for the `config` tool.
 */
const configInputSchema = {
    action: z.enum(['get', 'set', 'load', 'save', 'reset']).describe('Config action to perform'),
    config: morphConfigUpdateSchema.optional().describe('Partial config to merge for set'),
    path: z.string().optional().describe('Config JSON file for load/save (defaults to the last loaded file on save)'),
};

/**
 * Registers the `config` tool on the MCP server.
 */
export function registerConfigTool(server: McpServer): void {
    server.registerTool(
        'config',
        {
            title: 'Config',
            description: 'Read and change morph defaults: loop mapper, alignment norms, clustering, vertex resolution, log level. Actions: get, set, load, save, reset.',
            inputSchema: configInputSchema,
        },
        async (args) => {
            try {
                switch (args.action) {
                    case 'get':
                        return ok({ config: getSettings().toJSON(), source: getSettings().sourcePath });
                    case 'set':
                        return handleSet(args.config);
                    case 'load':
                        return await handleLoad(args.path);
                    case 'save':
                        return await handleSave(args.path);
                    case 'reset':
                        SettingsClass.reset();
                        return ok({ message: 'Config reset to defaults.', config: getSettings().toJSON() });
                    default:
                        return errors.invalidArgument(`Unknown config action: ${String(args.action)}`);
                }
            } catch (e: unknown) {
                return errors.toErrorResponse(e);
            }
        },
    );
}

function ok(data: object) {
    return { content: [{ type: 'text' as const, text: JSON.stringify(data) }] };
}

function handleSet(update: MorphConfigUpdate | undefined) {
    if (!update) {
        return errors.invalidArgument('config set requires "config".');
    }
    return ok({ config: getSettings().update(update) });
}

async function handleLoad(filePath: string | undefined) {
    if (!filePath) {
        return errors.invalidArgument('config load requires "path".');
    }
    const resolved = path.resolve(filePath);
    const settings = getSettings();
    const config = settings.update(await loadConfigFile(resolved));
    settings.sourcePath = resolved;
    return ok({ message: `Config loaded from ${resolved}.`, config });
}

async function handleSave(filePath: string | undefined) {
    const settings = getSettings();
    const target = filePath ? path.resolve(filePath) : settings.sourcePath;
    if (!target) {
        return errors.invalidArgument('config save requires "path" when no config file has been loaded.');
    }
    await saveConfigFile(target, settings.toJSON());
    settings.sourcePath = target;
    return ok({ message: `Config saved to ${target}.` });
}
