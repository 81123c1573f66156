import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerMorphTool } from './tools/morph.js';
import { registerConfigTool } from './tools/config.js';
import { getSettings } from './classes/settings.js';
import { loadConfigFile } from './io/config-io.js';
import { logger } from './logger.js';
import * as path from 'node:path';

export const SERVER_NAME = 'shape-morph-server';
export const SERVER_VERSION = '0.1.0';

/** Environment variable naming a config file to load at start-up. */
export const CONFIG_ENV_VAR = 'SHAPE_MORPH_CONFIG';

export function createServer(): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerMorphTool(server);
  registerConfigTool(server);

  return server;
}

/**
 * Loads the config file named by SHAPE_MORPH_CONFIG, if set.
 * Returns the resolved path, or null when the variable is unset.
 */
export async function applyEnvConfig(env: NodeJS.ProcessEnv = process.env): Promise<string | null> {
  const configPath = env[CONFIG_ENV_VAR];
  if (!configPath) {
    return null;
  }
  const resolved = path.resolve(configPath);
  const settings = getSettings();
  settings.update(await loadConfigFile(resolved));
  settings.sourcePath = resolved;
  logger.info(`Loaded config from ${resolved}`);
  return resolved;
}
