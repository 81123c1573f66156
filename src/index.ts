#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { applyEnvConfig, createServer } from './server.js';
import { logger } from './logger.js';

async function main() {
  await applyEnvConfig();
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Shape morph server running on stdio');
}

main().catch((error: unknown) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
