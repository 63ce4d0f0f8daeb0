#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/index.js';
import { setLogLevel, createLogger } from './utils/logger.js';
import { createRouterService } from './service.js';
import { registerTools } from './server/tools.js';

const log = createLogger('main');

async function main(): Promise<void> {
  log.info('modelmux starting...');

  // 1. Load configuration
  const config = loadConfig();
  setLogLevel(config.logging.level);
  log.info(`Configuration loaded. Strategy: ${config.routing.strategy}`);

  // 2. Wire registry, cache, metrics, pool and router
  const service = await createRouterService(config);

  // 3. Start MCP stdio server
  const server = new McpServer({
    name: 'modelmux',
    version: '0.1.0',
  });
  registerTools(server, service);
  log.info('MCP tools registered');

  const shutdown = (signal: string): void => {
    log.info(`Received ${signal}, shutting down`);
    service.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error('Shutdown failed', err);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('modelmux is running on stdio transport');
}

main().catch((err) => {
  log.error('Fatal error during startup', err);
  process.exit(1);
});
