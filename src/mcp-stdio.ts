#!/usr/bin/env node
/**
 * MCP stdio transport entry point.
 *
 * Lets a desktop assistant spawn the server as a subprocess (no HTTP needed).
 * Usage: ontology-lookup-mcp [config.yaml]
 *
 * stdout carries JSON-RPC only; the logger writes to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/loader.js';
import { createLogger } from './logging/logger.js';
import { createMcpServer } from './mcp/index.js';
import { initializeApp } from './server.js';

async function main() {
  const bootstrap = createLogger();
  const config = await loadConfig({
    configPath: process.argv[2],
    warn: (message) => bootstrap.warn(message),
  });

  const ctx = initializeApp(config);
  const mcpServer = createMcpServer(ctx);

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);

  ctx.logger.info('MCP server connected via stdio');
}

main().catch((err: unknown) => {
  process.stderr.write(`Fatal: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
  process.exit(1);
});
