/**
 * Factories for the MCP server and the in-process tool registry.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { ToolRegistry } from './ToolRegistry.js';
import { registerAllTools } from './tools/index.js';

export const SERVER_NAME = 'ontology-lookup';
export const SERVER_VERSION = '0.1.0';

/**
 * Create and configure an MCP server bound to the given AppContext.
 */
export function createMcpServer(ctx: AppContext): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  registerAllTools({ server, logger: ctx.logger.child({ component: 'tools' }) }, ctx);

  return server;
}

/**
 * Registry holding the same tool handlers, for the HTTP proxy and tests.
 */
export function createToolRegistry(ctx: AppContext): ToolRegistry {
  const registry = new ToolRegistry();
  registerAllTools({ registry, logger: ctx.logger.child({ component: 'tools' }) }, ctx);
  return registry;
}
