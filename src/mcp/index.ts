/**
 * Public exports for the MCP server layer.
 */

export { createMcpServer, createToolRegistry, SERVER_NAME, SERVER_VERSION } from './McpServerFactory.js';
export { mcpPlugin } from './fastifyPlugin.js';
export type { McpPluginOptions } from './fastifyPlugin.js';
export { ToolRegistry } from './ToolRegistry.js';
export type { ToolEntry, ToolSummary } from './ToolRegistry.js';
