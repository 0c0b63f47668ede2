/**
 * Dual-registration helper that registers a tool with both the MCP server
 * and the in-process ToolRegistry in a single call.
 *
 * Both registrations share one handler: parse the arguments with the tool's
 * zod schema, run it, and wrap the value (or the thrown error) as a
 * CallToolResult.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from '../../logging/logger.js';
import { ValidationError } from '../../ols/errors.js';
import type { ToolRegistry } from '../ToolRegistry.js';
import { errorResult, jsonResult } from '../helpers.js';

export interface ToolDefinition<S extends z.ZodObject> {
  name: string;
  description: string;
  schema: S;
  run: (args: z.output<S>, signal?: AbortSignal) => Promise<unknown>;
}

/** Where tools get registered; either target may be absent */
export interface ToolHost {
  server?: McpServer | undefined;
  registry?: ToolRegistry | undefined;
  logger: Logger;
}

export function createToolHandler<S extends z.ZodObject>(
  tool: ToolDefinition<S>,
  logger: Logger,
): (args: unknown, signal?: AbortSignal) => Promise<CallToolResult> {
  return async (args, signal) => {
    const parsed = tool.schema.safeParse(args ?? {});
    if (!parsed.success) {
      return errorResult(new ValidationError(`Invalid arguments for ${tool.name}: ${z.prettifyError(parsed.error)}`, {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.map(String).join('.'),
          message: issue.message,
        })),
      }));
    }

    const started = Date.now();
    try {
      const value = await tool.run(parsed.data, signal);
      logger.debug({ tool: tool.name, ms: Date.now() - started }, 'Tool call succeeded');
      return jsonResult(value);
    } catch (err) {
      logger.warn({ tool: tool.name, ms: Date.now() - started, err }, 'Tool call failed');
      return errorResult(err);
    }
  };
}

/**
 * Register a tool with the MCP server and the ToolRegistry, whichever the
 * host carries.
 */
export function dualRegister<S extends z.ZodObject>(host: ToolHost, tool: ToolDefinition<S>): void {
  const handler = createToolHandler(tool, host.logger);

  if (host.server) {
    host.server.tool(tool.name, tool.description, tool.schema.shape, (args, extra) => handler(args, extra.signal));
  }

  if (host.registry) {
    host.registry.register({
      name: tool.name,
      description: tool.description,
      inputSchema: z.toJSONSchema(tool.schema),
      handler,
    });
  }
}
