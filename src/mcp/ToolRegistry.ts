/**
 * In-process tool registry.
 *
 * Holds the same handlers the MCP server exposes, keyed by tool name, so the
 * HTTP proxy and tests can list and call tools without the MCP protocol.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export interface ToolEntry {
  name: string;
  description: string;
  /** JSON Schema for the tool's input parameters. */
  inputSchema: Record<string, unknown>;
  /** Validates `args` itself; never throws for bad input. */
  handler: (args: unknown, signal?: AbortSignal) => Promise<CallToolResult>;
}

/** Listing shape served by GET /api/tools */
export type ToolSummary = Omit<ToolEntry, 'handler'>;

export class ToolRegistry {
  private tools = new Map<string, ToolEntry>();

  /** Register a tool entry. Overwrites if name already exists. */
  register(entry: ToolEntry): void {
    this.tools.set(entry.name, entry);
  }

  get(name: string): ToolEntry | undefined {
    return this.tools.get(name);
  }

  list(): ToolSummary[] {
    return Array.from(this.tools.values(), ({ name, description, inputSchema }) => ({
      name,
      description,
      inputSchema,
    }));
  }

  listNames(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }
}
