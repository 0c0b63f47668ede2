/**
 * REST proxy handlers for the ontology tools.
 *
 * These thin handlers call ToolRegistry tools directly, so plain HTTP
 * clients get the same results as MCP clients without the JSON-RPC framing.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { ToolRegistry } from '../../mcp/ToolRegistry.js';
import { resultError, resultText } from '../../mcp/helpers.js';
import type { OntologyErrorCode } from '../../ols/errors.js';
import type { ApiErrorResponse, ToolCallParams, ToolListResponse } from '../types.js';

const STATUS_BY_CODE: Record<OntologyErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  UPSTREAM_ERROR: 502,
  MALFORMED_RESPONSE: 502,
  NETWORK_ERROR: 502,
  INTERNAL_ERROR: 500,
};

export function statusForCode(code: OntologyErrorCode): number {
  return STATUS_BY_CODE[code];
}

// ============================================================================
// Handler interface
// ============================================================================

export interface ToolHandlers {
  list(request: FastifyRequest, reply: FastifyReply): Promise<ToolListResponse>;

  call(
    request: FastifyRequest<{ Params: ToolCallParams; Body: unknown }>,
    reply: FastifyReply,
  ): Promise<unknown>;
}

// ============================================================================
// Factory
// ============================================================================

export function createToolHandlers(toolRegistry: ToolRegistry): ToolHandlers {
  return {
    async list() {
      const tools = toolRegistry.list();
      return { tools, total: tools.length };
    },

    async call(request, reply) {
      const { name } = request.params;
      const entry = toolRegistry.get(name);
      if (!entry) {
        reply.status(404);
        const body: ApiErrorResponse = {
          error: {
            code: 'NOT_FOUND',
            message: `Unknown tool "${name}". Valid: ${toolRegistry.listNames().join(', ')}`,
          },
        };
        return body;
      }

      // Abort upstream work when the client goes away
      const controller = new AbortController();
      const onClose = () => {
        if (!reply.raw.writableEnded) controller.abort();
      };
      reply.raw.on('close', onClose);

      try {
        const result = await entry.handler(request.body ?? {}, controller.signal);
        const error = resultError(result);
        if (error) {
          reply.status(statusForCode(error.code));
          const body: ApiErrorResponse = { error };
          return body;
        }
        const text = resultText(result);
        try {
          return JSON.parse(text);
        } catch {
          return { raw: text };
        }
      } finally {
        reply.raw.off('close', onClose);
      }
    },
  };
}
