/**
 * Route configuration for the API.
 *
 * Route handlers are thin wrappers; tool semantics live in OntologyService.
 */

import type { FastifyInstance } from 'fastify';
import type { ToolHandlers } from './handlers/ToolHandlers.js';
import type { HealthResponse, ToolCallParams } from './types.js';

export interface RouteOptions {
  toolHandlers: ToolHandlers;
  health: () => HealthResponse['components'];
  version: string;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { toolHandlers } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    version: options.version,
    components: options.health(),
  }));

  // ============================================================================
  // Tool Proxy
  // ============================================================================

  fastify.get('/api/tools', toolHandlers.list.bind(toolHandlers));
  fastify.post<{ Params: ToolCallParams; Body: unknown }>(
    '/api/tools/:name',
    toolHandlers.call.bind(toolHandlers),
  );
}
