/**
 * Server entry point for the ontology lookup service.
 *
 * This module:
 * - Builds the component graph (OLS client, engines, service) from config
 * - Creates the Fastify server with the MCP endpoint and REST routes
 * - Provides both programmatic API and CLI usage
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { HierarchyTraversal } from './hierarchy/HierarchyTraversal.js';
import { createLogger, type Logger } from './logging/logger.js';
import { createMcpServer, createToolRegistry, mcpPlugin, SERVER_VERSION } from './mcp/index.js';
import { OlsApi, type OntologyGateway } from './ols/OlsApi.js';
import { OlsClient, type FetchLike, type SleepFn } from './ols/OlsClient.js';
import { OntologyService } from './service/OntologyService.js';
import { EmbeddingCache } from './similarity/EmbeddingCache.js';
import { createEmbeddingProvider, type EmbeddingProvider } from './similarity/EmbeddingProvider.js';
import { SimilarityEngine } from './similarity/SimilarityEngine.js';
import { createToolHandlers } from './api/handlers/ToolHandlers.js';
import { registerRoutes } from './api/routes.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  logger: Logger;
  gateway: OntologyGateway;
  traversal: HierarchyTraversal;
  embeddings: EmbeddingCache;
  similarity: SimilarityEngine;
  service: OntologyService;
}

/**
 * Collaborators that tests (or embedders) substitute.
 */
export interface AppOverrides {
  logger?: Logger;
  /** Used for both OLS and embedding requests */
  fetch?: FetchLike;
  sleep?: SleepFn;
  gateway?: OntologyGateway;
  embeddingProvider?: EmbeddingProvider;
}

/**
 * Initialize all application components.
 */
export function initializeApp(config: AppConfig, overrides: AppOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger({ level: config.server.logLevel });

  const client = new OlsClient({
    ...config.ols,
    logger,
    ...(overrides.fetch ? { fetch: overrides.fetch } : {}),
    ...(overrides.sleep ? { sleep: overrides.sleep } : {}),
  });
  const gateway = overrides.gateway ?? new OlsApi(client);

  const traversal = new HierarchyTraversal(gateway, {
    maxDepth: config.tools.defaultDepth,
    maxResults: config.tools.maxTraversalResults,
    pageSize: config.tools.hierarchyPageSize,
    concurrency: config.tools.traversalConcurrency,
  }, logger);

  const provider = overrides.embeddingProvider ?? createEmbeddingProvider(config.embedding, overrides.fetch);
  const embeddings = new EmbeddingCache(provider, config.embedding.cache);
  const similarity = new SimilarityEngine(gateway, embeddings, {
    candidatePoolSize: config.tools.candidatePoolSize,
    logger,
  });

  const service = new OntologyService(gateway, traversal, similarity, config.tools);

  logger.info(
    { olsBaseUrl: client.baseUrl, embeddingProvider: provider.id },
    'Ontology lookup initialized',
  );

  return { config, logger, gateway, traversal, embeddings, similarity, service };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(ctx: AppContext): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = ctx.logger;
  const fastify = Fastify({ loggerInstance });

  const { cors: corsConfig } = ctx.config.server;
  if (corsConfig.enabled) {
    await fastify.register(cors, {
      origin: corsConfig.origins.includes('*') ? true : corsConfig.origins,
      methods: ['GET', 'HEAD', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'Mcp-Session-Id', 'Mcp-Protocol-Version'],
    });
  }

  // One MCP server per request (stateless Streamable HTTP)
  await fastify.register(mcpPlugin, { prefix: '/mcp', createMcpServer: () => createMcpServer(ctx) });

  const toolRegistry = createToolRegistry(ctx);
  registerRoutes(fastify, {
    toolHandlers: createToolHandlers(toolRegistry),
    version: SERVER_VERSION,
    health: () => ({
      ols: { baseUrl: ctx.config.ols.baseUrl },
      embedding: { provider: ctx.embeddings.providerId, cachedEntries: ctx.embeddings.size },
      tools: { registered: toolRegistry.size },
    }),
  });

  return fastify;
}

export interface StartOptions {
  configPath?: string | undefined;
}

/**
 * Load config, build the app and start listening.
 */
export async function startServer(options: StartOptions = {}): Promise<FastifyInstance> {
  const bootstrap = createLogger();
  const config = await loadConfig({ configPath: options.configPath, warn: (message) => bootstrap.warn(message) });
  const ctx = initializeApp(config);
  const fastify = await createServer(ctx);

  await fastify.listen({ port: config.server.port, host: config.server.host });

  const shutdown = async (signal: string) => {
    ctx.logger.info({ signal }, 'Shutting down');
    await fastify.close();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  return fastify;
}

/**
 * CLI entry point.
 */
async function main() {
  await startServer({ configPath: process.argv[2] });
}

// Run if executed directly
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch((err: unknown) => {
    process.stderr.write(`Failed to start server: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exit(1);
  });
}
