/**
 * ontology-lookup-mcp: ontology search, hierarchy and similarity tools
 * over the OLS4 REST API.
 *
 * This is the main entry point for the library.
 */

// Configuration
export { loadConfig, resolveConfig, validateConfig, ConfigValidationError } from './config/loader.js';
export type { LoadConfigOptions } from './config/loader.js';
export * from './config/types.js';

// Logging
export { createLogger, createSilentLogger } from './logging/logger.js';
export type { Logger, LoggerOptions } from './logging/logger.js';

// OLS access
export * from './ols/errors.js';
export * from './ols/types.js';
export { OlsClient, OLS_ENDPOINTS, encodeIri } from './ols/OlsClient.js';
export type { FetchLike, SleepFn, OlsClientOptions, OlsEndpoint, OlsParams } from './ols/OlsClient.js';
export { OlsApi, normalizeOntologyCode } from './ols/OlsApi.js';
export type { OntologyGateway, TermSearchQuery, OntologyListQuery } from './ols/OlsApi.js';
export { resolveTermIri } from './ols/iri.js';
export * from './ols/ResponseNormalizer.js';

// Engines
export { HierarchyTraversal, DEFAULT_TRAVERSAL_LIMITS } from './hierarchy/HierarchyTraversal.js';
export type { TraversalLimits, TraversalOptions, TraversalResult, TraversedTerm } from './hierarchy/HierarchyTraversal.js';
export * from './similarity/EmbeddingProvider.js';
export { EmbeddingCache } from './similarity/EmbeddingCache.js';
export type { EmbeddingCacheOptions } from './similarity/EmbeddingCache.js';
export { SimilarityEngine, embeddingText } from './similarity/SimilarityEngine.js';
export type { SimilarityQuery, SimilarityResponse, SimilarityResult } from './similarity/SimilarityEngine.js';

// Tool service
export * from './service/OntologyService.js';

// MCP
export * from './mcp/index.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext, AppOverrides, StartOptions } from './server.js';
