/**
 * Configuration types for the ontology lookup server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

/**
 * Top-level configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  ols: OlsConfig;
  tools: ToolDefaultsConfig;
  embedding: EmbeddingConfig;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * HTTP server settings (ignored by the stdio entry point).
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Remote OLS API settings.
 */
export interface OlsConfig {
  /** Base URL without trailing slash (default: 'https://www.ebi.ac.uk/ols4') */
  baseUrl: string;
  /** Per-attempt timeout in ms (default: 30_000) */
  timeoutMs: number;
  /** Retries after the first attempt (default: 2, i.e. 3 attempts) */
  maxRetries: number;
  /** Backoff base; retry n waits base * 2^(n-1) ms (default: 250) */
  retryBaseDelayMs: number;
}

/**
 * Defaults and limits applied at the tool boundary.
 */
export interface ToolDefaultsConfig {
  /** Rows per search_terms page (default: 10) */
  searchRows: number;
  /** Ontologies per search_ontologies page (default: 20) */
  ontologyPageSize: number;
  /** Page size used while walking parents/children (default: 100) */
  hierarchyPageSize: number;
  /** Traversal depth when the caller gives none (default: 1) */
  defaultDepth: number;
  /** Largest depth a caller may request (default: 10) */
  maxDepth: number;
  /** Stop a traversal after this many terms (default: 500) */
  maxTraversalResults: number;
  /** Frontier nodes fetched concurrently per level (default: 4) */
  traversalConcurrency: number;
  /** Similar terms returned when the caller gives no top_k (default: 10) */
  defaultTopK: number;
  /** Lexical candidates scored per similarity call (default: 25) */
  candidatePoolSize: number;
}

export type EmbeddingProviderKind = 'ngram' | 'openai-compatible' | 'none';

/**
 * Embedding provider configuration.
 */
export interface EmbeddingConfig {
  /** Provider used by find_similar_terms (default: 'ngram') */
  provider: EmbeddingProviderKind;
  /** Base URL for an OpenAI-compatible API (e.g. "http://localhost:8000/v1") */
  baseUrl: string;
  /** Embedding model served by the endpoint */
  model: string;
  /** Optional API key */
  apiKey: string;
  /** Per-request timeout in ms (default: 30_000) */
  timeoutMs: number;
  cache: EmbeddingCacheConfig;
}

export interface EmbeddingCacheConfig {
  enabled: boolean;
  /** Entry lifetime in ms (default: 600_000) */
  ttlMs: number;
  /** Oldest entries are evicted past this count (default: 5000) */
  maxEntries: number;
}

/**
 * Default configuration.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  ols: {
    baseUrl: 'https://www.ebi.ac.uk/ols4',
    timeoutMs: 30_000,
    maxRetries: 2,
    retryBaseDelayMs: 250,
  },
  tools: {
    searchRows: 10,
    ontologyPageSize: 20,
    hierarchyPageSize: 100,
    defaultDepth: 1,
    maxDepth: 10,
    maxTraversalResults: 500,
    traversalConcurrency: 4,
    defaultTopK: 10,
    candidatePoolSize: 25,
  },
  embedding: {
    provider: 'ngram',
    baseUrl: '',
    model: '',
    apiKey: '',
    timeoutMs: 30_000,
    cache: {
      enabled: true,
      ttlMs: 600_000,
      maxEntries: 5000,
    },
  },
};
