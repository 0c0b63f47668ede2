/**
 * Types for the HTTP API.
 */

import type { SerializedError } from '../ols/errors.js';
import type { ToolSummary } from '../mcp/ToolRegistry.js';

// ============================================================================
// Error Responses
// ============================================================================

/**
 * Error body returned by every non-2xx API response.
 */
export interface ApiErrorResponse {
  error: SerializedError;
}

// ============================================================================
// Tool Proxy
// ============================================================================

export interface ToolListResponse {
  tools: ToolSummary[];
  total: number;
}

export interface ToolCallParams {
  name: string;
}

// ============================================================================
// Health
// ============================================================================

export interface HealthResponse {
  status: 'ok' | 'degraded' | 'error';
  timestamp: string;
  version: string;
  components: {
    ols: { baseUrl: string };
    embedding: { provider: string; cachedEntries: number };
    tools: { registered: number };
  };
}
