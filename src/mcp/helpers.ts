/**
 * MCP response helpers.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { isErrorCode, serializeError, type SerializedError } from '../ols/errors.js';

/**
 * Create a JSON content result.
 */
export function jsonResult(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

/**
 * Create an error result carrying `{ error: { code, message, details? } }`.
 */
export function errorResult(err: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify({ error: serializeError(err) }, null, 2) }],
    isError: true,
  };
}

/**
 * Joined text of every text block in a result.
 */
export function resultText(result: CallToolResult): string {
  return result.content
    .map((c) => (c.type === 'text' ? c.text : ''))
    .join('\n');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Recover the serialized error from a result built by `errorResult`.
 */
export function resultError(result: CallToolResult): SerializedError | undefined {
  if (!result.isError) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(resultText(result));
  } catch {
    return { code: 'INTERNAL_ERROR', message: resultText(result) };
  }
  if (parsed !== null && typeof parsed === 'object' && 'error' in parsed) {
    const error = parsed.error;
    if (error !== null && typeof error === 'object' && 'code' in error && 'message' in error &&
        isErrorCode(error.code) && typeof error.message === 'string') {
      const details = 'details' in error ? error.details : undefined;
      return {
        code: error.code,
        message: error.message,
        ...(isRecord(details) ? { details } : {}),
      };
    }
  }
  return { code: 'INTERNAL_ERROR', message: resultText(result) };
}
