/**
 * Error taxonomy for ontology lookups.
 *
 * Every failure that reaches the tool boundary is one of these classes, so the
 * transport layer can render a machine-readable `{ code, message, details }`.
 */

export type OntologyErrorCode =
  | 'NOT_FOUND'           // Unknown ontology or term
  | 'NETWORK_ERROR'       // Transport failure after retries, or cancelled
  | 'UPSTREAM_ERROR'      // OLS returned bad data or failed mid-traversal
  | 'MALFORMED_RESPONSE'  // Required identity fields missing from a record
  | 'VALIDATION_ERROR'    // Caller supplied invalid parameters
  | 'INTERNAL_ERROR';     // Anything else

const ERROR_CODES: readonly OntologyErrorCode[] = [
  'NOT_FOUND',
  'NETWORK_ERROR',
  'UPSTREAM_ERROR',
  'MALFORMED_RESPONSE',
  'VALIDATION_ERROR',
  'INTERNAL_ERROR',
];

export function isErrorCode(value: unknown): value is OntologyErrorCode {
  return ERROR_CODES.some((code) => code === value);
}

/**
 * Serialized form returned to tool callers.
 */
export interface SerializedError {
  code: OntologyErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class OntologyLookupError extends Error {
  readonly code: OntologyErrorCode;
  readonly details: Record<string, unknown> | undefined;

  constructor(code: OntologyErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'OntologyLookupError';
    this.code = code;
    this.details = details;
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export class NotFoundError extends OntologyLookupError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', message, details);
    this.name = 'NotFoundError';
  }
}

export class NetworkError extends OntologyLookupError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NETWORK_ERROR', message, details);
    this.name = 'NetworkError';
  }
}

export class UpstreamError extends OntologyLookupError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('UPSTREAM_ERROR', message, details);
    this.name = 'UpstreamError';
  }
}

export class MalformedResponseError extends OntologyLookupError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('MALFORMED_RESPONSE', message, details);
    this.name = 'MalformedResponseError';
  }
}

export class ValidationError extends OntologyLookupError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Render any thrown value as a serialized error.
 */
export function serializeError(err: unknown): SerializedError {
  if (err instanceof OntologyLookupError) {
    return err.toJSON();
  }
  return {
    code: 'INTERNAL_ERROR',
    message: err instanceof Error ? err.message : String(err),
  };
}

/**
 * True when the error came from a caller-side abort rather than OLS.
 */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
