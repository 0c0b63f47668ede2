/**
 * Thin HTTP client for the OLS4 REST API.
 *
 * Uses native fetch. Only GETs against a fixed allow-list of endpoints;
 * transient failures (timeouts, network errors, 5xx, 429) are retried with
 * exponential backoff, client errors never are.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { OlsConfig } from '../config/types.js';
import type { Logger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import {
  NetworkError,
  NotFoundError,
  OntologyLookupError,
  UpstreamError,
  ValidationError,
  isAbortError,
} from './errors.js';

/**
 * Path templates, relative to the configured base URL.
 * `{ontology}` and `{iri}` are filled from the request params.
 */
export const OLS_ENDPOINTS = {
  search: '/api/search',
  ontologies: '/api/v2/ontologies',
  ontology: '/api/v2/ontologies/{ontology}',
  terms: '/api/terms',
  term: '/api/ontologies/{ontology}/terms/{iri}',
  termParents: '/api/ontologies/{ontology}/terms/{iri}/parents',
  termChildren: '/api/ontologies/{ontology}/terms/{iri}/children',
} as const;

export type OlsEndpoint = keyof typeof OLS_ENDPOINTS;

export type QueryValue = string | number | boolean | undefined;

export type OlsParams = Record<string, QueryValue>;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface OlsClientOptions extends Partial<OlsConfig> {
  fetch?: FetchLike;
  sleep?: SleepFn;
  logger?: Logger;
}

type AttemptOutcome =
  | { ok: true; body: unknown }
  | { ok: false; retryable: boolean; error: OntologyLookupError };

/**
 * OLS wants IRIs in path segments URL-encoded twice.
 */
export function encodeIri(iri: string): string {
  return encodeURIComponent(encodeURIComponent(iri));
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : {});
};

export class OlsClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: SleepFn;
  private readonly log: Logger;

  constructor(options: OlsClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://www.ebi.ac.uk/ols4').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 250;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.log = (options.logger ?? createSilentLogger()).child({ component: 'ols-client' });
  }

  /**
   * Build the request URL. Path params are consumed by the template;
   * everything else becomes the query string.
   */
  buildUrl(endpoint: OlsEndpoint, params: OlsParams = {}): string {
    const query = new URLSearchParams();
    const consumed = new Set<string>();

    const path = OLS_ENDPOINTS[endpoint].replace(/\{(ontology|iri)\}/g, (_match, name: string) => {
      const value = params[name];
      if (typeof value !== 'string' || value.trim().length === 0) {
        throw new ValidationError(`Missing path parameter "${name}" for ${endpoint}`, { endpoint, parameter: name });
      }
      consumed.add(name);
      return name === 'iri' ? encodeIri(value) : encodeURIComponent(value);
    });

    for (const [key, value] of Object.entries(params)) {
      if (value === undefined || consumed.has(key)) continue;
      query.set(key, String(value));
    }

    const qs = query.toString();
    return qs ? `${this.baseUrl}${path}?${qs}` : `${this.baseUrl}${path}`;
  }

  /**
   * GET an endpoint and decode its JSON body.
   */
  async get(endpoint: OlsEndpoint, params: OlsParams = {}, signal?: AbortSignal): Promise<unknown> {
    const url = this.buildUrl(endpoint, params);
    let lastError: OntologyLookupError | undefined;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        const waitMs = this.retryBaseDelayMs * 2 ** (attempt - 1);
        this.log.warn({ endpoint, attempt, waitMs, reason: lastError?.message }, 'Retrying OLS request');
        try {
          await this.sleep(waitMs, signal);
        } catch (err) {
          throw cancelled(url, err);
        }
      }

      if (signal?.aborted) {
        throw cancelled(url, signal.reason);
      }

      this.log.debug({ endpoint, url, attempt }, 'OLS request');
      const outcome = await this.attempt(url, signal);
      if (outcome.ok) {
        return outcome.body;
      }
      if (!outcome.retryable) {
        throw outcome.error;
      }
      lastError = outcome.error;
    }

    const attempts = this.maxRetries + 1;
    if (lastError instanceof UpstreamError) {
      throw new UpstreamError(`${lastError.message} (after ${attempts} attempts)`, { ...lastError.details, attempts });
    }
    throw new NetworkError(
      `OLS request failed after ${attempts} attempts: ${lastError?.message ?? 'unknown error'}`,
      { url, attempts },
    );
  }

  private async attempt(url: string, signal: AbortSignal | undefined): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const res = await this.fetchImpl(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });

      if (res.status === 404) {
        return { ok: false, retryable: false, error: new NotFoundError(`OLS has no resource at ${url}`, { url, status: 404 }) };
      }
      if (res.status >= 500 || res.status === 429) {
        return { ok: false, retryable: true, error: new UpstreamError(`OLS returned HTTP ${res.status}`, { url, status: res.status }) };
      }
      if (!res.ok) {
        return { ok: false, retryable: false, error: new UpstreamError(`OLS returned HTTP ${res.status}`, { url, status: res.status }) };
      }

      const text = await res.text();
      try {
        const body: unknown = JSON.parse(text);
        return { ok: true, body };
      } catch {
        return {
          ok: false,
          retryable: false,
          error: new UpstreamError('OLS returned a body that is not valid JSON', { url, status: res.status }),
        };
      }
    } catch (err) {
      if (signal?.aborted) {
        return { ok: false, retryable: false, error: cancelled(url, err) };
      }
      if (isAbortError(err)) {
        return { ok: false, retryable: true, error: new NetworkError(`OLS request timed out after ${this.timeoutMs}ms`, { url }) };
      }
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, retryable: true, error: new NetworkError(`OLS request failed: ${message}`, { url }) };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

function cancelled(url: string, cause: unknown): NetworkError {
  const reason = cause instanceof Error ? cause.message : undefined;
  return new NetworkError('OLS request was cancelled', { url, aborted: true, ...(reason ? { reason } : {}) });
}
