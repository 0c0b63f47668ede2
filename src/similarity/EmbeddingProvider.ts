/**
 * Embedding providers for similarity ranking.
 *
 * - `ngram`: hashed character trigrams computed in-process (default)
 * - `openai-compatible`: POST {baseUrl}/embeddings, OpenAI wire format
 * - `none`: always unavailable, so every similarity call degrades
 */

import type { EmbeddingConfig } from '../config/types.js';
import type { FetchLike } from '../ols/OlsClient.js';

export interface EmbeddingProvider {
  /** Distinguishes cache entries computed by different providers/models */
  readonly id: string;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export class EmbeddingUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmbeddingUnavailableError';
  }
}

// ============================================================================
// Local n-gram provider
// ============================================================================

const NGRAM_DIMENSIONS = 512;

/** 32-bit FNV-1a */
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

function l2Normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return norm === 0 ? vector : vector.map((v) => v / norm);
}

/**
 * Bag of hashed character trigrams plus whole words. Vectors are
 * non-negative, so cosine similarity between them lies in [0, 1].
 */
export class NgramEmbeddingProvider implements EmbeddingProvider {
  readonly id = `ngram-${NGRAM_DIMENSIONS}`;

  embedText(text: string): number[] {
    const vector = new Array<number>(NGRAM_DIMENSIONS).fill(0);
    const normalized = text.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, ' ').trim();
    if (!normalized) return vector;

    for (const word of normalized.split(' ')) {
      const padded = ` ${word} `;
      for (let i = 0; i + 3 <= padded.length; i++) {
        const slot = fnv1a(padded.slice(i, i + 3)) % NGRAM_DIMENSIONS;
        vector[slot] = (vector[slot] ?? 0) + 1;
      }
      const wordSlot = fnv1a(`w:${word}`) % NGRAM_DIMENSIONS;
      vector[wordSlot] = (vector[wordSlot] ?? 0) + 2;
    }

    return l2Normalize(vector);
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedText(text));
  }
}

// ============================================================================
// OpenAI-compatible provider
// ============================================================================

export interface OpenAICompatibleOptions {
  baseUrl: string;
  model: string;
  apiKey?: string | undefined;
  timeoutMs?: number | undefined;
  fetch?: FetchLike | undefined;
}

interface EmbeddingsResponse {
  data?: Array<{ index?: number; embedding?: unknown }>;
}

function isEmbeddingsResponse(value: unknown): value is EmbeddingsResponse {
  return value !== null && typeof value === 'object' && (!('data' in value) || Array.isArray(value.data));
}

function isVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.length > 0 && value.every((v) => typeof v === 'number' && Number.isFinite(v));
}

export class OpenAICompatibleEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenAICompatibleOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.id = `openai:${this.baseUrl}:${this.model}`;

    this.headers = { 'Content-Type': 'application/json' };
    if (options.apiKey) {
      this.headers['Authorization'] = `Bearer ${options.apiKey}`;
    }
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const res = await this.fetchImpl(`${this.baseUrl}/embeddings`, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify({ model: this.model, input: texts }),
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text();
        throw new EmbeddingUnavailableError(`Embedding error ${res.status}: ${body.slice(0, 200)}`);
      }

      const json: unknown = await res.json();
      if (!isEmbeddingsResponse(json) || !json.data || json.data.length !== texts.length) {
        throw new EmbeddingUnavailableError('Embedding response does not match the request');
      }

      const vectors: number[][] = new Array<number[]>(texts.length);
      for (const [position, item] of json.data.entries()) {
        const index = typeof item.index === 'number' ? item.index : position;
        if (!isVector(item.embedding) || index < 0 || index >= texts.length) {
          throw new EmbeddingUnavailableError('Embedding response contains an invalid vector');
        }
        vectors[index] = item.embedding;
      }
      return vectors;
    } catch (err) {
      if (err instanceof DOMException && err.name === 'AbortError') {
        throw new EmbeddingUnavailableError(
          signal?.aborted ? 'Embedding request cancelled' : `Embedding timeout after ${this.timeoutMs}ms`,
        );
      }
      throw err;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

// ============================================================================
// Disabled provider
// ============================================================================

export class DisabledEmbeddingProvider implements EmbeddingProvider {
  readonly id = 'none';

  async embed(): Promise<number[][]> {
    throw new EmbeddingUnavailableError('No embedding provider is configured');
  }
}

/**
 * Build the provider named in config.
 */
export function createEmbeddingProvider(config: EmbeddingConfig, fetchImpl?: FetchLike): EmbeddingProvider {
  switch (config.provider) {
    case 'openai-compatible':
      return new OpenAICompatibleEmbeddingProvider({
        baseUrl: config.baseUrl,
        model: config.model,
        apiKey: config.apiKey || undefined,
        timeoutMs: config.timeoutMs,
        fetch: fetchImpl,
      });
    case 'none':
      return new DisabledEmbeddingProvider();
    case 'ngram':
      return new NgramEmbeddingProvider();
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
