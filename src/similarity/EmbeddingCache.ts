/**
 * Read-through cache of text embeddings.
 *
 * Entries hold the promise, not the vector, so concurrent requests for the
 * same text share one computation. A rejected computation is evicted before
 * its waiters see the rejection. Insertion order doubles as age: the first
 * key in the Map is the oldest.
 *
 * A shared computation belongs to no single caller, so it runs without any
 * caller's signal; a cancelled caller stops waiting while the others keep
 * theirs.
 */

import type { EmbeddingCacheConfig } from '../config/types.js';
import { NetworkError } from '../ols/errors.js';
import type { EmbeddingProvider } from './EmbeddingProvider.js';

interface CacheEntry {
  vector: Promise<number[]>;
  expiresAt: number;
}

export interface EmbeddingCacheOptions extends Partial<EmbeddingCacheConfig> {
  now?: () => number;
}

export class EmbeddingCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly enabled: boolean;
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(
    private readonly provider: EmbeddingProvider,
    options: EmbeddingCacheOptions = {},
  ) {
    this.enabled = options.enabled ?? true;
    this.ttlMs = options.ttlMs ?? 600_000;
    this.maxEntries = options.maxEntries ?? 5000;
    this.now = options.now ?? Date.now;
  }

  get providerId(): string {
    return this.provider.id;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Embed every text, computing only those neither cached nor in flight.
   * The missing texts go to the provider as one batch.
   */
  async embedAll(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (!this.enabled) {
      return this.provider.embed(texts, signal);
    }
    if (signal?.aborted) {
      throw cancelled();
    }

    const now = this.now();
    const batch = createDeferred<number[][]>();
    const missing: string[] = [];

    const lookups = texts.map((text) => {
      const key = this.key(text);
      const cached = this.entries.get(key);
      if (cached && cached.expiresAt > now) {
        return cached.vector;
      }

      const slot = missing.length;
      missing.push(text);
      const vector = batch.promise.then((vectors) => {
        const v = vectors[slot];
        if (!v) throw new Error(`Embedding provider returned no vector for "${text}"`);
        return v;
      });

      const entry: CacheEntry = { vector, expiresAt: now + this.ttlMs };
      this.entries.delete(key);
      this.entries.set(key, entry);
      void vector.catch(() => {
        if (this.entries.get(key) === entry) this.entries.delete(key);
      });
      return vector;
    });

    this.evictOverflow();

    if (missing.length > 0) {
      void this.provider.embed(missing).then(batch.resolve, batch.reject);
    } else {
      batch.resolve([]);
    }

    const all = Promise.all(lookups);
    return signal ? untilAborted(all, signal) : all;
  }

  clear(): void {
    this.entries.clear();
  }

  private key(text: string): string {
    return `${this.provider.id}\u0000${text}`;
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

function cancelled(): NetworkError {
  return new NetworkError('Embedding request was cancelled', { aborted: true });
}

/** Settles like `work`, or rejects as soon as `signal` aborts. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(cancelled());
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
    // The provider may have been called, and the signal aborted, before the listener existed
    if (signal.aborted) onAbort();
  });
}
