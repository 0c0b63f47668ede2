/**
 * Similar-term ranking: a lexical candidate pool from OLS search, re-ranked
 * by cosine similarity of embeddings.
 */

import type { Logger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import type { OntologyGateway } from '../ols/OlsApi.js';
import type { SearchHit, TermDescriptor } from '../ols/types.js';
import { NetworkError, serializeError } from '../ols/errors.js';
import { cosineSimilarity } from './EmbeddingProvider.js';
import type { EmbeddingCache } from './EmbeddingCache.js';

export interface SimilarityResult {
  term: TermDescriptor;
  /** Cosine similarity in [0, 1]; null when ranking was degraded */
  score: number | null;
}

export type SimilarityQuery =
  | { queryText: string; ontologyScope?: string | undefined; topK: number }
  | { termIri: string; ontology: string; topK: number };

export interface SimilarityResponse {
  query: string;
  /** Set when similarity was computed relative to an existing term */
  sourceTerm: TermDescriptor | null;
  provider: string;
  degraded: boolean;
  reason?: string;
  results: SimilarityResult[];
}

export interface SimilarityEngineOptions {
  candidatePoolSize?: number;
  logger?: Logger;
}

/** Text embedded for a term: its label, then its definition. */
export function embeddingText(term: Pick<TermDescriptor, 'label' | 'definition'>): string {
  return term.definition ? `${term.label}. ${term.definition}` : term.label;
}

function clampScore(value: number): number {
  if (!Number.isFinite(value) || value < 0) return 0;
  return value > 1 ? 1 : value;
}

/** Search hits carry no hierarchy; parents/children stay empty. */
function hitToTerm(hit: SearchHit): TermDescriptor {
  return {
    ontology: hit.ontology,
    iri: hit.iri,
    label: hit.label,
    shortForm: hit.shortForm,
    oboId: hit.oboId,
    synonyms: [],
    definition: hit.description,
    obsolete: hit.obsolete,
    hasChildren: false,
    parents: [],
    children: [],
  };
}

export class SimilarityEngine {
  private readonly candidatePoolSize: number;
  private readonly log: Logger;

  constructor(
    private readonly gateway: OntologyGateway,
    private readonly cache: EmbeddingCache,
    options: SimilarityEngineOptions = {},
  ) {
    this.candidatePoolSize = options.candidatePoolSize ?? 25;
    this.log = (options.logger ?? createSilentLogger()).child({ component: 'similarity' });
  }

  async findSimilar(request: SimilarityQuery, signal?: AbortSignal): Promise<SimilarityResponse> {
    let queryText: string;
    let scope: string | undefined;
    let sourceTerm: TermDescriptor | null = null;

    if ('termIri' in request) {
      sourceTerm = await this.gateway.getTerm(request.ontology, request.termIri, signal);
      queryText = embeddingText(sourceTerm);
      scope = request.ontology;
    } else {
      queryText = request.queryText;
      scope = request.ontologyScope;
    }

    // Search on the label alone; a long definition drowns the lexical match
    const searchText = sourceTerm ? sourceTerm.label || sourceTerm.shortForm : queryText;
    const pool = await this.gateway.searchTerms({
      query: searchText,
      ontology: scope,
      exact: false,
      includeObsolete: false,
      page: 0,
      rows: this.candidatePoolSize,
    }, signal);

    const seen = new Set<string>();
    const candidates: TermDescriptor[] = [];
    for (const hit of pool.items) {
      const key = `${hit.ontology}\u0000${hit.iri}`;
      if (seen.has(key)) continue;
      if (sourceTerm && hit.iri === sourceTerm.iri) continue;
      seen.add(key);
      candidates.push(hitToTerm(hit));
    }

    const base = { query: queryText, sourceTerm, provider: this.cache.providerId };

    if (candidates.length === 0) {
      return { ...base, degraded: false, results: [] };
    }

    let vectors: number[][];
    try {
      vectors = await this.cache.embedAll([queryText, ...candidates.map(embeddingText)], signal);
    } catch (err) {
      // Only an unavailable provider degrades; the caller's own cancellation does not
      if (signal?.aborted) {
        throw new NetworkError('Similarity request was cancelled', { aborted: true });
      }
      const reason = `Embedding provider unavailable: ${serializeError(err).message}`;
      this.log.warn({ provider: this.cache.providerId, err }, 'Similarity ranking degraded to lexical order');
      return {
        ...base,
        degraded: true,
        reason,
        results: candidates.slice(0, request.topK).map((term) => ({ term, score: null })),
      };
    }

    const [queryVector = [], ...candidateVectors] = vectors;
    const scored = candidates.map((term, i) => ({
      term,
      score: clampScore(cosineSimilarity(queryVector, candidateVectors[i] ?? [])),
    }));

    // Array.prototype.sort is stable, so ties keep lexical rank
    scored.sort((a, b) => b.score - a.score);

    return { ...base, degraded: false, results: scored.slice(0, request.topK) };
  }
}
