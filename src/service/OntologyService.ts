/**
 * OntologyService - one method per exposed tool.
 *
 * Methods validate caller parameters, apply defaults from config, run the
 * engines and return plain JSON-serializable results. Every failure is an
 * OntologyLookupError subclass; the transport layers render them.
 */

import type { ToolDefaultsConfig } from '../config/types.js';
import { DEFAULT_CONFIG } from '../config/types.js';
import type { HierarchyTraversal, TraversedTerm } from '../hierarchy/HierarchyTraversal.js';
import { ValidationError } from '../ols/errors.js';
import { resolveTermIri } from '../ols/iri.js';
import type { OntologyGateway } from '../ols/OlsApi.js';
import { normalizeOntologyCode } from '../ols/OlsApi.js';
import type { HierarchyEdge, OntologyDescriptor, SearchHit, TermDescriptor } from '../ols/types.js';
import type { SimilarityEngine, SimilarityResponse } from '../similarity/SimilarityEngine.js';

// ============================================================================
// Inputs
// ============================================================================

export interface SearchTermsInput {
  query: string;
  ontology?: string | undefined;
  exact?: boolean | undefined;
  page?: number | undefined;
  rows?: number | undefined;
  includeObsolete?: boolean | undefined;
}

export interface SearchOntologiesInput {
  query?: string | undefined;
  page?: number | undefined;
  size?: number | undefined;
}

export interface TermInfoInput {
  ontology?: string | undefined;
  termIri: string;
}

export interface HierarchyInput {
  ontology: string;
  termIri: string;
  depth?: number | undefined;
  includeObsolete?: boolean | undefined;
}

export interface FindSimilarInput {
  queryText?: string | undefined;
  ontologyScope?: string | undefined;
  topK?: number | undefined;
  termIri?: string | undefined;
}

// ============================================================================
// Results
// ============================================================================

export interface SearchTermsResult {
  query: string;
  ontology: string | null;
  exact: boolean;
  page: number;
  rows: number;
  total: number;
  hasMore: boolean;
  hits: SearchHit[];
}

export interface SearchOntologiesResult {
  query: string | null;
  page: number;
  size: number;
  total: number;
  totalPages: number;
  ontologies: OntologyDescriptor[];
}

export interface HierarchyResult {
  ontology: string;
  term: TermDescriptor;
  depth: number;
  count: number;
  truncated: boolean;
  terms: TraversedTerm[];
  edges: HierarchyEdge[];
}

export interface FindSimilarResult extends SimilarityResponse {
  ontologyScope: string | null;
  topK: number;
}

/** Upper bounds enforced at the tool boundary */
export const TOOL_LIMITS = {
  maxRows: 100,
  maxPageSize: 100,
  maxTopK: 50,
} as const;

const ONTOLOGY_CODE = /^[A-Za-z0-9_.-]+$/;

// ============================================================================
// Validation helpers
// ============================================================================

function requireText(value: string | undefined, field: string): string {
  const trimmed = value?.trim() ?? '';
  if (!trimmed) {
    throw new ValidationError(`'${field}' must be a non-empty string`, { field });
  }
  return trimmed;
}

function optionalText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function integerInRange(
  value: number | undefined,
  field: string,
  fallback: number,
  min: number,
  max: number,
): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`'${field}' must be an integer between ${min} and ${max}`, {
      field,
      value,
      min,
      max,
    });
  }
  return value;
}

function ontologyCode(value: string | undefined, field: string): string {
  const code = requireText(value, field);
  if (!ONTOLOGY_CODE.test(code)) {
    throw new ValidationError(`'${field}' must be a single ontology code such as "go" or "hp"`, {
      field,
      value: code,
    });
  }
  return code.toLowerCase();
}

function ontologyList(value: string | undefined, field: string): string | undefined {
  const text = optionalText(value);
  if (text === undefined) return undefined;
  const codes = normalizeOntologyCode(text);
  if (!codes || codes.split(',').some((code) => !ONTOLOGY_CODE.test(code))) {
    throw new ValidationError(`'${field}' must be an ontology code or a comma-separated list of codes`, {
      field,
      value: text,
    });
  }
  return codes;
}

// ============================================================================
// Service
// ============================================================================

export class OntologyService {
  private readonly defaults: ToolDefaultsConfig;

  constructor(
    private readonly gateway: OntologyGateway,
    private readonly traversal: HierarchyTraversal,
    private readonly similarity: SimilarityEngine,
    defaults: Partial<ToolDefaultsConfig> = {},
  ) {
    this.defaults = { ...DEFAULT_CONFIG.tools, ...defaults };
  }

  async searchTerms(input: SearchTermsInput, signal?: AbortSignal): Promise<SearchTermsResult> {
    const query = requireText(input.query, 'query');
    const ontology = ontologyList(input.ontology, 'ontology');
    const exact = input.exact ?? false;
    const page = integerInRange(input.page, 'page', 0, 0, Number.MAX_SAFE_INTEGER);
    const rows = integerInRange(input.rows, 'rows', this.defaults.searchRows, 1, TOOL_LIMITS.maxRows);

    const result = await this.gateway.searchTerms({
      query,
      ontology,
      exact,
      includeObsolete: input.includeObsolete ?? false,
      page,
      rows,
    }, signal);

    return {
      query,
      ontology: ontology ?? null,
      exact,
      page,
      rows,
      total: result.totalElements,
      hasMore: result.hasMore,
      hits: result.items,
    };
  }

  async searchOntologies(input: SearchOntologiesInput, signal?: AbortSignal): Promise<SearchOntologiesResult> {
    const query = optionalText(input.query);
    const page = integerInRange(input.page, 'page', 0, 0, Number.MAX_SAFE_INTEGER);
    const size = integerInRange(input.size, 'size', this.defaults.ontologyPageSize, 1, TOOL_LIMITS.maxPageSize);

    const result = await this.gateway.listOntologies({ query, page, size }, signal);
    return {
      query: query ?? null,
      page,
      size,
      total: result.totalElements,
      totalPages: result.totalPages,
      ontologies: result.items,
    };
  }

  getOntologyInfo(ontology: string, signal?: AbortSignal): Promise<OntologyDescriptor> {
    return this.gateway.getOntology(ontologyCode(ontology, 'ontology'), signal);
  }

  /**
   * Term detail with direct parents and children filled from the same
   * endpoints the hierarchy tools walk.
   */
  async getTermInfo(input: TermInfoInput, signal?: AbortSignal): Promise<TermDescriptor> {
    const reference = requireText(input.termIri, 'term_iri');
    const ontology = optionalText(input.ontology);

    const term = ontology === undefined
      ? await this.gateway.lookupTerm(reference, signal)
      : await this.gateway.getTerm(ontologyCode(ontology, 'ontology'), resolveTermIri(reference), signal);

    // Aborted when either side fails so the other request stops too
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    const neighbours = async (direction: 'parents' | 'children'): Promise<TermDescriptor[]> => {
      try {
        return await this.traversal.getDirectNeighbours(direction, term.ontology, term.iri, {
          signal: controller.signal,
        });
      } catch (err) {
        controller.abort();
        throw err;
      }
    };

    const [parents, children] = await Promise.all([neighbours('parents'), neighbours('children')]).finally(() => {
      signal?.removeEventListener('abort', onAbort);
    });

    return {
      ...term,
      parents: parents.map((p) => p.iri),
      children: children.map((c) => c.iri),
      hasChildren: term.hasChildren || children.length > 0,
    };
  }

  getTermChildren(input: HierarchyInput, signal?: AbortSignal): Promise<HierarchyResult> {
    return this.hierarchy('children', input, signal);
  }

  getTermAncestors(input: HierarchyInput, signal?: AbortSignal): Promise<HierarchyResult> {
    return this.hierarchy('parents', input, signal);
  }

  async findSimilarTerms(input: FindSimilarInput, signal?: AbortSignal): Promise<FindSimilarResult> {
    const queryText = optionalText(input.queryText);
    const termIri = optionalText(input.termIri);
    const topK = integerInRange(input.topK, 'top_k', this.defaults.defaultTopK, 1, TOOL_LIMITS.maxTopK);

    if ((queryText === undefined) === (termIri === undefined)) {
      throw new ValidationError("Provide exactly one of 'query_text' or 'term_iri'", {
        fields: ['query_text', 'term_iri'],
      });
    }

    let response: SimilarityResponse;
    let scope: string | undefined;

    if (termIri !== undefined) {
      if (optionalText(input.ontologyScope) === undefined) {
        throw new ValidationError("'ontology_scope' is required when 'term_iri' is given", {
          field: 'ontology_scope',
        });
      }
      scope = ontologyCode(input.ontologyScope, 'ontology_scope');
      response = await this.similarity.findSimilar(
        { termIri: resolveTermIri(termIri), ontology: scope, topK },
        signal,
      );
    } else {
      scope = ontologyList(input.ontologyScope, 'ontology_scope');
      response = await this.similarity.findSimilar({ queryText: queryText ?? '', ontologyScope: scope, topK }, signal);
    }

    return { ...response, ontologyScope: scope ?? null, topK };
  }

  private async hierarchy(
    direction: 'parents' | 'children',
    input: HierarchyInput,
    signal?: AbortSignal,
  ): Promise<HierarchyResult> {
    const ontology = ontologyCode(input.ontology, 'ontology');
    const iri = resolveTermIri(requireText(input.termIri, 'term_iri'));
    const depth = integerInRange(input.depth, 'depth', this.defaults.defaultDepth, 1, this.defaults.maxDepth);

    const options = {
      maxDepth: depth,
      maxResults: this.defaults.maxTraversalResults,
      pageSize: this.defaults.hierarchyPageSize,
      concurrency: this.defaults.traversalConcurrency,
      includeObsolete: input.includeObsolete ?? false,
      signal,
    };
    const result = direction === 'parents'
      ? await this.traversal.getAncestors(ontology, iri, options)
      : await this.traversal.getChildren(ontology, iri, options);

    return {
      ontology: result.ontology,
      term: result.root,
      depth,
      count: result.terms.length,
      truncated: result.truncated,
      terms: result.terms,
      edges: result.edges,
    };
  }
}
