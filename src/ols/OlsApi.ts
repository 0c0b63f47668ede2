/**
 * Typed OLS operations: one method per allow-listed endpoint, each pairing
 * the HTTP call with its normalizer.
 */

import { NotFoundError } from './errors.js';
import type { OlsClient } from './OlsClient.js';
import {
  normalizeOntology,
  normalizeOntologyPage,
  normalizeSearchHits,
  normalizeTerm,
  normalizeTermPage,
} from './ResponseNormalizer.js';
import type { HierarchyDirection, OntologyDescriptor, Page, SearchHit, TermDescriptor } from './types.js';

export interface TermSearchQuery {
  query: string;
  /** One code or a comma-separated list */
  ontology?: string | undefined;
  exact: boolean;
  includeObsolete: boolean;
  page: number;
  rows: number;
}

export interface OntologyListQuery {
  query?: string | undefined;
  page: number;
  size: number;
}

/**
 * The subset of OLS the engines depend on. OlsApi implements it over HTTP;
 * tests may substitute an in-memory implementation.
 */
export interface OntologyGateway {
  searchTerms(query: TermSearchQuery, signal?: AbortSignal): Promise<Page<SearchHit>>;
  listOntologies(query: OntologyListQuery, signal?: AbortSignal): Promise<Page<OntologyDescriptor>>;
  getOntology(ontology: string, signal?: AbortSignal): Promise<OntologyDescriptor>;
  getTerm(ontology: string, iri: string, signal?: AbortSignal): Promise<TermDescriptor>;
  lookupTerm(id: string, signal?: AbortSignal): Promise<TermDescriptor>;
  getNeighbourPage(
    direction: HierarchyDirection,
    ontology: string,
    iri: string,
    page: number,
    size: number,
    signal?: AbortSignal,
  ): Promise<Page<TermDescriptor>>;
}

/** OLS ontology ids are lower-case; callers often write "GO" or "HP". */
export function normalizeOntologyCode(code: string): string {
  return code
    .split(',')
    .map((part) => part.trim().toLowerCase())
    .filter((part) => part.length > 0)
    .join(',');
}

function isEmptyBody(raw: unknown): boolean {
  return raw === null || raw === undefined || (typeof raw === 'object' && Object.keys(raw).length === 0);
}

export class OlsApi implements OntologyGateway {
  constructor(private readonly client: OlsClient) {}

  async searchTerms(query: TermSearchQuery, signal?: AbortSignal): Promise<Page<SearchHit>> {
    const raw = await this.client.get('search', {
      q: query.query,
      ontology: query.ontology ? normalizeOntologyCode(query.ontology) : undefined,
      exact: query.exact,
      obsoletes: query.includeObsolete,
      rows: query.rows,
      start: query.page * query.rows,
    }, signal);
    return normalizeSearchHits(raw, { page: query.page, rows: query.rows });
  }

  async listOntologies(query: OntologyListQuery, signal?: AbortSignal): Promise<Page<OntologyDescriptor>> {
    const raw = await this.client.get('ontologies', {
      page: query.page,
      size: query.size,
      search: query.query,
    }, signal);
    return normalizeOntologyPage(raw, query.size);
  }

  async getOntology(ontology: string, signal?: AbortSignal): Promise<OntologyDescriptor> {
    const code = normalizeOntologyCode(ontology);
    const raw = await this.client.get('ontology', { ontology: code }, signal);
    // Some OLS deployments answer an unknown id with 200 and an empty body
    if (isEmptyBody(raw)) {
      throw new NotFoundError(`Ontology '${ontology}' not found`, { ontology });
    }
    return normalizeOntology(raw);
  }

  async getTerm(ontology: string, iri: string, signal?: AbortSignal): Promise<TermDescriptor> {
    const code = normalizeOntologyCode(ontology);
    try {
      const raw = await this.client.get('term', { ontology: code, iri }, signal);
      if (isEmptyBody(raw)) {
        throw new NotFoundError(`Term '${iri}' not found in ontology '${ontology}'`, { ontology, iri });
      }
      return normalizeTerm(raw, code);
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new NotFoundError(`Term '${iri}' not found in ontology '${ontology}'`, { ontology, iri });
      }
      throw err;
    }
  }

  /**
   * Resolve an IRI, short form (GO_0008150) or OBO id (GO:0008150) without
   * knowing the ontology. The defining ontology's record wins.
   */
  async lookupTerm(id: string, signal?: AbortSignal): Promise<TermDescriptor> {
    const raw = await this.client.get('terms', { id, size: 20 }, signal);
    const entries = lookupEntries(raw);
    const defining = entries.find((entry) => entry.defining) ?? entries[0];
    if (!defining) {
      throw new NotFoundError(`Term '${id}' not found in OLS`, { id });
    }
    return defining.term;
  }

  async getNeighbourPage(
    direction: HierarchyDirection,
    ontology: string,
    iri: string,
    page: number,
    size: number,
    signal?: AbortSignal,
  ): Promise<Page<TermDescriptor>> {
    const code = normalizeOntologyCode(ontology);
    const raw = await this.client.get(
      direction === 'parents' ? 'termParents' : 'termChildren',
      { ontology: code, iri, page, size },
      signal,
    );
    return normalizeTermPage(raw, code, size);
  }
}

/**
 * `/api/terms` lists one record per ontology that mentions the term.
 */
function lookupEntries(raw: unknown): Array<{ term: TermDescriptor; defining: boolean }> {
  const page = normalizeTermPage(raw, '', 20);
  const flags = definingFlags(raw);
  return page.items.map((term, i) => ({ term, defining: flags[i] ?? false }));
}

function definingFlags(raw: unknown): boolean[] {
  if (raw === null || typeof raw !== 'object' || !('_embedded' in raw)) return [];
  const embedded = raw._embedded;
  if (embedded === null || typeof embedded !== 'object' || !('terms' in embedded)) return [];
  const terms = embedded.terms;
  if (!Array.isArray(terms)) return [];
  return terms.map((t: unknown) =>
    t !== null && typeof t === 'object' && 'is_defining_ontology' in t && t.is_defining_ontology === true,
  );
}
