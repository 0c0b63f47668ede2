/**
 * Maps raw OLS JSON onto the stable record types in ./types.ts.
 *
 * OLS serves three envelope styles depending on API version and endpoint:
 * - Solr search: `{ response: { numFound, start, docs: [...] } }`
 * - v2 paged: `{ page, numElements, totalPages, totalElements, elements: [...] }`
 * - v1 HAL: `{ _embedded: { terms: [...] }, page: { size, totalElements, totalPages, number } }`
 *
 * Optional fields default to empty values; records without an IRI or
 * ontology code are rejected with MalformedResponseError.
 */

import { MalformedResponseError } from './errors.js';
import type { OntologyDescriptor, Page, SearchHit, TermDescriptor } from './types.js';

const DESCRIPTION_LIMIT = 200;

// ============================================================================
// Field helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return isRecord(value) ? value : undefined;
}

/** First usable string from a string, a `{ value }` object, or a list of either. */
function firstString(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value)) {
    for (const item of value) {
      const s = firstString(item);
      if (s) return s;
    }
    return '';
  }
  const record = asRecord(value);
  return record ? firstString(record.value) : '';
}

function stringList(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  const items = Array.isArray(value) ? value : [value];
  return items.map(firstString).filter((s) => s.length > 0);
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

function optionalString(...candidates: unknown[]): string | null {
  for (const candidate of candidates) {
    const s = firstString(candidate);
    if (s) return s;
  }
  return null;
}

function optionalNumber(...candidates: unknown[]): number | null {
  for (const candidate of candidates) {
    if (typeof candidate === 'number' && Number.isFinite(candidate)) return candidate;
    if (typeof candidate === 'string' && candidate.trim() !== '' && Number.isFinite(Number(candidate))) {
      return Number(candidate);
    }
  }
  return null;
}

function flag(...candidates: unknown[]): boolean {
  for (const candidate of candidates) {
    if (typeof candidate === 'boolean') return candidate;
    if (candidate === 'true') return true;
    if (candidate === 'false') return false;
  }
  return false;
}

function shortFormFromIri(iri: string): string {
  const cut = Math.max(iri.lastIndexOf('/'), iri.lastIndexOf('#'));
  return cut >= 0 ? iri.slice(cut + 1) : iri;
}

export function truncateDescription(text: string, limit = DESCRIPTION_LIMIT): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

// ============================================================================
// Records
// ============================================================================

/**
 * Normalize a v1 or v2 ontology object.
 */
export function normalizeOntology(raw: unknown): OntologyDescriptor {
  const r = asRecord(raw);
  if (!r) {
    throw new MalformedResponseError('Ontology record is not an object', { received: typeof raw });
  }

  // v1 keeps descriptive fields under `config`
  const config = asRecord(r.config) ?? {};
  const id = firstString(r.ontologyId) || firstString(config.id);
  if (!id) {
    throw new MalformedResponseError('Ontology record has no ontologyId');
  }

  const numberOfClasses = optionalNumber(r.numberOfClasses, config.numberOfClasses);

  return {
    id,
    title: firstString(r.title) || firstString(config.title) || id,
    description: firstString(r.description) || firstString(config.description),
    version: optionalString(r.version, config.version),
    numberOfTerms: optionalNumber(r.numberOfTerms, config.numberOfTerms) ?? numberOfClasses,
    numberOfClasses,
    preferredPrefix: optionalString(r.preferredPrefix, config.preferredPrefix),
    homepage: optionalString(r.homepage, config.homepage),
    domain: optionalString(r.domain, config.domain),
    repository: optionalString(r.repository, config.repository),
  };
}

/**
 * Normalize a v1 term or v2 class entity.
 *
 * @param fallbackOntology - used when the record itself names no ontology
 */
export function normalizeTerm(raw: unknown, fallbackOntology?: string): TermDescriptor {
  const r = asRecord(raw);
  if (!r) {
    throw new MalformedResponseError('Term record is not an object', { received: typeof raw });
  }

  const iri = firstString(r.iri);
  if (!iri) {
    throw new MalformedResponseError('Term record has no IRI', { label: firstString(r.label) });
  }

  const ontology =
    firstString(r.ontology_name) ||
    firstString(r.ontologyId) ||
    firstString(r.ontology_prefix).toLowerCase() ||
    (fallbackOntology ?? '');
  if (!ontology) {
    throw new MalformedResponseError(`Term ${iri} names no ontology`, { iri });
  }

  return {
    ontology,
    iri,
    label: firstString(r.label),
    shortForm: firstString(r.short_form) || firstString(r.shortForm) || shortFormFromIri(iri),
    oboId: optionalString(r.obo_id, r.curie),
    synonyms: unique(stringList(r.synonyms ?? r.synonym)),
    definition: firstString(r.definition) || firstString(r.description),
    obsolete: flag(r.is_obsolete, r.isObsolete),
    hasChildren: flag(r.has_children, r.hasDirectChildren, r.hasHierarchicalChildren),
    parents: unique(stringList(r.directParent)),
    children: [],
  };
}

/**
 * Normalize one search document. `score` is null when OLS sent none.
 */
function normalizeSearchDoc(raw: unknown): Omit<SearchHit, 'score'> & { score: number | null } {
  const term = normalizeTerm(raw);
  const r = asRecord(raw) ?? {};
  return {
    iri: term.iri,
    label: term.label,
    ontology: term.ontology,
    shortForm: term.shortForm,
    oboId: term.oboId,
    description: truncateDescription(term.definition),
    obsolete: term.obsolete,
    score: optionalNumber(r.score),
  };
}

// ============================================================================
// Envelopes
// ============================================================================

/**
 * Normalize a search response into a page of hits in upstream order.
 *
 * When any hit lacks a score, all hits get the rank-derived score
 * `(n - i) / n` so descending score order still matches upstream order.
 */
export function normalizeSearchHits(raw: unknown, request: { page: number; rows: number }): Page<SearchHit> {
  const r = asRecord(raw);
  const solr = asRecord(r?.response);

  let docs: unknown[];
  let total: number;
  let start: number;

  if (solr && Array.isArray(solr.docs)) {
    docs = solr.docs;
    total = optionalNumber(solr.numFound) ?? docs.length;
    start = optionalNumber(solr.start) ?? request.page * request.rows;
  } else if (r && Array.isArray(r.elements)) {
    docs = r.elements;
    total = optionalNumber(r.totalElements) ?? docs.length;
    start = (optionalNumber(r.page) ?? request.page) * request.rows;
  } else {
    throw new MalformedResponseError('Search response has no result list');
  }

  const normalized = docs.map(normalizeSearchDoc);
  const n = normalized.length;
  const allScored = normalized.every((hit) => hit.score !== null);
  const items: SearchHit[] = normalized.map((hit, i) => ({
    ...hit,
    score: allScored && hit.score !== null ? hit.score : (n - i) / n,
  }));

  const hasMore = start + n < total;
  return {
    items,
    page: request.page,
    pageSize: request.rows,
    totalElements: total,
    totalPages: Math.ceil(total / request.rows),
    hasMore,
    nextPage: hasMore ? request.page + 1 : null,
  };
}

/**
 * Flatten a v1 `_embedded` or v2 `elements` envelope into a Page.
 *
 * A v1 response without `_embedded` is how OLS reports an empty result.
 */
export function normalizePage<T>(
  raw: unknown,
  embeddedKey: string,
  mapItem: (item: unknown) => T,
  requestedSize: number,
): Page<T> {
  const r = asRecord(raw);
  if (!r) {
    throw new MalformedResponseError('Paged response is not an object', { received: typeof raw });
  }

  let rawItems: unknown[];
  let pageNumber: number;
  let pageSize: number;
  let totalElements: number;
  let totalPages: number;

  if (Array.isArray(r.elements)) {
    rawItems = r.elements;
    pageNumber = optionalNumber(r.page) ?? 0;
    pageSize = requestedSize;
    totalElements = optionalNumber(r.totalElements) ?? rawItems.length;
    totalPages = optionalNumber(r.totalPages) ?? Math.ceil(totalElements / requestedSize);
  } else {
    const embedded = asRecord(r._embedded);
    const list = embedded?.[embeddedKey];
    if (list !== undefined && !Array.isArray(list)) {
      throw new MalformedResponseError(`_embedded.${embeddedKey} is not a list`);
    }
    rawItems = Array.isArray(list) ? list : [];

    const page = asRecord(r.page) ?? {};
    pageNumber = optionalNumber(page.number) ?? 0;
    pageSize = optionalNumber(page.size) ?? requestedSize;
    totalElements = optionalNumber(page.totalElements) ?? rawItems.length;
    totalPages = optionalNumber(page.totalPages) ?? (rawItems.length > 0 ? pageNumber + 1 : 0);
  }

  const hasMore = pageNumber + 1 < totalPages;
  return {
    items: rawItems.map(mapItem),
    page: pageNumber,
    pageSize,
    totalElements,
    totalPages,
    hasMore,
    nextPage: hasMore ? pageNumber + 1 : null,
  };
}

export function normalizeTermPage(raw: unknown, ontology: string, requestedSize: number): Page<TermDescriptor> {
  return normalizePage(raw, 'terms', (item) => normalizeTerm(item, ontology), requestedSize);
}

export function normalizeOntologyPage(raw: unknown, requestedSize: number): Page<OntologyDescriptor> {
  return normalizePage(raw, 'ontologies', normalizeOntology, requestedSize);
}
