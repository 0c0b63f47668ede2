/**
 * Normalized records produced from OLS responses.
 *
 * These are the only shapes the engines and tools see; raw OLS JSON never
 * leaves the normalizer.
 */

export interface OntologyDescriptor {
  /** Short code as OLS reports it (e.g. "go", "hp") */
  id: string;
  title: string;
  description: string;
  version: string | null;
  numberOfTerms: number | null;
  numberOfClasses: number | null;
  preferredPrefix: string | null;
  homepage: string | null;
  domain: string | null;
  repository: string | null;
}

export interface TermDescriptor {
  ontology: string;
  iri: string;
  label: string;
  shortForm: string;
  oboId: string | null;
  synonyms: string[];
  definition: string;
  obsolete: boolean;
  hasChildren: boolean;
  /** Direct parent IRIs, upstream order, unique */
  parents: string[];
  /** Direct child IRIs, upstream order, unique */
  children: string[];
}

export interface SearchHit {
  iri: string;
  label: string;
  ontology: string;
  shortForm: string;
  oboId: string | null;
  description: string;
  obsolete: boolean;
  score: number;
}

export interface HierarchyEdge {
  parent: string;
  child: string;
  ontology: string;
}

/**
 * A flattened page of results, whatever envelope OLS wrapped it in.
 */
export interface Page<T> {
  items: T[];
  /** 0-based page index */
  page: number;
  pageSize: number;
  totalElements: number;
  totalPages: number;
  hasMore: boolean;
  nextPage: number | null;
}

export type HierarchyDirection = 'parents' | 'children';
