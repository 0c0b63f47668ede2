/**
 * In-process stand-in for the OLS4 REST API.
 *
 * Serves the allow-listed endpoints from a small in-memory term graph as
 * `Response` objects, so OlsClient runs unchanged against it. Tests can
 * intercept individual URLs to inject failures.
 */

import type { FetchLike } from '../ols/OlsClient.js';

export interface FakeOntology {
  id: string;
  title: string;
  description: string;
  version: string;
  preferredPrefix: string;
}

export interface FakeTerm {
  ontology: string;
  iri: string;
  label: string;
  definition?: string;
  synonyms?: string[];
  parents: string[];
  obsolete?: boolean;
}

export type Interceptor = (url: URL, init: RequestInit) => Response | Promise<Response> | undefined;

export const OBO = 'http://purl.obolibrary.org/obo/';

export const FAKE_ONTOLOGIES: FakeOntology[] = [
  { id: 'go', title: 'Gene Ontology', description: 'Functions of gene products', version: '2026-01-01', preferredPrefix: 'GO' },
  { id: 'hp', title: 'Human Phenotype Ontology', description: 'Phenotypic abnormalities', version: '2026-02-01', preferredPrefix: 'HP' },
];

export const FAKE_TERMS: FakeTerm[] = [
  { ontology: 'go', iri: `${OBO}GO_0008150`, label: 'biological_process', parents: [] },
  { ontology: 'go', iri: `${OBO}GO_0009987`, label: 'cellular process', parents: [`${OBO}GO_0008150`] },
  { ontology: 'go', iri: `${OBO}GO_0008219`, label: 'cell death', definition: 'Any biological process that results in permanent cessation of all vital functions of a cell.', parents: [`${OBO}GO_0009987`] },
  { ontology: 'go', iri: `${OBO}GO_0012501`, label: 'programmed cell death', definition: 'A cell death process mediated by an intracellular program.', parents: [`${OBO}GO_0008219`] },
  { ontology: 'go', iri: `${OBO}GO_0070265`, label: 'necrotic cell death', definition: 'A cell death process with swelling and rupture of the cell.', parents: [`${OBO}GO_0008219`, `${OBO}GO_0012501`] },
  { ontology: 'go', iri: `${OBO}GO_0006915`, label: 'apoptotic process', definition: 'A programmed cell death process that begins with caspase activation.', synonyms: ['apoptosis', 'programmed cell death by apoptosis'], parents: [`${OBO}GO_0012501`] },
  { ontology: 'go', iri: `${OBO}GO_0043065`, label: 'positive regulation of apoptotic process', parents: [`${OBO}GO_0009987`] },
  { ontology: 'go', iri: `${OBO}GO_0006917`, label: 'obsolete induction of apoptosis', obsolete: true, parents: [] },
  { ontology: 'hp', iri: `${OBO}HP_0000001`, label: 'All', parents: [] },
  { ontology: 'hp', iri: `${OBO}HP_0000118`, label: 'Phenotypic abnormality', definition: 'A phenotypic abnormality.', parents: [`${OBO}HP_0000001`] },
  { ontology: 'hp', iri: `${OBO}HP_0000707`, label: 'Abnormality of the nervous system', parents: [`${OBO}HP_0000118`] },
  { ontology: 'hp', iri: `${OBO}HP_0012638`, label: 'Abnormal nervous system physiology', parents: [`${OBO}HP_0000707`] },
  { ontology: 'hp', iri: `${OBO}HP_0001250`, label: 'Seizure', synonyms: ['Seizures', 'Epileptic seizure'], parents: [`${OBO}HP_0012638`] },
];

function shortForm(iri: string): string {
  return iri.slice(iri.lastIndexOf('/') + 1);
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function notFound(): Response {
  return json({ error: 'Not Found', status: 404 }, 404);
}

function intParam(url: URL, name: string, fallback: number): number {
  const raw = url.searchParams.get(name);
  return raw === null ? fallback : Number.parseInt(raw, 10);
}

function abortError(): Error {
  const err = new Error('This operation was aborted');
  err.name = 'AbortError';
  return err;
}

export class FakeOls {
  readonly baseUrl = 'http://ols.test/ols4';
  /** Every URL requested, in order */
  readonly requests: URL[] = [];
  private readonly interceptors: Interceptor[] = [];

  constructor(
    private readonly ontologies: FakeOntology[] = FAKE_ONTOLOGIES,
    private readonly terms: FakeTerm[] = FAKE_TERMS,
  ) {}

  /** First interceptor returning a Response wins over the in-memory data. */
  intercept(interceptor: Interceptor): void {
    this.interceptors.push(interceptor);
  }

  readonly fetch: FetchLike = async (input, init) => {
    if (init.signal?.aborted) throw abortError();
    const url = new URL(input);
    this.requests.push(url);

    for (const interceptor of this.interceptors) {
      const response = await interceptor(url, init);
      if (response) return response;
    }
    return this.route(url);
  };

  /** Requests whose path ends with `suffix` */
  requestsTo(suffix: string): URL[] {
    return this.requests.filter((url) => url.pathname.endsWith(suffix));
  }

  private route(url: URL): Response {
    const path = url.pathname.slice(new URL(this.baseUrl).pathname.length);
    const segments = path.split('/').filter((s) => s.length > 0);

    if (path === '/api/search') return this.search(url);
    if (path === '/api/v2/ontologies') return this.listOntologies(url);
    if (path === '/api/terms') return this.lookup(url);

    if (segments.length === 4 && segments[1] === 'v2' && segments[2] === 'ontologies') {
      const ontology = this.ontologies.find((o) => o.id === segments[3]);
      return ontology ? json(this.ontologyJson(ontology)) : notFound();
    }

    // /api/ontologies/{ontology}/terms/{iri}[/parents|/children]
    if (segments[1] === 'ontologies' && segments[3] === 'terms' && segments[4] !== undefined) {
      const ontology = segments[2] ?? '';
      const iri = decodeURIComponent(decodeURIComponent(segments[4]));
      const term = this.terms.find((t) => t.ontology === ontology && t.iri === iri);
      if (!term) return notFound();
      if (segments[5] === 'parents') return this.page(url, this.parentsOf(term));
      if (segments[5] === 'children') return this.page(url, this.childrenOf(term));
      if (segments.length === 5) return json(this.termJson(term));
    }

    return notFound();
  }

  private search(url: URL): Response {
    const q = (url.searchParams.get('q') ?? '').toLowerCase();
    const exact = url.searchParams.get('exact') === 'true';
    const includeObsolete = url.searchParams.get('obsoletes') === 'true';
    const scope = url.searchParams.get('ontology')?.split(',');
    const rows = intParam(url, 'rows', 10);
    const start = intParam(url, 'start', 0);

    const rank = (term: FakeTerm): number => {
      const names = [term.label, ...(term.synonyms ?? [])].map((n) => n.toLowerCase());
      if (names.includes(q)) return 3;
      if (exact) return 0;
      if (names.some((n) => n.startsWith(q))) return 2;
      const words = q.split(/\s+/).filter((w) => w.length > 0);
      return words.length > 0 && names.some((n) => words.some((w) => n.includes(w))) ? 1 : 0;
    };

    const matches = this.terms
      .filter((t) => (!scope || scope.includes(t.ontology)) && (includeObsolete || !t.obsolete))
      .map((term) => ({ term, score: rank(term) }))
      .filter((m) => m.score > 0)
      .sort((a, b) => b.score - a.score);

    return json({
      response: {
        numFound: matches.length,
        start,
        docs: matches.slice(start, start + rows).map((m) => this.termJson(m.term)),
      },
    });
  }

  private listOntologies(url: URL): Response {
    const search = url.searchParams.get('search')?.toLowerCase();
    const page = intParam(url, 'page', 0);
    const size = intParam(url, 'size', 20);
    const matches = this.ontologies.filter((o) =>
      !search || o.id.includes(search) || o.title.toLowerCase().includes(search),
    );
    return json({
      page,
      numElements: Math.min(size, Math.max(matches.length - page * size, 0)),
      totalPages: Math.ceil(matches.length / size),
      totalElements: matches.length,
      elements: matches.slice(page * size, (page + 1) * size).map((o) => this.ontologyJson(o)),
    });
  }

  private lookup(url: URL): Response {
    const id = url.searchParams.get('id') ?? '';
    const matches = this.terms.filter((t) =>
      t.iri === id || shortForm(t.iri) === id || shortForm(t.iri).replace('_', ':') === id,
    );
    if (matches.length === 0) {
      return json({ page: { size: 20, totalElements: 0, totalPages: 0, number: 0 } });
    }
    return json({
      _embedded: { terms: matches.map((t) => ({ ...this.termJson(t), is_defining_ontology: true })) },
      page: { size: 20, totalElements: matches.length, totalPages: 1, number: 0 },
    });
  }

  private page(url: URL, items: FakeTerm[]): Response {
    const page = intParam(url, 'page', 0);
    const size = intParam(url, 'size', 20);
    const slice = items.slice(page * size, (page + 1) * size);
    const pageInfo = {
      size,
      totalElements: items.length,
      totalPages: Math.ceil(items.length / size),
      number: page,
    };
    // OLS omits `_embedded` entirely for an empty page
    return json(slice.length > 0
      ? { _embedded: { terms: slice.map((t) => this.termJson(t)) }, page: pageInfo }
      : { page: pageInfo });
  }

  private parentsOf(term: FakeTerm): FakeTerm[] {
    return term.parents
      .map((iri) => this.terms.find((t) => t.ontology === term.ontology && t.iri === iri))
      .filter((t): t is FakeTerm => t !== undefined);
  }

  private childrenOf(term: FakeTerm): FakeTerm[] {
    return this.terms.filter((t) => t.ontology === term.ontology && t.parents.includes(term.iri));
  }

  private termJson(term: FakeTerm): Record<string, unknown> {
    const short = shortForm(term.iri);
    return {
      iri: term.iri,
      label: term.label,
      description: term.definition ? [term.definition] : [],
      synonyms: term.synonyms ?? [],
      ontology_name: term.ontology,
      ontology_prefix: term.ontology.toUpperCase(),
      short_form: short,
      obo_id: short.replace('_', ':'),
      is_obsolete: term.obsolete ?? false,
      has_children: this.childrenOf(term).length > 0,
    };
  }

  private ontologyJson(ontology: FakeOntology): Record<string, unknown> {
    return {
      ontologyId: ontology.id,
      title: ontology.title,
      description: ontology.description,
      version: ontology.version,
      numberOfClasses: this.terms.filter((t) => t.ontology === ontology.id).length,
      preferredPrefix: ontology.preferredPrefix,
    };
  }
}
