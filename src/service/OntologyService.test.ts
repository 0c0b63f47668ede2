import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../config/types.js';
import { createSilentLogger } from '../logging/logger.js';
import { NotFoundError, UpstreamError, ValidationError } from '../ols/errors.js';
import { initializeApp } from '../server.js';
import { FAKE_ONTOLOGIES, FAKE_TERMS, FakeOls, OBO } from '../testing/FakeOls.js';

function makeService(fake = new FakeOls()) {
  const ctx = initializeApp(
    { ...DEFAULT_CONFIG, ols: { ...DEFAULT_CONFIG.ols, baseUrl: fake.baseUrl } },
    { fetch: fake.fetch, sleep: async () => undefined, logger: createSilentLogger() },
  );
  return { service: ctx.service, fake };
}

describe('OntologyService.searchTerms', () => {
  it('trims the query, normalizes the scope and applies default rows', async () => {
    const { service } = makeService();

    const result = await service.searchTerms({ query: '  apoptotic ', ontology: 'GO' });

    expect(result).toMatchObject({ query: 'apoptotic', ontology: 'go', exact: false, page: 0, rows: 10, total: 2, hasMore: false });
    expect(result.hits.map((h) => h.iri)).toEqual([`${OBO}GO_0006915`, `${OBO}GO_0043065`]);
  });

  it('finds apoptosis in GO through its synonym, skipping obsolete terms', async () => {
    const { service } = makeService();

    const result = await service.searchTerms({ query: 'apoptosis', ontology: 'GO' });

    expect(result.hits.map((h) => [h.label, h.score])).toEqual([['apoptotic process', 1]]);
  });

  it('rejects invalid parameters before calling OLS', async () => {
    const { service, fake } = makeService();

    await expect(service.searchTerms({ query: ' ' })).rejects.toThrow("'query' must be a non-empty string");
    await expect(service.searchTerms({ query: 'cell', rows: 101 })).rejects.toThrow(
      "'rows' must be an integer between 1 and 100",
    );
    await expect(service.searchTerms({ query: 'cell', ontology: 'go hp' })).rejects.toBeInstanceOf(ValidationError);
    expect(fake.requests).toHaveLength(0);
  });
});

describe('OntologyService ontology tools', () => {
  it('lists every ontology with the default page size', async () => {
    const { service } = makeService();
    const result = await service.searchOntologies({});
    expect(result).toMatchObject({ query: null, page: 0, size: 20, total: 2, totalPages: 1 });
    expect(result.ontologies.map((o) => o.id)).toEqual(['go', 'hp']);
  });

  it('describes an ontology by case-insensitive code', async () => {
    const { service } = makeService();
    await expect(service.getOntologyInfo('HP')).resolves.toMatchObject({ id: 'hp', title: 'Human Phenotype Ontology' });
  });

  it('reports an unknown ontology as not found', async () => {
    const { service } = makeService();
    await expect(service.getOntologyInfo('UNKNOWN_CODE')).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('OntologyService.getTermInfo', () => {
  it('fills direct parents and children', async () => {
    const { service } = makeService();

    const term = await service.getTermInfo({ ontology: 'go', termIri: 'GO:0008219' });

    expect(term.iri).toBe(`${OBO}GO_0008219`);
    expect(term.parents).toEqual([`${OBO}GO_0009987`]);
    expect(term.children).toEqual([`${OBO}GO_0012501`, `${OBO}GO_0070265`]);
    expect(term.hasChildren).toBe(true);
  });

  it('looks the term up across ontologies when none is given', async () => {
    const { service } = makeService();

    const term = await service.getTermInfo({ termIri: 'HP:0001250' });

    expect(term.ontology).toBe('hp');
    expect(term.label).toBe('Seizure');
    expect(term.parents).toEqual([`${OBO}HP_0012638`]);
    expect(term.children).toEqual([]);
  });

  it('stops the parents request when the children request fails', async () => {
    const fake = new FakeOls();
    let parentsAborted = false;
    fake.intercept((url, init) => {
      if (url.pathname.endsWith('/children')) return new Response('bad request', { status: 400 });
      if (!url.pathname.endsWith('/parents')) return undefined;
      // Parents never answer; only an abort ends the request
      return new Promise<Response>((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => {
          parentsAborted = true;
          const err = new Error('This operation was aborted');
          err.name = 'AbortError';
          reject(err);
        }, { once: true });
      });
    });
    const { service } = makeService(fake);

    const pending = service.getTermInfo({ ontology: 'go', termIri: 'GO:0008219' });

    await expect(pending).rejects.toBeInstanceOf(UpstreamError);
    await expect(pending).rejects.toThrow('OLS returned HTTP 400');
    expect(parentsAborted).toBe(true);
  });

  it('agrees with the depth-1 hierarchy tools', async () => {
    const { service } = makeService();
    const input = { ontology: 'go', termIri: `${OBO}GO_0070265` };

    const term = await service.getTermInfo(input);
    const ancestors = await service.getTermAncestors({ ...input, depth: 1 });
    const children = await service.getTermChildren({ ...input, depth: 1 });

    expect(ancestors.terms.map((t) => t.iri)).toEqual(term.parents);
    expect(children.terms.map((t) => t.iri)).toEqual(term.children);
  });
});

describe('OntologyService hierarchy tools', () => {
  it('returns only the direct parent at depth 1', async () => {
    const { service } = makeService();

    const result = await service.getTermAncestors({ ontology: 'HP', termIri: 'HP:0000118', depth: 1 });

    expect(result.ontology).toBe('hp');
    expect(result.term.label).toBe('Phenotypic abnormality');
    expect(result.terms.map((t) => t.iri)).toEqual([`${OBO}HP_0000001`]);
    expect(result.count).toBe(1);
    expect(result.truncated).toBe(false);
    expect(result.edges).toEqual([{ parent: `${OBO}HP_0000001`, child: `${OBO}HP_0000118`, ontology: 'hp' }]);
  });

  it('walks ancestors to the root', async () => {
    const { service } = makeService();

    const result = await service.getTermAncestors({ ontology: 'hp', termIri: 'HP:0001250', depth: 10 });

    expect(result.terms.map((t) => [t.label, t.depth])).toEqual([
      ['Abnormal nervous system physiology', 1],
      ['Abnormality of the nervous system', 2],
      ['Phenotypic abnormality', 3],
      ['All', 4],
    ]);
  });

  it('walks descendants level by level', async () => {
    const { service } = makeService();

    const result = await service.getTermChildren({ ontology: 'go', termIri: 'GO:0008150', depth: 2 });

    expect(result.depth).toBe(2);
    expect(result.terms.map((t) => [t.label, t.depth])).toEqual([
      ['cellular process', 1],
      ['cell death', 2],
      ['positive regulation of apoptotic process', 2],
    ]);
  });

  it('leaves obsolete children out unless include_obsolete is set', async () => {
    const retired = { ontology: 'go', iri: `${OBO}GO_0000001`, label: 'obsolete cell killing', obsolete: true, parents: [`${OBO}GO_0008219`] };
    const { service } = makeService(new FakeOls(FAKE_ONTOLOGIES, [...FAKE_TERMS, retired]));
    const input = { ontology: 'go', termIri: 'GO:0008219' };

    const current = await service.getTermChildren(input);
    const all = await service.getTermChildren({ ...input, includeObsolete: true });

    expect(current.terms.map((t) => t.iri)).toEqual([`${OBO}GO_0012501`, `${OBO}GO_0070265`]);
    expect(all.terms.map((t) => t.iri)).toEqual([`${OBO}GO_0012501`, `${OBO}GO_0070265`, `${OBO}GO_0000001`]);
  });

  it('bounds depth by the configured maximum', async () => {
    const { service } = makeService();
    const input = { ontology: 'go', termIri: 'GO:0008150' };

    await expect(service.getTermChildren({ ...input, depth: 11 })).rejects.toThrow(
      "'depth' must be an integer between 1 and 10",
    );
    await expect(service.getTermChildren({ ...input, depth: 0 })).rejects.toBeInstanceOf(ValidationError);
  });

  it('reports an unknown start term as not found', async () => {
    const { service } = makeService();
    await expect(service.getTermAncestors({ ontology: 'go', termIri: 'GO:9999999' })).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});

describe('OntologyService.findSimilarTerms', () => {
  it('requires exactly one of query_text and term_iri', async () => {
    const { service } = makeService();

    await expect(service.findSimilarTerms({})).rejects.toThrow("Provide exactly one of 'query_text' or 'term_iri'");
    await expect(service.findSimilarTerms({ queryText: 'seizure', termIri: 'HP:0001250', ontologyScope: 'hp' }))
      .rejects.toThrow("Provide exactly one of 'query_text' or 'term_iri'");
  });

  it('requires a scope when ranking relative to a term', async () => {
    const { service } = makeService();
    await expect(service.findSimilarTerms({ termIri: 'HP:0001250' })).rejects.toThrow(
      "'ontology_scope' is required when 'term_iri' is given",
    );
  });

  it('bounds top_k', async () => {
    const { service } = makeService();
    await expect(service.findSimilarTerms({ queryText: 'seizure', topK: 51 })).rejects.toThrow(
      "'top_k' must be an integer between 1 and 50",
    );
  });

  it('ranks free-text queries with the default provider', async () => {
    const { service } = makeService();

    const result = await service.findSimilarTerms({ queryText: 'seizure', ontologyScope: 'HP' });

    expect(result.ontologyScope).toBe('hp');
    expect(result.topK).toBe(10);
    expect(result.provider).toBe('ngram-512');
    expect(result.degraded).toBe(false);
    expect(result.results.map((r) => r.term.label)).toEqual(['Seizure']);
    expect(result.results[0]?.score).toBeCloseTo(1, 10);
  });

  it('expands OBO ids given as term_iri', async () => {
    const { service } = makeService();

    const result = await service.findSimilarTerms({ termIri: 'GO:0012501', ontologyScope: 'go', topK: 2 });

    expect(result.sourceTerm?.iri).toBe(`${OBO}GO_0012501`);
    expect(result.results).toHaveLength(2);
    expect(result.results.map((r) => r.term.iri)).not.toContain(`${OBO}GO_0012501`);
  });
});
