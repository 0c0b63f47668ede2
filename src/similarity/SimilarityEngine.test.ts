import { describe, expect, it } from 'vitest';
import { NetworkError, UpstreamError } from '../ols/errors.js';
import { OlsApi } from '../ols/OlsApi.js';
import { OlsClient } from '../ols/OlsClient.js';
import { FakeOls, OBO } from '../testing/FakeOls.js';
import { EmbeddingCache } from './EmbeddingCache.js';
import { DisabledEmbeddingProvider, NgramEmbeddingProvider, type EmbeddingProvider } from './EmbeddingProvider.js';
import { SimilarityEngine, embeddingText } from './SimilarityEngine.js';

/** Looks vectors up by the label part of the embedded text. */
class TableProvider implements EmbeddingProvider {
  readonly id = 'table';

  constructor(private readonly table: Record<string, number[]>) {}

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.table[text.split('. ')[0] ?? ''] ?? [0, 0, 1]);
  }
}

function makeEngine(provider: EmbeddingProvider, fake = new FakeOls()) {
  const client = new OlsClient({ baseUrl: fake.baseUrl, fetch: fake.fetch, sleep: async () => undefined });
  const engine = new SimilarityEngine(new OlsApi(client), new EmbeddingCache(provider));
  return { engine, fake };
}

const TABLE = {
  'cell death': [1, 0],
  'cellular process': [0, 1],
  'programmed cell death': [1, 1],
  'necrotic cell death': [1, 1],
  'apoptotic process': [-1, 0],
};

describe('embeddingText', () => {
  it('joins label and definition', () => {
    expect(embeddingText({ label: 'cell death', definition: '' })).toBe('cell death');
    expect(embeddingText({ label: 'Seizure', definition: 'A fit.' })).toBe('Seizure. A fit.');
  });
});

describe('SimilarityEngine', () => {
  it('ranks the lexical pool by cosine similarity, keeping ties in lexical order', async () => {
    const { engine, fake } = makeEngine(new TableProvider(TABLE));

    const response = await engine.findSimilar({ queryText: 'cell death', ontologyScope: 'go', topK: 10 });

    expect(response.degraded).toBe(false);
    expect(response.provider).toBe('table');
    expect(response.sourceTerm).toBeNull();
    expect(response.results.map((r) => r.term.label)).toEqual([
      'cell death',
      'programmed cell death',
      'necrotic cell death',
      'cellular process',
      'apoptotic process',
    ]);

    const scores = response.results.map((r) => r.score ?? -1);
    expect(scores[0]).toBe(1);
    expect(scores[1]).toBeCloseTo(Math.SQRT1_2, 10);
    expect(scores[2]).toBeCloseTo(Math.SQRT1_2, 10);
    expect(scores.slice(3)).toEqual([0, 0]);

    const params = fake.requestsTo('/api/search')[0]?.searchParams;
    expect(params?.get('rows')).toBe('25');
    expect(params?.get('obsoletes')).toBe('false');
    expect(params?.get('ontology')).toBe('go');
  });

  it('returns at most topK results', async () => {
    const { engine } = makeEngine(new TableProvider(TABLE));
    const response = await engine.findSimilar({ queryText: 'cell death', ontologyScope: 'go', topK: 2 });
    expect(response.results.map((r) => r.term.label)).toEqual(['cell death', 'programmed cell death']);
  });

  it('falls back to lexical order with null scores when embeddings are unavailable', async () => {
    const { engine } = makeEngine(new DisabledEmbeddingProvider());

    const response = await engine.findSimilar({ queryText: 'cell death', ontologyScope: 'go', topK: 3 });

    expect(response.degraded).toBe(true);
    expect(response.reason).toBe('Embedding provider unavailable: No embedding provider is configured');
    expect(response.results.map((r) => [r.term.label, r.score])).toEqual([
      ['cell death', null],
      ['cellular process', null],
      ['programmed cell death', null],
    ]);
  });

  it('fails with a cancellation instead of degrading when the caller aborts', async () => {
    const controller = new AbortController();
    const provider: EmbeddingProvider = {
      id: 'stalled',
      embed: () => {
        controller.abort();
        return new Promise<number[][]>(() => undefined);
      },
    };
    const { engine } = makeEngine(provider);

    const pending = engine.findSimilar({ queryText: 'cell death', ontologyScope: 'go', topK: 3 }, controller.signal);

    await expect(pending).rejects.toBeInstanceOf(NetworkError);
    await expect(pending).rejects.toMatchObject({
      message: 'Similarity request was cancelled',
      details: { aborted: true },
    });
  });

  it('returns an empty, non-degraded result when nothing matches', async () => {
    const { engine } = makeEngine(new DisabledEmbeddingProvider());
    const response = await engine.findSimilar({ queryText: 'zzzz', topK: 5 });
    expect(response.results).toEqual([]);
    expect(response.degraded).toBe(false);
  });

  it('ranks relative to an existing term and leaves that term out', async () => {
    const { engine, fake } = makeEngine(new NgramEmbeddingProvider());

    const response = await engine.findSimilar({ termIri: `${OBO}GO_0012501`, ontology: 'go', topK: 10 });

    expect(response.sourceTerm?.label).toBe('programmed cell death');
    expect(response.query).toBe('programmed cell death. A cell death process mediated by an intracellular program.');
    expect(fake.requestsTo('/api/search')[0]?.searchParams.get('q')).toBe('programmed cell death');
    expect(response.results.map((r) => r.term.iri).sort()).toEqual(
      [`${OBO}GO_0006915`, `${OBO}GO_0008219`, `${OBO}GO_0009987`, `${OBO}GO_0070265`].sort(),
    );
    for (const { score } of response.results) {
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    }
  });

  it('propagates a failed candidate search', async () => {
    const fake = new FakeOls();
    fake.intercept((url) => (url.pathname.endsWith('/api/search') ? new Response('boom', { status: 500 }) : undefined));
    const { engine } = makeEngine(new NgramEmbeddingProvider(), fake);

    await expect(engine.findSimilar({ queryText: 'cell death', topK: 5 })).rejects.toBeInstanceOf(UpstreamError);
  });
});
