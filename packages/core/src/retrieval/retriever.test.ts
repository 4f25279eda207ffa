import { describe, it, expect, vi } from 'vitest';
import { HybridRetriever, combineScores, cosineSimilarity } from './retriever.js';
import type { Embedder } from '../indexing/embedder.js';
import type { Chunk } from '../types.js';

function chunk(id: string, text: string, embedding: number[] | null, date: string | null = null, model = 'test-2d'): Chunk {
  return {
    chunkId: id.padEnd(64, '0'),
    text,
    metadata: { url: `https://example.com/${id}`, source: 'finnhub', date, type: 'news', title: text },
    embedding,
    embeddingModel: embedding ? model : null,
  };
}

/** Returns a fixed query vector. */
function fixedEmbedder(vector: number[] | Error): Embedder {
  return {
    modelId: 'test-2d',
    embed: vi.fn(async () => {
      if (vector instanceof Error) throw vector;
      return [vector];
    }),
  };
}

function source(chunks: Chunk[]) {
  return { all: () => chunks };
}

describe('cosineSimilarity', () => {
  it('clamps to [0, 1]', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(0);
    expect(cosineSimilarity([1, 0], [1, 1])).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it('is zero for mismatched or zero vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });
});

describe('combineScores', () => {
  it('weights semantic against lexical', () => {
    expect(combineScores(1, 0, 0.7)).toBeCloseTo(0.7, 10);
    expect(combineScores(0, 1, 0.7)).toBeCloseTo(0.3, 10);
  });

  it('is monotonic in lexical overlap at equal semantic score', () => {
    for (const w of [0, 0.3, 0.7, 0.99]) {
      const scores = [0, 0.25, 0.5, 0.75, 1].map(l => combineScores(0.6, l, w));
      for (let i = 1; i < scores.length; i++) {
        expect(scores[i]).toBeGreaterThan(scores[i - 1]);
      }
    }
  });
});

describe('HybridRetriever', () => {
  const chunks = [
    chunk('a', 'Tesla deliveries beat estimates', [1, 0], '2026-10-10T00:00:00Z'),
    chunk('b', 'Oil prices slide', [0, 1], '2026-10-12T00:00:00Z'),
    chunk('c', 'Tesla margins under pressure', [1, 1], null),
  ];

  it('ranks by the weighted score', async () => {
    const retriever = new HybridRetriever(source(chunks), fixedEmbedder([1, 0]));

    const result = await retriever.search('tesla deliveries');

    expect(result.totalSearched).toBe(3);
    expect(result.hits.map(h => h.chunk.chunkId[0])).toEqual(['a', 'c']);
    // a: 0.7 * 1 + 0.3 * 1
    expect(result.hits[0].score).toBeCloseTo(1, 10);
    expect(result.hits[0].lexicalScore).toBe(1);
    // c: 0.7 * cos45 + 0.3 * 0.5
    expect(result.hits[1].score).toBeCloseTo(0.7 * Math.SQRT1_2 + 0.15, 10);
  });

  it('honours topK and the semantic weight', async () => {
    const retriever = new HybridRetriever(source(chunks), fixedEmbedder([0, 1]));

    const semantic = await retriever.search('tesla', { semanticWeight: 1, topK: 1 });
    expect(semantic.hits.map(h => h.chunk.chunkId[0])).toEqual(['b']);

    const lexical = await retriever.search('tesla', { semanticWeight: 0 });
    expect(lexical.hits.map(h => h.chunk.chunkId[0])).toEqual(['a', 'c']);
  });

  it('uses configured defaults', async () => {
    const retriever = new HybridRetriever(source(chunks), fixedEmbedder([0, 1]), { topK: 1, semanticWeight: 0 });
    const result = await retriever.search('tesla');
    expect(result.hits).toHaveLength(1);
    expect(result.hits[0].semanticScore).toBe(0);
  });

  it('breaks ties by date, newest first, undated last, then id', async () => {
    const tied = [
      chunk('x', 'fed rates', null, null),
      chunk('w', 'fed rates', null, null),
      chunk('y', 'fed rates', null, '2026-10-01T00:00:00Z'),
      chunk('z', 'fed rates', null, '2026-10-05T00:00:00Z'),
    ];
    const retriever = new HybridRetriever(source(tied), fixedEmbedder([1, 0]));

    const result = await retriever.search('fed rates');

    expect(result.hits.map(h => h.chunk.chunkId[0])).toEqual(['z', 'y', 'w', 'x']);
  });

  it('degrades to lexical-only when the query cannot be embedded', async () => {
    const onFailure = vi.fn();
    const retriever = new HybridRetriever(source(chunks), fixedEmbedder(new Error('429 Too Many Requests')), {}, onFailure);

    const result = await retriever.search('oil');

    expect(result.hits.map(h => h.chunk.chunkId[0])).toEqual(['b']);
    expect(result.hits[0].semanticScore).toBe(0);
    expect(result.hits[0].score).toBeCloseTo(0.3, 10);
    expect(onFailure).toHaveBeenCalledWith('429 Too Many Requests');
  });

  it('ignores embeddings from another model', async () => {
    const mixed = [chunk('m', 'unrelated words', [1, 0], null, 'other-model')];
    const retriever = new HybridRetriever(source(mixed), fixedEmbedder([1, 0]));

    const result = await retriever.search('tesla');

    expect(result.hits).toEqual([]);
    expect(result.totalSearched).toBe(1);
  });

  it('applies the metadata filter', async () => {
    const retriever = new HybridRetriever(source(chunks), fixedEmbedder([1, 0]));
    const result = await retriever.search('tesla', { filter: m => m.date !== null });
    expect(result.totalSearched).toBe(2);
    expect(result.hits.map(h => h.chunk.chunkId[0])).toEqual(['a']);
  });

  it('never modifies the chunks', async () => {
    const snapshot = JSON.stringify(chunks);
    const retriever = new HybridRetriever(source(chunks), fixedEmbedder([1, 0]));
    await retriever.search('tesla deliveries');
    expect(JSON.stringify(chunks)).toBe(snapshot);
  });
});
