import type { Chunk, RetrievalHit, RetrievalResult } from '../types.js';

export function makeChunk(id: string, text: string, overrides: Partial<Chunk['metadata']> = {}): Chunk {
  return {
    chunkId: id.padEnd(64, '0'),
    text,
    metadata: {
      url: `https://example.com/${id}`,
      source: 'finnhub',
      date: '2026-10-16T12:00:00.000Z',
      type: 'news',
      title: `Article ${id}`,
      ...overrides,
    },
    embedding: null,
    embeddingModel: null,
  };
}

export function makeHit(chunk: Chunk, score = 0.5): RetrievalHit {
  return { chunk, score, semanticScore: score, lexicalScore: score };
}

export function makeRetrieval(chunks: Chunk[], query = 'test query'): RetrievalResult {
  return {
    query,
    hits: chunks.map((c, i) => makeHit(c, 1 - i * 0.1)),
    totalSearched: chunks.length,
  };
}
