import { describe, it, expect } from 'vitest';
import { chunkIdFor, normalizeWhitespace, toChunk, MAX_CHUNK_CHARS } from './chunker.js';
import type { RawDocument } from '../types.js';

function doc(overrides: Partial<RawDocument> = {}): RawDocument {
  return {
    sourceId: 'finnhub:news:https://news.example.com/1',
    url: 'https://news.example.com/1',
    title: 'Tesla  beats   estimates',
    body: 'Deliveries rose.\n\n\n\nMargins held.',
    publishedAt: '2026-10-16T12:00:00.000Z',
    provider: 'finnhub',
    kind: 'news',
    symbol: 'TSLA',
    ...overrides,
  };
}

describe('normalizeWhitespace', () => {
  it('collapses runs of spaces and blank lines', () => {
    expect(normalizeWhitespace('  a  \t b \r\n\r\n\r\n c  ')).toBe('a b\n\nc');
  });
});

describe('toChunk', () => {
  it('joins title and body and copies metadata', () => {
    const chunk = toChunk(doc());

    expect(chunk.text).toBe('Tesla beats estimates\n\nDeliveries rose.\n\nMargins held.');
    expect(chunk.metadata).toEqual({
      url: 'https://news.example.com/1',
      source: 'finnhub',
      date: '2026-10-16T12:00:00.000Z',
      type: 'news',
      title: 'Tesla  beats   estimates',
      symbol: 'TSLA',
    });
    expect(chunk.embedding).toBeNull();
    expect(chunk.chunkId).toBe(chunkIdFor('https://news.example.com/1', chunk.text));
    expect(chunk.chunkId).toMatch(/^[0-9a-f]{64}$/);
  });

  it('gives identical url and text the same id', () => {
    const a = toChunk(doc({ sourceId: 'fmp:news:x', provider: 'fmp' }));
    const b = toChunk(doc());
    expect(a.chunkId).toBe(b.chunkId);
  });

  it('gives the same text at another url a different id', () => {
    expect(toChunk(doc({ url: 'https://news.example.com/2' })).chunkId).not.toBe(toChunk(doc()).chunkId);
  });

  it('caps the text length', () => {
    const chunk = toChunk(doc({ body: 'x'.repeat(MAX_CHUNK_CHARS * 2) }));
    expect(chunk.text).toHaveLength(MAX_CHUNK_CHARS);
  });
});
