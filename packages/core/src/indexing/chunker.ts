import { createHash } from 'node:crypto';
import type { Chunk, RawDocument } from '../types.js';

export const MAX_CHUNK_CHARS = 8000;

export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t\f\v]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/** Content address of a chunk: sha256 of url + "\n" + text, hex. */
export function chunkIdFor(url: string, text: string): string {
  return createHash('sha256').update(`${url}\n${text}`).digest('hex');
}

/** One document becomes one chunk, without an embedding yet. */
export function toChunk(doc: RawDocument): Chunk {
  const title = normalizeWhitespace(doc.title);
  const body = normalizeWhitespace(doc.body);
  const text = (body ? `${title}\n\n${body}` : title).slice(0, MAX_CHUNK_CHARS);

  return {
    chunkId: chunkIdFor(doc.url, text),
    text,
    metadata: {
      url: doc.url,
      source: doc.provider,
      date: doc.publishedAt,
      type: doc.kind,
      title: doc.title,
      ...(doc.symbol ? { symbol: doc.symbol } : {}),
    },
    embedding: null,
    embeddingModel: null,
  };
}
