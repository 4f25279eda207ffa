import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ChunkStore, toRecord } from './store.js';
import { chunkIdFor } from './chunker.js';
import type { Chunk } from '../types.js';

function makeChunk(n: number, embedding: number[] | null = [1, 0]): Chunk {
  const url = `https://news.example.com/${n}`;
  const text = `Story ${n}`;
  return {
    chunkId: chunkIdFor(url, text),
    text,
    metadata: { url, source: 'finnhub', date: null, type: 'news', title: `Story ${n}` },
    embedding,
    embeddingModel: embedding ? 'hashing-512' : null,
  };
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'finverdict-store-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('ChunkStore', () => {
  it('persists chunks across reopen', async () => {
    const store = await ChunkStore.open(dir);
    await store.upsert([makeChunk(1), makeChunk(2, null)]);

    const reopened = await ChunkStore.open(dir);

    expect(reopened.size).toBe(2);
    expect(reopened.get(makeChunk(1).chunkId)).toEqual(makeChunk(1));
    expect(reopened.get(makeChunk(2).chunkId)?.embedding).toBeNull();
  });

  it('writes one segment per upsert and no temp files', async () => {
    const store = await ChunkStore.open(dir);
    await store.upsert([makeChunk(1)]);
    await store.upsert([makeChunk(2)]);
    await store.upsert([]);

    const files = await readdir(dir);
    expect(files).toHaveLength(2);
    expect(files.every(f => f.endsWith('.jsonl'))).toBe(true);
    expect(store.stats()).toEqual({ chunks: 2, embedded: 2, segments: 2, dir, skippedLines: 0 });
  });

  it('keeps the last written record for a chunk id', async () => {
    const store = await ChunkStore.open(dir);
    await store.upsert([makeChunk(1, null)]);
    await store.upsert([makeChunk(1, [0, 1])]);

    const reopened = await ChunkStore.open(dir);

    expect(reopened.size).toBe(1);
    expect(reopened.get(makeChunk(1).chunkId)?.embedding).toEqual([0, 1]);
  });

  it('skips unreadable lines and ignores unrelated files', async () => {
    const good = JSON.stringify(toRecord(makeChunk(3)));
    await writeFile(join(dir, 'segment-0000000000001-000001-abcdef01.jsonl'), `${good}\nnot json\n{"chunk_id":"x"}\n`);
    await writeFile(join(dir, 'notes.txt'), 'hello');
    await writeFile(join(dir, 'segment-0000000000002-000001-abcdef01.jsonl.1234.tmp'), good);

    const store = await ChunkStore.open(dir);

    expect(store.size).toBe(1);
    expect(store.stats().skippedLines).toBe(2);
    expect(store.stats().segments).toBe(1);
  });

  it('compacts all segments into one', async () => {
    const store = await ChunkStore.open(dir);
    await store.upsert([makeChunk(1)]);
    await store.upsert([makeChunk(2)]);
    await store.upsert([makeChunk(1, [0, 1])]);

    expect(await store.compact()).toEqual({ before: 3, after: 1 });

    const files = await readdir(dir);
    expect(files).toHaveLength(1);
    const reopened = await ChunkStore.open(dir);
    expect(reopened.size).toBe(2);
    expect(reopened.get(makeChunk(1).chunkId)?.embedding).toEqual([0, 1]);
  });

  it('appends after segments written by an earlier process', async () => {
    const first = await ChunkStore.open(dir);
    await first.upsert([makeChunk(1, null)]);

    const second = await ChunkStore.open(dir);
    await second.upsert([makeChunk(1, [0, 1])]);

    const third = await ChunkStore.open(dir);
    expect(third.get(makeChunk(1).chunkId)?.embedding).toEqual([0, 1]);
  });
});
