import { mkdir, readdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { z } from 'zod';
import { PROVIDER_IDS } from '@finverdict/tools';
import type { Chunk } from '../types.js';

// ---------------------------------------------------------------------------
// Persisted record shape
// ---------------------------------------------------------------------------

export const ChunkRecordSchema = z.object({
  chunk_id: z.string().regex(/^[0-9a-f]{64}$/),
  text: z.string(),
  metadata: z.object({
    url: z.string(),
    source: z.enum(PROVIDER_IDS),
    date: z.string().nullable(),
    type: z.enum(['quote', 'profile', 'fundamentals', 'news', 'exchange', 'web']),
    title: z.string(),
    symbol: z.string().optional(),
  }),
  embedding_vector: z.array(z.number()).nullable(),
  embedding_model: z.string().nullable(),
});

export type ChunkRecord = z.infer<typeof ChunkRecordSchema>;

export function toRecord(chunk: Chunk): ChunkRecord {
  return {
    chunk_id: chunk.chunkId,
    text: chunk.text,
    metadata: { ...chunk.metadata },
    embedding_vector: chunk.embedding,
    embedding_model: chunk.embeddingModel,
  };
}

export function fromRecord(record: ChunkRecord): Chunk {
  return {
    chunkId: record.chunk_id,
    text: record.text,
    metadata: { ...record.metadata },
    embedding: record.embedding_vector,
    embeddingModel: record.embedding_model,
  };
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

const SEGMENT_PATTERN = /^segment-\d{13}-\d{6}-[0-9a-f]{8}\.jsonl$/;

export interface ChunkStoreStats {
  chunks: number;
  embedded: number;
  segments: number;
  dir: string;
  /** Lines skipped on load because they did not parse. */
  skippedLines: number;
}

/**
 * Persistent, upsert-only chunk store. Every upsert writes one new JSON-lines
 * segment (temp file, then rename), so a crash never leaves a half-written
 * segment behind. On load, segments are replayed in name order and the last
 * record for a chunk id wins.
 */
export class ChunkStore {
  private readonly chunks = new Map<string, Chunk>();
  private segments: string[] = [];
  private skippedLines = 0;
  private sequence = 0;

  private constructor(readonly dir: string) {}

  static async open(dir: string): Promise<ChunkStore> {
    const store = new ChunkStore(dir);
    await mkdir(dir, { recursive: true });
    await store.load();
    return store;
  }

  get size(): number {
    return this.chunks.size;
  }

  get(chunkId: string): Chunk | undefined {
    return this.chunks.get(chunkId);
  }

  has(chunkId: string): boolean {
    return this.chunks.has(chunkId);
  }

  all(): Chunk[] {
    return [...this.chunks.values()];
  }

  stats(): ChunkStoreStats {
    let embedded = 0;
    for (const chunk of this.chunks.values()) {
      if (chunk.embedding) embedded++;
    }
    return {
      chunks: this.chunks.size,
      embedded,
      segments: this.segments.length,
      dir: this.dir,
      skippedLines: this.skippedLines,
    };
  }

  /** Persist chunks as one new segment, then make them visible. */
  async upsert(chunks: Chunk[]): Promise<void> {
    if (chunks.length === 0) return;
    const name = await this.writeSegment(chunks);
    this.segments.push(name);
    for (const chunk of chunks) {
      this.chunks.set(chunk.chunkId, chunk);
    }
  }

  /** Rewrite every chunk into a single segment and delete the old ones. */
  async compact(): Promise<{ before: number; after: number }> {
    const old = [...this.segments];
    if (old.length <= 1) return { before: old.length, after: old.length };

    const name = await this.writeSegment(this.all());
    this.segments = [name];
    for (const segment of old) {
      await unlink(join(this.dir, segment));
    }
    return { before: old.length, after: 1 };
  }

  private async load(): Promise<void> {
    const names = (await readdir(this.dir)).filter(n => SEGMENT_PATTERN.test(n)).sort();
    for (const name of names) {
      const content = await readFile(join(this.dir, name), 'utf-8');
      for (const line of content.split('\n')) {
        if (!line.trim()) continue;
        const chunk = parseLine(line);
        if (chunk) {
          this.chunks.set(chunk.chunkId, chunk);
        } else {
          this.skippedLines++;
        }
      }
    }
    this.segments = names;
  }

  private async writeSegment(chunks: Chunk[]): Promise<string> {
    const name = this.nextSegmentName();
    const finalPath = join(this.dir, name);
    const tempPath = `${finalPath}.${randomUUID()}.tmp`;
    const body = chunks.map(c => JSON.stringify(toRecord(c))).join('\n') + '\n';

    await writeFile(tempPath, body, 'utf-8');
    await rename(tempPath, finalPath);
    return name;
  }

  private nextSegmentName(): string {
    const last = this.segments[this.segments.length - 1];
    const lastStamp = last ? Number(last.slice(8, 21)) : 0;
    const lastSeq = last ? Number(last.slice(22, 28)) : 0;
    // Names must sort after every existing segment, even if the clock goes back.
    const stamp = Math.max(Date.now(), lastStamp);
    this.sequence = stamp === lastStamp ? Math.max(this.sequence, lastSeq) + 1 : this.sequence + 1;
    if (this.sequence >= 1_000_000) this.sequence = 0;
    const seq = String(this.sequence).padStart(6, '0');
    return `segment-${String(stamp).padStart(13, '0')}-${seq}-${randomUUID().slice(0, 8)}.jsonl`;
  }
}

function parseLine(line: string): Chunk | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = ChunkRecordSchema.safeParse(raw);
  return parsed.success ? fromRecord(parsed.data) : null;
}
