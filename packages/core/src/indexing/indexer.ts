import type { Chunk, RawDocument, RunBudget } from '../types.js';
import { toChunk } from './chunker.js';
import { validateEmbedding, type Embedder } from './embedder.js';
import type { ChunkStore } from './store.js';

export interface IngestStats {
  /** Chunks new to the store. */
  inserted: number;
  /** Stored chunks that gained an embedding from the current model. */
  updated: number;
  /** Stored chunks left as they were. */
  unchanged: number;
  /** Chunks left without an embedding. */
  embedFailures: number;
}

export interface IngestResult {
  chunks: Chunk[];
  stats: IngestStats;
}

/**
 * Turns documents into stored, embedded chunks. Ingest is idempotent: a
 * document already stored with an embedding from the current model is not
 * embedded or written again.
 */
export class Indexer {
  constructor(
    private readonly store: ChunkStore,
    private readonly embedder: Embedder,
    private readonly onEmbedFailure?: (message: string) => void,
  ) {}

  get embeddingModel(): string {
    return this.embedder.modelId;
  }

  async ingest(documents: RawDocument[], signal?: AbortSignal, budget?: RunBudget): Promise<Chunk[]> {
    return (await this.ingestWithStats(documents, signal, budget)).chunks;
  }

  async ingestWithStats(documents: RawDocument[], signal?: AbortSignal, budget?: RunBudget): Promise<IngestResult> {
    const stats: IngestStats = { inserted: 0, updated: 0, unchanged: 0, embedFailures: 0 };

    // Same url + text in one batch collapses to one chunk.
    const byId = new Map<string, Chunk>();
    for (const doc of documents) {
      const chunk = toChunk(doc);
      if (!byId.has(chunk.chunkId)) byId.set(chunk.chunkId, chunk);
    }

    const result: Chunk[] = [];
    const pending: Array<{ chunk: Chunk; existed: boolean }> = [];
    for (const chunk of byId.values()) {
      const stored = this.store.get(chunk.chunkId);
      if (stored && stored.embedding && stored.embeddingModel === this.embedder.modelId) {
        stats.unchanged++;
        result.push(stored);
      } else {
        pending.push({ chunk: stored ?? chunk, existed: stored !== undefined });
      }
    }

    if (pending.length === 0) return { chunks: result, stats };

    const vectors = await this.embedAll(pending.map(p => p.chunk.text), signal, budget);
    const toWrite: Chunk[] = [];

    pending.forEach(({ chunk, existed }, i) => {
      const vector = vectors[i];
      if (!vector) stats.embedFailures++;

      // A stored chunk whose re-embedding failed is left as it is.
      if (existed && !vector) {
        stats.unchanged++;
        result.push(chunk);
        return;
      }

      const next: Chunk = {
        ...chunk,
        embedding: vector,
        embeddingModel: vector ? this.embedder.modelId : null,
      };
      if (existed) stats.updated++;
      else stats.inserted++;
      toWrite.push(next);
      result.push(next);
    });

    await this.store.upsert(toWrite);
    return { chunks: result, stats };
  }

  /**
   * One batch call; when it fails, one call per text. Slots whose embedding
   * fails or is unusable come back null.
   */
  private async embedAll(
    texts: string[],
    signal?: AbortSignal,
    budget?: RunBudget,
  ): Promise<Array<number[] | null>> {
    try {
      const vectors = await this.embedder.embed(texts, signal, budget);
      return vectors.map(v => this.checked(v));
    } catch (err) {
      if (signal?.aborted) throw err;
      this.report(err);
    }

    const vectors: Array<number[] | null> = [];
    for (const text of texts) {
      try {
        const [vector] = await this.embedder.embed([text], signal, budget);
        vectors.push(vector ? this.checked(vector) : null);
      } catch (err) {
        if (signal?.aborted) throw err;
        this.report(err);
        vectors.push(null);
      }
    }
    return vectors;
  }

  private checked(vector: number[]): number[] | null {
    try {
      validateEmbedding(vector);
      return vector;
    } catch (err) {
      this.report(err);
      return null;
    }
  }

  private report(err: unknown): void {
    this.onEmbedFailure?.(err instanceof Error ? err.message : String(err));
  }
}
