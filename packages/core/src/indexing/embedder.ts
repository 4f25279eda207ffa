import { embedMany, type EmbeddingModel } from 'ai';
import { withRetry, type RetryConfig } from '../router/retry.js';
import { calculateEmbeddingCost } from '../router/cost.js';
import { tokenize } from '../retrieval/lexical.js';
import type { RunBudget } from '../types.js';

/**
 * Turns texts into vectors. `modelId` is stored with every vector it makes.
 * Paid embedders record their spend on `budget`.
 */
export interface Embedder {
  readonly modelId: string;
  embed(texts: string[], signal?: AbortSignal, budget?: RunBudget): Promise<number[][]>;
}

export class EmbeddingQualityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmbeddingQualityError';
  }
}

/** Rejects empty, non-finite and zero-norm vectors. */
export function validateEmbedding(vector: number[]): void {
  if (vector.length === 0) {
    throw new EmbeddingQualityError('Empty embedding vector');
  }
  let normSum = 0;
  for (const v of vector) {
    if (!Number.isFinite(v)) {
      throw new EmbeddingQualityError('Embedding contains non-finite values');
    }
    normSum += v * v;
  }
  if (normSum === 0) {
    throw new EmbeddingQualityError('Embedding has zero norm');
  }
}

const DEFAULT_EMBED_RETRY: RetryConfig = {
  maxRetries: 2,
  initialDelayMs: 500,
  timeoutMs: 30000,
  retryOn: ['rate_limit', 'server_error', 'timeout'],
};

/** Embeddings from an AI SDK embedding model (OpenAI, Google). */
export class AiSdkEmbedder implements Embedder {
  constructor(
    private readonly model: EmbeddingModel<string>,
    readonly modelId: string,
    private readonly retry: RetryConfig = DEFAULT_EMBED_RETRY,
  ) {}

  async embed(texts: string[], signal?: AbortSignal, budget?: RunBudget): Promise<number[][]> {
    if (texts.length === 0) return [];
    const { result } = await withRetry(
      async (_attempt, attemptSignal) => {
        const { embeddings, usage } = await embedMany({
          model: this.model,
          values: texts,
          abortSignal: attemptSignal,
          maxRetries: 0,
        });
        const tokens = usage?.tokens ?? 0;
        if (budget && tokens > 0) {
          budget.tracker.addCost(calculateEmbeddingCost(this.modelId, tokens), 'embedding');
        }
        return embeddings;
      },
      { ...this.retry, abortSignal: signal },
    );
    if (result.length !== texts.length) {
      throw new EmbeddingQualityError(`Expected ${texts.length} embeddings, got ${result.length}`);
    }
    return result;
  }
}

/**
 * Deterministic feature-hashing embedder used when no embedding provider is
 * configured. Unigrams and bigrams hash into a fixed number of signed buckets.
 */
export class HashingEmbedder implements Embedder {
  readonly modelId: string;

  constructor(private readonly dimensions = 512) {
    this.modelId = `hashing-${dimensions}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.vector(text));
  }

  private vector(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = tokenize(text);
    const features = [...tokens, ...tokens.slice(1).map((t, i) => `${tokens[i]} ${t}`)];

    for (const feature of features) {
      const hash = fnv1a(feature);
      const bucket = hash % this.dimensions;
      vector[bucket] += (hash & 0x80000000) === 0 ? 1 : -1;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    if (norm === 0) return vector;
    return vector.map(v => v / norm);
  }
}

/** 32-bit FNV-1a, unsigned. */
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
