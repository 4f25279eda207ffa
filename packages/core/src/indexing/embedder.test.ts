import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AiSdkEmbedder, EmbeddingQualityError, HashingEmbedder, validateEmbedding } from './embedder.js';
import { CostTracker } from '../router/cost.js';

vi.mock('ai', () => ({
  embedMany: vi.fn(),
}));

import { embedMany, type EmbeddingModel } from 'ai';

const mockEmbedMany = vi.mocked(embedMany);

type EmbedManyResult = Awaited<ReturnType<typeof embedMany>>;

beforeEach(() => {
  vi.clearAllMocks();
});

describe('validateEmbedding', () => {
  it('accepts ordinary vectors', () => {
    expect(() => validateEmbedding([0.1, -0.2, 0.3])).not.toThrow();
  });

  it('rejects empty, non-finite and zero vectors', () => {
    expect(() => validateEmbedding([])).toThrow(EmbeddingQualityError);
    expect(() => validateEmbedding([0.1, Number.NaN])).toThrow('Embedding contains non-finite values');
    expect(() => validateEmbedding([0, 0, 0])).toThrow('Embedding has zero norm');
  });
});

describe('AiSdkEmbedder', () => {
  const model = { modelId: 'text-embedding-3-small' } as unknown as EmbeddingModel<string>;

  it('embeds a batch in one call', async () => {
    mockEmbedMany.mockResolvedValueOnce({ embeddings: [[1, 0], [0, 1]] } as unknown as EmbedManyResult);

    const embedder = new AiSdkEmbedder(model, 'text-embedding-3-small');
    const vectors = await embedder.embed(['a', 'b']);

    expect(vectors).toEqual([[1, 0], [0, 1]]);
    expect(mockEmbedMany).toHaveBeenCalledTimes(1);
    const args = mockEmbedMany.mock.calls[0][0];
    expect(args.values).toEqual(['a', 'b']);
    expect(args.maxRetries).toBe(0);
  });

  it('charges the embedding tokens to the run budget', async () => {
    mockEmbedMany.mockResolvedValueOnce({
      embeddings: [[1, 0]],
      usage: { tokens: 100_000 },
    } as unknown as EmbedManyResult);
    const tracker = new CostTracker();

    const embedder = new AiSdkEmbedder(model, 'text-embedding-3-small');
    await embedder.embed(['a'], undefined, { maxCostUsd: 1, tracker });

    // 100_000 * 0.02 / 1M
    expect(tracker.spentOn('embedding')).toBeCloseTo(0.002, 10);
    expect(tracker.spentOn('completion')).toBe(0);
  });

  it('skips the call for an empty batch', async () => {
    const embedder = new AiSdkEmbedder(model, 'text-embedding-3-small');
    expect(await embedder.embed([])).toEqual([]);
    expect(mockEmbedMany).not.toHaveBeenCalled();
  });

  it('rejects a short response', async () => {
    mockEmbedMany.mockResolvedValueOnce({ embeddings: [[1, 0]] } as unknown as EmbedManyResult);

    const embedder = new AiSdkEmbedder(model, 'text-embedding-3-small');
    await expect(embedder.embed(['a', 'b'])).rejects.toThrow('Expected 2 embeddings, got 1');
  });
});

describe('HashingEmbedder', () => {
  const embedder = new HashingEmbedder(64);

  it('names its model after the dimension', () => {
    expect(embedder.modelId).toBe('hashing-64');
  });

  it('is deterministic and unit length', async () => {
    const [a] = await embedder.embed(['Tesla deliveries rose']);
    const [b] = await embedder.embed(['Tesla deliveries rose']);

    expect(a).toEqual(b);
    expect(a).toHaveLength(64);
    const norm = Math.sqrt(a.reduce((s, v) => s + v * v, 0));
    expect(norm).toBeCloseTo(1, 10);
  });

  it('puts texts with shared words closer than unrelated ones', async () => {
    const [query, related, unrelated] = await new HashingEmbedder().embed([
      'tesla deliveries',
      'tesla deliveries beat estimates',
      'oil prices fall on supply glut',
    ]);
    const dot = (x: number[], y: number[]) => x.reduce((s, v, i) => s + v * y[i], 0);

    expect(dot(query, related)).toBeGreaterThan(dot(query, unrelated));
  });

  it('returns a zero vector for text without tokens', async () => {
    const [v] = await embedder.embed(['!!!']);
    expect(v.every(x => x === 0)).toBe(true);
  });
});
