import type { Chunk, ChunkMetadata, RetrievalHit, RetrievalResult, RunBudget } from '../types.js';
import type { Embedder } from '../indexing/embedder.js';
import { validateEmbedding } from '../indexing/embedder.js';
import { extractKeywords, keywordOverlap, tokenSet } from './lexical.js';

/** Read access to indexed chunks. */
export interface ChunkSource {
  all(): Chunk[];
}

export interface SearchOptions {
  /** Maximum hits (default: 10). */
  topK?: number;
  /** Weight of the semantic score in [0, 1]; the lexical score gets the rest. */
  semanticWeight?: number;
  /** Only chunks whose metadata passes are scored. */
  filter?: (metadata: ChunkMetadata) => boolean;
  abortSignal?: AbortSignal;
  /** Run budget the query embedding is charged to. */
  budget?: RunBudget;
}

export const DEFAULT_TOP_K = 10;
export const DEFAULT_SEMANTIC_WEIGHT = 0.7;

/** Weighted sum of the two scores. */
export function combineScores(semantic: number, lexical: number, semanticWeight: number): number {
  return semanticWeight * semantic + (1 - semanticWeight) * lexical;
}

/** Cosine similarity clamped to [0, 1]; 0 for mismatched or zero vectors. */
export function cosineSimilarity(a: number[], b: number[], normA?: number, normB?: number): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  for (let i = 0; i < a.length; i++) dot += a[i] * b[i];
  const na = normA ?? vectorNorm(a);
  const nb = normB ?? vectorNorm(b);
  if (na === 0 || nb === 0) return 0;
  return Math.min(1, Math.max(0, dot / (na * nb)));
}

function vectorNorm(v: number[]): number {
  let sum = 0;
  for (const x of v) sum += x * x;
  return Math.sqrt(sum);
}

interface ChunkFeatures {
  tokens: Set<string>;
  norm: number;
  /** Model of the embedding `norm` was computed from. */
  normModel: string | null;
}

/** Newer first, undated last, then chunk id. */
function compareHits(a: RetrievalHit, b: RetrievalHit): number {
  if (b.score !== a.score) return b.score - a.score;
  const da = a.chunk.metadata.date ? Date.parse(a.chunk.metadata.date) : Number.NaN;
  const db = b.chunk.metadata.date ? Date.parse(b.chunk.metadata.date) : Number.NaN;
  const ha = !Number.isNaN(da);
  const hb = !Number.isNaN(db);
  if (ha && hb && da !== db) return db - da;
  if (ha !== hb) return ha ? -1 : 1;
  return a.chunk.chunkId < b.chunk.chunkId ? -1 : a.chunk.chunkId > b.chunk.chunkId ? 1 : 0;
}

/**
 * Top-k search over the index by a weighted mix of embedding similarity and
 * keyword overlap. Read-only: the index is never modified.
 */
export class HybridRetriever {
  // Chunk ids are content hashes, so cached tokens never go stale. Norms are
  // recomputed when a chunk's embedding model changes.
  private readonly features = new Map<string, ChunkFeatures>();

  constructor(
    private readonly chunks: ChunkSource,
    private readonly embedder: Embedder,
    private readonly defaults: { topK?: number; semanticWeight?: number } = {},
    private readonly onQueryEmbedFailure?: (message: string) => void,
  ) {}

  async search(query: string, options: SearchOptions = {}): Promise<RetrievalResult> {
    const topK = options.topK ?? this.defaults.topK ?? DEFAULT_TOP_K;
    const weight = clampWeight(options.semanticWeight ?? this.defaults.semanticWeight ?? DEFAULT_SEMANTIC_WEIGHT);

    const keywords = extractKeywords(query);
    const queryVector = weight > 0 ? await this.embedQuery(query, options.abortSignal, options.budget) : null;
    const queryNorm = queryVector ? vectorNorm(queryVector) : 0;

    const hits: RetrievalHit[] = [];
    let totalSearched = 0;

    for (const chunk of this.chunks.all()) {
      if (options.filter && !options.filter(chunk.metadata)) continue;
      totalSearched++;

      const features = this.featuresFor(chunk);
      const lexicalScore = keywordOverlap(keywords, features.tokens);
      const semanticScore =
        queryVector && chunk.embedding && chunk.embeddingModel === this.embedder.modelId
          ? cosineSimilarity(queryVector, chunk.embedding, queryNorm, features.norm)
          : 0;
      const score = combineScores(semanticScore, lexicalScore, weight);
      if (score > 0) {
        hits.push({ chunk, score, semanticScore, lexicalScore });
      }
    }

    hits.sort(compareHits);
    return { query, hits: hits.slice(0, Math.max(0, topK)), totalSearched };
  }

  /** Null when the query cannot be embedded; search is then lexical only. */
  private async embedQuery(query: string, signal?: AbortSignal, budget?: RunBudget): Promise<number[] | null> {
    try {
      const [vector] = await this.embedder.embed([query], signal, budget);
      if (!vector) return null;
      validateEmbedding(vector);
      return vector;
    } catch (err) {
      if (signal?.aborted) throw err;
      this.onQueryEmbedFailure?.(err instanceof Error ? err.message : String(err));
      return null;
    }
  }

  private featuresFor(chunk: Chunk): ChunkFeatures {
    let features = this.features.get(chunk.chunkId);
    if (!features) {
      features = { tokens: tokenSet(chunk.text), norm: 0, normModel: null };
      this.features.set(chunk.chunkId, features);
    }
    const model = chunk.embedding ? chunk.embeddingModel : null;
    if (features.normModel !== model || (model !== null && features.norm === 0)) {
      features.norm = chunk.embedding ? vectorNorm(chunk.embedding) : 0;
      features.normModel = model;
    }
    return features;
  }
}

function clampWeight(weight: number): number {
  if (!Number.isFinite(weight)) return DEFAULT_SEMANTIC_WEIGHT;
  return Math.min(1, Math.max(0, weight));
}
