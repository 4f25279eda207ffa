export type {
  AgentModel,
  RunBudget,
  Entity,
  ResolutionMethod,
  ResolvedEntity,
  DocumentKind,
  RawDocument,
  ChunkMetadata,
  Chunk,
  FactBundle,
  ProviderFailure,
  AggregationOutcome,
  RetrievalHit,
  RetrievalResult,
  SentimentLabel,
  VerdictSource,
  Verdict,
  HistoryTurn,
} from './types.js';

export { GenerationError, ProviderUnavailableError, QueueFullError, RunTimeoutError } from './errors.js';
export { resolveDataFile } from './data.js';

export * from './router/index.js';

export {
  EntityResolver,
  LlmEntityExtractor,
  EntityCandidateSchema,
  entityFromEntry,
  type EntityCandidate,
  type EntityExtractor,
  type LlmEntityExtractorOptions,
} from './resolve/entity-resolver.js';
export { RelevanceFilter, type RelevanceReason, type RelevanceResult } from './resolve/relevance.js';

export { SourceAggregator, toFailure, dedupe, type AggregatorOptions } from './aggregate/aggregator.js';
export { classifyWebContext, webSearchQuery, CONTEXT_DOMAINS, type WebContext } from './aggregate/web-context.js';

export { chunkIdFor, toChunk, normalizeWhitespace, MAX_CHUNK_CHARS } from './indexing/chunker.js';
export {
  AiSdkEmbedder,
  HashingEmbedder,
  EmbeddingQualityError,
  validateEmbedding,
  type Embedder,
} from './indexing/embedder.js';
export { ChunkStore, ChunkRecordSchema, type ChunkRecord, type ChunkStoreStats } from './indexing/store.js';
export { Indexer, type IngestStats, type IngestResult } from './indexing/indexer.js';

export {
  HybridRetriever,
  combineScores,
  cosineSimilarity,
  DEFAULT_TOP_K,
  DEFAULT_SEMANTIC_WEIGHT,
  type ChunkSource,
  type SearchOptions,
} from './retrieval/retriever.js';
export { extractKeywords, tokenize } from './retrieval/lexical.js';

export {
  AnswerGenerator,
  GeneratedAnswerSchema,
  SENTIMENT_LABELS,
  selectSources,
  type GeneratedAnswer,
  type GenerateInput,
} from './generation/generator.js';

export * from './verification/index.js';
export * from './pipeline/index.js';
export * from './output/index.js';
