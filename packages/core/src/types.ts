import type {
  CompanyProfile,
  ExchangeQuote,
  KeyStatistics,
  MarketId,
  ProviderId,
  QuoteData,
} from '@finverdict/tools';
import type { LanguageModel } from 'ai';
import type { CostTracker } from './router/cost.js';
import type { ErrorCategory } from './router/retry.js';

/** A resolved model plus the call settings one pipeline agent uses. */
export interface AgentModel {
  model: LanguageModel;
  modelId: string;
  maxOutputTokens?: number;
  temperature?: number;
}

/** Per-run spend cap shared by every model call of the run. */
export interface RunBudget {
  maxCostUsd: number;
  tracker: CostTracker;
}

// ---------------------------------------------------------------------------
// Entities
// ---------------------------------------------------------------------------

/** A tradable instrument a query is about. */
export interface Entity {
  /** Canonical symbol, suffixed on secondary markets (`RELIANCE.NS`). */
  symbol: string;
  name: string;
  market: MarketId;
  /** Listing exchange for suffixed symbols (`NSE`, `BSE`). */
  exchange?: string;
  /** Symbol without its exchange suffix. */
  baseSymbol: string;
}

export type ResolutionMethod = 'directory' | 'extraction';

export interface ResolvedEntity {
  entity: Entity;
  method: ResolutionMethod;
}

// ---------------------------------------------------------------------------
// Documents and chunks
// ---------------------------------------------------------------------------

export type DocumentKind = 'quote' | 'profile' | 'fundamentals' | 'news' | 'exchange' | 'web';

/** One normalised piece of fetched evidence. Frozen once created. */
export interface RawDocument {
  readonly sourceId: string;
  readonly url: string;
  readonly title: string;
  readonly body: string;
  /** ISO-8601, or null when the provider gives no date. */
  readonly publishedAt: string | null;
  readonly provider: ProviderId;
  readonly kind: DocumentKind;
  /** Set on entity-specific documents. */
  readonly symbol?: string;
}

export interface ChunkMetadata {
  url: string;
  /** Provider that produced the document. */
  source: ProviderId;
  date: string | null;
  type: DocumentKind;
  title: string;
  symbol?: string;
}

export interface Chunk {
  /** sha256 of url + "\n" + text. */
  chunkId: string;
  text: string;
  metadata: ChunkMetadata;
  /** Null when embedding failed; such chunks are still found lexically. */
  embedding: number[] | null;
  /** Model that produced `embedding`, null when there is none. */
  embeddingModel: string | null;
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

/** Structured entity facts passed to the generator and verifier. */
export interface FactBundle {
  quote?: QuoteData;
  profile?: CompanyProfile;
  fundamentals?: KeyStatistics;
  exchangeQuote?: ExchangeQuote;
}

export interface ProviderFailure {
  provider: ProviderId;
  operation: string;
  category: ErrorCategory;
  /** Redacted error message. */
  message: string;
}

export type AggregationOutcome =
  | { status: 'irrelevant' }
  | {
      status: 'ok';
      documents: RawDocument[];
      facts: FactBundle;
      failures: ProviderFailure[];
    };

// ---------------------------------------------------------------------------
// Retrieval
// ---------------------------------------------------------------------------

export interface RetrievalHit {
  chunk: Chunk;
  score: number;
  semanticScore: number;
  lexicalScore: number;
}

export interface RetrievalResult {
  query: string;
  hits: RetrievalHit[];
  /** Number of chunks scored. */
  totalSearched: number;
}

// ---------------------------------------------------------------------------
// Verdicts
// ---------------------------------------------------------------------------

export type SentimentLabel = 'Bearish' | 'Neutral' | 'Bullish';

export interface VerdictSource {
  title: string;
  url: string;
}

export interface Verdict {
  answer: string;
  /** Integer in [0, 100]. */
  sentimentScore: number;
  sentimentLabel: SentimentLabel;
  isAccurate: boolean;
  sources: VerdictSource[];
}

export interface HistoryTurn {
  role: 'user' | 'assistant';
  content: string;
}
