import { EventEmitter } from 'eventemitter3';
import type { SymbolDirectory } from '@finverdict/tools';
import { CostTracker } from '../router/cost.js';
import { AbortError } from '../router/retry.js';
import { EntityResolver, LlmEntityExtractor } from '../resolve/entity-resolver.js';
import type { SourceAggregator } from '../aggregate/aggregator.js';
import type { Indexer, IngestStats } from '../indexing/indexer.js';
import type { HybridRetriever } from '../retrieval/retriever.js';
import { AnswerGenerator } from '../generation/generator.js';
import { Verifier, type VerificationReport } from '../verification/verifier.js';
import type {
  AgentModel,
  ChunkMetadata,
  Entity,
  HistoryTurn,
  ProviderFailure,
  ResolutionMethod,
  RetrievalResult,
  RunBudget,
  Verdict,
} from '../types.js';

// ---------------------------------------------------------------------------
// Pipeline event types
// ---------------------------------------------------------------------------

export type StageName = 'resolve' | 'aggregate' | 'index' | 'retrieve' | 'generate' | 'verify';

export const STAGES: readonly StageName[] = ['resolve', 'aggregate', 'index', 'retrieve', 'generate', 'verify'];

export interface StageStartEvent {
  stage: StageName;
  stageIndex: number;
  totalStages: number;
  callerId?: string;
}

export interface StageCompleteEvent {
  stage: StageName;
  durationMs: number;
  callerId?: string;
}

export interface EntityResolvedEvent {
  entity: Entity | null;
  method: ResolutionMethod | null;
  /** Redacted reason the fallback extraction failed, when it ran and failed. */
  extractionFailure?: string;
  callerId?: string;
}

export interface ProviderFailedEvent {
  failure: ProviderFailure;
  callerId?: string;
}

export interface IndexIngestedEvent {
  stats: IngestStats;
  chunks: number;
  callerId?: string;
}

export interface VerificationCompleteEvent {
  report: VerificationReport;
  isAccurate: boolean;
  durationMs: number;
  callerId?: string;
}

export interface VerificationDegradedEvent {
  /** Redacted reason the model re-check failed. */
  reason: string;
  callerId?: string;
}

export interface PipelineCompleteEvent {
  result: PipelineResult;
}

export interface PipelineErrorEvent {
  error: Error;
  stage?: StageName;
  callerId?: string;
}

export interface PipelineEvents {
  'stage:start': (event: StageStartEvent) => void;
  'stage:complete': (event: StageCompleteEvent) => void;
  'entity:resolved': (event: EntityResolvedEvent) => void;
  'provider:failed': (event: ProviderFailedEvent) => void;
  'index:ingested': (event: IndexIngestedEvent) => void;
  'verification:complete': (event: VerificationCompleteEvent) => void;
  'verification:degraded': (event: VerificationDegradedEvent) => void;
  'pipeline:complete': (event: PipelineCompleteEvent) => void;
  'pipeline:error': (event: PipelineErrorEvent) => void;
}

// ---------------------------------------------------------------------------
// Inputs and results
// ---------------------------------------------------------------------------

export interface PipelineAgents {
  /** Fallback entity extraction; omitted to resolve from the directory only. */
  resolve?: AgentModel;
  generate: AgentModel;
  verify: AgentModel;
}

export interface PipelineDependencies {
  directory: SymbolDirectory;
  aggregator: SourceAggregator;
  indexer: Indexer;
  retriever: HybridRetriever;
  agents: PipelineAgents;
  /** LLM spend cap per run in USD. */
  maxBudgetUsd: number;
  verification?: { tolerance?: number };
  /** Timeout for the fallback entity extraction (default: 8000). */
  extractionTimeoutMs?: number;
}

export interface RunOptions {
  history?: HistoryTurn[];
  /** Opaque; only passed through to events and metadata. */
  callerId?: string;
  abortSignal?: AbortSignal;
  /** Per-run override of the retrieval depth. */
  topK?: number;
}

export interface PipelineMetadata {
  callerId?: string;
  resolution: ResolutionMethod | null;
  providerFailures: number;
  /** `provider:operation` of every failed call. */
  failedProviders: string[];
  failures: ProviderFailure[];
  documents: number;
  chunks: number;
  hits: number;
  ingest: IngestStats | null;
  verification: VerificationReport | null;
  costUsd: number;
  durationMs: number;
}

export type PipelineOutcome = 'answered' | 'irrelevant';

export interface PipelineResult {
  outcome: PipelineOutcome;
  verdict: Verdict;
  entity: Entity | null;
  metadata: PipelineMetadata;
}

export const IRRELEVANT_ANSWER =
  'This question does not appear to be about financial markets or companies, so no verdict was produced.';

export function irrelevantVerdict(): Verdict {
  return {
    answer: IRRELEVANT_ANSWER,
    sentimentScore: 50,
    sentimentLabel: 'Neutral',
    isAccurate: true,
    sources: [],
  };
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/**
 * Runs one query through resolve, aggregate, index, retrieve, generate and
 * verify, strictly in that order. Progress is reported as events; the
 * pipeline itself never prints.
 */
export class VerdictPipeline extends EventEmitter<PipelineEvents> {
  constructor(private readonly deps: PipelineDependencies) {
    super();
  }

  async runPipeline(query: string, options: RunOptions = {}): Promise<PipelineResult> {
    const { callerId, abortSignal } = options;
    const startTime = Date.now();
    const tracker = new CostTracker();
    const budget: RunBudget = { maxCostUsd: this.deps.maxBudgetUsd, tracker };
    const progress: { stage?: StageName; extractionFailure?: string } = {};

    const stage = async <T>(name: StageName, fn: () => Promise<T>): Promise<T> => {
      progress.stage = name;
      if (abortSignal?.aborted) throw new AbortError('Pipeline aborted');
      this.emit('stage:start', { stage: name, stageIndex: STAGES.indexOf(name), totalStages: STAGES.length, callerId });
      const stageStart = Date.now();
      const value = await fn();
      this.emit('stage:complete', { stage: name, durationMs: Date.now() - stageStart, callerId });
      return value;
    };

    const metadata: PipelineMetadata = {
      ...(callerId !== undefined ? { callerId } : {}),
      resolution: null,
      providerFailures: 0,
      failedProviders: [],
      failures: [],
      documents: 0,
      chunks: 0,
      hits: 0,
      ingest: null,
      verification: null,
      costUsd: 0,
      durationMs: 0,
    };

    const finish = (outcome: PipelineOutcome, verdict: Verdict, entity: Entity | null): PipelineResult => {
      metadata.costUsd = tracker.totalSpent;
      metadata.durationMs = Date.now() - startTime;
      const result: PipelineResult = { outcome, verdict, entity, metadata };
      this.emit('pipeline:complete', { result });
      return result;
    };

    try {
      // 1. Resolve
      const resolver = this.resolverFor(budget, (message) => {
        progress.extractionFailure = message;
      });
      const resolved = await stage('resolve', () => resolver.resolve(query, abortSignal));
      const entity = resolved?.entity ?? null;
      metadata.resolution = resolved?.method ?? null;
      this.emit('entity:resolved', {
        entity,
        method: metadata.resolution,
        ...(progress.extractionFailure !== undefined ? { extractionFailure: progress.extractionFailure } : {}),
        callerId,
      });

      // 2. Aggregate
      const aggregation = await stage('aggregate', () => this.deps.aggregator.fetch(query, entity, abortSignal));
      if (aggregation.status === 'irrelevant') {
        return finish('irrelevant', irrelevantVerdict(), null);
      }
      metadata.documents = aggregation.documents.length;
      metadata.failures = aggregation.failures;
      metadata.providerFailures = aggregation.failures.length;
      metadata.failedProviders = [...new Set(aggregation.failures.map(f => `${f.provider}:${f.operation}`))];
      for (const failure of aggregation.failures) {
        this.emit('provider:failed', { failure, callerId });
      }

      // 3. Index
      const ingested = await stage('index', () => this.deps.indexer.ingestWithStats(aggregation.documents, abortSignal, budget));
      metadata.ingest = ingested.stats;
      metadata.chunks = ingested.chunks.length;
      this.emit('index:ingested', { stats: ingested.stats, chunks: ingested.chunks.length, callerId });

      // 4. Retrieve
      const retrieval = await stage('retrieve', () => this.retrieve(query, entity, options, budget));
      metadata.hits = retrieval.hits.length;

      // 5. Generate
      const draft = await stage('generate', () =>
        new AnswerGenerator(this.deps.agents.generate, budget).generate({
          query,
          entity,
          facts: aggregation.facts,
          retrieval,
          history: options.history,
          abortSignal,
        }),
      );

      // 6. Verify
      const verifyStart = Date.now();
      const { verdict, report } = await stage('verify', () =>
        new Verifier({
          agent: this.deps.agents.verify,
          budget,
          tolerance: this.deps.verification?.tolerance,
        }).verifyWithReport({ query, verdict: draft, retrieval, facts: aggregation.facts, abortSignal }),
      );
      metadata.verification = report;
      if (report.llm === 'failed') {
        this.emit('verification:degraded', { reason: report.failure ?? 'unknown error', callerId });
      }
      this.emit('verification:complete', {
        report,
        isAccurate: verdict.isAccurate,
        durationMs: Date.now() - verifyStart,
        callerId,
      });

      return finish('answered', verdict, entity);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.emit('pipeline:error', { error, stage: progress.stage, callerId });
      throw error;
    }
  }

  private resolverFor(budget: RunBudget, onFailure: (message: string) => void): EntityResolver {
    const agent = this.deps.agents.resolve;
    if (!agent) return new EntityResolver(this.deps.directory);
    const extractor = new LlmEntityExtractor({
      agent,
      budget,
      timeoutMs: this.deps.extractionTimeoutMs,
      onFailure,
    });
    return new EntityResolver(this.deps.directory, extractor);
  }

  /**
   * The query is searched with the entity's symbol and name appended, and
   * chunks tagged with another symbol are never returned for an entity.
   */
  private retrieve(
    query: string,
    entity: Entity | null,
    options: RunOptions,
    budget: RunBudget,
  ): Promise<RetrievalResult> {
    const searchQuery = entity ? `${query} ${entity.symbol} ${entity.name}` : query;
    const filter = entity
      ? (m: ChunkMetadata) => !m.symbol || m.symbol === entity.symbol || m.symbol === entity.baseSymbol
      : undefined;
    return this.deps.retriever.search(searchQuery, {
      topK: options.topK,
      filter,
      abortSignal: options.abortSignal,
      budget,
    });
  }
}
