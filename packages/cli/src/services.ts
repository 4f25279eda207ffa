import {
  AiSdkEmbedder,
  ChunkStore,
  HashingEmbedder,
  HybridRetriever,
  Indexer,
  PipelineRunner,
  ProviderRegistry,
  RelevanceFilter,
  SourceAggregator,
  VerdictPipeline,
  modelForTier,
  type AgentModel,
  type Embedder,
  type ProviderConfig,
} from '@finverdict/core';
import { SymbolDirectory, createSources, type ToolConfig } from '@finverdict/tools';
import { expandTilde, type Config } from './config/index.js';
import type { AgentConfigEntry } from './config/schema.js';

export interface ServiceHooks {
  /** Called with a redacted message when an embedding call fails. */
  onEmbedFailure?: (message: string) => void;
}

export interface Services {
  pipeline: VerdictPipeline;
  store: ChunkStore;
  embedder: Embedder;
}

export function providerConfigFrom(config: Config): ProviderConfig {
  return {
    providers: {
      anthropic: { apiKey: config.providers.anthropic.api_key },
      openai: { apiKey: config.providers.openai.api_key },
      google: { apiKey: config.providers.google.api_key },
    },
  };
}

export function toolConfigFrom(config: Config): ToolConfig {
  return {
    marketDataApiKey: config.tools.market_data.api_key,
    braveApiKey: config.tools.brave.api_key,
    finnhubApiKey: config.tools.finnhub.api_key,
    fmpApiKey: config.tools.fmp.api_key,
    firecrawlApiKey: config.tools.firecrawl.api_key,
    userAgent: config.tools.user_agent,
  };
}

export function hasAnyProviderKey(config: Config): boolean {
  return Boolean(
    config.providers.anthropic.api_key || config.providers.openai.api_key || config.providers.google.api_key,
  );
}

function agentModel(registry: ProviderRegistry, entry: AgentConfigEntry, fallbackModel: string): AgentModel {
  const modelId = registry.remapModel(entry.model ?? fallbackModel);
  return {
    model: registry.getModel(modelId),
    modelId,
    maxOutputTokens: entry.max_tokens,
    temperature: entry.temperature,
  };
}

/** Embedding model from the first configured provider that offers one; hashing otherwise. */
export function createEmbedder(config: Config, registry: ProviderRegistry): Embedder {
  const modelId = registry.resolveEmbeddingModelId(config.retrieval.embedding_model);
  if (!modelId) return new HashingEmbedder();
  return new AiSdkEmbedder(registry.getEmbeddingModel(modelId), modelId);
}

export function openStore(config: Config): Promise<ChunkStore> {
  return ChunkStore.open(expandTilde(config.index.dir));
}

export function createRunner(config: Config): PipelineRunner {
  return new PipelineRunner({
    maxConcurrent: config.server.max_concurrent,
    maxQueued: config.server.max_queued,
    runTimeoutMs: config.server.run_timeout_ms,
  });
}

/** Wire the whole pipeline from the loaded configuration. */
export async function createServices(config: Config, hooks: ServiceHooks = {}): Promise<Services> {
  const providerConfig = providerConfigFrom(config);
  const registry = new ProviderRegistry(providerConfig);
  const store = await openStore(config);
  const embedder = createEmbedder(config, registry);

  const sources = createSources(toolConfigFrom(config), {
    newsLookbackDays: config.tools.news_lookback_days,
  });
  const aggregator = new SourceAggregator(sources, RelevanceFilter.load(), {
    concurrency: config.aggregation.concurrency,
    timeoutMs: config.aggregation.timeout_ms,
    deadlineMs: config.aggregation.deadline_ms,
    deepFetchCount: config.aggregation.deep_fetch_count,
    deepFetchChars: config.aggregation.deep_fetch_chars,
    webResultCount: config.aggregation.web_result_count,
  });

  const { agents } = config;
  const resolveModel = modelForTier('fast', providerConfig) ?? config.defaults.model;

  const pipeline = new VerdictPipeline({
    directory: SymbolDirectory.load(),
    aggregator,
    indexer: new Indexer(store, embedder, hooks.onEmbedFailure),
    retriever: new HybridRetriever(
      store,
      embedder,
      { topK: config.retrieval.top_k, semanticWeight: config.retrieval.semantic_weight },
      hooks.onEmbedFailure,
    ),
    agents: {
      ...(agents.resolve.enabled ? { resolve: agentModel(registry, agents.resolve, resolveModel) } : {}),
      generate: agentModel(registry, agents.generate, config.defaults.model),
      verify: agentModel(registry, agents.verify, config.defaults.model),
    },
    maxBudgetUsd: config.defaults.max_budget_usd,
    verification: { tolerance: config.verification.tolerance },
  });

  return { pipeline, store, embedder };
}
