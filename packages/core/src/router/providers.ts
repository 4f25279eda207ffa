import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { EmbeddingModel, LanguageModel } from 'ai';

export type ProviderId = 'anthropic' | 'openai' | 'google';

export interface ProviderConfig {
  providers: {
    anthropic?: { apiKey?: string };
    openai?: { apiKey?: string };
    google?: { apiKey?: string };
  };
}

// ---------------------------------------------------------------------------
// Model tier mapping: used to find equivalent models across providers
// ---------------------------------------------------------------------------

export type ModelTier = 'fast' | 'standard' | 'premium';

const MODEL_TO_TIER: Record<string, ModelTier> = {
  'claude-3-5-haiku-20241022': 'fast',
  'claude-sonnet-4-20250514': 'standard',
  'claude-opus-4-20250514': 'premium',
  'gpt-4o-mini': 'fast',
  'gpt-4o': 'standard',
  'o1': 'premium',
  'gemini-2.0-flash': 'fast',
  'gemini-2.5-flash': 'fast',
  'gemini-2.5-pro': 'standard',
};

const PROVIDER_TIER_MODELS: Record<ProviderId, Record<ModelTier, string>> = {
  anthropic: {
    fast: 'claude-3-5-haiku-20241022',
    standard: 'claude-sonnet-4-20250514',
    premium: 'claude-opus-4-20250514',
  },
  openai: {
    fast: 'gpt-4o-mini',
    standard: 'gpt-4o',
    premium: 'o1',
  },
  google: {
    fast: 'gemini-2.5-flash',
    standard: 'gemini-2.5-pro',
    premium: 'gemini-2.5-pro',
  },
};

const PROVIDER_PRIORITY: ProviderId[] = ['anthropic', 'openai', 'google'];

const PROVIDER_LABELS: Record<ProviderId, string> = {
  anthropic: 'Anthropic',
  openai: 'OpenAI',
  google: 'Google',
};

/** Embedding models by provider; Anthropic has none. */
const EMBEDDING_MODELS: Partial<Record<ProviderId, string>> = {
  openai: 'text-embedding-3-small',
  google: 'text-embedding-004',
};

/**
 * Remap a model to an equivalent model from an available provider.
 * If the model's provider has an API key, returns the model as-is.
 */
export function remapModelForProvider(modelId: string, config: ProviderConfig): string {
  const provider = tryDetectProvider(modelId);
  if (!provider) return modelId;

  if (config.providers[provider]?.apiKey) return modelId;

  const tier = MODEL_TO_TIER[modelId] ?? 'standard';
  for (const p of PROVIDER_PRIORITY) {
    if (config.providers[p]?.apiKey) {
      return PROVIDER_TIER_MODELS[p][tier];
    }
  }

  // No provider has a key; the call itself reports the missing key
  return modelId;
}

/** Model id for a tier on the first provider that has a key. */
export function modelForTier(tier: ModelTier, config: ProviderConfig): string | undefined {
  const provider = PROVIDER_PRIORITY.find(p => config.providers[p]?.apiKey);
  return provider ? PROVIDER_TIER_MODELS[provider][tier] : undefined;
}

/** Determine which provider a model string belongs to. */
export function detectProvider(modelId: string): ProviderId {
  const provider = tryDetectProvider(modelId);
  if (!provider) {
    throw new Error(`Cannot determine provider for model: ${modelId}`);
  }
  return provider;
}

function tryDetectProvider(modelId: string): ProviderId | undefined {
  if (modelId.startsWith('claude-')) return 'anthropic';
  if (
    modelId.startsWith('gpt-') ||
    modelId.startsWith('o1') ||
    modelId.startsWith('o3') ||
    modelId.startsWith('text-embedding-3')
  ) {
    return 'openai';
  }
  if (modelId.startsWith('gemini-') || modelId.startsWith('text-embedding-0')) return 'google';
  return undefined;
}

/**
 * Registry that lazily initialises AI SDK providers and hands out
 * language and embedding models by model-id string.
 */
export class ProviderRegistry {
  private anthropicProvider: ReturnType<typeof createAnthropic> | null = null;
  private openaiProvider: ReturnType<typeof createOpenAI> | null = null;
  private googleProvider: ReturnType<typeof createGoogleGenerativeAI> | null = null;

  constructor(private readonly config: ProviderConfig) {}

  remapModel(modelId: string): string {
    return remapModelForProvider(modelId, this.config);
  }

  hasProvider(provider: ProviderId): boolean {
    return !!this.config.providers[provider]?.apiKey;
  }

  getModel(modelId: string): LanguageModel {
    switch (detectProvider(modelId)) {
      case 'anthropic':
        return this.anthropic()(modelId);
      case 'openai':
        return this.openai()(modelId);
      case 'google':
        return this.google()(modelId);
    }
  }

  /**
   * Embedding model id to use: the configured one when its provider has a key,
   * otherwise the default of the first embedding-capable provider with a key.
   */
  resolveEmbeddingModelId(preferred?: string): string | undefined {
    if (preferred) {
      const provider = tryDetectProvider(preferred);
      if (provider && this.hasProvider(provider) && EMBEDDING_MODELS[provider]) return preferred;
    }
    for (const p of PROVIDER_PRIORITY) {
      const model = EMBEDDING_MODELS[p];
      if (model && this.hasProvider(p)) return model;
    }
    return undefined;
  }

  getEmbeddingModel(modelId: string): EmbeddingModel<string> {
    switch (detectProvider(modelId)) {
      case 'openai':
        return this.openai().textEmbeddingModel(modelId);
      case 'google':
        return this.google().textEmbeddingModel(modelId);
      case 'anthropic':
        throw new Error(`Anthropic does not offer embedding models (${modelId})`);
    }
  }

  private anthropic(): ReturnType<typeof createAnthropic> {
    if (!this.anthropicProvider) {
      this.anthropicProvider = createAnthropic({ apiKey: this.requireKey('anthropic') });
    }
    return this.anthropicProvider;
  }

  private openai(): ReturnType<typeof createOpenAI> {
    if (!this.openaiProvider) {
      this.openaiProvider = createOpenAI({ apiKey: this.requireKey('openai') });
    }
    return this.openaiProvider;
  }

  private google(): ReturnType<typeof createGoogleGenerativeAI> {
    if (!this.googleProvider) {
      this.googleProvider = createGoogleGenerativeAI({ apiKey: this.requireKey('google') });
    }
    return this.googleProvider;
  }

  private requireKey(provider: ProviderId): string {
    const apiKey = this.config.providers[provider]?.apiKey;
    if (!apiKey) {
      throw new Error(
        `${PROVIDER_LABELS[provider]} API key not configured. Set providers.${provider}.api_key in ~/.finverdict/config.yaml`,
      );
    }
    return apiKey;
  }
}
