export {
  type ModelPricing,
  type CostKind,
  MODEL_PRICING,
  EMBEDDING_PRICING,
  getModelPricing,
  calculateCost,
  calculateEmbeddingCost,
  CostTracker,
  BudgetExceededError,
} from './cost.js';

export {
  type ProviderId,
  type ProviderConfig,
  type ModelTier,
  detectProvider,
  modelForTier,
  remapModelForProvider,
  ProviderRegistry,
} from './providers.js';

export {
  type LLMCallOptions,
  type LLMResponse,
  type LLMStructuredResponse,
  callLLM,
  callLLMStructured,
  extractJson,
  StructuredOutputError,
} from './llm.js';

export {
  type ErrorCategory,
  type RetryConfig,
  type RetryResult,
  classifyError,
  withRetry,
  withTimeout,
  sleep,
  TimeoutError,
  AbortError,
  BudgetExceededRetryError,
} from './retry.js';
