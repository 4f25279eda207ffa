export interface ModelPricing {
  inputPerMillion: number;
  outputPerMillion: number;
}

// USD per million tokens
export const MODEL_PRICING: Record<string, ModelPricing> = {
  // Anthropic
  'claude-opus-4-20250514':         { inputPerMillion: 15.0, outputPerMillion: 75.0 },
  'claude-sonnet-4-20250514':       { inputPerMillion: 3.0,  outputPerMillion: 15.0 },
  'claude-3-5-haiku-20241022':      { inputPerMillion: 0.80, outputPerMillion: 4.0 },
  // OpenAI
  'gpt-4o':                         { inputPerMillion: 2.50, outputPerMillion: 10.0 },
  'gpt-4o-mini':                    { inputPerMillion: 0.15, outputPerMillion: 0.60 },
  'o1':                             { inputPerMillion: 15.0, outputPerMillion: 60.0 },
  // Google Gemini
  'gemini-2.5-pro':                 { inputPerMillion: 1.25, outputPerMillion: 10.0 },
  'gemini-2.5-flash':               { inputPerMillion: 0.15, outputPerMillion: 0.60 },
  'gemini-2.0-flash':               { inputPerMillion: 0.10, outputPerMillion: 0.40 },
};

// USD per million input tokens
export const EMBEDDING_PRICING: Record<string, number> = {
  'text-embedding-3-small': 0.02,
  'text-embedding-3-large': 0.13,
  'text-embedding-004': 0.025,
};

// Unknown models are priced like a mid-tier model so budgets stay conservative.
const FALLBACK_PRICING: ModelPricing = { inputPerMillion: 3.0, outputPerMillion: 15.0 };
const FALLBACK_EMBEDDING_PRICE = 0.13;

export function getModelPricing(model: string): ModelPricing {
  return MODEL_PRICING[model] ?? FALLBACK_PRICING;
}

export function calculateCost(model: string, inputTokens: number, outputTokens: number): number {
  const pricing = getModelPricing(model);
  return (inputTokens * pricing.inputPerMillion + outputTokens * pricing.outputPerMillion) / 1_000_000;
}

export function calculateEmbeddingCost(model: string, tokens: number): number {
  return (tokens * (EMBEDDING_PRICING[model] ?? FALLBACK_EMBEDDING_PRICE)) / 1_000_000;
}

export type CostKind = 'completion' | 'embedding';

/**
 * Spend of one pipeline run. Completions and embeddings both count against
 * the run budget; only completion calls check it.
 */
export class CostTracker {
  private readonly spent: Record<CostKind, number> = { completion: 0, embedding: 0 };
  private _calls = 0;

  get totalSpent(): number {
    return this.spent.completion + this.spent.embedding;
  }

  get totalCalls(): number {
    return this._calls;
  }

  spentOn(kind: CostKind): number {
    return this.spent[kind];
  }

  addCost(cost: number, kind: CostKind = 'completion'): void {
    this.spent[kind] += cost;
    this._calls++;
  }

  checkBudget(maxCostUsd: number): void {
    if (this.totalSpent >= maxCostUsd) {
      throw new BudgetExceededError(this.totalSpent, maxCostUsd);
    }
  }
}

export class BudgetExceededError extends Error {
  constructor(
    public readonly spent: number,
    public readonly budget: number,
  ) {
    super(`Budget exceeded: spent $${spent.toFixed(4)} of $${budget.toFixed(2)} budget`);
    this.name = 'BudgetExceededError';
  }
}
