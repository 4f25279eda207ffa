import { describe, it, expect } from 'vitest';
import { calculateCost, calculateEmbeddingCost, getModelPricing, CostTracker, BudgetExceededError } from './cost.js';

describe('calculateCost', () => {
  it('prices known models', () => {
    // (1000 * 3 + 500 * 15) / 1M
    expect(calculateCost('claude-sonnet-4-20250514', 1000, 500)).toBeCloseTo(0.0105, 8);
  });

  it('falls back to sonnet-level pricing', () => {
    expect(getModelPricing('unknown-model')).toEqual({ inputPerMillion: 3.0, outputPerMillion: 15.0 });
  });
});

describe('calculateEmbeddingCost', () => {
  it('prices embedding tokens per million', () => {
    // 50_000 * 0.02 / 1M
    expect(calculateEmbeddingCost('text-embedding-3-small', 50_000)).toBeCloseTo(0.001, 10);
  });

  it('prices unknown embedding models at the large-model rate', () => {
    expect(calculateEmbeddingCost('custom-embedder', 1_000_000)).toBeCloseTo(0.13, 10);
  });
});

describe('CostTracker', () => {
  it('accumulates spend and call count', () => {
    const tracker = new CostTracker();
    tracker.addCost(0.01);
    tracker.addCost(0.02);

    expect(tracker.totalSpent).toBeCloseTo(0.03, 10);
    expect(tracker.totalCalls).toBe(2);
  });

  it('throws once the budget is reached', () => {
    const tracker = new CostTracker();
    tracker.addCost(0.5);

    expect(() => tracker.checkBudget(1)).not.toThrow();
    tracker.addCost(0.5);
    expect(() => tracker.checkBudget(1)).toThrow(BudgetExceededError);
    expect(() => tracker.checkBudget(1)).toThrow('Budget exceeded: spent $1.0000 of $1.00 budget');
  });

  it('splits spend by kind and counts both against the budget', () => {
    const tracker = new CostTracker();
    tracker.addCost(0.3);
    tracker.addCost(0.2, 'embedding');

    expect(tracker.spentOn('completion')).toBeCloseTo(0.3, 10);
    expect(tracker.spentOn('embedding')).toBeCloseTo(0.2, 10);
    expect(() => tracker.checkBudget(0.5)).toThrow(BudgetExceededError);
  });
});
