import type { PipelineMetadata, PipelineResult } from '../pipeline/engine.js';
import type { Verdict } from '../types.js';

export function makeVerdict(overrides: Partial<Verdict> = {}): Verdict {
  return {
    answer: 'Tesla rose 4.1% on Thursday [1].',
    sentimentScore: 68,
    sentimentLabel: 'Bullish',
    isAccurate: true,
    sources: [{ title: 'Tesla rallies', url: 'https://example.com/a' }],
    ...overrides,
  };
}

export function makeMetadata(overrides: Partial<PipelineMetadata> = {}): PipelineMetadata {
  return {
    resolution: 'directory',
    providerFailures: 1,
    failedProviders: ['brave:companyNews'],
    failures: [{ provider: 'brave', operation: 'companyNews', category: 'server_error', message: '503 Service Unavailable' }],
    documents: 6,
    chunks: 6,
    hits: 5,
    ingest: { inserted: 6, updated: 0, unchanged: 0, embedFailures: 0 },
    verification: { llm: 'approved', unsupportedFigures: [], unsupportedClaims: [], removedSentences: [], corrected: false },
    costUsd: 0.001234,
    durationMs: 2345,
    ...overrides,
  };
}

export function makeResult(overrides: Partial<PipelineResult> = {}): PipelineResult {
  return {
    outcome: 'answered',
    verdict: makeVerdict(),
    entity: { symbol: 'TSLA', name: 'Tesla, Inc.', market: 'US', baseSymbol: 'TSLA' },
    metadata: makeMetadata(),
    ...overrides,
  };
}
