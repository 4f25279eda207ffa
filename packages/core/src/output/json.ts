/**
 * Wire formats for verdicts.
 *
 * The verdict payload is the stable, snake_case shape returned to callers:
 * `{ answer, sources, sentiment_score, sentiment_label, is_accurate }`.
 * The result payload wraps it with the outcome, entity and run metadata.
 */

import { z } from 'zod';
import { SENTIMENT_LABELS } from '../generation/generator.js';
import type { PipelineResult } from '../pipeline/engine.js';
import type { Verdict } from '../types.js';

export const VerdictPayloadSchema = z
  .object({
    answer: z.string().min(1),
    sources: z.array(z.object({ title: z.string(), url: z.string().min(1) }).strict()),
    sentiment_score: z.number().int().min(0).max(100),
    sentiment_label: z.enum(SENTIMENT_LABELS),
    is_accurate: z.boolean(),
  })
  .strict();

export type VerdictPayload = z.infer<typeof VerdictPayloadSchema>;

/** Validated wire form of a verdict. Throws a ZodError on a malformed verdict. */
export function toVerdictPayload(verdict: Verdict): VerdictPayload {
  return VerdictPayloadSchema.parse({
    answer: verdict.answer,
    sources: verdict.sources.map(s => ({ title: s.title, url: s.url })),
    sentiment_score: verdict.sentimentScore,
    sentiment_label: verdict.sentimentLabel,
    is_accurate: verdict.isAccurate,
  });
}

export interface JsonResultMetadata {
  caller_id?: string;
  resolution: string | null;
  provider_failures: number;
  failed_providers: string[];
  documents: number;
  chunks: number;
  hits: number;
  verification: { llm: string; unsupported_figures: string[]; removed_sentences: number } | null;
  cost_usd: number;
  duration_ms: number;
  duration: string;
}

export interface JsonResult {
  outcome: PipelineResult['outcome'];
  entity: { symbol: string; name: string; market: string; exchange?: string } | null;
  verdict: VerdictPayload;
  metadata: JsonResultMetadata;
}

export function toResultPayload(result: PipelineResult): JsonResult {
  const { metadata, entity } = result;
  return {
    outcome: result.outcome,
    entity: entity
      ? {
          symbol: entity.symbol,
          name: entity.name,
          market: entity.market,
          ...(entity.exchange ? { exchange: entity.exchange } : {}),
        }
      : null,
    verdict: toVerdictPayload(result.verdict),
    metadata: {
      ...(metadata.callerId !== undefined ? { caller_id: metadata.callerId } : {}),
      resolution: metadata.resolution,
      provider_failures: metadata.providerFailures,
      failed_providers: metadata.failedProviders,
      documents: metadata.documents,
      chunks: metadata.chunks,
      hits: metadata.hits,
      verification: metadata.verification
        ? {
            llm: metadata.verification.llm,
            unsupported_figures: metadata.verification.unsupportedFigures,
            removed_sentences: metadata.verification.removedSentences.length,
          }
        : null,
      cost_usd: Math.round(metadata.costUsd * 10000) / 10000,
      duration_ms: metadata.durationMs,
      duration: formatDuration(metadata.durationMs),
    },
  };
}

export function formatJson(result: PipelineResult): string {
  return JSON.stringify(toResultPayload(result), null, 2);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}
