import { z } from 'zod';
import { parseExchangeSymbol, redactSecrets, type SymbolDirectory, type SymbolEntry } from '@finverdict/tools';
import { callLLMStructured } from '../router/llm.js';
import type { AgentModel, Entity, ResolvedEntity, RunBudget } from '../types.js';

export interface EntityCandidate {
  company: string | null;
  ticker: string | null;
}

/**
 * Fallback that guesses the company or ticker a query is about. Returns
 * null when it cannot tell or fails; it never throws.
 */
export interface EntityExtractor {
  extract(query: string, signal?: AbortSignal): Promise<EntityCandidate | null>;
}

export const EntityCandidateSchema = z.object({
  company: z.string().nullable(),
  ticker: z.string().nullable(),
});

const EXTRACTION_SYSTEM_PROMPT = `You identify which publicly traded company a financial question is about.

Respond with JSON: {"company": string | null, "ticker": string | null}
- "company": the company name as usually written, or null
- "ticker": its primary listing symbol; for Indian listings add ".NS" (NSE) or ".BO" (BSE); null if unsure
Use null for both when the question is not about one specific company.
Respond ONLY with the JSON object.`;

export interface LlmEntityExtractorOptions {
  agent: AgentModel;
  budget?: RunBudget;
  /** Timeout for the single extraction call (default: 8000). */
  timeoutMs?: number;
  onFailure?: (message: string) => void;
}

/** One short model call, no retries. */
export class LlmEntityExtractor implements EntityExtractor {
  constructor(private readonly options: LlmEntityExtractorOptions) {}

  async extract(query: string, signal?: AbortSignal): Promise<EntityCandidate | null> {
    const { agent, budget, timeoutMs = 8000, onFailure } = this.options;
    try {
      const response = await callLLMStructured(
        {
          model: agent.model,
          modelId: agent.modelId,
          system: EXTRACTION_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: query }],
          maxOutputTokens: agent.maxOutputTokens ?? 200,
          temperature: agent.temperature ?? 0,
          budget,
          retry: { maxRetries: 0, timeoutMs },
          abortSignal: signal,
        },
        EntityCandidateSchema,
        'entity extraction',
      );
      return response.data;
    } catch (err) {
      onFailure?.(redactSecrets(err instanceof Error ? err.message : String(err)));
      return null;
    }
  }
}

export function entityFromEntry(entry: SymbolEntry): Entity {
  const symbol = entry.symbol.toUpperCase();
  const parsed = parseExchangeSymbol(symbol);
  const exchange = entry.exchange ?? parsed?.listing.exchange;
  return {
    symbol,
    name: entry.name,
    market: entry.market,
    ...(exchange ? { exchange } : {}),
    baseSymbol: parsed?.base ?? symbol,
  };
}

/**
 * Maps free text to a tradable symbol: directory match first, then the
 * extractor's candidates checked against the directory again.
 */
export class EntityResolver {
  constructor(
    private readonly directory: SymbolDirectory,
    private readonly extractor?: EntityExtractor,
  ) {}

  async resolve(query: string, signal?: AbortSignal): Promise<ResolvedEntity | null> {
    const direct = this.directory.match(query);
    if (direct) {
      return { entity: entityFromEntry(direct.entry), method: 'directory' };
    }

    if (!this.extractor) return null;

    const candidate = await this.extractor.extract(query, signal);
    if (!candidate) return null;

    for (const text of [candidate.ticker, candidate.company]) {
      if (!text || !text.trim()) continue;
      const entry = this.directory.lookupSymbol(text.trim()) ?? this.directory.match(text)?.entry;
      if (entry) {
        return { entity: entityFromEntry(entry), method: 'extraction' };
      }
    }

    return null;
  }
}
