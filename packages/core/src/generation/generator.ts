import { z } from 'zod';
import type { ModelMessage } from 'ai';
import { callLLMStructured, StructuredOutputError } from '../router/llm.js';
import { AbortError, BudgetExceededRetryError } from '../router/retry.js';
import { GenerationError } from '../errors.js';
import type {
  AgentModel,
  Entity,
  FactBundle,
  HistoryTurn,
  RetrievalResult,
  RunBudget,
  SentimentLabel,
  Verdict,
  VerdictSource,
} from '../types.js';
import { GENERATION_SYSTEM_PROMPT, buildGenerationPrompt } from './prompts.js';

export const SENTIMENT_LABELS = ['Bearish', 'Neutral', 'Bullish'] as const satisfies readonly SentimentLabel[];

export const GeneratedAnswerSchema = z.object({
  answer: z.string().trim().min(1),
  sentiment_score: z.number().min(0).max(100),
  sentiment_label: z.enum(SENTIMENT_LABELS),
  cited_sources: z.array(z.number().int()).default([]),
});

export type GeneratedAnswer = z.infer<typeof GeneratedAnswerSchema>;

export interface GenerateInput {
  query: string;
  entity: Entity | null;
  facts: FactBundle;
  retrieval: RetrievalResult;
  history?: HistoryTurn[];
  abortSignal?: AbortSignal;
}

export const FALLBACK_SOURCE_COUNT = 5;
const MAX_HISTORY_TURNS = 10;

/** Cited evidence numbers (1-based) to sources; the top hits when none are valid. */
export function selectSources(cited: number[], retrieval: RetrievalResult): VerdictSource[] {
  const sources: VerdictSource[] = [];
  const seen = new Set<string>();
  const add = (index: number) => {
    const hit = retrieval.hits[index];
    if (!hit || !hit.chunk.metadata.url || seen.has(hit.chunk.metadata.url)) return;
    seen.add(hit.chunk.metadata.url);
    sources.push({ title: hit.chunk.metadata.title, url: hit.chunk.metadata.url });
  };

  for (const n of cited) {
    if (Number.isInteger(n) && n >= 1) add(n - 1);
  }
  if (sources.length > 0) return sources;

  for (let i = 0; i < retrieval.hits.length && sources.length < FALLBACK_SOURCE_COUNT; i++) {
    add(i);
  }
  return sources;
}

/** Writes the answer from retrieved evidence and structured facts. */
export class AnswerGenerator {
  constructor(
    private readonly agent: AgentModel,
    private readonly budget?: RunBudget,
  ) {}

  async generate(input: GenerateInput): Promise<Verdict> {
    const history: ModelMessage[] = (input.history ?? [])
      .slice(-MAX_HISTORY_TURNS)
      .map(turn => ({ role: turn.role, content: turn.content }));

    let data: GeneratedAnswer;
    try {
      const response = await callLLMStructured(
        {
          model: this.agent.model,
          modelId: this.agent.modelId,
          system: GENERATION_SYSTEM_PROMPT,
          messages: [
            ...history,
            {
              role: 'user',
              content: buildGenerationPrompt({
                query: input.query,
                entity: input.entity,
                facts: input.facts,
                hits: input.retrieval.hits,
              }),
            },
          ],
          maxOutputTokens: this.agent.maxOutputTokens ?? 1024,
          temperature: this.agent.temperature ?? 0.2,
          budget: this.budget,
          abortSignal: input.abortSignal,
        },
        GeneratedAnswerSchema,
        'answer',
      );
      data = response.data;
    } catch (err) {
      if (err instanceof AbortError || err instanceof BudgetExceededRetryError) throw err;
      if (err instanceof StructuredOutputError) {
        throw new GenerationError(`Model returned a malformed answer: ${err.detail}`, { cause: err });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new GenerationError(`Answer generation failed: ${message}`, { cause: err });
    }

    return {
      answer: data.answer,
      sentimentScore: Math.round(data.sentiment_score),
      sentimentLabel: data.sentiment_label,
      isAccurate: true,
      sources: selectSources(data.cited_sources, input.retrieval),
    };
  }
}
