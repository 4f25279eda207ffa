import { z } from 'zod';
import { callLLMStructured } from '../router/llm.js';
import { AbortError, BudgetExceededRetryError } from '../router/retry.js';
import { redactSecrets } from '@finverdict/tools';
import { renderEvidence, renderFacts } from '../generation/prompts.js';
import { SENTIMENT_LABELS } from '../generation/generator.js';
import type { AgentModel, FactBundle, RetrievalResult, RunBudget, Verdict } from '../types.js';
import { EvidenceSet, DEFAULT_TOLERANCE } from './evidence.js';

export const UNSUPPORTED_ANSWER =
  'The available evidence does not support a definitive answer to this question.';

const VERIFICATION_SYSTEM_PROMPT = `You are a fact-checker for financial answers. You receive a question, a drafted answer and the evidence the answer was written from.

Check every statement in the answer against the evidence:
- Figures (prices, percentages, amounts, dates) must appear in the evidence.
- Claims about direction or causes must be stated or directly implied by the evidence.

Respond with a JSON object:
{
  "is_accurate": boolean (true only if every statement is supported),
  "unsupported_claims": array of the unsupported statements, quoted from the answer,
  "corrected_answer": string with unsupported statements removed or fixed from the evidence, or null when the answer is accurate,
  "sentiment_score": integer 0-100 for the corrected answer,
  "sentiment_label": "Bearish" | "Neutral" | "Bullish"
}
Respond ONLY with the JSON object, no other text.`;

export const VerificationResponseSchema = z.object({
  is_accurate: z.boolean(),
  unsupported_claims: z.array(z.string()).default([]),
  corrected_answer: z.string().nullable().default(null),
  sentiment_score: z.number().min(0).max(100).optional(),
  sentiment_label: z.enum(SENTIMENT_LABELS).optional(),
});

export type VerificationResponse = z.infer<typeof VerificationResponseSchema>;

export type LlmCheck = 'approved' | 'rejected' | 'failed';

export interface VerificationReport {
  llm: LlmCheck;
  /** Figures in the drafted answer with no match in the evidence. */
  unsupportedFigures: string[];
  unsupportedClaims: string[];
  /** Sentences dropped from the final answer. */
  removedSentences: string[];
  corrected: boolean;
  /** Redacted reason when the model re-check failed. */
  failure?: string;
}

export interface VerifyInput {
  query: string;
  verdict: Verdict;
  retrieval: RetrievalResult;
  facts: FactBundle;
  abortSignal?: AbortSignal;
}

export interface VerifierOptions {
  agent: AgentModel;
  budget?: RunBudget;
  tolerance?: number;
}

function buildVerificationPrompt(input: VerifyInput): string {
  const facts = renderFacts(input.facts);
  return [
    `Question: ${input.query}`,
    `## Drafted answer\n${input.verdict.answer}`,
    ...(facts ? [`## Structured facts\n${facts}`] : []),
    `## Evidence\n${renderEvidence(input.retrieval.hits)}`,
  ].join('\n\n');
}

/**
 * Second pass over a drafted verdict. A model re-check and the figure
 * containment check must both pass for the verdict to stay accurate.
 */
export class Verifier {
  private readonly tolerance: number;

  constructor(private readonly options: VerifierOptions) {
    this.tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  }

  async verify(input: VerifyInput): Promise<Verdict> {
    return (await this.verifyWithReport(input)).verdict;
  }

  async verifyWithReport(input: VerifyInput): Promise<{ verdict: Verdict; report: VerificationReport }> {
    const evidence = new EvidenceSet(
      [...input.retrieval.hits.map(h => h.chunk.text), renderFacts(input.facts)],
      this.tolerance,
    );
    const unsupportedFigures = evidence.unsupportedFigures(input.verdict.answer).map(f => f.raw);

    let response: VerificationResponse | null = null;
    let failure: string | undefined;
    try {
      response = (await callLLMStructured(
        {
          model: this.options.agent.model,
          modelId: this.options.agent.modelId,
          system: VERIFICATION_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: buildVerificationPrompt(input) }],
          maxOutputTokens: this.options.agent.maxOutputTokens ?? 1024,
          temperature: this.options.agent.temperature ?? 0,
          budget: this.options.budget,
          abortSignal: input.abortSignal,
        },
        VerificationResponseSchema,
        'verification',
      )).data;
    } catch (err) {
      if (err instanceof AbortError || err instanceof BudgetExceededRetryError) throw err;
      failure = redactSecrets(err instanceof Error ? err.message : String(err));
    }

    const llm: LlmCheck = response === null ? 'failed' : response.is_accurate ? 'approved' : 'rejected';
    const unsupportedClaims = response?.unsupported_claims ?? [];
    const report: VerificationReport = {
      llm,
      unsupportedFigures,
      unsupportedClaims,
      removedSentences: [],
      corrected: false,
      ...(failure !== undefined ? { failure } : {}),
    };

    if (llm !== 'rejected' && unsupportedFigures.length === 0) {
      return { verdict: { ...input.verdict, isAccurate: true }, report };
    }

    const corrected = response?.corrected_answer?.trim();
    const base = corrected ? corrected : input.verdict.answer;
    // Flagged claims quote the draft, so they are only matched against it.
    const stripped = evidence.stripUnsupported(base, corrected ? [] : unsupportedClaims);
    report.removedSentences = stripped.removed;
    report.corrected = Boolean(corrected);

    if (!stripped.text) {
      return {
        verdict: {
          ...input.verdict,
          answer: UNSUPPORTED_ANSWER,
          sentimentScore: 50,
          sentimentLabel: 'Neutral',
          isAccurate: false,
        },
        report,
      };
    }

    const verdict: Verdict = { ...input.verdict, answer: stripped.text, isAccurate: false };
    if (corrected && response?.sentiment_score !== undefined && response.sentiment_label) {
      verdict.sentimentScore = Math.round(response.sentiment_score);
      verdict.sentimentLabel = response.sentiment_label;
    }
    return { verdict, report };
  }
}
