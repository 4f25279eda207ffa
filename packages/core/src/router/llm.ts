import { generateText, type LanguageModel, type ModelMessage } from 'ai';
import type { ZodType, ZodTypeDef } from 'zod';
import { calculateCost, CostTracker, BudgetExceededError } from './cost.js';
import { withRetry, type RetryConfig, BudgetExceededRetryError } from './retry.js';

export interface LLMCallOptions {
  /** Resolved AI SDK LanguageModel instance. */
  model: LanguageModel;
  /** Raw model-id string (for cost look-up). */
  modelId: string;
  system: string;
  messages: ModelMessage[];
  maxOutputTokens?: number;
  temperature?: number;
  /** Optional budget enforcement. */
  budget?: { maxCostUsd: number; tracker: CostTracker };
  /** Retry configuration (uses defaults if not provided). */
  retry?: RetryConfig;
  abortSignal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  usage: { inputTokens: number; outputTokens: number; costUsd: number };
  /** Number of attempts made (1 = no retries needed). */
  attempts?: number;
}

export interface LLMStructuredResponse<T> extends LLMResponse {
  data: T;
}

const DEFAULT_LLM_RETRY: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  timeoutMs: 60000,
  retryOn: ['rate_limit', 'server_error', 'timeout'],
};

/**
 * Single-shot LLM call with retry support.
 * Retries on 429 (rate limit), 5xx (server errors), and timeouts.
 * Does NOT retry on budget exceeded or auth errors.
 */
export async function callLLM(options: LLMCallOptions): Promise<LLMResponse> {
  const retryConfig = { ...DEFAULT_LLM_RETRY, ...options.retry, abortSignal: options.abortSignal };

  const { result, attempts } = await withRetry(
    async (_attempt, signal) => {
      // Budget check before each attempt
      if (options.budget) {
        try {
          options.budget.tracker.checkBudget(options.budget.maxCostUsd);
        } catch (err) {
          // Wrap in non-retryable error
          throw new BudgetExceededRetryError(
            err instanceof Error ? err.message : String(err),
          );
        }
      }

      const result = await generateText({
        model: options.model,
        system: options.system,
        messages: options.messages,
        maxOutputTokens: options.maxOutputTokens,
        temperature: options.temperature,
        abortSignal: signal,
        // Retries are handled here, not inside the SDK
        maxRetries: 0,
      });

      const inputTokens = result.usage.inputTokens ?? 0;
      const outputTokens = result.usage.outputTokens ?? 0;
      const costUsd = calculateCost(options.modelId, inputTokens, outputTokens);

      if (options.budget) {
        options.budget.tracker.addCost(costUsd);
      }

      return {
        content: result.text,
        usage: { inputTokens, outputTokens, costUsd },
      };
    },
    retryConfig,
  );

  return { ...result, attempts };
}

/**
 * Raised when a model twice returns output that does not match the expected
 * JSON shape.
 */
export class StructuredOutputError extends Error {
  constructor(
    public readonly label: string,
    public readonly detail: string,
    public readonly rawContent: string,
  ) {
    super(`Invalid ${label} output: ${detail}`);
    this.name = 'StructuredOutputError';
  }
}

/**
 * Pull a JSON value out of a model response. Accepts bare JSON, JSON inside
 * a ```json fence, or the outermost {...} block embedded in prose.
 */
export function extractJson(content: string): unknown {
  const trimmed = content.trim();
  const fenced = trimmed.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  const candidate = fenced ? fenced[1].trim() : trimmed;

  try {
    return JSON.parse(candidate);
  } catch {
    const start = candidate.indexOf('{');
    const end = candidate.lastIndexOf('}');
    if (start === -1 || end <= start) {
      throw new SyntaxError('No JSON object found in response');
    }
    return JSON.parse(candidate.slice(start, end + 1));
  }
}

type ParseOutcome<T> = { ok: true; data: T } | { ok: false; detail: string };

function parseStructured<T>(content: string, schema: ZodType<T, ZodTypeDef, unknown>): ParseOutcome<T> {
  let raw: unknown;
  try {
    raw = extractJson(content);
  } catch (err) {
    return { ok: false, detail: `not valid JSON (${err instanceof Error ? err.message : String(err)})` };
  }

  const parsed = schema.safeParse(raw);
  if (parsed.success) return { ok: true, data: parsed.data };

  const detail = parsed.error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
  return { ok: false, detail };
}

/**
 * Call the model and validate its JSON reply against a zod schema.
 *
 * An unparseable or off-schema reply gets one corrective follow-up carrying
 * the validation problems; a second failure throws StructuredOutputError.
 */
export async function callLLMStructured<T>(
  options: LLMCallOptions,
  schema: ZodType<T, ZodTypeDef, unknown>,
  label: string,
): Promise<LLMStructuredResponse<T>> {
  const first = await callLLM(options);
  const firstParse = parseStructured(first.content, schema);
  if (firstParse.ok) return { ...first, data: firstParse.data };

  const retryMessages: ModelMessage[] = [
    ...options.messages,
    { role: 'assistant', content: first.content },
    {
      role: 'user',
      content:
        `Your previous response was not valid JSON for the requested format (${firstParse.detail}). ` +
        'Please respond with only valid JSON, no other text or markdown formatting.',
    },
  ];

  const second = await callLLM({
    ...options,
    messages: retryMessages,
    retry: { ...options.retry, maxRetries: 0 }, // No further retries on the JSON fix attempt
  });
  const secondParse = parseStructured(second.content, schema);
  if (!secondParse.ok) {
    throw new StructuredOutputError(label, secondParse.detail, second.content);
  }

  return {
    content: second.content,
    data: secondParse.data,
    usage: {
      inputTokens: first.usage.inputTokens + second.usage.inputTokens,
      outputTokens: first.usage.outputTokens + second.usage.outputTokens,
      costUsd: first.usage.costUsd + second.usage.costUsd,
    },
    attempts: (first.attempts ?? 1) + (second.attempts ?? 1),
  };
}

export { BudgetExceededError };
