/**
 * Retry utility with exponential backoff.
 *
 * Used for model and embedding calls. Supports timeouts, abort signals and
 * error classification so that auth and budget failures are not retried.
 */

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

/** Classifies an error for retry decision-making. */
export type ErrorCategory =
  | 'rate_limit'       // 429: backoff and retry
  | 'server_error'     // 500/502/503: backoff and retry
  | 'timeout'          // Request timed out
  | 'aborted'          // Caller cancelled: never retry
  | 'budget_exceeded'  // Budget limit hit: do not retry
  | 'auth_error'       // 401/403: do not retry
  | 'not_found'        // 404: do not retry
  | 'json_parse'       // Invalid JSON response
  | 'unknown';

export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof BudgetExceededRetryError) return 'budget_exceeded';
  if (error instanceof AbortError) return 'aborted';
  if (error instanceof TimeoutError) return 'timeout';

  const message = error instanceof Error ? error.message : String(error);
  const lowerMsg = message.toLowerCase();

  if (/\b429\b/.test(message) || lowerMsg.includes('rate limit') || lowerMsg.includes('too many requests')) {
    return 'rate_limit';
  }
  if (/\b(500|502|503|529)\b/.test(message) || lowerMsg.includes('internal server error') || lowerMsg.includes('bad gateway') || lowerMsg.includes('service unavailable') || lowerMsg.includes('overloaded')) {
    return 'server_error';
  }
  if (/\b(401|403)\b/.test(message) || lowerMsg.includes('unauthorized') || lowerMsg.includes('forbidden') || lowerMsg.includes('api key')) {
    return 'auth_error';
  }
  if (/\b404\b/.test(message) || lowerMsg.includes('not found')) {
    return 'not_found';
  }
  if (lowerMsg.includes('timeout') || lowerMsg.includes('timed out')) {
    return 'timeout';
  }
  if (lowerMsg.includes('json') && (lowerMsg.includes('parse') || lowerMsg.includes('unexpected token'))) {
    return 'json_parse';
  }
  if (error instanceof Error && error.name === 'BudgetExceededError') {
    return 'budget_exceeded';
  }

  return 'unknown';
}

// ---------------------------------------------------------------------------
// Retry configuration
// ---------------------------------------------------------------------------

export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3). */
  maxRetries?: number;
  /** Initial delay in milliseconds before first retry (default: 1000). */
  initialDelayMs?: number;
  /** Backoff multiplier (default: 2). */
  backoffMultiplier?: number;
  /** Maximum delay cap in milliseconds (default: 30000). */
  maxDelayMs?: number;
  /** Timeout per attempt in milliseconds (default: 30000). */
  timeoutMs?: number;
  /** Error categories that should be retried. */
  retryOn?: ErrorCategory[];
  abortSignal?: AbortSignal;
  /** Called before each retry with attempt info. */
  onRetry?: (attempt: number, error: Error, category: ErrorCategory, delayMs: number) => void;
}

const DEFAULT_RETRY_CONFIG: Required<Omit<RetryConfig, 'abortSignal' | 'onRetry'>> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  timeoutMs: 30000,
  retryOn: ['rate_limit', 'server_error', 'timeout'],
};

export interface RetryResult<T> {
  result: T;
  attempts: number;
  totalDelayMs: number;
}

/**
 * Execute a function with retry logic and exponential backoff.
 * Each attempt receives its own AbortSignal, which fires when the attempt
 * times out or the caller aborts.
 */
export async function withRetry<T>(
  fn: (attempt: number, signal: AbortSignal) => Promise<T>,
  config: RetryConfig = {},
): Promise<RetryResult<T>> {
  const {
    maxRetries = DEFAULT_RETRY_CONFIG.maxRetries,
    initialDelayMs = DEFAULT_RETRY_CONFIG.initialDelayMs,
    backoffMultiplier = DEFAULT_RETRY_CONFIG.backoffMultiplier,
    maxDelayMs = DEFAULT_RETRY_CONFIG.maxDelayMs,
    timeoutMs = DEFAULT_RETRY_CONFIG.timeoutMs,
    retryOn = DEFAULT_RETRY_CONFIG.retryOn,
    abortSignal,
    onRetry,
  } = config;

  let lastError: Error | undefined;
  let totalDelayMs = 0;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (abortSignal?.aborted) {
      throw new AbortError('Operation aborted');
    }

    const attemptController = new AbortController();
    const forwardAbort = () => attemptController.abort();
    abortSignal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const result = await withTimeout(fn(attempt, attemptController.signal), timeoutMs, abortSignal);
      return { result, attempts: attempt + 1, totalDelayMs };
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      attemptController.abort();
      const category = classifyError(err);

      if (!retryOn.includes(category) || attempt >= maxRetries) {
        throw lastError;
      }

      const baseDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
      const jitter = baseDelay * 0.1 * Math.random();
      const delay = Math.min(baseDelay + jitter, maxDelayMs);

      const retryAfter = extractRetryAfter(lastError.message);
      const actualDelay = retryAfter ? Math.max(delay, retryAfter * 1000) : delay;

      onRetry?.(attempt + 1, lastError, category, actualDelay);

      await sleep(actualDelay, abortSignal);
      totalDelayMs += actualDelay;
    } finally {
      abortSignal?.removeEventListener('abort', forwardAbort);
    }
  }

  throw lastError ?? new Error('Retry failed with no error captured');
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Wrap a promise with a timeout. */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  abortSignal?: AbortSignal,
): Promise<T> {
  if (abortSignal?.aborted) {
    throw new AbortError('Operation aborted');
  }
  if (timeoutMs <= 0 || timeoutMs === Infinity) {
    if (!abortSignal) return promise;
    timeoutMs = Infinity;
  }

  return new Promise<T>((resolve, reject) => {
    const timer = timeoutMs === Infinity
      ? undefined
      : setTimeout(() => {
          abortSignal?.removeEventListener('abort', onAbort);
          reject(new TimeoutError(`Operation timed out after ${timeoutMs}ms`));
        }, timeoutMs);

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError('Operation aborted'));
    };
    abortSignal?.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        clearTimeout(timer);
        abortSignal?.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        abortSignal?.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/** Sleep for the given milliseconds, respecting abort signal. */
export function sleep(ms: number, abortSignal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (abortSignal?.aborted) {
      reject(new AbortError('Operation aborted'));
      return;
    }

    const timer = setTimeout(() => {
      abortSignal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError('Operation aborted during retry delay'));
    };
    abortSignal?.addEventListener('abort', onAbort, { once: true });
  });
}

function extractRetryAfter(message: string): number | undefined {
  const match = message.match(/retry.?after[:\s]+(\d+)/i);
  if (match) return parseInt(match[1], 10);
  return undefined;
}

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class AbortError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AbortError';
  }
}

/** Sentinel error to prevent retries on budget exceeded. */
export class BudgetExceededRetryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BudgetExceededRetryError';
  }
}
