/**
 * Lightweight HTTP fetch retry utility for provider clients.
 *
 * Retries on 429 (rate limit) and 5xx (server errors) with exponential backoff.
 * Respects Retry-After headers. Supports abort signals.
 */

import type { ZodType } from 'zod';
import { redactSecrets } from './redact.js';

export interface FetchRetryConfig {
  /** Maximum retry attempts (default: 2). */
  maxRetries?: number;
  /** Initial delay in ms before first retry (default: 1000). */
  initialDelayMs?: number;
  /** Backoff multiplier (default: 2). */
  backoffMultiplier?: number;
  /** Maximum delay cap in ms (default: 15000). */
  maxDelayMs?: number;
}

const DEFAULT_CONFIG: Required<FetchRetryConfig> = {
  maxRetries: 2,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 15000,
};

/** Non-2xx response that was not (or no longer) worth retrying. */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    statusText: string,
    url: string,
  ) {
    super(
      `HTTP ${status} ${statusText}` +
      (status === 429 ? ' (rate limited)' : '') +
      ` for ${redactSecrets(url)}`,
    );
    this.name = 'HttpStatusError';
  }
}

/** Provider answered 2xx but the payload did not have the expected shape. */
export class ResponseShapeError extends Error {
  constructor(label: string, detail: string) {
    super(`Unexpected ${label} response: ${detail}`);
    this.name = 'ResponseShapeError';
  }
}

export class AbortError extends Error {
  constructor(message = 'Aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

/**
 * Fetch with automatic retry on rate limits and server errors.
 * Returns the successful Response or throws after all retries exhausted.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  config: FetchRetryConfig = {},
): Promise<Response> {
  const {
    maxRetries = DEFAULT_CONFIG.maxRetries,
    initialDelayMs = DEFAULT_CONFIG.initialDelayMs,
    backoffMultiplier = DEFAULT_CONFIG.backoffMultiplier,
    maxDelayMs = DEFAULT_CONFIG.maxDelayMs,
  } = config;
  const signal = init.signal ?? undefined;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const baseDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
    const jitter = baseDelay * 0.1 * Math.random();
    let delay = Math.min(baseDelay + jitter, maxDelayMs);

    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw err;
      }
      lastError = new Error(redactSecrets(err instanceof Error ? err.message : String(err)));

      if (!isNetworkError(lastError) || attempt >= maxRetries) {
        throw lastError;
      }
      await sleep(delay, signal);
      continue;
    }

    if (response.ok) {
      return response;
    }

    const status = response.status;
    const isRetryable = status === 429 || (status >= 500 && status <= 599);
    lastError = new HttpStatusError(status, response.statusText, url);

    if (!isRetryable || attempt >= maxRetries) {
      throw lastError;
    }

    const retryAfter = response.headers?.get?.('Retry-After');
    if (retryAfter) {
      const retryAfterSecs = parseInt(retryAfter, 10);
      if (!isNaN(retryAfterSecs)) {
        delay = Math.max(delay, retryAfterSecs * 1000);
      }
    }

    await sleep(delay, signal);
  }

  throw lastError ?? new Error('Fetch retry failed');
}

/**
 * Fetch a JSON endpoint and validate the body.
 * Provider payload shapes never leave the client module unvalidated.
 */
export async function fetchJson<T>(
  url: string,
  init: RequestInit,
  schema: ZodType<T>,
  label: string,
  config?: FetchRetryConfig,
): Promise<T> {
  const response = await fetchWithRetry(url, init, config);
  const body: unknown = await response.json();
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ResponseShapeError(label, issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid body');
  }
  return parsed.data;
}

function isNetworkError(error: Error): boolean {
  return error.message.includes('fetch failed') ||
    error.message.includes('ECONNRESET') ||
    error.message.includes('ETIMEDOUT') ||
    error.message.includes('timeout');
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortError());
      return;
    }

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
