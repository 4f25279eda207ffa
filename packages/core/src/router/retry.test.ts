import { describe, it, expect, vi } from 'vitest';
import {
  classifyError,
  withRetry,
  withTimeout,
  sleep,
  TimeoutError,
  AbortError,
  BudgetExceededRetryError,
} from './retry.js';

describe('classifyError', () => {
  it.each([
    ['HTTP 429 Too Many Requests', 'rate_limit'],
    ['Rate limit exceeded', 'rate_limit'],
    ['HTTP 503 Service Unavailable', 'server_error'],
    ['Overloaded', 'server_error'],
    ['HTTP 401 Unauthorized', 'auth_error'],
    ['Invalid API key', 'auth_error'],
    ['HTTP 404 Not Found', 'not_found'],
    ['Request timed out', 'timeout'],
    ['JSON parse error: Unexpected token', 'json_parse'],
    ['something else', 'unknown'],
  ])('classifies "%s" as %s', (message, expected) => {
    expect(classifyError(new Error(message))).toBe(expected);
  });

  it('classifies the error classes by type', () => {
    expect(classifyError(new TimeoutError('x'))).toBe('timeout');
    expect(classifyError(new AbortError('x'))).toBe('aborted');
    expect(classifyError(new BudgetExceededRetryError('x'))).toBe('budget_exceeded');
  });
});

describe('withRetry', () => {
  it('returns the result with the attempt count', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('HTTP 500')).mockResolvedValueOnce('ok');

    const result = await withRetry(fn, { maxRetries: 2, initialDelayMs: 1 });

    expect(result.result).toBe('ok');
    expect(result.attempts).toBe(2);
    expect(fn.mock.calls[1][0]).toBe(1);
  });

  it('does not retry non-retryable errors', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('HTTP 401 Unauthorized'));

    await expect(withRetry(fn, { maxRetries: 3, initialDelayMs: 1 })).rejects.toThrow('401');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('throws the last error after exhausting retries', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('HTTP 503'));

    await expect(withRetry(fn, { maxRetries: 2, initialDelayMs: 1 })).rejects.toThrow('HTTP 503');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('aborts the attempt signal when an attempt times out', async () => {
    let seen: AbortSignal | undefined;
    const fn = vi.fn((_attempt: number, signal: AbortSignal) => {
      seen = signal;
      return new Promise<string>(() => {});
    });

    await expect(withRetry(fn, { maxRetries: 0, timeoutMs: 20 })).rejects.toBeInstanceOf(TimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it('stops when the caller aborts', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(withRetry(async () => 'never', { abortSignal: controller.signal })).rejects.toBeInstanceOf(AbortError);
  });

  it('reports retries through onRetry', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValueOnce(new Error('HTTP 429')).mockResolvedValueOnce(1);

    await withRetry(fn, { maxRetries: 1, initialDelayMs: 1, onRetry });

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(1);
    expect(onRetry.mock.calls[0][2]).toBe('rate_limit');
  });
});

describe('withTimeout', () => {
  it('resolves before the timeout', async () => {
    await expect(withTimeout(Promise.resolve(5), 100)).resolves.toBe(5);
  });

  it('rejects with TimeoutError', async () => {
    await expect(withTimeout(new Promise(() => {}), 10)).rejects.toThrow('Operation timed out after 10ms');
  });

  it('rejects with AbortError on abort even without a timeout', async () => {
    const controller = new AbortController();
    const pending = withTimeout(new Promise(() => {}), 0, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AbortError);
  });
});

describe('sleep', () => {
  it('rejects immediately when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(1000, controller.signal)).rejects.toBeInstanceOf(AbortError);
  });
});
