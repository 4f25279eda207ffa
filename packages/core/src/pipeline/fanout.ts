import { Semaphore } from './semaphore.js';
import { AbortError, TimeoutError, withTimeout } from '../router/retry.js';

export interface FanOutTask<T> {
  /** Label used in outcomes (e.g. `finnhub:companyNews`). */
  name: string;
  run: (signal: AbortSignal) => Promise<T>;
}

export type FanOutOutcome<T> =
  | { name: string; status: 'fulfilled'; value: T; durationMs: number }
  | { name: string; status: 'rejected'; error: Error; durationMs: number };

export interface FanOutOptions {
  /** Maximum tasks running at once (default: 6). */
  concurrency?: number;
  /** Per-task timeout in milliseconds (default: 8000). */
  timeoutMs?: number;
  /** Overall deadline in milliseconds (default: 20000). */
  deadlineMs?: number;
  abortSignal?: AbortSignal;
}

const DEFAULT_FAN_OUT: Required<Omit<FanOutOptions, 'abortSignal'>> = {
  concurrency: 6,
  timeoutMs: 8000,
  deadlineMs: 20000,
};

/**
 * Run tasks through a bounded pool and collect every outcome.
 *
 * A task never rejects the whole batch: failures, per-task timeouts and tasks
 * still pending (or queued) at the deadline all come back as rejected
 * outcomes. Outcomes keep the order of `tasks`.
 */
export async function fanOut<T>(
  tasks: FanOutTask<T>[],
  options: FanOutOptions = {},
): Promise<FanOutOutcome<T>[]> {
  const {
    concurrency = DEFAULT_FAN_OUT.concurrency,
    timeoutMs = DEFAULT_FAN_OUT.timeoutMs,
    deadlineMs = DEFAULT_FAN_OUT.deadlineMs,
    abortSignal,
  } = options;

  if (tasks.length === 0) return [];

  const semaphore = new Semaphore(concurrency);
  const deadline = new AbortController();
  const onCallerAbort = () => deadline.abort();
  abortSignal?.addEventListener('abort', onCallerAbort, { once: true });
  const deadlineTimer = setTimeout(() => deadline.abort(), deadlineMs);

  const runOne = async (task: FanOutTask<T>): Promise<FanOutOutcome<T>> => {
    const started = Date.now();
    try {
      const value = await semaphore.run(async () => {
        if (deadline.signal.aborted) throw deadlineError(abortSignal, deadlineMs);
        const controller = new AbortController();
        const forward = () => controller.abort();
        deadline.signal.addEventListener('abort', forward, { once: true });
        try {
          return await withTimeout(task.run(controller.signal), timeoutMs, deadline.signal);
        } catch (err) {
          controller.abort();
          if (err instanceof AbortError) throw deadlineError(abortSignal, deadlineMs);
          throw err;
        } finally {
          deadline.signal.removeEventListener('abort', forward);
        }
      }, deadline.signal);
      return { name: task.name, status: 'fulfilled', value, durationMs: Date.now() - started };
    } catch (err) {
      // Still queued when the deadline or the caller aborted.
      const error = err instanceof AbortError
        ? deadlineError(abortSignal, deadlineMs)
        : err instanceof Error ? err : new Error(String(err));
      return { name: task.name, status: 'rejected', error, durationMs: Date.now() - started };
    }
  };

  try {
    return await Promise.all(tasks.map(runOne));
  } finally {
    clearTimeout(deadlineTimer);
    abortSignal?.removeEventListener('abort', onCallerAbort);
  }
}

function deadlineError(callerSignal: AbortSignal | undefined, deadlineMs: number): Error {
  if (callerSignal?.aborted) return new AbortError('Operation aborted');
  return new TimeoutError(`Deadline of ${deadlineMs}ms reached`);
}
