import { Semaphore } from './semaphore.js';
import { QueueFullError, RunTimeoutError } from '../errors.js';

export interface PipelineRunnerOptions {
  /** Runs executing at once (default: 4). */
  maxConcurrent?: number;
  /** Runs allowed to wait for a slot (default: 32). */
  maxQueued?: number;
  /** Per-run timeout in milliseconds, counted from when the run starts (default: 60000). */
  runTimeoutMs?: number;
}

/**
 * Bounded job queue for pipeline runs. Each job gets an AbortSignal that
 * fires on the run timeout or when the submitter aborts.
 */
export class PipelineRunner {
  private readonly semaphore: Semaphore;
  private readonly maxQueued: number;
  private readonly runTimeoutMs: number;
  private _active = 0;
  private _queued = 0;

  constructor(options: PipelineRunnerOptions = {}) {
    this.semaphore = new Semaphore(options.maxConcurrent ?? 4);
    this.maxQueued = options.maxQueued ?? 32;
    this.runTimeoutMs = options.runTimeoutMs ?? 60000;
  }

  get active(): number {
    return this._active;
  }

  get queued(): number {
    return this._queued;
  }

  /**
   * Enqueue a job. Rejects with QueueFullError at once when the queue is
   * full, with RunTimeoutError when the run exceeds its timeout, and with
   * AbortError when the submitter aborts before the job starts.
   */
  async submit<T>(job: (signal: AbortSignal) => Promise<T>, abortSignal?: AbortSignal): Promise<T> {
    if (this._queued >= this.maxQueued) {
      throw new QueueFullError(this.maxQueued);
    }

    this._queued++;
    let started = false;
    try {
      return await this.semaphore.run(async () => {
        started = true;
        this._queued--;
        this._active++;
        try {
          return await this.runWithTimeout(job, abortSignal);
        } finally {
          this._active--;
        }
      }, abortSignal);
    } finally {
      if (!started) this._queued--;
    }
  }

  private runWithTimeout<T>(job: (signal: AbortSignal) => Promise<T>, abortSignal?: AbortSignal): Promise<T> {
    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => controller.abort();
      const timer = setTimeout(() => {
        controller.abort();
        reject(new RunTimeoutError(this.runTimeoutMs));
      }, this.runTimeoutMs);

      if (abortSignal?.aborted) controller.abort();
      abortSignal?.addEventListener('abort', onAbort, { once: true });

      job(controller.signal).then(
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
}
