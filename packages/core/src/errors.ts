import type { ProviderId } from '@finverdict/tools';

/** The model did not produce a usable verdict. Fatal for the request. */
export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

/** A provider call failed. Caught by fan-out and recorded, never rethrown past the aggregator. */
export class ProviderUnavailableError extends Error {
  constructor(
    public readonly provider: ProviderId,
    public readonly operation: string,
    message: string,
  ) {
    super(`${provider} ${operation} failed: ${message}`);
    this.name = 'ProviderUnavailableError';
  }
}

export class QueueFullError extends Error {
  constructor(public readonly maxQueued: number) {
    super(`Pipeline queue is full (${maxQueued} runs waiting)`);
    this.name = 'QueueFullError';
  }
}

export class RunTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Pipeline run timed out after ${timeoutMs}ms`);
    this.name = 'RunTimeoutError';
  }
}
