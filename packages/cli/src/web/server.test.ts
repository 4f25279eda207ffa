import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  GenerationError,
  PipelineRunner,
  QueueFullError,
  RunTimeoutError,
  BudgetExceededError,
  type PipelineResult,
  type RunOptions,
} from '@finverdict/core';
import { errorResponse, startVerdictServer, type VerdictServerOptions } from './server.js';

function makeResult(): PipelineResult {
  return {
    outcome: 'answered',
    verdict: {
      answer: 'Tesla shares rose 4.1% on Thursday.',
      sentimentScore: 66,
      sentimentLabel: 'Bullish',
      isAccurate: true,
      sources: [{ title: 'Tesla rallies', url: 'https://example.com/tsla' }],
    },
    entity: { symbol: 'TSLA', name: 'Tesla, Inc.', market: 'US', baseSymbol: 'TSLA' },
    metadata: {
      callerId: 'caller-7',
      resolution: 'directory',
      providerFailures: 0,
      failedProviders: [],
      failures: [],
      documents: 4,
      chunks: 4,
      hits: 4,
      ingest: null,
      verification: null,
      costUsd: 0.002,
      durationMs: 1500,
    },
  };
}

const runPipeline = vi.fn<(query: string, options?: RunOptions) => Promise<PipelineResult>>();

function startServer(overrides: Partial<VerdictServerOptions> = {}) {
  return startVerdictServer({
    service: { runPipeline },
    runner: new PipelineRunner(),
    port: 0,
    version: 'test',
    ...overrides,
  });
}

function postVerify(port: number, body: string): Promise<Response> {
  return fetch(`http://127.0.0.1:${port}/api/verify`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

describe('startVerdictServer', () => {
  let server: ReturnType<typeof startVerdictServer> | null = null;

  afterEach(async () => {
    runPipeline.mockReset();
    if (server) {
      await server.close();
      server = null;
    }
  });

  it('serves the health endpoint', async () => {
    server = startServer();
    const port = await server.ready;

    const response = await fetch(`http://127.0.0.1:${port}/health`);
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toEqual({ status: 'ok', version: 'test', active: 0, queued: 0 });
  });

  it('returns the verdict payload for a valid request', async () => {
    runPipeline.mockResolvedValueOnce(makeResult());
    server = startServer();
    const port = await server.ready;

    const response = await postVerify(port, JSON.stringify({
      query: 'Is Tesla up today?',
      history: [{ role: 'user', content: 'Tell me about Tesla' }],
      caller_id: 'caller-7',
    }));
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({
      outcome: 'answered',
      verdict: {
        answer: 'Tesla shares rose 4.1% on Thursday.',
        sources: [{ title: 'Tesla rallies', url: 'https://example.com/tsla' }],
        sentiment_score: 66,
        sentiment_label: 'Bullish',
        is_accurate: true,
      },
      metadata: { caller_id: 'caller-7', documents: 4, duration_ms: 1500, cost_usd: 0.002 },
    });

    expect(runPipeline).toHaveBeenCalledTimes(1);
    const [query, options] = runPipeline.mock.calls[0];
    expect(query).toBe('Is Tesla up today?');
    expect(options?.history).toEqual([{ role: 'user', content: 'Tell me about Tesla' }]);
    expect(options?.callerId).toBe('caller-7');
    expect(options?.abortSignal).toBeInstanceOf(AbortSignal);
  });

  it('rejects a body that is not JSON', async () => {
    server = startServer();
    const port = await server.ready;

    const response = await postVerify(port, '{not json');
    const body: unknown = await response.json();

    expect(response.status).toBe(400);
    expect(body).toEqual({ error: 'invalid_request', message: 'Body is not valid JSON' });
    expect(runPipeline).not.toHaveBeenCalled();
  });

  it('rejects a blank query', async () => {
    server = startServer();
    const port = await server.ready;

    const response = await postVerify(port, JSON.stringify({ query: '   ' }));

    expect(response.status).toBe(400);
    expect(runPipeline).not.toHaveBeenCalled();
  });

  it('maps generation failures to 502', async () => {
    runPipeline.mockRejectedValueOnce(new GenerationError('Answer generation failed: 401 Unauthorized'));
    server = startServer();
    const port = await server.ready;

    const response = await postVerify(port, JSON.stringify({ query: 'Is Tesla up today?' }));
    const body: unknown = await response.json();

    expect(response.status).toBe(502);
    expect(body).toEqual({ error: 'generation_failed', message: 'Answer generation failed: 401 Unauthorized' });
  });

  it('maps a run timeout to 504', async () => {
    runPipeline.mockImplementationOnce((_query, options) =>
      new Promise((_resolve, reject) => {
        options?.abortSignal?.addEventListener('abort', () => reject(new Error('aborted')));
      }),
    );
    server = startServer({ runner: new PipelineRunner({ runTimeoutMs: 50 }) });
    const port = await server.ready;

    const response = await postVerify(port, JSON.stringify({ query: 'Is Tesla up today?' }));
    const body: unknown = await response.json();

    expect(response.status).toBe(504);
    expect(body).toEqual({ error: 'timeout', message: 'Pipeline run timed out after 50ms' });
  });

  it('rejects oversized bodies with 413', async () => {
    server = startServer({ maxBodyBytes: 16 });
    const port = await server.ready;

    const response = await postVerify(port, JSON.stringify({ query: 'a much longer question than allowed' }));

    expect(response.status).toBe(413);
    expect(runPipeline).not.toHaveBeenCalled();
  });

  it('returns 405 for other methods and 404 for unknown paths', async () => {
    server = startServer();
    const port = await server.ready;

    const wrongMethod = await fetch(`http://127.0.0.1:${port}/api/verify`);
    const unknown = await fetch(`http://127.0.0.1:${port}/unknown`);

    expect(wrongMethod.status).toBe(405);
    expect(wrongMethod.headers.get('allow')).toBe('POST');
    expect(unknown.status).toBe(404);
  });

  it('close() shuts down the server', async () => {
    server = startServer();
    await server.ready;

    await server.close();
    expect(server.server.listening).toBe(false);
    server = null;
  });
});

describe('errorResponse', () => {
  it('maps runner and budget errors', () => {
    expect(errorResponse(new QueueFullError(32))).toEqual({
      status: 503,
      body: { error: 'queue_full', message: 'Pipeline queue is full (32 runs waiting)' },
    });
    expect(errorResponse(new RunTimeoutError(1000)).status).toBe(504);
    expect(errorResponse(new BudgetExceededError(0.6, 0.5)).status).toBe(502);
    expect(errorResponse(new Error('boom'))).toEqual({ status: 500, body: { error: 'internal_error' } });
  });
});
