import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { z } from 'zod';
import {
  BudgetExceededError,
  BudgetExceededRetryError,
  GenerationError,
  QueueFullError,
  RunTimeoutError,
  toResultPayload,
  type PipelineResult,
  type PipelineRunner,
  type RunOptions,
} from '@finverdict/core';
import { redactSecrets } from '@finverdict/tools';
import type { Logger } from '../logging.js';

/** What the server needs from the pipeline. */
export interface VerdictService {
  runPipeline(query: string, options?: RunOptions): Promise<PipelineResult>;
}

export interface VerdictServerOptions {
  service: VerdictService;
  runner: PipelineRunner;
  port: number;
  host?: string;
  version: string;
  logger?: Logger;
  /** Largest accepted request body in bytes (default: 65536). */
  maxBodyBytes?: number;
}

export const VerifyRequestSchema = z.object({
  query: z.string().trim().min(1).max(2000),
  history: z
    .array(z.object({ role: z.enum(['user', 'assistant']), content: z.string() }).strict())
    .max(50)
    .optional(),
  caller_id: z.string().max(200).optional(),
}).strict();

export type VerifyRequest = z.infer<typeof VerifyRequestSchema>;

interface ErrorResponse {
  status: number;
  body: { error: string; message?: string };
}

class RequestTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'RequestTooLargeError';
  }
}

/** HTTP status and body for an error thrown by a pipeline run. */
export function errorResponse(err: unknown): ErrorResponse {
  if (err instanceof QueueFullError) {
    return { status: 503, body: { error: 'queue_full', message: err.message } };
  }
  if (err instanceof RunTimeoutError) {
    return { status: 504, body: { error: 'timeout', message: err.message } };
  }
  if (
    err instanceof GenerationError ||
    err instanceof BudgetExceededError ||
    err instanceof BudgetExceededRetryError
  ) {
    return { status: 502, body: { error: 'generation_failed', message: redactSecrets(err.message) } };
  }
  return { status: 500, body: { error: 'internal_error' } };
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    // Oversized bodies are drained, not kept, so the 413 can still be sent.
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size <= limit) chunks.push(chunk);
    });
    req.on('end', () => {
      if (size > limit) reject(new RequestTooLargeError(limit));
      else resolve(Buffer.concat(chunks).toString('utf-8'));
    });
    req.on('error', reject);
  });
}

function parseRequest(raw: string): { ok: true; request: VerifyRequest } | { ok: false; message: string } {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, message: 'Body is not valid JSON' };
  }
  const parsed = VerifyRequestSchema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      message: parsed.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join(', '),
    };
  }
  return { ok: true, request: parsed.data };
}

/**
 * `GET /health` and `POST /api/verify`. Runs are handed to the runner, so a
 * slow pipeline never blocks other requests.
 */
export function startVerdictServer(options: VerdictServerOptions): {
  server: HttpServer;
  close: () => Promise<void>;
  ready: Promise<number>;
} {
  const { service, runner, version, logger } = options;
  const maxBodyBytes = options.maxBodyBytes ?? 65536;

  const handleVerify = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    let raw: string;
    try {
      raw = await readBody(req, maxBodyBytes);
    } catch (err) {
      if (err instanceof RequestTooLargeError) {
        sendJson(res, 413, { error: 'payload_too_large', message: err.message });
        return;
      }
      throw err;
    }

    const parsed = parseRequest(raw);
    if (!parsed.ok) {
      sendJson(res, 400, { error: 'invalid_request', message: parsed.message });
      return;
    }

    const { query, history, caller_id: callerId } = parsed.request;
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const result = await runner.submit(
        (signal) => service.runPipeline(query, { history, callerId, abortSignal: signal }),
        controller.signal,
      );
      const payload = toResultPayload(result);
      sendJson(res, 200, { outcome: payload.outcome, verdict: payload.verdict, metadata: payload.metadata });
    } catch (err) {
      const response = errorResponse(err);
      if (response.status === 500) {
        logger?.error(`Request failed: ${err instanceof Error ? err.message : String(err)}`);
      } else {
        logger?.warn(`Request failed with ${response.status}: ${response.body.message ?? response.body.error}`);
      }
      if (!res.headersSent && !controller.signal.aborted) {
        sendJson(res, response.status, response.body);
      }
    }
  };

  const server = createServer((req, res) => {
    const path = (req.url ?? '/').split('?')[0];

    if (req.method === 'GET' && path === '/health') {
      sendJson(res, 200, { status: 'ok', version, active: runner.active, queued: runner.queued });
      return;
    }

    if (path === '/api/verify') {
      if (req.method !== 'POST') {
        res.setHeader('Allow', 'POST');
        sendJson(res, 405, { error: 'method_not_allowed' });
        return;
      }
      handleVerify(req, res).catch((err: unknown) => {
        logger?.error(`Request handling failed: ${err instanceof Error ? err.message : String(err)}`);
        if (!res.headersSent) sendJson(res, 500, { error: 'internal_error' });
      });
      return;
    }

    sendJson(res, 404, { error: 'not_found' });
  });

  const ready = new Promise<number>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host ?? '127.0.0.1', () => {
      server.off('error', reject);
      const address = server.address();
      resolve(isAddressInfo(address) ? address.port : options.port);
    });
  });

  const close = (): Promise<void> =>
    new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  return { server, close, ready };
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return address !== null && typeof address === 'object';
}
