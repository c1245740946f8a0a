/**
 * HTTP tests for the gateway routes and middleware stack, served in-process
 * on an ephemeral port with a stub backend client
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { once } from 'events';
import type { Server } from 'http';
import { request, type Dispatcher } from 'undici';
import { createApp } from '../app.js';
import { FieldRemappingAdapter } from '../adapters/fieldRemapping.js';
import { createCorsMiddleware } from '../middleware/cors.js';
import type { BackendRequestOptions, BackendResponse } from '../services/backendClient.js';
import { STATIC_MODEL_CREATED, type GatewayConfig } from '../services/config.js';
import { ConfigError } from '../services/errors.js';
import {
  clearCapturedLogs,
  configureLogger,
  disableLogCapture,
  enableLogCapture,
  getCapturedLogs,
} from '../services/logger.js';
import { TokenBucketRateLimiter, type RateLimiter } from '../services/rateLimiter.js';

const ALLOWED_ORIGIN = 'http://localhost:3000';

function testConfig(overrides: { timeoutMs?: number } = {}): GatewayConfig {
  return {
    backend: {
      endpoint: 'https://backend.test/api/v1/query',
      provider: 'field_remapping',
      timeoutMs: overrides.timeoutMs ?? 2000,
      auth: { certFile: 'cert.pem', keyFile: 'key.pem' },
      proxies: {},
    },
    server: { host: '127.0.0.1', port: 0 },
    cors: { allowedOrigins: [ALLOWED_ORIGIN] },
    rateLimit: { ratePerSecond: 1000, burst: 1000 },
    streaming: { chunkDelayMs: 0 },
    model: { id: 'default-model', ownedBy: 'assistant-bridge', created: STATIC_MODEL_CREATED },
    fieldRemapping: { forwardContext: false },
    logging: { level: 'info' },
  };
}

type BackendHandler = (body: unknown, options?: BackendRequestOptions) => Promise<BackendResponse>;

interface Harness {
  baseUrl: string;
  post: Mock<BackendHandler>;
  close: () => Promise<void>;
}

async function startGateway(
  handler: BackendHandler,
  options: { config?: GatewayConfig; rateLimiter?: RateLimiter } = {}
): Promise<Harness> {
  const config = options.config ?? testConfig();
  const post = vi.fn<BackendHandler>(handler);
  const app = createApp({
    config,
    client: { post, close: async () => {} },
    adapter: new FieldRemappingAdapter(),
    rateLimiter: options.rateLimiter ?? new TokenBucketRateLimiter(config.rateLimit),
  });

  const server: Server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Gateway is not listening on a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    post,
    close: () => new Promise<void>((resolve, reject) => {
      server.closeAllConnections();
      server.close((err) => (err ? reject(err) : resolve()));
    }),
  };
}

const replyWith = (status: number, body: string): BackendHandler => async () => ({ status, body });

async function call(
  harness: Harness,
  path: string,
  init: { method?: Dispatcher.HttpMethod; headers?: Record<string, string>; json?: unknown; body?: string } = {}
) {
  const hasJson = init.json !== undefined || init.body !== undefined;
  const response = await request(`${harness.baseUrl}${path}`, {
    method: init.method ?? (hasJson ? 'POST' : 'GET'),
    headers: {
      ...(hasJson && { 'content-type': 'application/json' }),
      ...init.headers,
    },
    body: init.body ?? (init.json !== undefined ? JSON.stringify(init.json) : undefined),
  });
  return {
    status: response.statusCode,
    headers: response.headers,
    text: await response.body.text(),
  };
}

const kernelQuestion = {
  model: 'default-model',
  messages: [
    { role: 'system', content: 'You are a helpful assistant.' },
    { role: 'user', content: 'Tell me more about kernels.' },
  ],
};

describe('API Routes', () => {
  let harness: Harness;

  afterEach(async () => {
    await harness.close();
  });

  describe('GET /health', () => {
    beforeEach(async () => {
      harness = await startGateway(replyWith(200, '{}'));
    });

    it('reports ok without calling the backend', async () => {
      const response = await call(harness, '/health');

      expect(response.status).toBe(200);
      expect(JSON.parse(response.text)).toEqual({ status: 'ok' });
      expect(harness.post).not.toHaveBeenCalled();
    });

    it('logs the start and end of a request under its correlation ID', async () => {
      enableLogCapture();
      clearCapturedLogs();
      try {
        await call(harness, '/health', { headers: { 'x-correlation-id': 'trace-log' } });
        await vi.waitFor(() => expect(getCapturedLogs().map((entry) => entry.message)).toContain('Request completed'));

        const entries = getCapturedLogs().filter((entry) => entry.correlationId === 'trace-log');
        expect(entries.map((entry) => [entry.message, entry.method, entry.path])).toEqual([
          ['Request started', 'GET', '/health'],
          ['Request completed', 'GET', '/health'],
        ]);
        expect(entries[1].statusCode).toBe(200);
      } finally {
        disableLogCapture();
      }
    });

    it('tags every response with a correlation ID', async () => {
      const generated = await call(harness, '/health');
      expect(generated.headers['x-correlation-id']).toMatch(/^[0-9a-f-]{36}$/);

      const echoed = await call(harness, '/health', { headers: { 'x-correlation-id': 'trace-abc' } });
      expect(echoed.headers['x-correlation-id']).toBe('trace-abc');
    });
  });

  describe('GET /v1/models', () => {
    beforeEach(async () => {
      harness = await startGateway(replyWith(200, '{}'));
    });

    it('lists the static model', async () => {
      const response = await call(harness, '/v1/models');

      expect(response.status).toBe(200);
      expect(JSON.parse(response.text)).toEqual({
        object: 'list',
        data: [{ id: 'default-model', object: 'model', created: 1234567890, owned_by: 'assistant-bridge' }],
      });
    });
  });

  describe('POST /v1/chat/completions', () => {
    it('answers the kernel question', async () => {
      harness = await startGateway(replyWith(200, '{"data":{"text":"Linux is modular."}}'));

      const response = await call(harness, '/v1/chat/completions', { json: kernelQuestion });
      const body = JSON.parse(response.text);

      expect(response.status).toBe(200);
      expect(harness.post.mock.calls[0][0]).toEqual({ question: 'Tell me more about kernels.' });
      expect(body.object).toBe('chat.completion');
      expect(body.model).toBe('default-model');
      expect(body.choices).toEqual([{
        index: 0,
        message: { role: 'assistant', content: 'Linux is modular.' },
        finish_reason: 'stop',
      }]);
      expect(body.usage).toEqual({ prompt_tokens: 0, completion_tokens: 5, total_tokens: 5 });
    });

    it('streams the reply as SSE chunks followed by [DONE]', async () => {
      harness = await startGateway(replyWith(200, '{"data":{"text":"Linux is modular."}}'));

      const response = await call(harness, '/v1/chat/completions', { json: { ...kernelQuestion, stream: true } });

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('text/event-stream');

      const events = response.text.split('\n\n').filter((event) => event.length > 0);
      expect(events.every((event) => event.startsWith('data: '))).toBe(true);
      expect(events.at(-1)).toBe('data: [DONE]');

      const chunks = events.slice(0, -1).map((event) => JSON.parse(event.slice('data: '.length)));
      expect(chunks.map((chunk) => chunk.choices[0])).toEqual([
        { index: 0, delta: { role: 'assistant' } },
        { index: 0, delta: { content: 'is ' } },
        { index: 0, delta: { content: 'modular. ' } },
        { index: 0, delta: {}, finish_reason: 'stop' },
      ]);
      expect(new Set(chunks.map((chunk) => chunk.id)).size).toBe(1);
      expect(chunks.every((chunk) => chunk.model === 'default-model')).toBe(true);
    });

    it('rejects a request without messages', async () => {
      harness = await startGateway(replyWith(200, '{}'));

      const response = await call(harness, '/v1/chat/completions', { json: { model: 'default-model' } });

      expect(response.status).toBe(400);
      expect(JSON.parse(response.text)).toEqual({
        error: {
          message: 'messages is required',
          type: 'invalid_request_error',
          code: 'invalid_request',
          param: 'messages',
        },
      });
      expect(harness.post).not.toHaveBeenCalled();
    });

    it('rejects malformed JSON', async () => {
      harness = await startGateway(replyWith(200, '{}'));

      const response = await call(harness, '/v1/chat/completions', { body: '{"model": ' });

      expect(response.status).toBe(400);
      expect(JSON.parse(response.text)).toEqual({
        error: {
          message: 'Request body is not valid JSON',
          type: 'invalid_request_error',
          code: 'invalid_request',
        },
      });
    });

    it('hides backend failures behind a sanitized 502', async () => {
      harness = await startGateway(replyWith(500, 'Traceback: internal secret at /srv/app.py'));

      const response = await call(harness, '/v1/chat/completions', { json: kernelQuestion });

      expect(response.status).toBe(502);
      expect(JSON.parse(response.text)).toEqual({
        error: {
          message: 'The backend service request failed',
          type: 'backend_error',
          code: 'backend_error',
        },
      });
    });

    it('reports a reply without data.text as a transform error', async () => {
      harness = await startGateway(replyWith(200, '{"data":{"answer":"Linux is modular."}}'));

      const response = await call(harness, '/v1/chat/completions', { json: kernelQuestion });

      expect(response.status).toBe(500);
      expect(JSON.parse(response.text)).toEqual({
        error: {
          message: 'Failed to process the backend response',
          type: 'transform_error',
          code: 'transform_error',
        },
      });
    });

    it('answers 504 when the backend exceeds the timeout', async () => {
      const hang: BackendHandler = (_body, options = {}) => new Promise<BackendResponse>((_resolve, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
      harness = await startGateway(hang, { config: testConfig({ timeoutMs: 50 }) });

      const response = await call(harness, '/v1/chat/completions', { json: kernelQuestion });

      expect(response.status).toBe(504);
      expect(JSON.parse(response.text).error.type).toBe('timeout_error');
    });

    describe('when the client disconnects', () => {
      beforeEach(() => {
        enableLogCapture();
        clearCapturedLogs();
        configureLogger({ level: 'debug' });
      });

      afterEach(() => {
        disableLogCapture();
        configureLogger({ level: 'info' });
      });

      it('cancels the backend call and never starts the stream', async () => {
        const words = Array.from({ length: 30 }, (_, i) => `word${i}`).join(' ');
        let backendSignal: AbortSignal | undefined;
        const slowReply: BackendHandler = async (_body, options = {}) => {
          backendSignal = options.signal;
          await new Promise((resolve) => setTimeout(resolve, 200));
          return { status: 200, body: JSON.stringify({ data: { text: words } }) };
        };
        harness = await startGateway(slowReply, {
          config: { ...testConfig(), streaming: { chunkDelayMs: 5 } },
        });

        const client = new AbortController();
        const pending = request(`${harness.baseUrl}/v1/chat/completions`, {
          method: 'POST',
          headers: { 'content-type': 'application/json' },
          body: JSON.stringify({ ...kernelQuestion, stream: true }),
          signal: client.signal,
        });
        await vi.waitFor(() => expect(harness.post).toHaveBeenCalledTimes(1));
        client.abort();
        await expect(pending).rejects.toThrow();

        const messages = () => getCapturedLogs().map((entry) => entry.message);
        await vi.waitFor(() => expect(messages()).toContain('Client disconnected before stream started'), {
          timeout: 2000,
        });
        expect(backendSignal?.aborted).toBe(true);
        expect(messages()).not.toContain('Stream completed');
        expect(messages()).not.toContain('Client disconnected during stream');
      });
    });

    it('returns JSON errors, not a stream, when the streaming backend call fails', async () => {
      harness = await startGateway(replyWith(503, 'down'));

      const response = await call(harness, '/v1/chat/completions', { json: { ...kernelQuestion, stream: true } });

      expect(response.status).toBe(502);
      expect(response.headers['content-type']).toMatch(/^application\/json/);
    });
  });

  describe('admission control', () => {
    it('rejects requests over the burst before any backend call', async () => {
      const frozen = () => 0;
      harness = await startGateway(replyWith(200, '{"data":{"text":"ok"}}'), {
        rateLimiter: new TokenBucketRateLimiter({ ratePerSecond: 1, burst: 2 }, frozen),
      });

      const statuses: number[] = [];
      let rejected: Awaited<ReturnType<typeof call>> | undefined;
      for (let i = 0; i < 4; i++) {
        const response = await call(harness, '/v1/chat/completions', { json: kernelQuestion });
        statuses.push(response.status);
        if (response.status === 429) rejected = response;
      }

      expect(statuses).toEqual([200, 200, 429, 429]);
      expect(harness.post).toHaveBeenCalledTimes(2);
      expect(rejected?.headers['retry-after']).toBe('1');
      expect(JSON.parse(rejected?.text ?? '{}').error.type).toBe('rate_limit_error');
    });
  });

  describe('CORS', () => {
    beforeEach(async () => {
      harness = await startGateway(replyWith(200, '{}'));
    });

    it('allows listed origins', async () => {
      const response = await call(harness, '/health', { headers: { origin: ALLOWED_ORIGIN } });
      expect(response.headers['access-control-allow-origin']).toBe(ALLOWED_ORIGIN);
    });

    it('sends no CORS headers to other origins', async () => {
      const response = await call(harness, '/health', { headers: { origin: 'http://evil.test' } });
      expect(response.headers['access-control-allow-origin']).toBeUndefined();
    });

    it('answers preflight requests', async () => {
      const response = await call(harness, '/v1/chat/completions', {
        method: 'OPTIONS',
        headers: {
          origin: ALLOWED_ORIGIN,
          'access-control-request-method': 'POST',
        },
      });

      expect(response.status).toBe(204);
      expect(response.headers['access-control-allow-origin']).toBe(ALLOWED_ORIGIN);
    });

    it('refuses an empty allow-list', () => {
      expect(() => createCorsMiddleware([])).toThrow(ConfigError);
    });
  });

  describe('unknown endpoints', () => {
    beforeEach(async () => {
      harness = await startGateway(replyWith(200, '{}'));
    });

    it('answers 404 in the error format', async () => {
      const response = await call(harness, '/v1/embeddings', { json: {} });

      expect(response.status).toBe(404);
      expect(JSON.parse(response.text).error).toEqual({
        message: 'Unknown endpoint: POST /v1/embeddings',
        type: 'invalid_request_error',
        code: 'not_found',
      });
    });
  });
});
