/**
 * API Routes
 *
 * OpenAI-compatible API endpoints: chat completions (streaming and not),
 * model listing and health.
 */

import { Router, Request, Response, NextFunction, IRouter } from 'express';
import type { ProviderAdapter } from '../adapters/base.js';
import { getRequestLogger } from '../middleware/logging.js';
import type { BackendClient } from '../services/backendClient.js';
import type { GatewayConfig } from '../services/config.js';
import type { Logger } from '../services/logger.js';
import { emulateStream, formatChunkEvent, formatSSEDone } from '../services/streaming.js';
import { parseChatRequest } from '../services/wireFormat.js';
import type { ChatCompletionRequest, ModelListResponse } from '../types/chat.js';

/**
 * Process-wide state the routes read
 */
export interface RouterContext {
  config: GatewayConfig;
  client: BackendClient;
  adapter: ProviderAdapter;
}

export function createRouter(context: RouterContext): IRouter {
  const { config, client, adapter } = context;
  const router: IRouter = Router();

  /**
   * Replay the complete backend reply as SSE once the backend call succeeded.
   * Errors before this point still get a regular JSON error response.
   */
  async function streamCompletion(
    chatRequest: ChatCompletionRequest,
    res: Response,
    logger: Logger
  ): Promise<void> {
    // Armed before the backend call so a disconnect while waiting cancels it
    const controller = new AbortController();
    res.on('close', () => controller.abort());

    const text = await adapter
      .handleStreamingRequest(client, config.backend, chatRequest, logger, controller.signal)
      .catch((error: unknown) => {
        if (controller.signal.aborted) return null;
        throw error;
      });

    if (text === null || controller.signal.aborted) {
      logger.info('Client disconnected before stream started');
      return;
    }

    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    let chunkCount = 0;
    const stream = emulateStream(text, chatRequest.model, {
      delayMs: config.streaming.chunkDelayMs,
      signal: controller.signal,
    });

    for await (const chunk of stream) {
      res.write(formatChunkEvent(chunk, logger));
      chunkCount++;
    }

    if (controller.signal.aborted) {
      logger.info('Client disconnected during stream', { chunkCount });
      return;
    }

    res.write(formatSSEDone());
    res.end();
    logger.debug('Stream completed', { chunkCount });
  }

  // Health check endpoint
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  /**
   * GET /v1/models
   *
   * Lists the single model this gateway fronts.
   */
  router.get('/v1/models', (_req: Request, res: Response) => {
    const body: ModelListResponse = {
      object: 'list',
      data: [{
        id: config.model.id,
        object: 'model',
        created: config.model.created,
        owned_by: config.model.ownedBy,
      }],
    };
    res.json(body);
  });

  /**
   * POST /v1/chat/completions
   *
   * OpenAI-compatible chat completions endpoint. Streaming replies are
   * emulated from the complete backend answer.
   */
  router.post('/v1/chat/completions', async (req: Request, res: Response, next: NextFunction) => {
    const logger = getRequestLogger(req);

    const validation = parseChatRequest(req.body);
    if (!validation.valid) {
      logger.warn('Invalid chat completion request', {
        error: validation.error.error.message,
      });
      res.status(400).json(validation.error);
      return;
    }

    const chatRequest = validation.request;

    try {
      if (chatRequest.stream) {
        await streamCompletion(chatRequest, res, logger);
      } else {
        const response = await adapter.handleRequest(client, config.backend, chatRequest, logger);
        res.json(response);
      }
    } catch (error) {
      next(error);
    }
  });

  return router;
}
