// Base Provider Adapter abstract class
import type { ChatCompletionRequest, ChatCompletionResponse } from '../types/chat.js';
import type { BackendClient, BackendResponse } from '../services/backendClient.js';
import type { BackendConfig, ProviderKind } from '../services/config.js';
import { BackendError, TimeoutError } from '../services/errors.js';
import { defaultLogger, type Logger } from '../services/logger.js';

/**
 * JSON object sent to the backend (shape varies by provider)
 */
export interface BackendPayload {
  [key: string]: unknown;
}

/**
 * Abstract base class for provider adapters
 *
 * Variants supply the three mapping hooks; the outbound call, its timeout
 * and status handling are shared.
 */
export abstract class ProviderAdapter {
  abstract readonly providerId: ProviderKind;

  /**
   * Map a chat request to the backend payload. Never throws: a request that
   * cannot be mapped yields an empty or partial payload and a logged error.
   */
  abstract transformRequest(request: ChatCompletionRequest, logger?: Logger): BackendPayload;

  /**
   * Map a parsed backend reply to a chat completion
   *
   * @throws TransformError when required fields are missing
   */
  abstract transformResponse(payload: unknown, model: string): ChatCompletionResponse;

  /**
   * Pull the full reply text out of a parsed backend reply for streaming
   *
   * @throws TransformError when required fields are missing
   */
  abstract extractStreamingText(payload: unknown): string;

  /**
   * Execute a chat completion against the backend
   */
  async handleRequest(
    client: BackendClient,
    backend: BackendConfig,
    request: ChatCompletionRequest,
    logger: Logger = defaultLogger,
    signal?: AbortSignal
  ): Promise<ChatCompletionResponse> {
    const payload = await this.callBackend(client, backend, request, logger, signal);
    return this.transformResponse(payload, request.model);
  }

  /**
   * Execute the backend call and return the complete reply text, which the
   * streaming engine then replays
   */
  async handleStreamingRequest(
    client: BackendClient,
    backend: BackendConfig,
    request: ChatCompletionRequest,
    logger: Logger = defaultLogger,
    signal?: AbortSignal
  ): Promise<string> {
    const payload = await this.callBackend(client, backend, request, logger, signal);
    return this.extractStreamingText(payload);
  }

  /**
   * POST the mapped payload and parse the reply body as JSON. The call is
   * aborted on timeout or when the caller's signal fires.
   */
  protected async callBackend(
    client: BackendClient,
    backend: BackendConfig,
    request: ChatCompletionRequest,
    logger: Logger,
    signal?: AbortSignal
  ): Promise<unknown> {
    const body = this.transformRequest(request, logger);
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, backend.timeoutMs);
    const cancel = () => controller.abort();
    signal?.addEventListener('abort', cancel, { once: true });
    if (signal?.aborted) {
      controller.abort();
    }
    const startTime = Date.now();

    let response: BackendResponse;
    try {
      response = await client.post(body, { signal: controller.signal });
    } catch (error) {
      if (signal?.aborted) {
        logger.info('Backend call cancelled by caller', { provider: this.providerId });
        throw new BackendError('Backend request cancelled');
      }

      if (timedOut) {
        logger.error('Backend call timed out', {
          provider: this.providerId,
          timeoutMs: backend.timeoutMs,
        });
        throw new TimeoutError(backend.timeoutMs);
      }

      const reason = error instanceof Error ? error.message : String(error);
      logger.error('Backend call failed', {
        provider: this.providerId,
        error: reason,
      });
      throw new BackendError(`Backend request failed: ${reason}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', cancel);
    }

    logger.debug('Backend responded', {
      provider: this.providerId,
      status: response.status,
      durationMs: Date.now() - startTime,
    });

    if (response.status < 200 || response.status >= 300) {
      logger.error('Backend returned error status', {
        provider: this.providerId,
        status: response.status,
        body: response.body,
      });
      throw new BackendError(`Backend returned status ${response.status}`, response.status);
    }

    try {
      const payload: unknown = JSON.parse(response.body);
      return payload;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error('Backend returned malformed JSON', {
        provider: this.providerId,
        error: reason,
        body: response.body,
      });
      throw new BackendError(`Backend response is not valid JSON: ${reason}`, response.status);
    }
  }
}
