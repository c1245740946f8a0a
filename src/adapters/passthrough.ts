/**
 * Pass-through Adapter
 *
 * For backends that already speak the chat completion schema: the request
 * is forwarded as-is (unrecognized fields included) and the reply is only
 * validated.
 */

import { ProviderAdapter, type BackendPayload } from './base.js';
import type { ChatCompletionRequest, ChatCompletionResponse } from '../types/chat.js';
import { TransformError, describePayload } from '../services/errors.js';
import { defaultLogger, type Logger } from '../services/logger.js';
import { isRecord, parseChatResponse, serializeChatRequest } from '../services/wireFormat.js';

export class PassthroughAdapter extends ProviderAdapter {
  readonly providerId = 'passthrough';

  transformRequest(request: ChatCompletionRequest, logger: Logger = defaultLogger): BackendPayload {
    try {
      // Values JSON cannot carry are dropped here rather than on the wire
      const json: unknown = JSON.parse(JSON.stringify(serializeChatRequest(request)));
      return isRecord(json) ? json : {};
    } catch (error) {
      logger.error('Failed to serialize request for backend', {
        provider: this.providerId,
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  transformResponse(payload: unknown): ChatCompletionResponse {
    const parsed = parseChatResponse(payload);
    if (!parsed.success) {
      throw new TransformError(
        `Backend reply is not a chat completion (${parsed.error}): ${describePayload(payload)}`
      );
    }
    return parsed.response;
  }

  extractStreamingText(payload: unknown): string {
    const choices = isRecord(payload) ? payload.choices : undefined;
    if (!Array.isArray(choices) || choices.length === 0) {
      throw new TransformError(`Backend reply has no choices: ${describePayload(payload)}`);
    }

    const first: unknown = choices[0];
    const message = isRecord(first) ? first.message : undefined;
    const content = isRecord(message) ? message.content : undefined;
    if (typeof content !== 'string') {
      throw new TransformError(
        `Backend reply is missing choices[0].message.content: ${describePayload(payload)}`
      );
    }

    return content;
  }
}
