/**
 * Field-remapping Adapter
 *
 * For question/answer backends: the last user message is sent as
 * `{ "question": ... }` and the reply's `data.text` becomes the single
 * assistant choice.
 */

import { ProviderAdapter, type BackendPayload } from './base.js';
import type { ChatCompletionRequest, ChatCompletionResponse, ChatMessage, Usage } from '../types/chat.js';
import { TransformError, describePayload } from '../services/errors.js';
import { currentTimestamp, generateCompletionId } from '../services/ids.js';
import { isRecord } from '../services/wireFormat.js';

export interface FieldRemappingOptions {
  /** Send the whole conversation as `context` alongside the question */
  forwardContext?: boolean;
}

export interface ContextTurn {
  role: string;
  content: string;
}

/**
 * Content of the last user message, or "" when there is none
 */
export function extractQuestion(messages: ChatMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === 'user') {
      return messages[i].content;
    }
  }
  return '';
}

export function buildContext(messages: ChatMessage[]): ContextTurn[] {
  return messages.map(({ role, content }) => ({ role, content }));
}

/**
 * Rough token count: four characters per token
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function readCount(usage: Record<string, unknown>, field: string): number | undefined {
  const value = usage[field];
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : undefined;
}

/**
 * Backend-reported usage when present, otherwise an estimate from the text
 */
export function resolveUsage(payload: unknown, text: string): Usage {
  const usage = isRecord(payload) ? payload.usage : undefined;

  if (isRecord(usage)) {
    const promptTokens = readCount(usage, 'prompt_tokens') ?? 0;
    const completionTokens = readCount(usage, 'completion_tokens') ?? 0;
    return {
      prompt_tokens: promptTokens,
      completion_tokens: completionTokens,
      total_tokens: readCount(usage, 'total_tokens') ?? promptTokens + completionTokens,
    };
  }

  const completionTokens = estimateTokens(text);
  return {
    prompt_tokens: 0,
    completion_tokens: completionTokens,
    total_tokens: completionTokens,
  };
}

export class FieldRemappingAdapter extends ProviderAdapter {
  readonly providerId = 'field_remapping';
  private readonly forwardContext: boolean;

  constructor(options: FieldRemappingOptions = {}) {
    super();
    this.forwardContext = options.forwardContext ?? false;
  }

  transformRequest(request: ChatCompletionRequest): BackendPayload {
    const payload: BackendPayload = {
      question: extractQuestion(request.messages),
    };

    if (this.forwardContext) {
      payload.context = buildContext(request.messages);
    }

    return payload;
  }

  transformResponse(payload: unknown, model: string): ChatCompletionResponse {
    const text = this.readText(payload);

    return {
      id: generateCompletionId(),
      object: 'chat.completion',
      created: currentTimestamp(),
      model,
      choices: [{
        index: 0,
        message: { role: 'assistant', content: text },
        finish_reason: 'stop',
      }],
      usage: resolveUsage(payload, text),
    };
  }

  extractStreamingText(payload: unknown): string {
    return this.readText(payload);
  }

  private readText(payload: unknown): string {
    const data = isRecord(payload) ? payload.data : undefined;
    if (!isRecord(data)) {
      throw new TransformError(`Backend reply is missing data: ${describePayload(payload)}`);
    }
    if (typeof data.text !== 'string') {
      throw new TransformError(`Backend reply is missing data.text: ${describePayload(payload)}`);
    }
    return data.text;
  }
}
