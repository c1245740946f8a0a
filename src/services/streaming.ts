/**
 * Streaming Emulation Service
 *
 * Replays a complete backend reply as a paced sequence of OpenAI-style
 * chunks, and frames chunks as SSE events.
 */

import { setTimeout as sleep } from 'timers/promises';
import type { ChatCompletionChunk, ChunkDelta } from '../types/chat.js';
import { currentTimestamp, generateCompletionId } from './ids.js';
import { defaultLogger, type Logger } from './logger.js';

export const DEFAULT_CHUNK_DELAY_MS = 20;

const SERIALIZATION_ERROR_EVENT =
  'data: {"error":{"message":"Failed to serialize chunk","type":"serialization_error"}}\n\n';

export interface StreamOptions {
  /** Pause before every chunk after the first */
  delayMs?: number;
  /** Ends the sequence early, e.g. when the caller disconnects */
  signal?: AbortSignal;
  id?: string;
  created?: number;
}

/**
 * Split text on whitespace runs, keeping one trailing space per word
 */
export function splitWords(text: string): string[] {
  return text
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => `${word} `);
}

function buildChunk(
  id: string,
  created: number,
  model: string,
  delta: ChunkDelta,
  finishReason?: string
): ChatCompletionChunk {
  return {
    id,
    object: 'chat.completion.chunk',
    created,
    model,
    choices: [{
      index: 0,
      delta,
      ...(finishReason && { finish_reason: finishReason }),
    }],
  };
}

/**
 * Resolves false when the signal fired before or during the pause
 */
async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  if (ms <= 0) return true;

  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) return false;
    throw error;
  }
}

/**
 * Emit N + 1 chunks for an N-word text: the assistant role, the words after
 * the first, then an empty delta finishing with "stop". Text without words
 * still yields the role and terminal chunks.
 */
export async function* emulateStream(
  text: string,
  model: string,
  options: StreamOptions = {}
): AsyncGenerator<ChatCompletionChunk> {
  const { delayMs = DEFAULT_CHUNK_DELAY_MS, signal } = options;
  const id = options.id ?? generateCompletionId();
  const created = options.created ?? currentTimestamp();
  const words = splitWords(text);
  const lastStep = Math.max(words.length, 1);

  if (signal?.aborted) return;
  yield buildChunk(id, created, model, { role: 'assistant' });

  for (let step = 1; step <= lastStep; step++) {
    if (!(await pause(delayMs, signal))) return;

    if (step === lastStep) {
      yield buildChunk(id, created, model, {}, 'stop');
    } else {
      yield buildChunk(id, created, model, { content: words[step] });
    }
  }
}

/**
 * Format a chunk as an SSE event. A chunk that cannot be serialized becomes
 * an error event so the sequence can continue.
 */
export function formatChunkEvent(chunk: ChatCompletionChunk, logger: Logger = defaultLogger): string {
  try {
    return `data: ${JSON.stringify(chunk)}\n\n`;
  } catch (error) {
    logger.error('Failed to serialize chunk', {
      chunkId: chunk.id,
      error: error instanceof Error ? error.message : String(error),
    });
    return SERIALIZATION_ERROR_EVENT;
  }
}

/**
 * Format the SSE done signal
 */
export function formatSSEDone(): string {
  return 'data: [DONE]\n\n';
}
