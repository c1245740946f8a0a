/**
 * Wire Format Service
 *
 * Parses inbound chat completion bodies and backend replies into the
 * OpenAI-compatible model, and serializes requests back to JSON objects.
 * Absent or null optional fields never fail parsing and are never emitted
 * as explicit nulls.
 */

import { z } from 'zod';
import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatChoice,
  ChatMessage,
  ErrorResponse,
  ToolDefinition,
} from '../types/chat.js';
import { createErrorResponse } from './errors.js';

/**
 * Optional on the wire: missing and null both become undefined
 */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);
}

const nonNegativeInt = z.number().int().nonnegative();

const ToolCallSchema = z.object({
  id: z.string(),
  type: z.string(),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
  }),
});

const ToolDefinitionSchema = z.object({
  type: z.string(),
  function: z.object({
    name: z.string(),
    description: optional(z.string()),
    parameters: z.unknown(),
  }),
});

const MessageSchema = z.object({
  role: z.string(),
  content: z.string().nullish().transform((value) => value ?? ''),
  name: optional(z.string()),
  tool_calls: optional(z.array(ToolCallSchema)),
});

const ChatRequestSchema = z.object({
  model: z.string(),
  messages: z.array(MessageSchema),
  temperature: optional(z.number()),
  top_p: optional(z.number()),
  n: optional(nonNegativeInt),
  stream: optional(z.boolean()),
  stop: optional(z.union([z.string().transform((stop) => [stop]), z.array(z.string())])),
  max_tokens: optional(nonNegativeInt),
  presence_penalty: optional(z.number()),
  frequency_penalty: optional(z.number()),
  user: optional(z.string()),
  tools: optional(z.array(ToolDefinitionSchema)),
  tool_choice: z.unknown().transform((value) => value ?? undefined),
});

const ChatResponseSchema = z.object({
  id: z.string(),
  object: z.string(),
  created: z.number().int(),
  model: z.string(),
  choices: z.array(z.object({
    index: nonNegativeInt,
    message: MessageSchema,
    finish_reason: optional(z.string()),
  })),
  usage: z.object({
    prompt_tokens: nonNegativeInt,
    completion_tokens: nonNegativeInt,
    total_tokens: nonNegativeInt,
  }),
});

const KNOWN_REQUEST_FIELDS: ReadonlySet<string> = new Set(Object.keys(ChatRequestSchema.shape));

export type ChatRequestValidation =
  | { valid: true; request: ChatCompletionRequest }
  | { valid: false; error: ErrorResponse };

export type ChatResponseParse =
  | { success: true; response: ChatCompletionResponse }
  | { success: false; error: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Render a zod issue path the way callers write it: messages[1].role
 */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') {
      return `${acc}[${segment}]`;
    }
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}

function invalidRequest(message: string, param?: string): ErrorResponse {
  return createErrorResponse(message, 'invalid_request_error', 'invalid_request', param);
}

function describeIssue(issue: z.ZodIssue): ErrorResponse {
  const param = formatIssuePath(issue.path);
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return invalidRequest(`${param} is required`, param);
  }
  return invalidRequest(`${param}: ${issue.message}`, param);
}

function toChatMessage(message: z.output<typeof MessageSchema>): ChatMessage {
  return {
    role: message.role,
    content: message.content,
    ...(message.name !== undefined && { name: message.name }),
    ...(message.tool_calls !== undefined && { tool_calls: message.tool_calls }),
  };
}

function toToolDefinition(tool: z.output<typeof ToolDefinitionSchema>): ToolDefinition {
  return {
    type: tool.type,
    function: {
      name: tool.function.name,
      ...(tool.function.description !== undefined && { description: tool.function.description }),
      parameters: tool.function.parameters,
    },
  };
}

/**
 * Copy an object, dropping keys whose value is undefined or null
 */
export function omitAbsent(value: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(value).filter(([, field]) => field !== undefined && field !== null)
  );
}

/**
 * Validate an inbound chat completion body
 */
export function parseChatRequest(body: unknown): ChatRequestValidation {
  if (!isRecord(body)) {
    return { valid: false, error: invalidRequest('Request body must be a JSON object') };
  }

  const parsed = ChatRequestSchema.safeParse(body);
  if (!parsed.success) {
    return { valid: false, error: describeIssue(parsed.error.issues[0]) };
  }

  const data = parsed.data;
  const extra: Record<string, unknown> = Object.fromEntries(
    Object.entries(body).filter(([key]) => !KNOWN_REQUEST_FIELDS.has(key))
  );

  const request: ChatCompletionRequest = {
    model: data.model,
    messages: data.messages.map(toChatMessage),
    temperature: data.temperature,
    top_p: data.top_p,
    n: data.n,
    stream: data.stream,
    stop: data.stop,
    max_tokens: data.max_tokens,
    presence_penalty: data.presence_penalty,
    frequency_penalty: data.frequency_penalty,
    user: data.user,
    tools: data.tools?.map(toToolDefinition),
    tool_choice: data.tool_choice,
    extra,
  };

  return { valid: true, request };
}

/**
 * Serialize a request to its JSON object form. Unrecognized fields are
 * flattened back to the top level; known fields take precedence.
 */
export function serializeChatRequest(request: ChatCompletionRequest): Record<string, unknown> {
  const { extra, messages, ...known } = request;
  const payload: Record<string, unknown> = {
    ...omitAbsent(known),
    messages: messages.map((message) => omitAbsent(message)),
  };

  // fromEntries keeps keys such as "__proto__" as own data properties
  const unknownFields = Object.entries(extra).filter(([key]) => !Object.hasOwn(payload, key));

  return { ...payload, ...Object.fromEntries(unknownFields) };
}

/**
 * Validate a backend payload that claims to already be a chat completion
 */
export function parseChatResponse(payload: unknown): ChatResponseParse {
  const parsed = ChatResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = formatIssuePath(issue.path);
    return { success: false, error: path ? `${path}: ${issue.message}` : issue.message };
  }

  const data = parsed.data;
  const choices: ChatChoice[] = data.choices.map((choice) => ({
    index: choice.index,
    message: toChatMessage(choice.message),
    ...(choice.finish_reason !== undefined && { finish_reason: choice.finish_reason }),
  }));

  return {
    success: true,
    response: {
      id: data.id,
      object: data.object,
      created: data.created,
      model: data.model,
      choices,
      usage: data.usage,
    },
  };
}
