// Chat completion type definitions (OpenAI-compatible)

/**
 * Function invocation attached to an assistant message
 */
export interface FunctionCall {
  name: string;
  arguments: string;
}

export interface ToolCall {
  id: string;
  type: string;
  function: FunctionCall;
}

export interface FunctionDefinition {
  name: string;
  description?: string;
  parameters: unknown;
}

export interface ToolDefinition {
  type: string;
  function: FunctionDefinition;
}

/**
 * A single conversation turn. Roles are free-form: callers may introduce
 * roles beyond system/user/assistant.
 */
export interface ChatMessage {
  role: string;
  content: string;
  name?: string;
  tool_calls?: ToolCall[];
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  top_p?: number;
  n?: number;
  stream?: boolean;
  stop?: string[];
  max_tokens?: number;
  presence_penalty?: number;
  frequency_penalty?: number;
  user?: string;
  tools?: ToolDefinition[];
  tool_choice?: unknown;
  /** Unrecognized top-level fields, kept so providers may consult them */
  extra: Record<string, unknown>;
}

export interface Usage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatChoice {
  index: number;
  message: ChatMessage;
  finish_reason?: string;
}

export interface ChatCompletionResponse {
  id: string;
  object: string;
  created: number;
  model: string;
  choices: ChatChoice[];
  usage: Usage;
}

/**
 * Partial payload of a streamed chunk. At most one of role/content is set.
 */
export interface ChunkDelta {
  role?: string;
  content?: string;
  tool_calls?: ToolCall[];
}

export interface ChunkChoice {
  index: number;
  delta: ChunkDelta;
  finish_reason?: string;
}

export interface ChatCompletionChunk {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: ChunkChoice[];
}

export interface ModelDescriptor {
  id: string;
  object: 'model';
  created: number;
  owned_by: string;
}

export interface ModelListResponse {
  object: 'list';
  data: ModelDescriptor[];
}

export interface ErrorResponse {
  error: {
    message: string;
    type: string;
    code: string;
    param?: string;
  };
}
