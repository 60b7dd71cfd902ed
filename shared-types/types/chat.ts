/**
 * Chat Completion Types - standard chat-completion wire protocol
 *
 * The request, response, stream chunk and error shapes the gateway
 * presents to its callers.
 */

// ============================================================================
// Request
// ============================================================================

export type ChatRole = 'system' | 'user' | 'assistant';

/**
 * One conversation turn
 */
export interface ChatMessage {
  role: ChatRole;
  content: string;
  /** Optional participant name; omitted when empty */
  name?: string;
}

/**
 * Inbound chat-completion request
 *
 * Optional sampling fields are absent unless the caller set them.
 */
export interface ChatCompletionRequest {
  model: string;
  /** Non-empty, ordered */
  messages: ChatMessage[];
  temperature?: number;
  top_p?: number;
  max_tokens?: number;
  stream: boolean;
  presence_penalty?: number;
  frequency_penalty?: number;
  stop?: string[];
  user?: string;
  /** Function-calling fields; only the compatible endpoint receives them */
  functions?: unknown[];
  function_call?: unknown;
}

// ============================================================================
// Response
// ============================================================================

export interface ChatCompletionUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletionChoice {
  index: number;
  message: {
    role: 'assistant';
    content: string;
  };
  finish_reason: string;
}

/**
 * Non-streaming chat-completion result
 */
export interface ChatCompletionResponse {
  id: string;
  object: 'chat.completion';
  /** Unix seconds */
  created: number;
  model: string;
  choices: ChatCompletionChoice[];
  usage: ChatCompletionUsage;
}

// ============================================================================
// Streaming
// ============================================================================

export interface ChatCompletionChunkChoice {
  index: number;
  /** Only the text produced since the previous chunk */
  delta: {
    content?: string;
  };
  finish_reason: string | null;
}

/**
 * One streamed event, sent as `data: <json>\n\n`
 */
export interface ChatCompletionChunk {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: ChatCompletionChunkChoice[];
  /** Present on the terminal chunk when the backend reported usage */
  usage?: ChatCompletionUsage;
}

// ============================================================================
// Errors
// ============================================================================

export type ErrorType =
  | 'invalid_request_error'
  | 'authentication_error'
  | 'permission_error'
  | 'rate_limit_error'
  | 'server_error'
  | 'timeout_error'
  | 'api_error';

export interface ErrorEnvelope {
  error: {
    message: string;
    type: ErrorType;
    code?: string;
  };
}
