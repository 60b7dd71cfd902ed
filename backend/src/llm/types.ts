/**
 * Native agent-completion protocol types
 *
 * Shapes spoken by the backend. The standard protocol the gateway exposes
 * lives in @agent-gateway/shared-types.
 */

// ============================================================================
// Request
// ============================================================================

export interface NativeMessage {
  role: string;
  content: string;
  name?: string;
}

/** A single user turn goes out as `prompt`, anything else as `messages` */
export type NativeInput = { prompt: string } | { messages: NativeMessage[] };

/**
 * Sampling parameters. A field is present only when the caller set it.
 */
export interface NativeParameters {
  temperature?: number;
  top_p?: number;
  max_tokens?: number;
  stop?: string[];
  presence_penalty?: number;
  frequency_penalty?: number;
}

export interface NativeRequest {
  input: NativeInput;
  /** Always sent, `{}` when no parameter was set */
  parameters: NativeParameters;
  debug: Record<string, never>;
}

// ============================================================================
// Response
// ============================================================================

export interface NativeModelUsage {
  input_tokens: number;
  output_tokens: number;
  model_id: string;
}

export interface NativeOutput {
  /** Cumulative text: on a stream frame, everything produced so far */
  text: string;
  /** Empty when the backend omitted it; "null" on non-final stream frames */
  finish_reason: string;
  session_id: string;
}

/**
 * Completed response, and the shape of every stream frame.
 * Missing fields are normalised to empty values while parsing.
 */
export interface NativeResponse {
  output: NativeOutput;
  usage: {
    models: NativeModelUsage[];
  };
  request_id: string;
}

export interface NativeErrorBody {
  code: string;
  message: string;
  request_id: string;
}

// ============================================================================
// Streaming state
// ============================================================================

export type StreamState = 'streaming' | 'done';

/**
 * Per-exchange state of a translated stream. Created for one streaming
 * request and dropped when it ends.
 */
export interface StreamCursor {
  /** Length of the cumulative text already emitted as deltas */
  lastLength: number;
  /** First non-empty request id seen; used on every chunk */
  streamId: string;
  state: StreamState;
  /** Set when the source ended before a frame with a finish reason */
  abnormalEnd: boolean;
  readonly model: string;
  /** Unix seconds, shared by every chunk of the exchange */
  readonly created: number;
}
