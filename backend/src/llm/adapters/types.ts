/**
 * Protocol Adapter Interface
 *
 * An adapter turns a validated standard request into the HTTP request sent to
 * the backend. The native adapter also translates everything coming back.
 */

import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  ErrorEnvelope,
} from '@agent-gateway/shared-types';
import type { NativeResponse } from '../types.js';

export type GatewayMode = 'native' | 'compatible';

/** HTTP request structure built by an adapter */
export interface AdapterRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

export interface BuildRequestOptions {
  stream: boolean;
  /** Caller's Accept header, honoured on buffered calls */
  accept?: string;
}

export interface ProtocolAdapter {
  readonly mode: GatewayMode;

  /** Build the outbound HTTP request (url, headers, body) */
  buildRequest(request: ChatCompletionRequest, options: BuildRequestOptions): AdapterRequest;
}

/**
 * Adapter for a backend that does not speak the standard protocol.
 */
export interface TranslatingAdapter extends ProtocolAdapter {
  /** Complete backend body → standard response; null when it cannot be parsed */
  parseResponse(raw: string, model: string): ChatCompletionResponse | null;

  /** One stream frame payload; null for a malformed frame */
  parseStreamFrame(data: string): NativeResponse | null;

  /** Non-success backend body → standard error envelope; null when nothing usable was found */
  convertError(status: number, body: string): ErrorEnvelope | null;
}

export const USER_AGENT = 'agent-gateway/1.0';

export function buildForwardHeaders(apiKey: string, options: BuildRequestOptions): Record<string, string> {
  let accept = options.stream ? 'text/event-stream' : 'application/json';
  if (!options.stream && options.accept) {
    accept = options.accept;
  }
  return {
    Authorization: `Bearer ${apiKey}`,
    'Content-Type': 'application/json',
    'User-Agent': USER_AGENT,
    Accept: accept,
  };
}
