/**
 * LLM Module Entry Point / Factory
 *
 * Builds the shared AgentClient and the protocol adapter selected by
 * configuration. Both are created once at startup and shared read-only.
 */

import type { AgentConfig, Config } from '../config/index.js';
import { getCompatibleEndpoint, getNativeEndpoint } from '../config/index.js';
import { AgentClient } from './client.js';
import type { FetchLike } from './client.js';
import { NativeAgentAdapter } from './adapters/native-agent.js';
import { CompatibleModeAdapter } from './adapters/compatible.js';

// Re-export key types and classes for convenience
export { AgentClient, UpstreamStream } from './client.js';
export type { AgentClientOptions, BufferedResponse, FetchLike } from './client.js';
export { StreamHandler } from './stream-handler.js';
export type { SSEMessage } from './stream-handler.js';
export { StreamTranslator } from './stream-translator.js';
export type { TranslatedStreamEvent } from './stream-translator.js';
export { extractErrorObject } from './error-extractor.js';
export { GatewayError, buildErrorEnvelope, toGatewayError, isAbortError } from './errors.js';
export { NativeAgentAdapter, errorTypeForStatus } from './adapters/native-agent.js';
export { CompatibleModeAdapter } from './adapters/compatible.js';
export type {
  AdapterRequest,
  BuildRequestOptions,
  GatewayMode,
  ProtocolAdapter,
  TranslatingAdapter,
} from './adapters/types.js';
export type {
  NativeErrorBody,
  NativeInput,
  NativeMessage,
  NativeParameters,
  NativeRequest,
  NativeResponse,
  StreamCursor,
  StreamState,
} from './types.js';

// ============================================================================
// Factory
// ============================================================================

/** Adapter picked by `USE_NATIVE_API`; narrow on `mode` */
export type GatewayAdapter = NativeAgentAdapter | CompatibleModeAdapter;

export function createAdapter(agent: AgentConfig): GatewayAdapter {
  if (agent.useNative) {
    return new NativeAgentAdapter({ endpoint: getNativeEndpoint(agent), apiKey: agent.apiKey });
  }
  return new CompatibleModeAdapter({ endpoint: getCompatibleEndpoint(agent), apiKey: agent.apiKey });
}

export interface CreateAgentClientOptions {
  /** Transport override, used by tests */
  fetch?: FetchLike;
}

export function createAgentClient(config: Config, options: CreateAgentClientOptions = {}): AgentClient {
  return new AgentClient({
    requestTimeoutMs: config.transport.requestTimeoutMs,
    streamTimeoutMs: config.transport.streamTimeoutMs,
    fetch: options.fetch,
  });
}
