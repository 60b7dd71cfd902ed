/**
 * Backend Module - Unified Export Point
 */

// Gateway
export { createApp, startServer, SERVICE_NAME, CHAT_COMPLETIONS_PATH } from './server.js';
export type { CreateAppOptions } from './server.js';

// Backend client, adapters and translators
export * from './llm/index.js';

// Request validation
export { chatCompletionRequestSchema, parseChatCompletionRequest } from './validation/chat-request.js';
export type { ValidationResult } from './validation/chat-request.js';

// Configuration
export {
  config,
  loadConfig,
  validateConfig,
  printConfig,
  getNativeEndpoint,
  getCompatibleEndpoint,
} from './config/index.js';
export type { Config, AgentConfig } from './config/index.js';

// Logging
export { Log, createLogger } from './logging/log.js';
export type { LogLevel, LogEntry } from './logging/log.js';

// Type re-exports for convenience
export type * from '@agent-gateway/shared-types';
