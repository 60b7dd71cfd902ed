/**
 * Agent Gateway - shared wire types
 *
 * Types for the standard chat-completion protocol exposed by the gateway.
 * Clients of the gateway can import these directly.
 */

export type * from './types/chat.js';
