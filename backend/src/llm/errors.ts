/**
 * Gateway errors and their standard error envelope
 */

import type { ErrorEnvelope, ErrorType } from '@agent-gateway/shared-types';

export class GatewayError extends Error {
  readonly statusCode: number;
  readonly type: ErrorType;
  readonly code?: string;

  constructor(
    statusCode: number,
    type: ErrorType,
    message: string,
    options?: { code?: string; cause?: unknown },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'GatewayError';
    this.statusCode = statusCode;
    this.type = type;
    this.code = options?.code;
  }

  toEnvelope(): ErrorEnvelope {
    return buildErrorEnvelope(this.message, this.type, this.code);
  }
}

export function buildErrorEnvelope(message: string, type: ErrorType, code?: string): ErrorEnvelope {
  const envelope: ErrorEnvelope = { error: { message, type } };
  if (code) {
    envelope.error.code = code;
  }
  return envelope;
}

/**
 * Wrap anything thrown into a GatewayError so it can be rendered as an envelope
 */
export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new GatewayError(500, 'server_error', message, { cause: error });
}

export function isAbortError(error: unknown): boolean {
  if (error != null && typeof error === 'object' && 'name' in error) {
    return error.name === 'AbortError';
  }
  return false;
}
