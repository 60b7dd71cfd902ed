/**
 * Native Agent Adapter
 *
 * Translates between the standard chat-completion protocol and the backend's
 * native agent-completion protocol:
 *   - request:  messages + sampling fields → `{input, parameters, debug}`
 *   - response: `{output, usage.models, request_id}` → `chat.completion`
 *   - errors:   `{code, message, request_id}` + HTTP status → `{error: {...}}`
 *
 * Stream frames share the response shape; the StreamTranslator turns them
 * into delta chunks.
 */

import { z } from 'zod';
import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatCompletionUsage,
  ErrorEnvelope,
  ErrorType,
} from '@agent-gateway/shared-types';
import type {
  NativeErrorBody,
  NativeInput,
  NativeModelUsage,
  NativeParameters,
  NativeRequest,
  NativeResponse,
} from '../types.js';
import { buildForwardHeaders } from './types.js';
import type { AdapterRequest, BuildRequestOptions, TranslatingAdapter } from './types.js';
import { extractErrorObject } from '../error-extractor.js';
import { buildErrorEnvelope } from '../errors.js';
import { createLogger } from '../../logging/log.js';

const log = createLogger('native-agent');

// ---------------------------------------------------------------------------
// Wire schemas (internal)
// ---------------------------------------------------------------------------

const lenientString = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const lenientCount = z
  .number()
  .nullish()
  .transform((value) => value ?? 0);

const nativeResponseSchema: z.ZodType<NativeResponse, z.ZodTypeDef, unknown> = z.object({
  output: z
    .object({
      text: lenientString,
      finish_reason: lenientString,
      session_id: lenientString,
    })
    .nullish()
    .transform((output) => output ?? { text: '', finish_reason: '', session_id: '' }),
  usage: z
    .object({
      models: z
        .array(
          z.object({
            input_tokens: lenientCount,
            output_tokens: lenientCount,
            model_id: lenientString,
          }),
        )
        .nullish()
        .transform((models) => models ?? []),
    })
    .nullish()
    .transform((usage) => usage ?? { models: [] }),
  request_id: lenientString,
});

const nativeErrorSchema: z.ZodType<NativeErrorBody, z.ZodTypeDef, unknown> = z.object({
  code: lenientString,
  message: lenientString,
  request_id: lenientString,
});

const GENERIC_ERROR: NativeErrorBody = {
  code: 'api_error',
  message: 'API request failed',
  request_id: '',
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Fixed HTTP status → standard error type table
 */
export function errorTypeForStatus(status: number): ErrorType {
  switch (status) {
    case 400:
    case 404:
      return 'invalid_request_error';
    case 401:
      return 'authentication_error';
    case 403:
      return 'permission_error';
    case 429:
      return 'rate_limit_error';
    case 500:
    case 502:
    case 503:
      return 'server_error';
    default:
      return 'api_error';
  }
}

/**
 * Usage from the first per-model entry, or undefined when none was reported
 */
export function usageFromModels(models: NativeModelUsage[]): ChatCompletionUsage | undefined {
  const first = models[0];
  if (!first) {
    return undefined;
  }
  return {
    prompt_tokens: first.input_tokens,
    completion_tokens: first.output_tokens,
    total_tokens: first.input_tokens + first.output_tokens,
  };
}

function parseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

export function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export class NativeAgentAdapter implements TranslatingAdapter {
  readonly mode = 'native' as const;

  constructor(private readonly opts: { endpoint: string; apiKey: string }) {}

  // ---- buildRequest -------------------------------------------------------

  buildRequest(request: ChatCompletionRequest, options: BuildRequestOptions): AdapterRequest {
    return {
      url: this.opts.endpoint,
      headers: buildForwardHeaders(this.opts.apiKey, options),
      body: this.toNativeRequest(request),
    };
  }

  toNativeRequest(request: ChatCompletionRequest): NativeRequest {
    return {
      input: this.toNativeInput(request),
      parameters: this.toNativeParameters(request),
      debug: {},
    };
  }

  // ---- parseResponse ------------------------------------------------------

  parseResponse(raw: string, model: string): ChatCompletionResponse | null {
    const native = this.parseNative(raw);
    if (!native) {
      log.warn('Failed to parse native response, forwarding raw body', {
        body: raw.slice(0, 500),
      });
      return null;
    }

    const usage = usageFromModels(native.usage.models) ?? {
      prompt_tokens: 0,
      completion_tokens: 0,
      total_tokens: 0,
    };

    log.debug('Converted native response', {
      input_tokens: usage.prompt_tokens,
      output_tokens: usage.completion_tokens,
    });

    return {
      id: native.request_id,
      object: 'chat.completion',
      created: unixNow(),
      model,
      choices: [
        {
          index: 0,
          message: {
            role: 'assistant',
            content: native.output.text,
          },
          finish_reason: native.output.finish_reason || 'stop',
        },
      ],
      usage,
    };
  }

  // ---- parseStreamFrame ---------------------------------------------------

  parseStreamFrame(data: string): NativeResponse | null {
    return this.parseNative(data);
  }

  // ---- convertError -------------------------------------------------------

  convertError(status: number, body: string): ErrorEnvelope | null {
    const candidate = extractErrorObject(body) ?? body;
    const json = parseJson(candidate);
    const parsed = json.ok ? nativeErrorSchema.safeParse(json.value) : undefined;

    let nativeError: NativeErrorBody;
    if (parsed?.success) {
      nativeError = parsed.data;
    } else if (body.includes('"message"')) {
      log.warn('Unparseable error body, using generic message', { status, body: body.slice(0, 500) });
      nativeError = GENERIC_ERROR;
    } else {
      log.warn('Unparseable error body, forwarding raw body', { status, body: body.slice(0, 500) });
      return null;
    }

    return buildErrorEnvelope(nativeError.message, errorTypeForStatus(status), nativeError.code);
  }

  // =========================================================================
  // Internals
  // =========================================================================

  private toNativeInput(request: ChatCompletionRequest): NativeInput {
    const [first] = request.messages;
    if (request.messages.length === 1 && first.role === 'user') {
      return { prompt: first.content };
    }

    return {
      messages: request.messages.map((message) =>
        message.name
          ? { role: message.role, content: message.content, name: message.name }
          : { role: message.role, content: message.content },
      ),
    };
  }

  private toNativeParameters(request: ChatCompletionRequest): NativeParameters {
    const parameters: NativeParameters = {};
    if (request.temperature !== undefined) parameters.temperature = request.temperature;
    if (request.top_p !== undefined) parameters.top_p = request.top_p;
    if (request.max_tokens !== undefined) parameters.max_tokens = request.max_tokens;
    if (request.stop !== undefined && request.stop.length > 0) parameters.stop = request.stop;
    if (request.presence_penalty !== undefined) parameters.presence_penalty = request.presence_penalty;
    if (request.frequency_penalty !== undefined) parameters.frequency_penalty = request.frequency_penalty;
    return parameters;
  }

  private parseNative(raw: string): NativeResponse | null {
    const json = parseJson(raw);
    if (!json.ok) {
      return null;
    }
    const result = nativeResponseSchema.safeParse(json.value);
    return result.success ? result.data : null;
  }
}
