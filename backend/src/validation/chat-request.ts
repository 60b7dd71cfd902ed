/**
 * Inbound chat-completion request validation
 *
 * The schema both checks and normalises the body: null content becomes "",
 * null parameters become absent, a single `stop` string becomes a one-item
 * list, `stream` defaults to false and `model` to "". `functions` and
 * `function_call` are kept opaque for the compatible endpoint. Other unknown
 * fields are dropped.
 */

import { z } from 'zod';
import type { ChatCompletionRequest } from '@agent-gateway/shared-types';

const optionalNumber = z
  .number({ invalid_type_error: 'must be a number' })
  .nullish()
  .transform((value) => value ?? undefined);

const messageSchema = z.object(
  {
    role: z.enum(['system', 'user', 'assistant'], {
      errorMap: () => ({ message: 'must be one of system, user, assistant' }),
    }),
    content: z
      .string({ invalid_type_error: 'must be a string' })
      .nullish()
      .transform((value) => value ?? ''),
    name: z
      .string({ invalid_type_error: 'must be a string' })
      .nullish()
      .transform((value) => value || undefined),
  },
  { invalid_type_error: 'must be an object' },
);

const stopSchema = z
  .union([z.string(), z.array(z.string())], {
    errorMap: () => ({ message: 'must be a string or a list of strings' }),
  })
  .nullish()
  .transform((value) => {
    if (value == null) return undefined;
    return typeof value === 'string' ? [value] : value;
  });

export const chatCompletionRequestSchema: z.ZodType<ChatCompletionRequest, z.ZodTypeDef, unknown> = z.object(
  {
    model: z
      .string({ invalid_type_error: 'must be a string' })
      .nullish()
      .transform((value) => value ?? ''),
    messages: z
      .array(messageSchema, {
        required_error: 'is required',
        invalid_type_error: 'must be an array',
      })
      .min(1, 'must not be empty'),
    temperature: optionalNumber,
    top_p: optionalNumber,
    max_tokens: optionalNumber,
    presence_penalty: optionalNumber,
    frequency_penalty: optionalNumber,
    stop: stopSchema,
    stream: z
      .boolean({ invalid_type_error: 'must be a boolean' })
      .nullish()
      .transform((value) => value ?? false),
    user: z
      .string({ invalid_type_error: 'must be a string' })
      .nullish()
      .transform((value) => value ?? undefined),
    functions: z
      .array(z.unknown(), { invalid_type_error: 'must be an array' })
      .nullish()
      .transform((value) => value ?? undefined),
    function_call: z.unknown().transform((value) => value ?? undefined),
  },
  {
    required_error: 'Request body must be a JSON object',
    invalid_type_error: 'Request body must be a JSON object',
  },
);

export type ValidationResult =
  | { success: true; data: ChatCompletionRequest }
  | { success: false; error: string };

/**
 * First issue as `path: message`, or just the message for a root-level issue
 */
export function formatValidationError(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) {
    return 'Invalid request body';
  }
  if (issue.path.length === 0) {
    return issue.message;
  }
  return `${issue.path.join('.')}: ${issue.message}`;
}

export function parseChatCompletionRequest(body: unknown): ValidationResult {
  const result = chatCompletionRequestSchema.safeParse(body);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: formatValidationError(result.error) };
}
