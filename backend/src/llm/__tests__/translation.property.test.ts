/**
 * Translation properties
 *
 * - Request form: a lone user message becomes `prompt`, anything else `messages`
 *   with order, roles, content and names preserved.
 * - Stream reconstruction: for any growing sequence of cumulative texts, the
 *   concatenated deltas equal the final text.
 * - Response round-trip: content, finish reason and token totals survive.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import type { ChatMessage } from '@agent-gateway/shared-types';
import { NativeAgentAdapter } from '../adapters/native-agent.js';
import { StreamTranslator } from '../stream-translator.js';

const adapter = new NativeAgentAdapter({ endpoint: 'https://agent.test', apiKey: 'test-key' });

const messageArb: fc.Arbitrary<ChatMessage> = fc.record(
  {
    role: fc.constantFrom<ChatMessage['role']>('system', 'user', 'assistant'),
    content: fc.string(),
    name: fc.string({ minLength: 1, maxLength: 8 }),
  },
  { requiredKeys: ['role', 'content'] },
);

describe('Request form selection', () => {
  it('a single user message always becomes prompt', () => {
    fc.assert(
      fc.property(fc.string(), (content) => {
        const native = adapter.toNativeRequest({
          model: 'm',
          messages: [{ role: 'user', content }],
          stream: false,
        });
        expect(native.input).toEqual({ prompt: content });
      }),
      { numRuns: 50 },
    );
  });

  it('any other conversation becomes messages with every turn preserved', () => {
    const conversationArb = fc
      .array(messageArb, { minLength: 1, maxLength: 6 })
      .filter((messages) => !(messages.length === 1 && messages[0].role === 'user'));

    fc.assert(
      fc.property(conversationArb, (messages) => {
        const native = adapter.toNativeRequest({ model: 'm', messages, stream: false });
        expect(native.input).toEqual({ messages });
      }),
      { numRuns: 50 },
    );
  });
});

describe('Stream reconstruction', () => {
  it('concatenated deltas equal the final cumulative text', () => {
    fc.assert(
      fc.property(fc.array(fc.string({ maxLength: 5 }), { maxLength: 10 }), (pieces) => {
        const translator = new StreamTranslator(adapter);
        const cursor = translator.createCursor('m', 0);

        let cumulative = '';
        let rebuilt = '';
        const frames = [...pieces.map((piece) => (cumulative += piece)), cumulative];
        frames.forEach((text, i) => {
          const finish = i === frames.length - 1 ? 'stop' : 'null';
          const data = JSON.stringify({ output: { text, finish_reason: finish }, request_id: 'r' });
          for (const event of translator.handleFrame(cursor, data)) {
            if (event.type === 'chunk') {
              rebuilt += event.chunk.choices[0].delta.content ?? '';
            }
          }
        });

        expect(rebuilt).toBe(cumulative);
        expect(cursor.state).toBe('done');
      }),
      { numRuns: 50 },
    );
  });
});

describe('Response round-trip', () => {
  it('keeps content, finish reason and token totals', () => {
    fc.assert(
      fc.property(
        fc.string(),
        fc.constantFrom('', 'stop', 'length'),
        fc.nat({ max: 100_000 }),
        fc.nat({ max: 100_000 }),
        (text, finishReason, inputTokens, outputTokens) => {
          const raw = JSON.stringify({
            output: { text, finish_reason: finishReason },
            usage: { models: [{ input_tokens: inputTokens, output_tokens: outputTokens, model_id: 'm' }] },
            request_id: 'r',
          });
          const response = adapter.parseResponse(raw, 'm');

          expect(response?.choices[0].message.content).toBe(text);
          expect(response?.choices[0].finish_reason).toBe(finishReason || 'stop');
          expect(response?.usage.total_tokens).toBe(inputTokens + outputTokens);
        },
      ),
      { numRuns: 50 },
    );
  });
});
