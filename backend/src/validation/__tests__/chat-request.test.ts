import { describe, it, expect } from 'vitest';
import { parseChatCompletionRequest } from '../chat-request.js';

describe('parseChatCompletionRequest', () => {
  it('accepts a minimal request and fills defaults', () => {
    const result = parseChatCompletionRequest({ messages: [{ role: 'user', content: 'hi' }] });

    expect(result).toEqual({
      success: true,
      data: { model: '', messages: [{ role: 'user', content: 'hi' }], stream: false },
    });
  });

  it('normalises nulls and a single stop string', () => {
    const result = parseChatCompletionRequest({
      model: 'agent-model',
      messages: [{ role: 'assistant', content: null, name: null }],
      temperature: null,
      max_tokens: 32,
      stop: 'END',
      stream: true,
    });

    expect(result).toEqual({
      success: true,
      data: {
        model: 'agent-model',
        messages: [{ role: 'assistant', content: '' }],
        max_tokens: 32,
        stop: ['END'],
        stream: true,
      },
    });
  });

  it('keeps a stop list and a message name, dropping unknown fields', () => {
    const result = parseChatCompletionRequest({
      messages: [{ role: 'user', content: 'hi', name: 'alice', extra: 1 }],
      stop: ['a', 'b'],
      tools: [],
    });

    expect(result.success && result.data).toEqual({
      model: '',
      messages: [{ role: 'user', content: 'hi', name: 'alice' }],
      stop: ['a', 'b'],
      stream: false,
    });
  });

  it('keeps function-calling fields as given', () => {
    const result = parseChatCompletionRequest({
      messages: [{ role: 'user', content: 'hi' }],
      functions: [{ name: 'lookup' }],
      function_call: 'auto',
    });

    expect(result.success && result.data).toEqual({
      model: '',
      messages: [{ role: 'user', content: 'hi' }],
      stream: false,
      functions: [{ name: 'lookup' }],
      function_call: 'auto',
    });
  });

  it.each<[string, unknown, string]>([
    ['a non-object body', [1, 2], 'Request body must be a JSON object'],
    ['a null body', null, 'Request body must be a JSON object'],
    ['missing messages', {}, 'messages: is required'],
    ['empty messages', { messages: [] }, 'messages: must not be empty'],
    ['messages that are not a list', { messages: 'hi' }, 'messages: must be an array'],
    ['an unknown role', { messages: [{ role: 'tool', content: 'x' }] }, 'messages.0.role: must be one of system, user, assistant'],
    ['non-string content', { messages: [{ role: 'user', content: 5 }] }, 'messages.0.content: must be a string'],
    ['a string temperature', { messages: [{ role: 'user', content: 'x' }], temperature: '0.5' }, 'temperature: must be a number'],
    ['a numeric stop', { messages: [{ role: 'user', content: 'x' }], stop: 3 }, 'stop: must be a string or a list of strings'],
    ['functions that are not a list', { messages: [{ role: 'user', content: 'x' }], functions: 'lookup' }, 'functions: must be an array'],
    ['a string stream flag', { messages: [{ role: 'user', content: 'x' }], stream: 'yes' }, 'stream: must be a boolean'],
  ])('rejects %s', (_label, body, message) => {
    expect(parseChatCompletionRequest(body)).toEqual({ success: false, error: message });
  });
});
