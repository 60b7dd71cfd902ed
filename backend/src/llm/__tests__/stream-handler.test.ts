/**
 * StreamHandler Unit Tests
 *
 * Tests SSE stream parsing: data lines, empty line delimiters, [DONE]
 * termination, multi-data lines, split chunks and early consumer exit.
 */

import { describe, it, expect } from 'vitest';
import { StreamHandler } from '../stream-handler.js';
import type { SSEMessage } from '../stream-handler.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Build a body that streams the given SSE text in one chunk. */
function makeSSEBody(sseText: string): ReadableStream<Uint8Array> {
  return makeChunkedSSEBody([sseText]);
}

/** Build a body that streams chunks one at a time. */
function makeChunkedSSEBody(chunks: Array<string | Uint8Array>): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  let i = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      if (i < chunks.length) {
        const chunk = chunks[i];
        controller.enqueue(typeof chunk === 'string' ? encoder.encode(chunk) : chunk);
        i++;
      } else {
        controller.close();
      }
    },
  });
}

async function collect(gen: AsyncGenerator<SSEMessage>): Promise<SSEMessage[]> {
  const messages: SSEMessage[] = [];
  for await (const message of gen) {
    messages.push(message);
  }
  return messages;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('StreamHandler.parseSSEStream', () => {
  const handler = new StreamHandler();

  it('yields one message per blank-line delimited event', async () => {
    const body = makeSSEBody('data: {"a":1}\n\ndata: {"a":2}\n\n');
    expect(await collect(handler.parseSSEStream(body))).toEqual([
      { event: '', data: '{"a":1}' },
      { event: '', data: '{"a":2}' },
    ]);
  });

  it('keeps the event name and ignores id lines', async () => {
    const body = makeSSEBody('id:1\nevent:result\n:HTTP_STATUS/200\ndata:{"x":true}\n\n');
    expect(await collect(handler.parseSSEStream(body))).toEqual([{ event: 'result', data: '{"x":true}' }]);
  });

  it('joins multiple data lines with a newline', async () => {
    const body = makeSSEBody('data: first\ndata: second\n\n');
    expect(await collect(handler.parseSSEStream(body))).toEqual([{ event: '', data: 'first\nsecond' }]);
  });

  it('tolerates CRLF line endings', async () => {
    const body = makeSSEBody('data: one\r\n\r\ndata: two\r\n\r\n');
    expect(await collect(handler.parseSSEStream(body))).toEqual([
      { event: '', data: 'one' },
      { event: '', data: 'two' },
    ]);
  });

  it('reassembles lines split across reads', async () => {
    const body = makeChunkedSSEBody(['da', 'ta: {"text":', '"Hi"}\n', '\nda', 'ta: {"text":"Hi!"}\n\n']);
    expect(await collect(handler.parseSSEStream(body))).toEqual([
      { event: '', data: '{"text":"Hi"}' },
      { event: '', data: '{"text":"Hi!"}' },
    ]);
  });

  it('decodes multi-byte characters split across reads', async () => {
    const bytes = new TextEncoder().encode('data: 你好\n\n');
    // "你" is three bytes starting at index 6
    const body = makeChunkedSSEBody([bytes.slice(0, 7), bytes.slice(7)]);
    expect(await collect(handler.parseSSEStream(body))).toEqual([{ event: '', data: '你好' }]);
  });

  it('dispatches a pending payload at end of stream', async () => {
    const body = makeSSEBody('data: {"a":1}\n\ndata: {"a":2}');
    expect(await collect(handler.parseSSEStream(body))).toEqual([
      { event: '', data: '{"a":1}' },
      { event: '', data: '{"a":2}' },
    ]);
  });

  it('stops at [DONE]', async () => {
    const body = makeSSEBody('data: {"a":1}\n\ndata: [DONE]\n\ndata: {"a":2}\n\n');
    expect(await collect(handler.parseSSEStream(body))).toEqual([{ event: '', data: '{"a":1}' }]);
  });

  it('yields nothing for an empty body', async () => {
    expect(await collect(handler.parseSSEStream(makeSSEBody('')))).toEqual([]);
  });

  it('cancels the body when the consumer stops early', async () => {
    let cancelled = false;
    const encoder = new TextEncoder();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('data: one\n\ndata: two\n\n'));
      },
      cancel() {
        cancelled = true;
      },
    });

    for await (const message of handler.parseSSEStream(body)) {
      expect(message.data).toBe('one');
      break;
    }

    expect(cancelled).toBe(true);
    expect(body.locked).toBe(false);
  });
});
