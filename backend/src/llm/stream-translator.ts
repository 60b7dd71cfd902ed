/**
 * StreamTranslator – cumulative native frames → standard delta chunks.
 *
 * Every native frame carries the whole text produced so far. The translator
 * keeps a per-exchange StreamCursor holding how much of that text has already
 * been sent, and emits only the new suffix.
 *
 *   streaming ──(frame with finish_reason)──▶ done   terminal chunk + [DONE]
 *   streaming ──(source ends)──────────────▶ done   abnormal, nothing synthesized
 */

import type { ChatCompletionChunk, ChatCompletionUsage } from '@agent-gateway/shared-types';
import type { StreamCursor } from './types.js';
import type { TranslatingAdapter } from './adapters/types.js';
import type { SSEMessage } from './stream-handler.js';
import { unixNow, usageFromModels } from './adapters/native-agent.js';
import { createLogger } from '../logging/log.js';
import type { Log } from '../logging/log.js';

export type TranslatedStreamEvent =
  | { type: 'chunk'; chunk: ChatCompletionChunk }
  /** Terminal sentinel, written as `data: [DONE]` */
  | { type: 'done' };

export class StreamTranslator {
  private readonly log: Log;

  constructor(
    private readonly adapter: Pick<TranslatingAdapter, 'parseStreamFrame'>,
    log?: Log,
  ) {
    this.log = log ?? createLogger('stream-translator');
  }

  createCursor(model: string, created: number = unixNow()): StreamCursor {
    return {
      lastLength: 0,
      streamId: '',
      state: 'streaming',
      abnormalEnd: false,
      model,
      created,
    };
  }

  /**
   * Apply one frame payload to the cursor and return what to emit, in order.
   * Malformed frames are skipped; frames after `done` are ignored.
   */
  handleFrame(cursor: StreamCursor, data: string): TranslatedStreamEvent[] {
    if (cursor.state === 'done') {
      return [];
    }

    const frame = this.adapter.parseStreamFrame(data);
    if (!frame) {
      this.log.warn('Skipping malformed stream frame', { data: data.slice(0, 100) });
      return [];
    }

    if (!cursor.streamId && frame.request_id) {
      cursor.streamId = frame.request_id;
    }

    const events: TranslatedStreamEvent[] = [];

    // Text that did not grow yields no delta
    const text = frame.output.text;
    if (text.length > cursor.lastLength) {
      const delta = text.slice(cursor.lastLength);
      cursor.lastLength = text.length;
      events.push({ type: 'chunk', chunk: this.buildChunk(cursor, { content: delta }, null) });
    }

    const finishReason = frame.output.finish_reason;
    if (finishReason && finishReason !== 'null') {
      events.push({
        type: 'chunk',
        chunk: this.buildChunk(cursor, {}, finishReason, usageFromModels(frame.usage.models)),
      });
      events.push({ type: 'done' });
      cursor.state = 'done';
    }

    return events;
  }

  /**
   * Drive the cursor over a message source. Stops consuming as soon as the
   * terminal frame has been handled.
   */
  async *translate(
    messages: AsyncIterable<SSEMessage>,
    cursor: StreamCursor,
  ): AsyncGenerator<TranslatedStreamEvent> {
    for await (const message of messages) {
      for (const event of this.handleFrame(cursor, message.data)) {
        yield event;
      }
      if (cursor.state === 'done') {
        return;
      }
    }

    if (cursor.state !== 'done') {
      cursor.state = 'done';
      cursor.abnormalEnd = true;
      this.log.warn('Stream ended before a finish frame', {
        id: cursor.streamId,
        emittedLength: cursor.lastLength,
      });
    }
  }

  private buildChunk(
    cursor: StreamCursor,
    delta: ChatCompletionChunk['choices'][number]['delta'],
    finishReason: string | null,
    usage?: ChatCompletionUsage,
  ): ChatCompletionChunk {
    const chunk: ChatCompletionChunk = {
      id: cursor.streamId,
      object: 'chat.completion.chunk',
      created: cursor.created,
      model: cursor.model,
      choices: [
        {
          index: 0,
          delta,
          finish_reason: finishReason,
        },
      ],
    };
    if (usage) {
      chunk.usage = usage;
    }
    return chunk;
  }
}
