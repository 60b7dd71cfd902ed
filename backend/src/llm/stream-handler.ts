/**
 * StreamHandler – SSE reader for backend event-stream bodies.
 *
 * Reads a `ReadableStream` as an SSE stream, splits by lines and yields one
 * message per dispatched event. Handles standard SSE format:
 *   - `event:` lines set the event type
 *   - `data:` lines carry the payload
 *   - Empty lines delimit events
 *   - `[DONE]` terminates the stream
 *
 * The reader is cancelled when the consumer stops early, which releases the
 * underlying connection.
 */

export interface SSEMessage {
  event: string;
  data: string;
}

interface LineResult {
  event: string;
  data: string;
  dispatch: boolean;
  terminate: boolean;
}

export class StreamHandler {
  /**
   * Async generator yielding SSE messages from a raw byte stream, in arrival order.
   */
  async *parseSSEStream(body: ReadableStream<Uint8Array>): AsyncGenerator<SSEMessage> {
    const reader = body.getReader();
    const decoder = new TextDecoder();

    let buffer = '';
    let currentEvent = '';
    let currentData = '';
    let finished = false;

    try {
      while (true) {
        const { done, value } = await reader.read();

        let lines: string[];
        if (done) {
          finished = true;
          buffer += decoder.decode();
          // Remaining buffered text plus a virtual blank line flushes the last event
          lines = [...buffer.split('\n'), ''];
          buffer = '';
        } else {
          buffer += decoder.decode(value, { stream: true });
          lines = buffer.split('\n');
          // Keep the last incomplete line in the buffer
          buffer = lines.pop() ?? '';
        }

        for (const line of lines) {
          const result = this.processLine(line, currentEvent, currentData);
          currentEvent = result.event;
          currentData = result.data;

          if (result.dispatch) {
            const message: SSEMessage = { event: currentEvent, data: currentData };
            currentEvent = '';
            currentData = '';
            yield message;
          }

          if (result.terminate) {
            return;
          }
        }

        if (done) {
          return;
        }
      }
    } finally {
      if (!finished) {
        // Rejects when the body already errored; nothing left to release then
        await reader.cancel().catch(() => undefined);
      }
      reader.releaseLock();
    }
  }

  /**
   * Process a single SSE line, updating event/data state.
   */
  private processLine(line: string, currentEvent: string, currentData: string): LineResult {
    // Empty line = event boundary → dispatch accumulated event
    if (line.trim() === '') {
      if (currentData) {
        return { event: currentEvent, data: currentData, dispatch: true, terminate: false };
      }
      return { event: '', data: '', dispatch: false, terminate: false };
    }

    if (line.startsWith('event:')) {
      return {
        event: line.slice('event:'.length).trim(),
        data: currentData,
        dispatch: false,
        terminate: false,
      };
    }

    if (line.startsWith('data:')) {
      const payload = line.slice('data:'.length).trim();

      if (payload === '[DONE]') {
        return { event: currentEvent, data: currentData, dispatch: false, terminate: true };
      }

      // Multiple `data:` lines are joined with a newline
      const newData = currentData ? currentData + '\n' + payload : payload;
      return { event: currentEvent, data: newData, dispatch: false, terminate: false };
    }

    // Comments (`:`), `id:`, `retry:` and unknown lines are ignored
    return { event: currentEvent, data: currentData, dispatch: false, terminate: false };
  }
}
