/**
 * AgentClient – outbound calls to the agent backend.
 *
 * One shared instance per process, built on the runtime's pooled `fetch`
 * (keep-alive connections are reused across requests). Buffered and streamed
 * calls get separate timeout budgets; a streamed call's budget covers the
 * whole life of the stream. Caller cancellation is linked into every call so
 * a client disconnect abandons the backend read and frees the connection.
 *
 * No retries: a failed call surfaces as a GatewayError.
 */

import type { AdapterRequest } from './adapters/types.js';
import { GatewayError, isAbortError } from './errors.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface AgentClientOptions {
  /** Budget for buffered calls in milliseconds */
  requestTimeoutMs: number;
  /** Budget for streamed calls in milliseconds */
  streamTimeoutMs: number;
  /** Transport override; defaults to the global fetch */
  fetch?: FetchLike;
}

export interface BufferedResponse {
  status: number;
  headers: Headers;
  body: string;
}

/**
 * Abort scope for one outbound call: timeout + caller signal.
 */
class CallScope {
  readonly controller = new AbortController();
  timedOut = false;
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly external?: AbortSignal;
  private readonly onExternalAbort = () => this.controller.abort(this.external?.reason);

  constructor(timeoutMs: number, external?: AbortSignal) {
    this.external = external;
    this.timer = setTimeout(() => {
      this.timedOut = true;
      const timeoutError = new Error(`Backend call exceeded ${timeoutMs}ms`);
      timeoutError.name = 'TimeoutError';
      this.controller.abort(timeoutError);
    }, timeoutMs);

    if (external?.aborted) {
      this.controller.abort(external.reason);
    } else {
      external?.addEventListener('abort', this.onExternalAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get callerAborted(): boolean {
    return this.external?.aborted ?? false;
  }

  /**
   * Classify a failure of this call. Caller aborts are passed through
   * unchanged so the HTTP layer can tell a departed client apart.
   */
  classify(error: unknown): unknown {
    if (this.timedOut) {
      return new GatewayError(504, 'timeout_error', 'Request timed out, please retry later', {
        cause: error,
      });
    }
    if (this.callerAborted || isAbortError(error)) {
      return error;
    }
    if (error instanceof GatewayError) {
      return error;
    }
    return new GatewayError(500, 'server_error', `Unable to reach the agent backend: ${describe(error)}`, {
      cause: error,
    });
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.external?.removeEventListener('abort', this.onExternalAbort);
  }
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    // fetch reports network failures as "fetch failed" with the reason in `cause`
    if (error.cause instanceof Error) {
      return `${error.message} (${error.cause.message})`;
    }
    return error.message;
  }
  return String(error);
}

/**
 * An open streamed call. `release()` must be called once the body is done
 * with; it stops the timer and drops the connection if it is still open.
 */
export class UpstreamStream {
  private released = false;

  constructor(
    private readonly response: Response,
    private readonly scope: CallScope,
  ) {}

  get status(): number {
    return this.response.status;
  }

  get ok(): boolean {
    return this.response.ok;
  }

  get headers(): Headers {
    return this.response.headers;
  }

  get body(): ReadableStream<Uint8Array> | null {
    return this.response.body;
  }

  async text(): Promise<string> {
    try {
      return await this.response.text();
    } catch (error: unknown) {
      throw this.scope.classify(error);
    }
  }

  classifyError(error: unknown): unknown {
    return this.scope.classify(error);
  }

  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.scope.dispose();
    if (!this.scope.signal.aborted) {
      this.scope.controller.abort();
    }
  }
}

export class AgentClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: AgentClientOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Buffered call: the whole body is read before returning.
   */
  async send(request: AdapterRequest, signal?: AbortSignal): Promise<BufferedResponse> {
    const scope = new CallScope(this.options.requestTimeoutMs, signal);
    try {
      const response = await this.post(request, scope.signal);
      const body = await response.text();
      return { status: response.status, headers: response.headers, body };
    } catch (error: unknown) {
      throw scope.classify(error);
    } finally {
      scope.dispose();
    }
  }

  /**
   * Streamed call: returns once the response head has arrived.
   */
  async stream(request: AdapterRequest, signal?: AbortSignal): Promise<UpstreamStream> {
    const scope = new CallScope(this.options.streamTimeoutMs, signal);
    try {
      const response = await this.post(request, scope.signal);
      return new UpstreamStream(response, scope);
    } catch (error: unknown) {
      scope.dispose();
      throw scope.classify(error);
    }
  }

  private post(request: AdapterRequest, signal: AbortSignal): Promise<Response> {
    return this.fetchImpl(request.url, {
      method: 'POST',
      headers: request.headers,
      body: JSON.stringify(request.body),
      signal,
    });
  }
}
