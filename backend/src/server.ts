/**
 * Gateway Server - standard chat-completion surface over the agent backend
 *
 * Provides:
 * - POST /v1/chat/completions (buffered and streamed, native or compatible mode)
 * - GET /health
 * - Standard error envelopes for every failure, including 400/404/405
 */

import express from 'express';
import cors from 'cors';
import { createServer } from 'http';
import type { Server } from 'http';
import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { ChatCompletionRequest, ErrorEnvelope } from '@agent-gateway/shared-types';
import type { Config } from './config/index.js';
import {
  GatewayError,
  StreamHandler,
  StreamTranslator,
  buildErrorEnvelope,
  createAdapter,
  createAgentClient,
  toGatewayError,
} from './llm/index.js';
import type {
  AdapterRequest,
  AgentClient,
  BufferedResponse,
  GatewayAdapter,
  NativeAgentAdapter,
  UpstreamStream,
} from './llm/index.js';
import { parseChatCompletionRequest } from './validation/chat-request.js';
import { createLogger } from './logging/log.js';

const log = createLogger('server');

export const SERVICE_NAME = 'agent-gateway';
export const CHAT_COMPLETIONS_PATH = '/v1/chat/completions';

/** Backend response headers never relayed to the caller */
const SKIPPED_UPSTREAM_HEADERS = new Set([
  'content-type',
  'content-length',
  'content-encoding',
  'transfer-encoding',
  'connection',
  'keep-alive',
  'x-request-id',
]);

export interface CreateAppOptions {
  config: Config;
  /** Shared backend client; built from `config` when omitted */
  client?: AgentClient;
}

interface ChatContext {
  requestId: string;
  request: ChatCompletionRequest;
  outbound: AdapterRequest;
  client: AgentClient;
  streamHandler: StreamHandler;
  /** Aborted when the caller goes away before the response is complete */
  signal: AbortSignal;
}

// ============================================================================
// Helpers
// ============================================================================

function getRequestId(res: Response): string {
  const value: unknown = res.locals.requestId;
  return typeof value === 'string' ? value : '';
}

function sendEnvelope(res: Response, status: number, envelope: ErrorEnvelope): void {
  res.status(status);
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(envelope));
}

/**
 * Set SSE response headers and push them out
 */
function setSSEHeaders(res: Response, status = 200): void {
  res.status(status);
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no');
  res.socket?.setNoDelay(true);
  res.flushHeaders();
}

/**
 * Write SSE payload */
function writeSSEData(res: Response, data: unknown): void {
  writeSSERaw(res, JSON.stringify(data));
}

function writeSSERaw(res: Response, payload: string): void {
  if (res.destroyed || res.writableEnded) {
    return;
  }
  res.write(`data: ${payload}\n\n`);
}

function copyUpstreamHeaders(headers: Headers, res: Response): void {
  headers.forEach((value, key) => {
    if (!SKIPPED_UPSTREAM_HEADERS.has(key.toLowerCase())) {
      res.setHeader(key, value);
    }
  });
}

function truncate(text: string, max = 500): string {
  return text.length > max ? `${text.slice(0, max)}...(truncated)` : text;
}

/**
 * Abort controller tied to the caller's connection. `close` also fires after
 * a normal finish, so only an unfinished response counts as a disconnect.
 */
function watchDisconnect(res: Response, requestId: string): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded && !controller.signal.aborted) {
      log.info('Client disconnected', { requestId });
      controller.abort();
    }
  });
  return controller;
}

function bodyParserStatus(error: unknown): number | null {
  if (error === null || typeof error !== 'object') return null;
  if (!('type' in error) || typeof error.type !== 'string' || !error.type.startsWith('entity.')) return null;
  if ('status' in error && typeof error.status === 'number') return error.status;
  return 400;
}

// ============================================================================
// Buffered exchange
// ============================================================================

function translateBufferedBody(adapter: NativeAgentAdapter, upstream: BufferedResponse, model: string): string {
  if (upstream.status === 200) {
    const response = adapter.parseResponse(upstream.body, model);
    if (response) {
      log.debug('Response converted to standard format');
      return JSON.stringify(response);
    }
    return upstream.body;
  }

  const envelope = adapter.convertError(upstream.status, upstream.body);
  if (envelope) {
    log.debug('Error response converted to standard format', { status: upstream.status });
    return JSON.stringify(envelope);
  }
  return upstream.body;
}

async function handleBuffered(ctx: ChatContext, adapter: GatewayAdapter, res: Response): Promise<void> {
  let upstream: BufferedResponse;
  try {
    upstream = await ctx.client.send(ctx.outbound, ctx.signal);
  } catch (error: unknown) {
    if (ctx.signal.aborted) {
      return;
    }
    throw error;
  }

  log.info('Backend responded', { requestId: ctx.requestId, status: upstream.status });

  const body =
    adapter.mode === 'native' ? translateBufferedBody(adapter, upstream, ctx.request.model) : upstream.body;

  copyUpstreamHeaders(upstream.headers, res);
  res.status(upstream.status);
  res.setHeader('Content-Type', 'application/json');
  res.end(body);
}

// ============================================================================
// Streamed exchange
// ============================================================================

async function handleNativeStream(ctx: ChatContext, adapter: NativeAgentAdapter, res: Response): Promise<void> {
  let upstream: UpstreamStream;
  try {
    upstream = await ctx.client.stream(ctx.outbound, ctx.signal);
  } catch (error: unknown) {
    if (ctx.signal.aborted) {
      return;
    }
    const failure = toGatewayError(error);
    log.error('Stream request failed', { requestId: ctx.requestId, error: failure });
    setSSEHeaders(res);
    writeSSEData(res, failure.toEnvelope());
    res.end();
    return;
  }

  setSSEHeaders(res);
  log.info('Backend stream opened', { requestId: ctx.requestId, status: upstream.status });

  try {
    if (upstream.status !== 200) {
      const body = await upstream.text();
      const envelope = adapter.convertError(upstream.status, body);
      writeSSERaw(res, envelope ? JSON.stringify(envelope) : body);
      res.end();
      return;
    }

    const translator = new StreamTranslator(adapter);
    const cursor = translator.createCursor(ctx.request.model);

    if (upstream.body) {
      const frames = ctx.streamHandler.parseSSEStream(upstream.body);
      for await (const event of translator.translate(frames, cursor)) {
        if (event.type === 'chunk') {
          writeSSEData(res, event.chunk);
        } else {
          writeSSERaw(res, '[DONE]');
        }
      }
    } else {
      cursor.state = 'done';
      cursor.abnormalEnd = true;
      log.warn('Backend stream had no body', { requestId: ctx.requestId });
    }

    log.info('Stream finished', {
      requestId: ctx.requestId,
      id: cursor.streamId,
      abnormalEnd: cursor.abnormalEnd,
    });
    res.end();
  } catch (error: unknown) {
    if (ctx.signal.aborted) {
      log.info('Stream abandoned by client', { requestId: ctx.requestId });
      return;
    }
    const failure = toGatewayError(upstream.classifyError(error));
    log.error('Stream read failed', { requestId: ctx.requestId, error: failure });
    writeSSEData(res, failure.toEnvelope());
    res.end();
  } finally {
    upstream.release();
  }
}

/**
 * Compatible mode: the backend already emits standard chunks, so bytes are
 * relayed as they arrive.
 */
async function handleCompatibleStream(ctx: ChatContext, res: Response): Promise<void> {
  let upstream: UpstreamStream;
  try {
    upstream = await ctx.client.stream(ctx.outbound, ctx.signal);
  } catch (error: unknown) {
    if (ctx.signal.aborted) {
      return;
    }
    const failure = toGatewayError(error);
    log.error('Stream request failed', { requestId: ctx.requestId, error: failure });
    setSSEHeaders(res);
    writeSSEData(res, failure.toEnvelope());
    res.end();
    return;
  }

  log.info('Backend stream opened', { requestId: ctx.requestId, status: upstream.status });

  try {
    if (upstream.status !== 200) {
      const body = await upstream.text();
      setSSEHeaders(res, upstream.status);
      writeSSERaw(res, body);
      res.end();
      return;
    }

    setSSEHeaders(res);
    if (upstream.body) {
      const reader = upstream.body.getReader();
      try {
        while (true) {
          const { done, value } = await reader.read();
          if (done) break;
          if (res.destroyed) break;
          res.write(value);
        }
      } finally {
        reader.releaseLock();
      }
    }
    res.end();
  } catch (error: unknown) {
    if (ctx.signal.aborted) {
      log.info('Stream abandoned by client', { requestId: ctx.requestId });
      return;
    }
    const failure = toGatewayError(upstream.classifyError(error));
    log.error('Stream relay failed', { requestId: ctx.requestId, error: failure });
    if (!res.headersSent) {
      setSSEHeaders(res);
    }
    writeSSEData(res, failure.toEnvelope());
    res.end();
  } finally {
    upstream.release();
  }
}

// ============================================================================
// App
// ============================================================================

export function createApp(options: CreateAppOptions): express.Express {
  const { config } = options;
  const client = options.client ?? createAgentClient(config);
  const adapter = createAdapter(config.agent);
  const streamHandler = new StreamHandler();

  const app = express();
  app.disable('x-powered-by');

  // Request logging middleware
  app.use((req, res, next) => {
    const requestIdHeader = req.headers['x-request-id'];
    const requestId = (typeof requestIdHeader === 'string' && requestIdHeader.trim()) || uuidv4();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-ID', requestId);
    log.info(`${req.method} ${req.url}`, { requestId });
    next();
  });

  app.use(cors());

  // Bodies are read as JSON whatever their declared content type
  app.use(express.json({ type: () => true, limit: '10mb' }));

  /**
   * Health check
   */
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: SERVICE_NAME, timestamp: Date.now() });
  });

  /**
   * Chat completions: validate, forward, translate
   */
  app.post(CHAT_COMPLETIONS_PATH, (req, res, next) => {
    const requestId = getRequestId(res);

    const parsed = parseChatCompletionRequest(req.body);
    if (!parsed.success) {
      log.warn('Rejected invalid request', { requestId, error: parsed.error });
      sendEnvelope(res, 400, buildErrorEnvelope(parsed.error, 'invalid_request_error'));
      return;
    }

    const request = parsed.data;
    const outbound = adapter.buildRequest(request, {
      stream: request.stream,
      accept: req.get('accept'),
    });

    log.info('Forwarding to agent backend', {
      requestId,
      mode: adapter.mode,
      stream: request.stream,
      url: outbound.url,
    });
    log.debug('Outbound body', { requestId, body: truncate(JSON.stringify(outbound.body)) });

    const ctx: ChatContext = {
      requestId,
      request,
      outbound,
      client,
      streamHandler,
      signal: watchDisconnect(res, requestId).signal,
    };

    let pending: Promise<void>;
    if (!request.stream) {
      pending = handleBuffered(ctx, adapter, res);
    } else if (adapter.mode === 'native') {
      pending = handleNativeStream(ctx, adapter, res);
    } else {
      pending = handleCompatibleStream(ctx, res);
    }
    pending.catch(next);
  });

  app.all(CHAT_COMPLETIONS_PATH, (req, res) => {
    sendEnvelope(
      res,
      405,
      buildErrorEnvelope(`Method ${req.method} not allowed, use POST`, 'invalid_request_error'),
    );
  });

  app.use((req, res) => {
    sendEnvelope(res, 404, buildErrorEnvelope(`Unknown route: ${req.method} ${req.path}`, 'invalid_request_error'));
  });

  // Error middleware: every failure leaves as a standard envelope
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const requestId = getRequestId(res);

    const parserStatus = bodyParserStatus(error);
    const failure =
      parserStatus !== null
        ? new GatewayError(
            parserStatus,
            'invalid_request_error',
            parserStatus === 413 ? 'Request body is too large' : 'Request body is not valid JSON',
            { cause: error },
          )
        : toGatewayError(error);

    if (failure.statusCode >= 500) {
      log.error('Request failed', { requestId, error: failure });
    } else {
      log.warn('Request failed', { requestId, status: failure.statusCode, message: failure.message });
    }

    if (res.headersSent) {
      res.end();
      return;
    }
    sendEnvelope(res, failure.statusCode, failure.toEnvelope());
  });

  return app;
}

/**
 * Start listening; resolves once the port is bound
 */
export function startServer(config: Config, client?: AgentClient): Promise<Server> {
  const app = createApp({ config, client });
  const server = createServer(app);

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.server.port, config.server.host, () => {
      server.off('error', reject);
      log.info('Gateway listening', {
        host: config.server.host,
        port: config.server.port,
        mode: config.agent.useNative ? 'native' : 'compatible',
      });
      resolve(server);
    });
  });
}
