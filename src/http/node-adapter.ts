/**
 * node:http adapter.
 *
 * Wraps an `IncomingMessage` as an `InboundRequest`, runs it through a
 * `Pipeline`, and writes the resulting `OutboundResponse`. Works with any
 * object of the same shape, so tests drive it without opening a socket.
 *
 * @example
 * ```ts
 * const listener = createRequestListener({
 *   pipeline: createPipeline(),
 *   resolveRoute: (method, path) => routes.get(path),
 * });
 * createServer(listener).listen(8080);
 * ```
 */

import type { IncomingHttpHeaders } from 'node:http';
import { randomUUID } from 'node:crypto';
import type { BodyChunk, InboundRequest, OutboundResponse } from '../types/transport.js';
import { ErrorCode } from '../types/errors.js';
import { HttpError, httpErrors, isHttpError } from '../core/http-error.js';
import { createLogger, type Logger } from '../core/logger.js';
import { renderHttpError, type Pipeline } from '../core/pipeline-runner.js';
import type { Route } from '../core/pipeline/types.js';

// ---------------------------------------------------------------------------
// Structural node:http surface
// ---------------------------------------------------------------------------

/** The parts of `IncomingMessage` the adapter reads. */
export interface NodeRequestLike extends AsyncIterable<BodyChunk> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
}

/** The parts of `ServerResponse` the adapter writes. */
export interface NodeResponseLike {
  writeHead(statusCode: number, headers: Record<string, string | number>): unknown;
  end(body?: string | Uint8Array): unknown;
}

export type RouteResolver = (method: string, path: string) => Route | undefined;

export interface RequestListenerOptions {
  pipeline: Pipeline;
  resolveRoute: RouteResolver;
  logger?: Logger;
}

const INTERNAL_ERROR_BODY = JSON.stringify({ title: 'Internal Server Error' });

// ---------------------------------------------------------------------------
// Request conversion
// ---------------------------------------------------------------------------

function parseContentLength(value: string | undefined): number | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw httpErrors.badRequest(
      'The value provided for the "Content-Length" header is invalid. ' +
        'The value of the header must be a non-negative integer.',
      'Invalid header value',
    );
  }
  return Number(trimmed);
}

/**
 * Path component of a request target, without the query string. Targets
 * that do not parse as a URL path (e.g. `//`) are returned up to the `?`.
 */
export function requestPath(url: string | undefined): string {
  const target = url ?? '/';
  try {
    return new URL(target, 'http://localhost').pathname;
  } catch {
    const query = target.indexOf('?');
    return query === -1 ? target : target.slice(0, query);
  }
}

/**
 * Build an `InboundRequest` over a Node request. The message itself is the
 * body stream, so it must not have been read yet.
 *
 * @throws HttpError BAD_REQUEST on a malformed `content-length`.
 */
export function toInboundRequest(message: NodeRequestLike): InboundRequest {
  const { headers } = message;
  return {
    method: (message.method ?? 'GET').toUpperCase(),
    contentLength: parseContentLength(headers['content-length']),
    contentType: headers['content-type'] ?? null,
    accept: headers.accept ?? null,
    path: requestPath(message.url),
    stream: message,
    context: new Map(),
  };
}

// ---------------------------------------------------------------------------
// Response writing
// ---------------------------------------------------------------------------

export function writeResponse(res: NodeResponseLike, response: OutboundResponse): void {
  const headers: Record<string, string | number> = { 'content-type': response.contentType };
  if (response.body === undefined) {
    res.writeHead(response.status, headers);
    res.end();
    return;
  }
  headers['content-length'] = Buffer.byteLength(response.body);
  res.writeHead(response.status, headers);
  res.end(response.body);
}

// ---------------------------------------------------------------------------
// createRequestListener()
// ---------------------------------------------------------------------------

/**
 * Create a `node:http` request listener.
 *
 * Unrouted requests get a 404 error document. HttpErrors become their
 * error document; any other failure is logged and answered with a bare
 * 500, without internals.
 */
export function createRequestListener(
  options: RequestListenerOptions,
): (req: NodeRequestLike, res: NodeResponseLike) => Promise<void> {
  const { pipeline, resolveRoute } = options;
  const baseLogger = options.logger ?? createLogger('http');

  return async (req, res) => {
    const started = Date.now();
    const method = (req.method ?? 'GET').toUpperCase();
    const path = requestPath(req.url);
    const logger = baseLogger.withContext({ request_id: randomUUID(), method, path });
    const response: OutboundResponse = { status: 200, contentType: 'application/json' };

    try {
      const request = toInboundRequest(req);
      const route = resolveRoute(method, path);
      if (route === undefined) {
        renderHttpError(response, new HttpError({ code: ErrorCode.NOT_FOUND }));
      } else {
        await pipeline.handle(request, response, route);
      }
    } catch (err: unknown) {
      if (isHttpError(err)) {
        renderHttpError(response, err);
      } else {
        logger.error('unhandled error while processing request', { err });
        response.status = 500;
        response.contentType = 'application/json';
        response.body = INTERNAL_ERROR_BODY;
      }
    }

    writeResponse(res, response);
    logger.info('request completed', {
      status: response.status,
      duration_ms: Date.now() - started,
    });
  };
}
