/**
 * Transport-facing types: what a stage sees of the request and response.
 *
 * The HTTP server owns the real objects; the pipeline only depends on the
 * narrow surface below, so any server can be adapted to it.
 */

// ---------------------------------------------------------------------------
// Request context
// ---------------------------------------------------------------------------

/**
 * Per-request key/value store shared by every stage and the handler.
 * Created at request entry and dropped when the response is written.
 */
export type RequestContext = Map<string, unknown>;

// ---------------------------------------------------------------------------
// Inbound
// ---------------------------------------------------------------------------

/** A chunk as produced by a Node stream or an in-memory iterable. */
export type BodyChunk = Uint8Array | string;

export interface InboundRequest {
  /** HTTP method as received, e.g. `'POST'`. */
  method: string;
  /** Declared `Content-Length`, or `null` when the header is absent. */
  contentLength: number | null;
  /** Declared `Content-Type`, or `null` when the header is absent. */
  contentType: string | null;
  /** Raw `Accept` header, or `null` when absent (treated as `*\/*`). */
  accept: string | null;
  /** Request path, used for logging only. */
  path?: string;
  /** Single-read, non-seekable body stream. */
  stream: AsyncIterable<BodyChunk>;
  context: RequestContext;
}

// ---------------------------------------------------------------------------
// Outbound
// ---------------------------------------------------------------------------

export interface OutboundResponse {
  status: number;
  contentType: string;
  body?: string | Uint8Array;
}

// ---------------------------------------------------------------------------
// Resource
// ---------------------------------------------------------------------------

/**
 * Application handler object for a route. The pipeline only ever reads
 * named properties from it (see `lookupNamedCapability`).
 */
export type Resource = object;
