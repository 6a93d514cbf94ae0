/**
 * Pipeline types for the payload-gate request/response pipeline.
 *
 * A stage exposes up to three hooks. For one request the runner calls:
 *   every `processRequest` (in stage order)
 *   every `processResource` (in stage order)
 *   the route's responder
 *   every `processResponse` (in reverse stage order)
 * A hook rejects by throwing an `HttpError`.
 */

import type { InboundRequest, OutboundResponse, Resource } from '../../types/transport.js';

// ---------------------------------------------------------------------------
// Stage
// ---------------------------------------------------------------------------

export interface PipelineStage {
  name: string;
  /** Pre-routing checks; no resource is known yet. */
  processRequest?(request: InboundRequest, response: OutboundResponse): void | Promise<void>;
  /** After routing, before the responder runs. */
  processResource?(
    request: InboundRequest,
    response: OutboundResponse,
    resource: Resource,
  ): void | Promise<void>;
  /** After the responder, whether or not it succeeded. */
  processResponse?(
    request: InboundRequest,
    response: OutboundResponse,
    resource: Resource,
    succeeded: boolean,
  ): void | Promise<void>;
}

// ---------------------------------------------------------------------------
// Route
// ---------------------------------------------------------------------------

/** Application code for a route: stores its result in the request context. */
export type Responder = (
  request: InboundRequest,
  response: OutboundResponse,
) => void | Promise<void>;

export interface Route {
  resource: Resource;
  responder: Responder;
}
