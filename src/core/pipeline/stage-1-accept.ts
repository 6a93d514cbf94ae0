/**
 * Pipeline Stage 1: Accept and Content-Type enforcement.
 *
 * Two checks in order:
 *   1. The client must accept `application/json` responses (→ 406).
 *   2. Methods that carry a body must declare an `application/json`
 *      content type (→ 415).
 *
 * Runs before anything reads the body.
 */

import type { InboundRequest } from '../../types/transport.js';
import { httpErrors } from '../http-error.js';
import { clientAccepts } from '../media-type.js';
import { createLogger } from '../logger.js';
import { DEFAULT_CONFIG } from '../pipeline-config.js';
import type { PipelineStage } from './types.js';

const logger = createLogger('pipeline:accept');

const JSON_CONTENT_TYPE = 'application/json';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface Stage1Options {
  /** Methods for which a JSON content type is required. Default POST, PUT, PATCH. */
  requiredMethods?: Iterable<string>;
}

// ---------------------------------------------------------------------------
// Check
// ---------------------------------------------------------------------------

/**
 * Reject requests that cannot be served as JSON.
 *
 * @throws HttpError NOT_ACCEPTABLE if the Accept header excludes JSON.
 * @throws HttpError UNSUPPORTED_MEDIA_TYPE if a body-carrying method lacks
 *   an `application/json` content type.
 */
export function checkAcceptability(
  request: InboundRequest,
  requiredMethods: ReadonlySet<string> = new Set(DEFAULT_CONFIG.requiredJsonMethods),
): void {
  if (!clientAccepts(request.accept, JSON_CONTENT_TYPE)) {
    throw httpErrors.notAcceptable(
      'This server only supports responses encoded as JSON. ' +
        'Please update your "Accept" header to include "application/json".',
    );
  }

  const method = request.method.toUpperCase();
  if (!requiredMethods.has(method)) return;

  if (request.contentType === null || !request.contentType.includes(JSON_CONTENT_TYPE)) {
    throw httpErrors.unsupportedMediaType(
      `${method} requests must have "application/json" in their "Content-Type" header.`,
    );
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createStage1Accept(options: Stage1Options = {}): PipelineStage {
  const requiredMethods = new Set(
    [...(options.requiredMethods ?? DEFAULT_CONFIG.requiredJsonMethods)].map((m) => m.toUpperCase()),
  );

  return {
    name: 'accept',

    processRequest(request: InboundRequest): void {
      logger.debug('checking acceptability', {
        method: request.method,
        accept: request.accept,
        content_type: request.contentType,
      });
      checkAcceptability(request, requiredMethods);
    },
  };
}

export const stage1Accept: PipelineStage = createStage1Accept();
