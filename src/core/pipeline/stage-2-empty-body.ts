/**
 * Pipeline Stage 2: Empty body rejection.
 *
 * A request that declares a non-zero Content-Length but delivers no bytes
 * is rejected with 400. Requests without a declared length are never read.
 */

import type { InboundRequest } from '../../types/transport.js';
import { httpErrors } from '../http-error.js';
import { getStashedContent } from '../stream-cache.js';
import { createLogger } from '../logger.js';
import type { PipelineStage } from './types.js';

const logger = createLogger('pipeline:empty-body');

/**
 * @throws HttpError BAD_REQUEST if a body was declared but none arrived.
 */
export async function checkNonEmpty(request: InboundRequest): Promise<void> {
  if (!request.contentLength) return;

  const content = await getStashedContent(request);
  if (content.byteLength === 0) {
    throw httpErrors.badRequest('Empty request body. A valid JSON document is required.');
  }
}

export const stage2EmptyBody: PipelineStage = {
  name: 'empty-body',

  async processRequest(request: InboundRequest): Promise<void> {
    logger.debug('checking for empty body', { content_length: request.contentLength });
    await checkNonEmpty(request);
  },
};
