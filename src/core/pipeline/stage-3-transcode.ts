/**
 * Pipeline Stage 3: Payload transcoding.
 *
 * Inbound (`processResource`): decode the request body, through the
 * resource's schema when it has one or as generic JSON otherwise, and
 * store the result under `config.inboundKey`.
 *
 * Outbound (`processResponse`): take the handler's result from
 * `config.outboundKey` and encode it into the response body, again through
 * the schema or as generic JSON.
 *
 * Schema lookup order per method and direction is described in
 * `schema-resolver.ts`.
 */

import type { InboundRequest, OutboundResponse, Resource } from '../../types/transport.js';
import type { Direction, Schema } from '../../types/schema.js';
import { isSchema } from '../../types/schema.js';
import { httpErrors } from '../http-error.js';
import { isCodecError, toText } from '../codec.js';
import { contentTypeMatches } from '../media-type.js';
import { getStashedContent } from '../stream-cache.js';
import { resolveSchema } from '../schema-resolver.js';
import { createLogger } from '../logger.js';
import { resolvePipelineConfig, type PipelineConfig } from '../pipeline-config.js';
import type { PipelineStage } from './types.js';

const logger = createLogger('pipeline:transcode');

const SERIALIZE_FAILED_TITLE = 'Could not serialize response';

// ---------------------------------------------------------------------------
// PayloadTranscoder
// ---------------------------------------------------------------------------

export class PayloadTranscoder implements PipelineStage {
  readonly name = 'transcode';
  readonly config: PipelineConfig;

  constructor(config: PipelineConfig = resolvePipelineConfig()) {
    this.config = config;
  }

  // -------------------------------------------------------------------------
  // Hooks
  // -------------------------------------------------------------------------

  async processResource(
    request: InboundRequest,
    _response: OutboundResponse,
    resource: Resource,
  ): Promise<void> {
    logger.debug('decoding request', { method: request.method, content_type: request.contentType });
    await this.decodeRequest(request, resource);
  }

  processResponse(
    request: InboundRequest,
    response: OutboundResponse,
    resource: Resource,
    succeeded: boolean,
  ): void {
    logger.debug('encoding response', { method: request.method, succeeded });
    this.encodeResponse(request, response, resource);
  }

  // -------------------------------------------------------------------------
  // Inbound
  // -------------------------------------------------------------------------

  /**
   * Decode the request body into `config.inboundKey`.
   *
   * @throws HttpError BAD_REQUEST on invalid UTF-8 or JSON.
   * @throws HttpError UNPROCESSABLE_ENTITY when the schema rejects the body.
   * @throws TypeError when the resource's schema is not an instance.
   */
  async decodeRequest(request: InboundRequest, resource: Resource): Promise<void> {
    if (!request.contentLength) return;

    const { config } = this;
    if (
      !config.handleUnexpectedContentTypes &&
      !contentTypeMatches(request.contentType, config.expectedContentType)
    ) {
      logger.info('content type is not the expected type, skipping deserialization', {
        method: request.method,
        content_type: request.contentType,
        expected: config.expectedContentType,
      });
      return;
    }

    const found = resolveSchema(resource, request.method, 'request');

    if (found !== undefined) {
      const schema = requireSchemaInstance(found, request.method, 'request');
      const parsed = await this.decodeBody(request, 'schema');
      const result = schema.load(parsed);

      if (!result.ok) {
        logger.debug('schema rejected request body', { method: request.method });
        throw httpErrors.unprocessableEntity(this.describe(result.errors));
      }

      request.context.set(config.inboundKey, result.value);
    } else if (config.forceGenericJson) {
      request.context.set(config.inboundKey, await this.decodeBody(request, 'generic'));
    }
  }

  private async decodeBody(request: InboundRequest, mode: 'schema' | 'generic'): Promise<unknown> {
    const body = await getStashedContent(request);
    try {
      return this.config.codec.decode(body);
    } catch (err) {
      // A codec that throws something other than CodecError still signals bad input
      const kind = isCodecError(err) ? err.kind : 'syntax';

      if (mode === 'generic') {
        throw httpErrors.badRequest(
          'Could not decode the request body, either because it was not valid JSON ' +
            'or because it was not encoded as UTF-8.',
        );
      }
      throw httpErrors.badRequest(
        kind === 'encoding' ? 'Body was not encoded as UTF-8' : 'Request must be valid JSON',
      );
    }
  }

  // -------------------------------------------------------------------------
  // Outbound
  // -------------------------------------------------------------------------

  /**
   * Encode the value under `config.outboundKey` into the response body.
   *
   * @throws HttpError INTERNAL_SERVER_ERROR when the value cannot be encoded.
   * @throws TypeError when the resource's schema is not an instance.
   */
  encodeResponse(request: InboundRequest, response: OutboundResponse, resource: Resource): void {
    const { config } = this;
    if (!request.context.has(config.outboundKey)) return;

    const value = request.context.get(config.outboundKey);
    const found = resolveSchema(resource, request.method, 'response');

    if (found !== undefined) {
      const schema = requireSchemaInstance(found, request.method, 'response');

      let result: ReturnType<Schema['dump']>;
      try {
        result = schema.dump(value);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn('schema threw while dumping response', { method: request.method, err });
        throw httpErrors.internal(this.describe({ error: message }), SERIALIZE_FAILED_TITLE);
      }

      if (!result.ok) {
        throw httpErrors.internal(this.describe(result.errors), SERIALIZE_FAILED_TITLE);
      }

      response.body = result.value;
      response.contentType = config.codec.contentType;
    } else if (config.forceGenericJson) {
      try {
        response.body = config.codec.encode(value);
      } catch (err) {
        logger.warn('result could not be encoded', { method: request.method, err });
        throw httpErrors.internal(
          'The server attempted to serialize an object that cannot be serialized. ' +
            'This is likely a server-side bug.',
          SERIALIZE_FAILED_TITLE,
        );
      }
      response.contentType = config.codec.contentType;
    }
  }

  /** JSON-encode error detail for a response description. */
  private describe(detail: Record<string, unknown>): string {
    try {
      return toText(this.config.codec.encode(detail));
    } catch {
      return JSON.stringify(detail);
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function requireSchemaInstance(value: unknown, method: string, direction: Direction): Schema {
  if (!isSchema(value)) {
    throw new TypeError(
      'The schema and <method>_schema properties of a resource must be instantiated ' +
        `schema objects (got ${typeof value} for ${method.toUpperCase()} ${direction}).`,
    );
  }
  return value;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createStage3Transcode(config?: PipelineConfig): PayloadTranscoder {
  return new PayloadTranscoder(config);
}
