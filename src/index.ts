/**
 * payload-gate public API.
 */

export const VERSION = '0.1.0';

export * from './types/index.js';
export * from './core/pipeline/index.js';

export { HttpError, httpErrors, isHttpError, type HttpErrorOptions } from './core/http-error.js';
export { CodecError, isCodecError, jsonCodec, decodeUtf8, toText } from './core/codec.js';
export {
  parseMediaRange,
  mediaTypeQuality,
  clientAccepts,
  contentTypeMatches,
  MediaTypeError,
  type MediaRange,
} from './core/media-type.js';
export { CONTENT_KEY, getStashedContent, hasStashedContent } from './core/stream-cache.js';
export {
  lookupNamedCapability,
  resolveSpecificSchema,
  resolveSchema,
} from './core/schema-resolver.js';
export {
  DEFAULT_CONFIG,
  resolvePipelineConfig,
  pipelineConfigFromFile,
  type PipelineConfig,
} from './core/pipeline-config.js';
export { loadConfig, initialize, type InitResult } from './core/config-loader.js';
export {
  runPipeline,
  renderHttpError,
  createStages,
  createPipeline,
  Pipeline,
} from './core/pipeline-runner.js';
export { AjvSchema, SCHEMA_ERROR_KEY, type AjvSchemaOptions } from './core/ajv-schema.js';
export {
  createLogger,
  configureLogging,
  resetLogging,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogSink,
} from './core/logger.js';
export {
  createRequestListener,
  toInboundRequest,
  writeResponse,
  requestPath,
  type NodeRequestLike,
  type NodeResponseLike,
  type RequestListenerOptions,
  type RouteResolver,
} from './http/node-adapter.js';
