export {
  ErrorCode,
  type ErrorCodeValue,
  type ErrorPayload,
  ERROR_STATUS,
  ERROR_TITLES,
  CLIENT_ERROR_CODES,
} from './errors.js';

export {
  type RequestContext,
  type BodyChunk,
  type InboundRequest,
  type OutboundResponse,
  type Resource,
} from './transport.js';

export {
  type SchemaErrors,
  type SchemaResult,
  type Schema,
  type Direction,
  isSchema,
} from './schema.js';

export { type CodecErrorKind, type Codec } from './codec.js';

export {
  type PipelineSection,
  type LoggingSection,
  type FileConfig,
  DEFAULT_FILE_CONFIG,
  resolveConfigPath,
  parseConfig,
} from './config.js';
