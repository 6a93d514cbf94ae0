/**
 * Error codes and payload shapes surfaced by the pipeline.
 *
 * Every failure a stage can report maps to exactly one code, and every
 * code maps to one HTTP status.
 */

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

export const ErrorCode = {
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  NOT_ACCEPTABLE: 'NOT_ACCEPTABLE',
  UNSUPPORTED_MEDIA_TYPE: 'UNSUPPORTED_MEDIA_TYPE',
  UNPROCESSABLE_ENTITY: 'UNPROCESSABLE_ENTITY',
  INTERNAL_SERVER_ERROR: 'INTERNAL_SERVER_ERROR',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ---------------------------------------------------------------------------
// Status mapping
// ---------------------------------------------------------------------------

/** HTTP status for each error code. */
export const ERROR_STATUS: Readonly<Record<ErrorCodeValue, number>> = {
  [ErrorCode.BAD_REQUEST]: 400,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.NOT_ACCEPTABLE]: 406,
  [ErrorCode.UNSUPPORTED_MEDIA_TYPE]: 415,
  [ErrorCode.UNPROCESSABLE_ENTITY]: 422,
  [ErrorCode.INTERNAL_SERVER_ERROR]: 500,
};

/** Default title for each error code (the status reason phrase). */
export const ERROR_TITLES: Readonly<Record<ErrorCodeValue, string>> = {
  [ErrorCode.BAD_REQUEST]: 'Bad Request',
  [ErrorCode.NOT_FOUND]: 'Not Found',
  [ErrorCode.NOT_ACCEPTABLE]: 'Not Acceptable',
  [ErrorCode.UNSUPPORTED_MEDIA_TYPE]: 'Unsupported Media Type',
  [ErrorCode.UNPROCESSABLE_ENTITY]: 'Unprocessable Entity',
  [ErrorCode.INTERNAL_SERVER_ERROR]: 'Internal Server Error',
};

/** Codes caused by the client, detected before or while reading the body. */
export const CLIENT_ERROR_CODES: ReadonlySet<ErrorCodeValue> = new Set([
  ErrorCode.BAD_REQUEST,
  ErrorCode.NOT_FOUND,
  ErrorCode.NOT_ACCEPTABLE,
  ErrorCode.UNSUPPORTED_MEDIA_TYPE,
  ErrorCode.UNPROCESSABLE_ENTITY,
]);

// ---------------------------------------------------------------------------
// Payload
// ---------------------------------------------------------------------------

/** JSON body written to the response when a stage rejects a request. */
export interface ErrorPayload {
  title: string;
  description?: string;
}
