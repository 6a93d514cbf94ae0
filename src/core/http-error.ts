/**
 * HttpError: structured error class raised by pipeline stages.
 *
 * Stages throw HttpError to reject a request with a specific status. The
 * runner discriminates HttpError from other throws: HttpError → rendered
 * error response, anything else → propagated to the server, which answers
 * with a generic 500 (no internals leaked).
 */

import type { ErrorCodeValue, ErrorPayload } from '../types/errors.js';
import { ErrorCode, ERROR_STATUS, ERROR_TITLES } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

const HTTP_ERROR_BRAND = Symbol.for('payload-gate.HttpError');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface HttpErrorOptions {
  code: ErrorCodeValue;
  /** Short summary. Defaults to the status reason phrase. */
  title?: string;
  /** Human-readable detail written to the response body. */
  description?: string;
}

// ---------------------------------------------------------------------------
// HttpError class
// ---------------------------------------------------------------------------

export class HttpError extends Error {
  readonly code: ErrorCodeValue;
  readonly status: number;
  readonly title: string;
  readonly description?: string;

  /** @internal Brand for safe instanceof checks across module boundaries. */
  readonly [HTTP_ERROR_BRAND] = true as const;

  constructor(options: HttpErrorOptions) {
    const title = options.title ?? ERROR_TITLES[options.code];
    super(options.description ?? title);
    this.name = 'HttpError';
    this.code = options.code;
    this.status = ERROR_STATUS[options.code];
    this.title = title;

    if (options.description !== undefined) {
      this.description = options.description;
    }
  }

  /** Body written to the response. No stack traces are included. */
  toErrorPayload(): ErrorPayload {
    const payload: ErrorPayload = { title: this.title };
    if (this.description !== undefined) {
      payload.description = this.description;
    }
    return payload;
  }
}

// ---------------------------------------------------------------------------
// Type guard
// ---------------------------------------------------------------------------

export function isHttpError(value: unknown): value is HttpError {
  if (value instanceof HttpError) {
    return true;
  }

  // Cross-module check: branded symbol
  return (
    typeof value === 'object' &&
    value !== null &&
    HTTP_ERROR_BRAND in value &&
    Reflect.get(value, HTTP_ERROR_BRAND) === true
  );
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export const httpErrors = {
  badRequest: (description: string, title?: string) =>
    new HttpError({ code: ErrorCode.BAD_REQUEST, description, title }),

  notFound: (description: string) => new HttpError({ code: ErrorCode.NOT_FOUND, description }),

  notAcceptable: (description: string) =>
    new HttpError({ code: ErrorCode.NOT_ACCEPTABLE, description }),

  unsupportedMediaType: (description: string) =>
    new HttpError({ code: ErrorCode.UNSUPPORTED_MEDIA_TYPE, description }),

  unprocessableEntity: (description: string) =>
    new HttpError({ code: ErrorCode.UNPROCESSABLE_ENTITY, description }),

  internal: (description: string, title?: string) =>
    new HttpError({ code: ErrorCode.INTERNAL_SERVER_ERROR, description, title }),
};
