import { describe, it, expect } from 'vitest';
import { checkAcceptability, createStage1Accept, stage1Accept } from './stage-1-accept.js';
import { isHttpError, type HttpError } from '../http-error.js';
import { ErrorCode } from '../../types/errors.js';
import { createRequest, createResponse } from '../../testing/factories.js';
import type { InboundRequest } from '../../types/transport.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function rejection(request: InboundRequest, methods?: ReadonlySet<string>): HttpError {
  try {
    checkAcceptability(request, methods);
  } catch (err) {
    if (isHttpError(err)) return err;
    throw err;
  }
  throw new Error('expected the request to be rejected');
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Stage 1: Accept and Content-Type', () => {
  it('passes a GET that accepts JSON', () => {
    expect(() => checkAcceptability(createRequest())).not.toThrow();
  });

  it('passes when the Accept header is missing', () => {
    expect(() => checkAcceptability(createRequest({ accept: null }))).not.toThrow();
  });

  it('rejects clients that do not accept JSON with 406', () => {
    const err = rejection(createRequest({ accept: 'text/html' }));

    expect(err.code).toBe(ErrorCode.NOT_ACCEPTABLE);
    expect(err.status).toBe(406);
    expect(err.description).toBe(
      'This server only supports responses encoded as JSON. ' +
        'Please update your "Accept" header to include "application/json".',
    );
  });

  it('checks Accept before Content-Type', () => {
    const err = rejection(createRequest({ method: 'POST', accept: 'text/html', contentType: null }));
    expect(err.status).toBe(406);
  });

  it('rejects a POST without a content type with 415', () => {
    const err = rejection(createRequest({ method: 'POST' }));

    expect(err.code).toBe(ErrorCode.UNSUPPORTED_MEDIA_TYPE);
    expect(err.description).toBe(
      'POST requests must have "application/json" in their "Content-Type" header.',
    );
  });

  it('rejects a PUT with a non-JSON content type', () => {
    const err = rejection(createRequest({ method: 'put', contentType: 'text/plain' }));
    expect(err.description).toBe(
      'PUT requests must have "application/json" in their "Content-Type" header.',
    );
  });

  it('accepts content types containing application/json', () => {
    for (const contentType of ['application/json', 'application/json; charset=utf-8']) {
      const request = createRequest({ method: 'PATCH', contentType });
      expect(() => checkAcceptability(request)).not.toThrow();
    }
  });

  it('does not require a content type for other methods', () => {
    expect(() => checkAcceptability(createRequest({ method: 'DELETE' }))).not.toThrow();
  });

  it('honours a custom method set', () => {
    const request = createRequest({ method: 'DELETE' });
    expect(rejection(request, new Set(['DELETE'])).status).toBe(415);
  });

  it('exposes the check as a request hook', () => {
    const stage = createStage1Accept({ requiredMethods: ['post'] });
    const request = createRequest({ method: 'POST', contentType: 'text/csv' });

    expect(stage.name).toBe('accept');
    expect(() => stage.processRequest?.(request, createResponse())).toThrow(
      'POST requests must have "application/json" in their "Content-Type" header.',
    );
    expect(stage1Accept.processResource).toBeUndefined();
  });
});
