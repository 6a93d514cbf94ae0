/**
 * Pipeline runner for payload-gate.
 *
 * Drives the stage hooks around a route's responder:
 *   request hooks → resource hooks → responder → response hooks (reversed)
 *
 * A failure before the responder short-circuits: the error is rendered and
 * no response hook runs. Once the responder has been reached, response
 * hooks always run, so a result stored before a handler failure is still
 * encoded. Only HttpErrors are rendered here; anything else (programmer
 * errors, unexpected handler crashes) propagates to the server.
 */

import type { InboundRequest, OutboundResponse } from '../types/transport.js';
import { CLIENT_ERROR_CODES } from '../types/errors.js';
import { isHttpError, type HttpError } from './http-error.js';
import { createLogger } from './logger.js';
import { resolvePipelineConfig, type PipelineConfig } from './pipeline-config.js';
import { createStage1Accept } from './pipeline/stage-1-accept.js';
import { stage2EmptyBody } from './pipeline/stage-2-empty-body.js';
import { createStage3Transcode } from './pipeline/stage-3-transcode.js';
import type { PipelineStage, Route } from './pipeline/types.js';

const logger = createLogger('pipeline:runner');

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/** Client errors are routine and logged at debug; server-side ones at warn. */
function logRejection(
  message: string,
  request: InboundRequest,
  error: HttpError,
  meta: Record<string, unknown> = {},
): void {
  const level = CLIENT_ERROR_CODES.has(error.code) ? 'debug' : 'warn';
  logger[level](message, {
    ...meta,
    method: request.method,
    path: request.path,
    error_code: error.code,
  });
}

/** Write an HttpError into the response as a JSON error document. */
export function renderHttpError(response: OutboundResponse, error: HttpError): void {
  response.status = error.status;
  response.contentType = 'application/json';
  response.body = JSON.stringify(error.toErrorPayload());
}

// ---------------------------------------------------------------------------
// runPipeline()
// ---------------------------------------------------------------------------

/**
 * Run one request through `stages` and the route's responder.
 *
 * @throws Any non-HttpError raised by a hook or the responder. A responder
 *   crash is rethrown only after the response hooks have run.
 */
export async function runPipeline(
  stages: readonly PipelineStage[],
  request: InboundRequest,
  response: OutboundResponse,
  route: Route,
): Promise<void> {
  const { resource, responder } = route;

  try {
    for (const stage of stages) {
      await stage.processRequest?.(request, response);
    }
    for (const stage of stages) {
      await stage.processResource?.(request, response, resource);
    }
  } catch (err: unknown) {
    if (!isHttpError(err)) throw err;
    logRejection('request rejected before responder', request, err);
    renderHttpError(response, err);
    return;
  }

  let succeeded = false;
  let crash: { error: unknown } | undefined;
  try {
    await responder(request, response);
    succeeded = true;
  } catch (err: unknown) {
    if (isHttpError(err)) {
      renderHttpError(response, err);
    } else {
      crash = { error: err };
    }
  }

  for (const stage of [...stages].reverse()) {
    try {
      await stage.processResponse?.(request, response, resource, succeeded);
    } catch (err: unknown) {
      if (!isHttpError(err)) throw err;
      logRejection('response hook rejected', request, err, { stage: stage.name });
      renderHttpError(response, err);
    }
  }

  if (crash) {
    throw crash.error;
  }
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/** The standard stages wired from one config. */
export function createStages(config: PipelineConfig = resolvePipelineConfig()): PipelineStage[] {
  return [
    createStage1Accept({ requiredMethods: config.requiredJsonMethods }),
    stage2EmptyBody,
    createStage3Transcode(config),
  ];
}

export class Pipeline {
  readonly config: PipelineConfig;
  private readonly stages: readonly PipelineStage[];

  constructor(config: PipelineConfig = resolvePipelineConfig(), stages?: readonly PipelineStage[]) {
    this.config = config;
    this.stages = stages ?? createStages(config);
  }

  get stageNames(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  handle(request: InboundRequest, response: OutboundResponse, route: Route): Promise<void> {
    return runPipeline(this.stages, request, response, route);
  }
}

export function createPipeline(overrides: Partial<PipelineConfig> = {}): Pipeline {
  return new Pipeline(resolvePipelineConfig(overrides));
}
