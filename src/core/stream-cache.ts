/**
 * Single-read body buffering.
 *
 * The transport stream can be read exactly once and cannot be rewound.
 * Every stage that needs the body goes through `getStashedContent`, which
 * reads the stream on first use and serves the buffered bytes afterwards.
 * No stage may iterate `request.stream` directly.
 */

import type { InboundRequest } from '../types/transport.js';

/** Reserved context key holding the buffered body. */
export const CONTENT_KEY = 'content';

async function readAll(stream: InboundRequest['stream']): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
  }
  return new Uint8Array(Buffer.concat(chunks));
}

/**
 * Return the request body, reading the transport at most once per request.
 * Read failures propagate to the caller and nothing is stashed.
 */
export async function getStashedContent(request: InboundRequest): Promise<Uint8Array> {
  const stashed = request.context.get(CONTENT_KEY);
  if (stashed instanceof Uint8Array) {
    return stashed;
  }

  const content = await readAll(request.stream);
  request.context.set(CONTENT_KEY, content);
  return content;
}

/** True once the body has been buffered for this request. */
export function hasStashedContent(request: InboundRequest): boolean {
  return request.context.get(CONTENT_KEY) instanceof Uint8Array;
}
