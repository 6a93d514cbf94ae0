/**
 * Method- and direction-scoped schema lookup on resources.
 *
 * Schemas are attached to a resource by name. For a `POST` request the
 * lookup order is:
 *   1. `post_request_schema`
 *   2. `post_schema`
 *   3. `schema`
 * and for the response the same with `post_response_schema` first.
 */

import type { Resource } from '../types/transport.js';
import type { Direction } from '../types/schema.js';

/**
 * Read a named property from a resource (own or inherited).
 * `undefined` and `null` both mean "not provided".
 */
export function lookupNamedCapability(resource: Resource, name: string): unknown {
  if (!(name in resource)) return undefined;
  const value: unknown = Reflect.get(resource, name);
  return value ?? undefined;
}

/** The method-specific schema, or `undefined` if the resource has none. */
export function resolveSpecificSchema(
  resource: Resource,
  method: string,
  direction: Direction,
): unknown {
  const lowered = method.toLowerCase();

  const specific = lookupNamedCapability(resource, `${lowered}_${direction}_schema`);
  if (specific !== undefined) return specific;

  return lookupNamedCapability(resource, `${lowered}_schema`);
}

/**
 * The most specific schema for (method, direction), falling back to the
 * resource-wide `schema`. Returns whatever is attached; callers check that
 * it is an instantiated schema.
 */
export function resolveSchema(resource: Resource, method: string, direction: Direction): unknown {
  const specific = resolveSpecificSchema(resource, method, direction);
  if (specific !== undefined) return specific;

  return lookupNamedCapability(resource, 'schema');
}
