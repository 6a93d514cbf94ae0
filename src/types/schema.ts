/**
 * The schema capability contract.
 *
 * A schema converts between the wire representation of a payload and the
 * value handlers work with. Failures are reported through the result
 * union, never by a second calling convention.
 */

/** Field (or `_schema` for root-level problems) to list of messages. */
export type SchemaErrors = Record<string, unknown>;

export type SchemaResult<T> = { ok: true; value: T } | { ok: false; errors: SchemaErrors };

export interface Schema<TValue = unknown> {
  /** Validate and coerce a decoded JSON value into the internal value. */
  load(raw: unknown): SchemaResult<TValue>;
  /** Encode an internal value into its transmittable representation. */
  dump(value: unknown): SchemaResult<string | Uint8Array>;
}

/** Message direction; selects the `{method}_{direction}_schema` slot. */
export type Direction = 'request' | 'response';

/**
 * True when `value` is an instantiated schema: a non-function object with
 * callable `load` and `dump`. A schema class passed without `new` fails.
 */
export function isSchema(value: unknown): value is Schema {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'load' in value &&
    typeof value.load === 'function' &&
    'dump' in value &&
    typeof value.dump === 'function'
  );
}
