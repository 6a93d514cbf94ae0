/**
 * Schema capability backed by ajv.
 *
 * Validates payloads against a JSON Schema written in terms of internal
 * field names. `dataKeys` maps internal names to the keys used on the
 * wire, so `{ bar: 'foo' }` reads `{"foo": ...}` into `{ bar: ... }` and
 * writes it back as `{"foo": ...}`. Validators are compiled once, at
 * construction, and reused for every request.
 */

import _Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import type { Codec } from '../types/codec.js';
import type { Schema, SchemaErrors, SchemaResult } from '../types/schema.js';
import { isRecord } from '../types/config.js';
import { jsonCodec, toText } from './codec.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface AjvSchemaOptions {
  /** JSON Schema for the internal value; must describe an object. */
  schema: Record<string, unknown>;
  /** Internal field name → wire key, for fields whose names differ. */
  dataKeys?: Record<string, string>;
  /** Codec producing the dumped representation. Defaults to JSON. */
  codec?: Codec;
}

/** Key used for errors that do not belong to a single field. */
export const SCHEMA_ERROR_KEY = '_schema';

const INVALID_INPUT = 'Invalid input type.';

// ---------------------------------------------------------------------------
// AjvSchema
// ---------------------------------------------------------------------------

export class AjvSchema<TValue extends Record<string, unknown> = Record<string, unknown>>
  implements Schema<TValue>
{
  private readonly loadValidator: ValidateFunction<TValue>;
  private readonly dumpValidator: ValidateFunction<TValue>;
  private readonly toWire: ReadonlyMap<string, string>;
  private readonly fromWire: ReadonlyMap<string, string>;
  private readonly codec: Codec;

  constructor(options: AjvSchemaOptions) {
    // Loading coerces scalars ("5" → 5); dumping checks the value as-is.
    const loadAjv = new Ajv({ allErrors: true, strict: false, coerceTypes: true });
    const dumpAjv = new Ajv({ allErrors: true, strict: false });
    this.loadValidator = loadAjv.compile<TValue>(options.schema);
    this.dumpValidator = dumpAjv.compile<TValue>(options.schema);

    const entries = Object.entries(options.dataKeys ?? {});
    this.toWire = new Map(entries);
    this.fromWire = new Map(entries.map(([internal, wire]) => [wire, internal]));
    this.codec = options.codec ?? jsonCodec;
  }

  /**
   * Rename wire keys to internal names, coerce, and validate.
   * The caller's value is never mutated.
   */
  load(raw: unknown): SchemaResult<TValue> {
    if (!isRecord(raw)) {
      return { ok: false, errors: { [SCHEMA_ERROR_KEY]: [INVALID_INPUT] } };
    }

    // An internal name that has its own wire key is not accepted on the wire
    const renamed: Record<string, unknown> = {};
    const unknownKeys: string[] = [];
    for (const [key, value] of Object.entries(raw)) {
      const internal = this.fromWire.get(key);
      if (internal !== undefined) {
        renamed[internal] = value;
      } else if (this.toWire.has(key)) {
        unknownKeys.push(key);
      } else {
        renamed[key] = value;
      }
    }

    const data = structuredClone(renamed);
    if (!this.loadValidator(data)) {
      return { ok: false, errors: this.collectErrors(this.loadValidator.errors, unknownKeys) };
    }
    if (unknownKeys.length > 0) {
      return { ok: false, errors: this.collectErrors([], unknownKeys) };
    }
    return { ok: true, value: data };
  }

  /** Validate the internal value, rename to wire keys, and encode. */
  dump(value: unknown): SchemaResult<string> {
    if (!isRecord(value)) {
      return { ok: false, errors: { [SCHEMA_ERROR_KEY]: [INVALID_INPUT] } };
    }
    if (!this.dumpValidator(value)) {
      return { ok: false, errors: this.collectErrors(this.dumpValidator.errors) };
    }

    const wire: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(value)) {
      wire[this.toWire.get(key) ?? key] = field;
    }

    try {
      return { ok: true, value: toText(this.codec.encode(wire)) };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, errors: { [SCHEMA_ERROR_KEY]: [message] } };
    }
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  /**
   * Group ajv errors by wire field name. Errors below a field keep the
   * rest of their path as a prefix, e.g. `{ address: ['/zip: must be string'] }`.
   * `unknownKeys` are wire keys rejected before validation.
   */
  private collectErrors(
    errors: ErrorObject[] | null | undefined,
    unknownKeys: readonly string[] = [],
  ): SchemaErrors {
    const grouped: Record<string, string[]> = {};
    const add = (field: string, message: string): void => {
      (grouped[field] ??= []).push(message);
    };

    for (const err of errors ?? []) {
      const segments = err.instancePath.split('/').slice(1);
      const [head, ...rest] = segments;

      if (head === undefined) {
        const missing: unknown = err.params['missingProperty'];
        const additional: unknown = err.params['additionalProperty'];
        if (err.keyword === 'required' && typeof missing === 'string') {
          add(this.wireName(missing), 'Missing data for required field.');
        } else if (err.keyword === 'additionalProperties' && typeof additional === 'string') {
          add(this.wireName(additional), 'Unknown field.');
        } else {
          add(SCHEMA_ERROR_KEY, err.message ?? 'invalid value');
        }
        continue;
      }

      const message = err.message ?? 'invalid value';
      add(this.wireName(head), rest.length > 0 ? `/${rest.join('/')}: ${message}` : message);
    }

    for (const key of unknownKeys) {
      add(key, 'Unknown field.');
    }

    return grouped;
  }

  private wireName(internal: string): string {
    return this.toWire.get(internal) ?? internal;
  }
}
