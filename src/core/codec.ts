/**
 * Default JSON codec.
 *
 * Decoding rejects invalid UTF-8 separately from invalid JSON so the
 * transcoder can report the two with different messages. Encoding is
 * strict: values JSON.stringify would silently drop or mangle (sets,
 * maps, functions, class instances) are rejected instead.
 */

import type { Codec, CodecErrorKind } from '../types/codec.js';

// ---------------------------------------------------------------------------
// CodecError
// ---------------------------------------------------------------------------

export class CodecError extends Error {
  readonly kind: CodecErrorKind;

  constructor(kind: CodecErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CodecError';
    this.kind = kind;
  }
}

export function isCodecError(value: unknown): value is CodecError {
  return value instanceof CodecError;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Decode bytes as strict UTF-8, throwing `CodecError('encoding')`. */
export function decodeUtf8(input: Uint8Array | string): string {
  if (typeof input === 'string') return input;
  try {
    return utf8.decode(input);
  } catch (err) {
    throw new CodecError('encoding', 'Input is not valid UTF-8', { cause: err });
  }
}

/** Render codec output as text, e.g. for an error description. */
export function toText(output: string | Uint8Array): string {
  return typeof output === 'string' ? output : Buffer.from(output).toString('utf8');
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  return value.constructor?.name ?? 'object';
}

/**
 * JSON.stringify replacer that throws on values without a faithful JSON
 * form. Runs after `toJSON`, so Dates arrive here as strings.
 */
function strictReplacer(this: unknown, key: string, value: unknown): unknown {
  switch (typeof value) {
    case 'function':
    case 'symbol':
    case 'bigint':
      throw new CodecError('unencodable', `Value at "${key}" is a ${typeof value}`);
    case 'number':
      if (!Number.isFinite(value)) {
        throw new CodecError('unencodable', `Value at "${key}" is not a finite number`);
      }
      return value;
    case 'object':
      if (value !== null && !Array.isArray(value) && !isPlainObject(value)) {
        throw new CodecError('unencodable', `Value at "${key}" is a ${describeValue(value)}`);
      }
      return value;
    default:
      return value;
  }
}

// ---------------------------------------------------------------------------
// jsonCodec
// ---------------------------------------------------------------------------

export const jsonCodec: Codec = {
  contentType: 'application/json',

  decode(input: Uint8Array | string): unknown {
    const text = decodeUtf8(input);
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new CodecError('syntax', 'Input is not valid JSON', { cause: err });
    }
  },

  encode(value: unknown): string {
    let encoded: string | undefined;
    try {
      encoded = JSON.stringify(value, strictReplacer);
    } catch (err) {
      if (isCodecError(err)) throw err;
      // Circular structures surface as a TypeError from JSON.stringify
      throw new CodecError('unencodable', 'Value cannot be encoded as JSON', { cause: err });
    }
    if (encoded === undefined) {
      throw new CodecError('unencodable', `Value is ${describeValue(value)}`);
    }
    return encoded;
  },
};
