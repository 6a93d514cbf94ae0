/**
 * Codec capability used for generic (schema-less) JSON handling and for
 * encoding error details.
 */

/**
 * Why a codec call failed:
 * - `encoding`: input bytes are not valid UTF-8
 * - `syntax`: input text is not a valid document
 * - `unencodable`: a value has no representation in the format
 */
export type CodecErrorKind = 'encoding' | 'syntax' | 'unencodable';

export interface Codec {
  /** Media type produced by `encode`, e.g. `'application/json'`. */
  readonly contentType: string;
  /** Throws `CodecError` (`encoding` or `syntax`) on malformed input. */
  decode(input: Uint8Array | string): unknown;
  /** Throws `CodecError` (`unencodable`) when `value` cannot be represented. */
  encode(value: unknown): string | Uint8Array;
}
