/**
 * Media type parsing and media-range quality matching.
 *
 * Used by the accept guard (does the client accept JSON?) and by the
 * transcoder (is this body the expected content type?). Matching follows
 * the usual media-range rules: the most specific range that matches a
 * type decides its quality, and a quality of 0 means "not acceptable".
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MediaRange {
  type: string;
  subtype: string;
  params: Record<string, string>;
  /** Quality in [0, 1]. Missing or out-of-range values become 1. */
  q: number;
}

export class MediaTypeError extends Error {
  constructor(value: string) {
    super(`Malformed media type: "${value}"`);
    this.name = 'MediaTypeError';
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse a media type or media range such as `application/json; q=0.5`.
 * A bare `*` is read as `*\/*`.
 *
 * @throws MediaTypeError if the type is not `type/subtype` or a parameter
 *   has no `=`.
 */
export function parseMediaRange(value: string): MediaRange {
  const [fullType = '', ...rawParams] = value.split(';');

  const params: Record<string, string> = {};
  for (const raw of rawParams) {
    const eq = raw.indexOf('=');
    if (eq === -1) {
      throw new MediaTypeError(value);
    }
    params[raw.slice(0, eq).trim().toLowerCase()] = raw.slice(eq + 1).trim();
  }

  let essence = fullType.trim().toLowerCase();
  if (essence === '*') essence = '*/*';

  const parts = essence.split('/');
  if (parts.length !== 2 || parts[0] === '' || parts[1] === '') {
    throw new MediaTypeError(value);
  }

  const qParam = params['q'];
  let q = 1;
  if (qParam !== undefined && qParam !== '') {
    const parsed = Number(qParam);
    if (!Number.isNaN(parsed) && parsed >= 0 && parsed <= 1) {
      q = parsed;
    }
  }

  return { type: parts[0], subtype: parts[1], params, q };
}

// ---------------------------------------------------------------------------
// Quality
// ---------------------------------------------------------------------------

/**
 * Quality of `mediaType` against a comma-separated list of media ranges.
 *
 * Among the matching ranges the best fit wins: exact type beats wildcard,
 * then exact subtype, then the count of equal parameters. Returns 0 when
 * no range matches.
 *
 * @throws MediaTypeError if `mediaType` or any range is malformed.
 */
export function mediaTypeQuality(mediaType: string, ranges: string): number {
  const target = parseMediaRange(mediaType);
  const parsedRanges = ranges.split(',').map((range) => parseMediaRange(range));

  let bestFitness = -1;
  let bestQ = 0;

  for (const range of parsedRanges) {
    const typeMatch = range.type === target.type || range.type === '*' || target.type === '*';
    const subtypeMatch =
      range.subtype === target.subtype || range.subtype === '*' || target.subtype === '*';
    if (!typeMatch || !subtypeMatch) continue;

    let fitness = range.type === target.type ? 100 : 0;
    fitness += range.subtype === target.subtype ? 10 : 0;
    for (const [key, value] of Object.entries(target.params)) {
      if (key !== 'q' && range.params[key] === value) fitness += 1;
    }

    if (fitness > bestFitness) {
      bestFitness = fitness;
      bestQ = range.q;
    }
  }

  return bestQ;
}

// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

/**
 * Whether a client with the given `Accept` header accepts `mediaType`.
 * A missing header accepts everything; a malformed one accepts nothing.
 */
export function clientAccepts(accept: string | null, mediaType: string): boolean {
  const ranges = accept ?? '*/*';
  if (ranges === mediaType || ranges === '*/*') return true;

  try {
    return mediaTypeQuality(mediaType, ranges) !== 0;
  } catch {
    return false;
  }
}

/**
 * Whether a declared `Content-Type` denotes the expected type.
 *
 * A missing content type counts as a match, so bodies sent without one
 * are still decoded. Parameters such as `charset` are tolerated; a
 * malformed content type never matches.
 */
export function contentTypeMatches(contentType: string | null, expected: string): boolean {
  if (contentType === null || contentType === expected) return true;

  try {
    return mediaTypeQuality(contentType, expected) !== 0;
  } catch {
    return false;
  }
}
