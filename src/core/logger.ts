/**
 * Structured JSON logging for payload-gate.
 *
 * Provides component-scoped loggers with level filtering and injectable
 * sinks for testing. All log output is JSON-formatted with level, ts,
 * component, and msg fields. Request fields are promoted to top-level.
 *
 * @example
 * ```ts
 * const logger = createLogger('pipeline:transcode');
 * logger.info('skipping deserialization', { content_type: 'text/csv' });
 * // → {"level":"info","ts":"...","component":"pipeline:transcode","msg":"skipping deserialization","meta":{"content_type":"text/csv"}}
 * ```
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Log severity levels in ascending order. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** A structured log entry. */
export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  request_id?: string;
  method?: string;
  path?: string;
  status?: number;
  duration_ms?: number;
  error_code?: string;
  meta?: Record<string, unknown>;
}

/** A function that consumes a log entry (output destination). */
export type LogSink = (entry: LogEntry) => void;

/** Request fields that are automatically promoted to every log entry. */
export interface LogContext {
  request_id?: string;
  method?: string;
  path?: string;
}

/** A structured logger scoped to a component. */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subComponent: string): Logger;
  withContext(ctx: LogContext): Logger;
}

// ---------------------------------------------------------------------------
// Level ordering
// ---------------------------------------------------------------------------

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Global state
// ---------------------------------------------------------------------------

let globalLevel: LogLevel = 'info';
let globalSink: LogSink = defaultSink;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Configure the global logging level and/or sink. */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level !== undefined) {
    globalLevel = options.level;
  }
  if (options.sink !== undefined) {
    globalSink = options.sink;
  }
}

/** Reset logging to defaults (level: info, sink: stdout JSON). */
export function resetLogging(): void {
  globalLevel = 'info';
  globalSink = defaultSink;
}

function defaultSink(entry: LogEntry): void {
  process.stdout.write(JSON.stringify(entry) + '\n');
}

// ---------------------------------------------------------------------------
// Metadata sanitization
// ---------------------------------------------------------------------------

/** Metadata keys that must never appear in log output. */
export const NEVER_LOG_FIELDS = new Set([
  'body',
  'content',
  'authorization',
  'cookie',
  'password',
  'secret',
  'token',
]);

/** Maximum length for string values in metadata before truncation. */
export const META_STRING_MAX_LENGTH = 1024;

const PROMOTED_KEYS = new Set(['request_id', 'method', 'path', 'status', 'duration_ms', 'error_code']);

/**
 * Strip denied and promoted keys, truncate long strings, and serialize
 * Errors in metadata.
 */
function sanitizeMeta(meta?: Record<string, unknown>): Record<string, unknown> | undefined {
  if (!meta) return undefined;

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (NEVER_LOG_FIELDS.has(key) || PROMOTED_KEYS.has(key)) continue;

    if (value instanceof Error) {
      result[key] = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    } else if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
      result[key] = value.slice(0, META_STRING_MAX_LENGTH) + '...[truncated]';
    } else {
      result[key] = value;
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name (e.g. `'pipeline:accept'`, `'http'`).
 * @param boundContext - Optional request fields promoted to every entry.
 */
export function createLogger(component: string, boundContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const entry: LogEntry = {
      level,
      ts: new Date().toISOString(),
      component,
      msg: message,
    };

    if (boundContext) {
      if (boundContext.request_id) entry.request_id = boundContext.request_id;
      if (boundContext.method) entry.method = boundContext.method;
      if (boundContext.path) entry.path = boundContext.path;
    }

    // Promote well-known fields from meta to top-level
    if (meta) {
      if (typeof meta.request_id === 'string') entry.request_id = meta.request_id;
      if (typeof meta.method === 'string') entry.method = meta.method;
      if (typeof meta.path === 'string') entry.path = meta.path;
      if (typeof meta.status === 'number') entry.status = meta.status;
      if (typeof meta.duration_ms === 'number') entry.duration_ms = meta.duration_ms;
      if (typeof meta.error_code === 'string') entry.error_code = meta.error_code;
    }

    const sanitized = sanitizeMeta(meta);
    if (sanitized !== undefined) {
      entry.meta = sanitized;
    }

    globalSink(entry);
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (subComponent) => createLogger(`${component}:${subComponent}`, boundContext),
    withContext: (ctx) => {
      const merged: LogContext = { ...boundContext, ...ctx };
      return createLogger(component, merged);
    },
  };
}
