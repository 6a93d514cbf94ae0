/**
 * File configuration schema and config path resolution.
 *
 * Defines the TypeScript types for the `payload-gate.toml` sections and
 * validates raw parsed TOML into them. Runtime-only settings (the codec)
 * are not expressible in the file and are layered on in
 * `core/pipeline-config.ts`.
 */

import { resolve } from 'node:path';
import type { LogLevel } from '../core/logger.js';

// ---------------------------------------------------------------------------
// Section types
// ---------------------------------------------------------------------------

/** `[pipeline]` section of payload-gate.toml. */
export interface PipelineSection {
  inbound_key: string;
  outbound_key: string;
  force_generic_json: boolean;
  expected_content_type: string;
  handle_unexpected_content_types: boolean;
  required_json_methods: string[];
}

/** `[logging]` section of payload-gate.toml. */
export interface LoggingSection {
  level: LogLevel;
}

/**
 * Full file configuration. Unknown top-level sections are preserved
 * as-is so an application can keep its own settings in the same file.
 */
export interface FileConfig {
  pipeline: PipelineSection;
  logging: LoggingSection;
  [section: string]: unknown;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_FILE_CONFIG: FileConfig = {
  pipeline: {
    inbound_key: 'json',
    outbound_key: 'result',
    force_generic_json: true,
    expected_content_type: 'application/json',
    handle_unexpected_content_types: false,
    required_json_methods: ['POST', 'PUT', 'PATCH'],
  },
  logging: { level: 'info' },
};

const VALID_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['debug', 'info', 'warn', 'error']);

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.has(value);
}

// ---------------------------------------------------------------------------
// resolveConfigPath()
// ---------------------------------------------------------------------------

/**
 * Resolve the config file location.
 *
 * Precedence:
 *  1. `$PAYLOAD_GATE_CONFIG` (if non-empty)
 *  2. `./payload-gate.toml` in the working directory
 */
export function resolveConfigPath(): string {
  const envValue = process.env['PAYLOAD_GATE_CONFIG'];
  if (envValue && envValue.length > 0) {
    return resolve(envValue);
  }
  return resolve(process.cwd(), 'payload-gate.toml');
}

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const section = raw[name];
  if (section === undefined) return {};
  if (!isRecord(section)) {
    throw new Error(`[${name}] must be a table`);
  }
  return section;
}

function readString(
  section: Record<string, unknown>,
  key: string,
  fallback: string,
  label: string,
): string {
  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${label}.${key} must be a non-empty string`);
  }
  return value;
}

function readBoolean(
  section: Record<string, unknown>,
  key: string,
  fallback: boolean,
  label: string,
): boolean {
  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new Error(`${label}.${key} must be a boolean`);
  }
  return value;
}

function readStringArray(
  section: Record<string, unknown>,
  key: string,
  fallback: string[],
  label: string,
): string[] {
  const value = section[key];
  if (value === undefined) return [...fallback];
  if (!Array.isArray(value)) {
    throw new Error(`${label}.${key} must be an array`);
  }
  const result: string[] = [];
  for (const entry of value) {
    if (typeof entry !== 'string') {
      throw new Error(`${label}.${key} entries must be strings`);
    }
    result.push(entry);
  }
  return result;
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

/**
 * Parse and validate a raw config object (e.g. from TOML parsing) into a
 * fully typed `FileConfig`, applying defaults for missing keys.
 */
export function parseConfig(raw: Record<string, unknown>): FileConfig {
  const extra: Record<string, unknown> = {};
  for (const key of Object.keys(raw)) {
    if (key !== 'pipeline' && key !== 'logging') {
      extra[key] = raw[key];
    }
  }

  // --- pipeline ---
  const rawPipeline = readSection(raw, 'pipeline');
  const defaults = DEFAULT_FILE_CONFIG.pipeline;
  const pipeline: PipelineSection = {
    inbound_key: readString(rawPipeline, 'inbound_key', defaults.inbound_key, 'pipeline'),
    outbound_key: readString(rawPipeline, 'outbound_key', defaults.outbound_key, 'pipeline'),
    force_generic_json: readBoolean(
      rawPipeline,
      'force_generic_json',
      defaults.force_generic_json,
      'pipeline',
    ),
    expected_content_type: readString(
      rawPipeline,
      'expected_content_type',
      defaults.expected_content_type,
      'pipeline',
    ),
    handle_unexpected_content_types: readBoolean(
      rawPipeline,
      'handle_unexpected_content_types',
      defaults.handle_unexpected_content_types,
      'pipeline',
    ),
    required_json_methods: readStringArray(
      rawPipeline,
      'required_json_methods',
      defaults.required_json_methods,
      'pipeline',
    ),
  };

  // --- logging ---
  const rawLogging = readSection(raw, 'logging');
  const level = readString(rawLogging, 'level', DEFAULT_FILE_CONFIG.logging.level, 'logging');
  if (!isLogLevel(level)) {
    throw new Error(
      `Invalid logging.level: "${level}". Must be one of: ${[...VALID_LEVELS].join(', ')}`,
    );
  }

  return { ...extra, pipeline, logging: { level } };
}
