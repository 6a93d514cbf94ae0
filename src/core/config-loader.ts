/**
 * TOML-based configuration loader for payload-gate.
 *
 * Reads `payload-gate.toml`, parses it with smol-toml, validates it
 * against the file schema, and applies the logging section.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { parseConfig, resolveConfigPath, DEFAULT_FILE_CONFIG } from '../types/config.js';
import type { FileConfig } from '../types/config.js';
import type { Codec } from '../types/codec.js';
import { configureLogging } from './logger.js';
import { pipelineConfigFromFile, type PipelineConfig } from './pipeline-config.js';

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/**
 * Load and validate a config file.
 *
 * If the file does not exist or is empty, returns the defaults.
 * Throws on invalid TOML syntax or schema validation errors.
 */
export function loadConfig(filePath: string): FileConfig {
  if (!existsSync(filePath)) {
    return structuredClone(DEFAULT_FILE_CONFIG);
  }

  const content = readFileSync(filePath, 'utf-8');
  if (content.trim().length === 0) {
    return structuredClone(DEFAULT_FILE_CONFIG);
  }

  return parseConfig(parseTOML(content));
}

// ---------------------------------------------------------------------------
// initialize()
// ---------------------------------------------------------------------------

/** Result of `initialize()`: everything needed at startup. */
export interface InitResult {
  file: FileConfig;
  pipeline: PipelineConfig;
}

/**
 * Load the config file (from `filePath` or the resolved default path),
 * apply its logging level, and build the pipeline config.
 */
export function initialize(options: { filePath?: string; codec?: Codec } = {}): InitResult {
  const file = loadConfig(options.filePath ?? resolveConfigPath());
  configureLogging({ level: file.logging.level });
  return { file, pipeline: pipelineConfigFromFile(file, options.codec) };
}
