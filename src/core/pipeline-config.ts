/**
 * Immutable pipeline configuration.
 *
 * Built once when the pipeline is constructed and shared read-only by all
 * requests. The file config (`payload-gate.toml`) covers every setting
 * except the codec, which is supplied in code.
 */

import type { Codec } from '../types/codec.js';
import type { FileConfig } from '../types/config.js';
import { DEFAULT_FILE_CONFIG } from '../types/config.js';
import { jsonCodec } from './codec.js';

export interface PipelineConfig {
  /** Context key the decoded request body is stored under. */
  readonly inboundKey: string;
  /** Context key the handler stores its result under. */
  readonly outboundKey: string;
  /** Decode/encode as plain JSON when the resource has no schema. */
  readonly forceGenericJson: boolean;
  readonly codec: Codec;
  readonly expectedContentType: string;
  /** Decode bodies whose content type is not `expectedContentType`. */
  readonly handleUnexpectedContentTypes: boolean;
  /** Upper-cased methods that must carry a JSON content type. */
  readonly requiredJsonMethods: readonly string[];
}

const defaults = DEFAULT_FILE_CONFIG.pipeline;

export const DEFAULT_CONFIG: PipelineConfig = Object.freeze({
  inboundKey: defaults.inbound_key,
  outboundKey: defaults.outbound_key,
  forceGenericJson: defaults.force_generic_json,
  codec: jsonCodec,
  expectedContentType: defaults.expected_content_type,
  handleUnexpectedContentTypes: defaults.handle_unexpected_content_types,
  requiredJsonMethods: Object.freeze([...defaults.required_json_methods]),
});

/** Merge overrides onto the defaults and freeze the result. */
export function resolvePipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const merged = { ...DEFAULT_CONFIG, ...overrides };
  return Object.freeze({
    ...merged,
    requiredJsonMethods: Object.freeze(merged.requiredJsonMethods.map((m) => m.toUpperCase())),
  });
}

/** Build a pipeline config from a parsed file config, plus an optional codec. */
export function pipelineConfigFromFile(file: FileConfig, codec?: Codec): PipelineConfig {
  const section = file.pipeline;
  return resolvePipelineConfig({
    inboundKey: section.inbound_key,
    outboundKey: section.outbound_key,
    forceGenericJson: section.force_generic_json,
    expectedContentType: section.expected_content_type,
    handleUnexpectedContentTypes: section.handle_unexpected_content_types,
    requiredJsonMethods: section.required_json_methods,
    ...(codec ? { codec } : {}),
  });
}
