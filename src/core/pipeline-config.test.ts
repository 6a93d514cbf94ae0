import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, pipelineConfigFromFile, resolvePipelineConfig } from './pipeline-config.js';
import { DEFAULT_FILE_CONFIG } from '../types/config.js';
import { jsonCodec } from './codec.js';

describe('DEFAULT_CONFIG', () => {
  it('has the documented defaults', () => {
    expect(DEFAULT_CONFIG).toEqual({
      inboundKey: 'json',
      outboundKey: 'result',
      forceGenericJson: true,
      codec: jsonCodec,
      expectedContentType: 'application/json',
      handleUnexpectedContentTypes: false,
      requiredJsonMethods: ['POST', 'PUT', 'PATCH'],
    });
  });

  it('is frozen', () => {
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CONFIG.requiredJsonMethods)).toBe(true);
  });
});

describe('resolvePipelineConfig', () => {
  it('merges overrides onto the defaults', () => {
    const config = resolvePipelineConfig({ outboundKey: 'reply', forceGenericJson: false });

    expect(config.outboundKey).toBe('reply');
    expect(config.forceGenericJson).toBe(false);
    expect(config.inboundKey).toBe('json');
  });

  it('upper-cases required methods', () => {
    expect(resolvePipelineConfig({ requiredJsonMethods: ['post', 'Delete'] }).requiredJsonMethods)
      .toEqual(['POST', 'DELETE']);
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(resolvePipelineConfig())).toBe(true);
  });
});

describe('pipelineConfigFromFile', () => {
  it('maps file keys to config fields', () => {
    const config = pipelineConfigFromFile({
      ...DEFAULT_FILE_CONFIG,
      pipeline: {
        inbound_key: 'in',
        outbound_key: 'out',
        force_generic_json: false,
        expected_content_type: 'text/json',
        handle_unexpected_content_types: true,
        required_json_methods: ['put'],
      },
    });

    expect(config).toEqual({
      inboundKey: 'in',
      outboundKey: 'out',
      forceGenericJson: false,
      codec: jsonCodec,
      expectedContentType: 'text/json',
      handleUnexpectedContentTypes: true,
      requiredJsonMethods: ['PUT'],
    });
  });
});
