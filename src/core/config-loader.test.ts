import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { initialize, loadConfig } from './config-loader.js';
import { DEFAULT_FILE_CONFIG } from '../types/config.js';
import { createLogger, configureLogging, resetLogging } from './logger.js';
import { jsonCodec } from './codec.js';
import type { Codec } from '../types/codec.js';
import { createCapturingSink } from '../testing/factories.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

function createTempRoot(): string {
  const root = join(
    tmpdir(),
    `payload-gate-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`,
  );
  mkdirSync(root, { recursive: true });
  return root;
}

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

describe('loadConfig', () => {
  let testRoot: string;

  beforeEach(() => {
    testRoot = createTempRoot();
  });

  afterEach(() => {
    rmSync(testRoot, { recursive: true, force: true });
  });

  it('returns the defaults when the file does not exist', () => {
    expect(loadConfig(join(testRoot, 'payload-gate.toml'))).toEqual(DEFAULT_FILE_CONFIG);
  });

  it('returns the defaults for an empty file', () => {
    const path = join(testRoot, 'payload-gate.toml');
    writeFileSync(path, '   \n', 'utf-8');
    expect(loadConfig(path)).toEqual(DEFAULT_FILE_CONFIG);
  });

  it('parses all sections', () => {
    const path = join(testRoot, 'payload-gate.toml');
    writeFileSync(
      path,
      `
[pipeline]
inbound_key = "payload"
outbound_key = "reply"
force_generic_json = false
expected_content_type = "application/vnd.api+json"
handle_unexpected_content_types = true
required_json_methods = ["POST", "PUT"]

[logging]
level = "debug"

[app]
port = 8080
`,
      'utf-8',
    );

    const config = loadConfig(path);

    expect(config.pipeline).toEqual({
      inbound_key: 'payload',
      outbound_key: 'reply',
      force_generic_json: false,
      expected_content_type: 'application/vnd.api+json',
      handle_unexpected_content_types: true,
      required_json_methods: ['POST', 'PUT'],
    });
    expect(config.logging.level).toBe('debug');
    expect(config['app']).toEqual({ port: 8080 });
  });

  it('throws on invalid TOML', () => {
    const path = join(testRoot, 'payload-gate.toml');
    writeFileSync(path, '[pipeline\ninbound_key = ', 'utf-8');
    expect(() => loadConfig(path)).toThrow();
  });

  it('throws on schema errors', () => {
    const path = join(testRoot, 'payload-gate.toml');
    writeFileSync(path, '[pipeline]\nforce_generic_json = "no"\n', 'utf-8');
    expect(() => loadConfig(path)).toThrow('pipeline.force_generic_json must be a boolean');
  });
});

// ---------------------------------------------------------------------------
// initialize()
// ---------------------------------------------------------------------------

describe('initialize', () => {
  let testRoot: string;

  beforeEach(() => {
    testRoot = createTempRoot();
  });

  afterEach(() => {
    rmSync(testRoot, { recursive: true, force: true });
    resetLogging();
  });

  it('builds the pipeline config from the file', () => {
    const path = join(testRoot, 'payload-gate.toml');
    writeFileSync(path, '[pipeline]\ninbound_key = "doc"\nrequired_json_methods = ["post"]\n');

    const { file, pipeline } = initialize({ filePath: path });

    expect(file.pipeline.inbound_key).toBe('doc');
    expect(pipeline.inboundKey).toBe('doc');
    expect(pipeline.requiredJsonMethods).toEqual(['POST']);
    expect(pipeline.codec).toBe(jsonCodec);
  });

  it('uses a codec supplied in code', () => {
    const codec: Codec = { ...jsonCodec, contentType: 'application/json; charset=utf-8' };
    const { pipeline } = initialize({ filePath: join(testRoot, 'missing.toml'), codec });
    expect(pipeline.codec).toBe(codec);
  });

  it('applies the logging level', () => {
    const path = join(testRoot, 'payload-gate.toml');
    writeFileSync(path, '[logging]\nlevel = "warn"\n');
    initialize({ filePath: path });

    const capture = createCapturingSink();
    configureLogging({ sink: capture.sink });
    const logger = createLogger('test');
    logger.info('dropped');
    logger.warn('kept');

    expect(capture.entries.map((e) => e.msg)).toEqual(['kept']);
  });
});
