import { describe, it, expect } from 'vitest';
import { AjvSchema, SCHEMA_ERROR_KEY } from './ajv-schema.js';
import type { Codec } from '../types/codec.js';

const itemSchema = {
  type: 'object',
  properties: {
    bar: { type: 'string' },
    int: { type: 'integer' },
    address: {
      type: 'object',
      properties: { zip: { type: 'string' } },
    },
  },
  required: ['bar'],
  additionalProperties: false,
};

function createSchema(): AjvSchema {
  return new AjvSchema({ schema: itemSchema, dataKeys: { bar: 'foo' } });
}

describe('AjvSchema.load', () => {
  it('renames wire keys to internal names', () => {
    expect(createSchema().load({ foo: 'test' })).toEqual({ ok: true, value: { bar: 'test' } });
  });

  it('coerces scalar strings', () => {
    expect(createSchema().load({ foo: 'x', int: '5' })).toEqual({
      ok: true,
      value: { bar: 'x', int: 5 },
    });
  });

  it('reports type errors under the field name', () => {
    expect(createSchema().load({ foo: 'test', int: 'test' })).toEqual({
      ok: false,
      errors: { int: ['must be integer'] },
    });
  });

  it('reports missing required fields under their wire key', () => {
    expect(createSchema().load({})).toEqual({
      ok: false,
      errors: { foo: ['Missing data for required field.'] },
    });
  });

  it('reports unknown fields', () => {
    expect(createSchema().load({ foo: 'x', extra: 1 })).toEqual({
      ok: false,
      errors: { extra: ['Unknown field.'] },
    });
  });

  it('rejects the internal name of a renamed field on the wire', () => {
    expect(createSchema().load({ foo: 'x', bar: 'sneaky' })).toEqual({
      ok: false,
      errors: { bar: ['Unknown field.'] },
    });
  });

  it('reports a misplaced internal name alongside validation errors', () => {
    expect(createSchema().load({ bar: 'sneaky' })).toEqual({
      ok: false,
      errors: { foo: ['Missing data for required field.'], bar: ['Unknown field.'] },
    });
  });

  it('keeps the wire order of fields', () => {
    const result = createSchema().load({ foo: 'x', int: 1 });
    expect(result.ok && Object.keys(result.value)).toEqual(['bar', 'int']);
  });

  it('rejects non-object input', () => {
    expect(createSchema().load(['foo'])).toEqual({
      ok: false,
      errors: { [SCHEMA_ERROR_KEY]: ['Invalid input type.'] },
    });
  });

  it('does not mutate the input', () => {
    const raw = { foo: 'x', int: '7' };
    createSchema().load(raw);
    expect(raw).toEqual({ foo: 'x', int: '7' });
  });
});

describe('AjvSchema.dump', () => {
  it('renames internal names to wire keys and encodes', () => {
    expect(createSchema().dump({ bar: 'x', int: 3 })).toEqual({
      ok: true,
      value: '{"foo":"x","int":3}',
    });
  });

  it('does not coerce when dumping', () => {
    expect(createSchema().dump({ bar: 1 })).toEqual({
      ok: false,
      errors: { foo: ['must be string'] },
    });
  });

  it('prefixes nested errors with the rest of the path', () => {
    expect(createSchema().dump({ bar: 'x', address: { zip: 5 } })).toEqual({
      ok: false,
      errors: { address: ['/zip: must be string'] },
    });
  });

  it('reports codec failures as schema errors', () => {
    const failing: Codec = {
      contentType: 'application/json',
      decode: () => null,
      encode: () => {
        throw new Error('encoder unavailable');
      },
    };
    const schema = new AjvSchema({ schema: itemSchema, codec: failing });

    expect(schema.dump({ bar: 'x' })).toEqual({
      ok: false,
      errors: { [SCHEMA_ERROR_KEY]: ['encoder unavailable'] },
    });
  });
});
