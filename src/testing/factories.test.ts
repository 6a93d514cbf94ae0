import { describe, it, expect } from 'vitest';
import {
  createCapturingSink,
  createJsonPost,
  createRequest,
  createResponse,
  createStubSchema,
  SingleReadStream,
} from './factories.js';

async function collect(stream: AsyncIterable<unknown>): Promise<unknown[]> {
  const out: unknown[] = [];
  for await (const chunk of stream) out.push(chunk);
  return out;
}

describe('SingleReadStream', () => {
  it('yields its chunks only on the first read', async () => {
    const stream = new SingleReadStream(['a', 'b']);

    expect(await collect(stream)).toEqual(['a', 'b']);
    expect(await collect(stream)).toEqual([]);
    expect(stream.reads).toBe(2);
  });
});

describe('createRequest', () => {
  it('defaults to a bodiless GET accepting JSON', () => {
    const request = createRequest();

    expect(request.method).toBe('GET');
    expect(request.contentLength).toBeNull();
    expect(request.contentType).toBeNull();
    expect(request.accept).toBe('application/json');
  });

  it('infers the content length of a string body in bytes', () => {
    expect(createRequest({ body: 'héllo' }).contentLength).toBe(6);
  });

  it('keeps an explicit content length', () => {
    expect(createRequest({ body: 'abc', contentLength: 10 }).contentLength).toBe(10);
  });

  it('returns fresh contexts', () => {
    expect(createRequest().context).not.toBe(createRequest().context);
  });
});

describe('createJsonPost', () => {
  it('builds a JSON POST', () => {
    const request = createJsonPost('{}');
    expect(request.method).toBe('POST');
    expect(request.contentType).toBe('application/json');
    expect(request.contentLength).toBe(2);
  });
});

describe('createResponse', () => {
  it('defaults to 200 JSON without a body', () => {
    expect(createResponse()).toEqual({ status: 200, contentType: 'application/json' });
  });
});

describe('createStubSchema', () => {
  it('passes values through by default', () => {
    const schema = createStubSchema();
    expect(schema.load({ a: 1 })).toEqual({ ok: true, value: { a: 1 } });
    expect(schema.dump({ a: 1 })).toEqual({ ok: true, value: '{"a":1}' });
  });
});

describe('createCapturingSink', () => {
  it('records entries and filters by level', () => {
    const capture = createCapturingSink();
    capture.sink({ level: 'warn', ts: 't', component: 'c', msg: 'm' });
    expect(capture.atLevel('warn')).toHaveLength(1);
    expect(capture.atLevel('info')).toHaveLength(0);
  });
});
