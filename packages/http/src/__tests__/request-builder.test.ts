import { ok } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import { BatchQueue } from '../batch-queue.js';
import { RequestBuilder, type RequestDispatcher } from '../request-builder.js';
import { RequestBuildError, type HttpResponse, type JsonResponse } from '../types.js';

import { bytes, text } from './test-utils.js';

describe('RequestBuilder', () => {
  it('should build a GET request with defaults', () => {
    const spec = new RequestBuilder().get('https://api.example.com/items').build();

    expect(spec).toEqual({
      headers: {},
      method: 'GET',
      query: [],
      retries: 0,
      url: 'https://api.example.com/items',
    });
  });

  it('should set the method through each verb helper', () => {
    const url = 'https://api.example.com/items/1';
    const builder = new RequestBuilder();

    expect(builder.put(url).build().method).toBe('PUT');
    expect(builder.patch(url).build().method).toBe('PATCH');
    expect(builder.delete(url).build().method).toBe('DELETE');
    expect(builder.head(url).build().method).toBe('HEAD');
    expect(builder.options(url).build().method).toBe('OPTIONS');
    expect(builder.request('POST', url).build().method).toBe('POST');
  });

  it('should keep the last value written for a header', () => {
    const spec = new RequestBuilder()
      .get('https://api.example.com/items')
      .header('X-Trace', 'first')
      .headers({ 'X-Trace': 'second', Accept: 'application/json' })
      .build();

    expect(spec.headers).toEqual({ Accept: 'application/json', 'X-Trace': 'second' });
  });

  it('should treat header names case-insensitively', () => {
    const spec = new RequestBuilder()
      .post('https://api.example.com/items')
      .header('content-type', 'text/plain')
      .header('X-Trace', 'first')
      .header('x-trace', 'second')
      .json({ a: 1 })
      .build();

    expect(spec.headers).toEqual({ 'Content-Type': 'application/json', 'x-trace': 'second' });
  });

  it('should percent-encode query pairs and replace earlier queries', () => {
    const spec = new RequestBuilder()
      .get('https://api.example.com/search')
      .query({ stale: 'yes' })
      .query({ 'filter[name]': "O'Brien (jr)", limit: 10, exact: true })
      .build();

    expect(spec.query).toEqual(['filter%5Bname%5D=O%27Brien%20%28jr%29', 'limit=10', 'exact=true']);
  });

  it('should encode JSON bodies without escaping unicode or slashes', () => {
    const spec = new RequestBuilder().post('https://api.example.com/items').json({ name: 'café', path: 'a/b' }).build();

    expect(spec.headers['Content-Type']).toBe('application/json');
    expect(spec.body ? text(spec.body) : undefined).toBe('{"name":"café","path":"a/b"}');
  });

  it('should accept raw string and byte bodies', () => {
    const fromString = new RequestBuilder().post('https://api.example.com/raw').body('plain text').build();
    const fromBytes = new RequestBuilder().post('https://api.example.com/raw').body(bytes('raw bytes')).build();

    expect(fromString.body ? text(fromString.body) : undefined).toBe('plain text');
    expect(fromBytes.body ? text(fromBytes.body) : undefined).toBe('raw bytes');
  });

  it('should clamp the retry budget to a non-negative integer', () => {
    const builder = new RequestBuilder().get('https://api.example.com/items');

    expect(builder.retry(-3).build().retries).toBe(0);
    expect(builder.retry(2.7).build().retries).toBe(2);
    expect(builder.retry(Number.NaN).build().retries).toBe(0);
    expect(new RequestBuilder(undefined, { retries: 4 }).get('https://api.example.com').build().retries).toBe(4);
  });

  it('should produce a frozen spec unaffected by later builder changes', () => {
    const builder = new RequestBuilder().get('https://api.example.com/items').header('X-Version', '1');
    const spec = builder.build();

    builder.header('X-Version', '2').retry(9);

    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec.headers)).toBe(true);
    expect(Object.isFrozen(spec.query)).toBe(true);
    expect(spec.headers['X-Version']).toBe('1');
    expect(spec.retries).toBe(0);
  });

  it('should attach hooks to the built request', () => {
    const before = vi.fn();
    const after = vi.fn();

    const spec = new RequestBuilder().get('https://api.example.com').beforeRequest(before).afterResponse(after).build();

    expect(spec.beforeRequest).toBe(before);
    expect(spec.afterResponse).toBe(after);
  });

  it('should refuse to build without a method and URL', () => {
    expect(() => new RequestBuilder().build()).toThrow(RequestBuildError);
  });

  it('should refuse relative and non-http URLs', () => {
    expect(() => new RequestBuilder().get('/items').build()).toThrow('URL must be an absolute http(s) URL, got "/items"');
    expect(() => new RequestBuilder().get('ftp://files.example.com/a').build()).toThrow(RequestBuildError);
  });

  it('should refuse a body on GET and HEAD', () => {
    expect(() => new RequestBuilder().get('https://api.example.com').body('x').build()).toThrow(
      'GET requests cannot carry a body'
    );
    expect(() => new RequestBuilder().head('https://api.example.com').json({}).build()).toThrow(RequestBuildError);
  });

  it('should add the built spec to a batch queue', () => {
    const queue = new BatchQueue();

    new RequestBuilder().get('https://api.example.com/a').addToBatch(queue).get('https://api.example.com/b').addToBatch(queue);

    expect(queue.toArray().map((spec) => spec.url)).toEqual(['https://api.example.com/a', 'https://api.example.com/b']);
  });

  it('should reject send() when not bound to a client', async () => {
    await expect(new RequestBuilder().get('https://api.example.com').send()).rejects.toThrow(RequestBuildError);
  });

  it('should send through the bound dispatcher', async () => {
    const response: HttpResponse = { body: bytes('{}'), headers: {}, status: 200, url: 'https://api.example.com' };
    const jsonResponse: JsonResponse = { body: {}, headers: {}, status: 200, url: 'https://api.example.com' };
    const send = vi.fn().mockResolvedValue(ok(response));
    const sendJson = vi.fn().mockResolvedValue(ok(jsonResponse));
    const dispatcher: RequestDispatcher = { send, sendJson };

    const builder = new RequestBuilder(dispatcher).get('https://api.example.com');
    const sent = await builder.send();
    const sentJson = await builder.sendJson();

    expect(sent.isOk() && sent.value).toBe(response);
    expect(sentJson.isOk() && sentJson.value).toBe(jsonResponse);
    expect(send).toHaveBeenCalledWith(expect.objectContaining({ method: 'GET', url: 'https://api.example.com' }));
    expect(sendJson).toHaveBeenCalledTimes(1);
  });
});
