import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { HttpClient, toJsonResponse } from '../client.js';
import { InstrumentationCollector } from '../instrumentation.js';
import type { TransportClient } from '../transport/types.js';
import { DecodeError, RetriesExhaustedError, type HttpResponse } from '../types.js';

import { bytes, createScriptedTransport, reply } from './test-utils.js';

const URL_ITEM = 'https://api.example.com/items/42';
const URL_LIST = 'https://api.example.com/items';

const effects = { delay: () => Promise.resolve(), now: () => 0 };

describe('HttpClient', () => {
  it('should send a request built from the client', async () => {
    const { transport, calls } = createScriptedTransport({ [URL_ITEM]: [reply(200, 'hello')] });
    const client = new HttpClient({ defaultHeaders: { 'User-Agent': 'volley-test' }, transport }, effects);

    const result = await client.get(URL_ITEM).header('X-Trace', 't-1').send();

    expect(result.isOk() && result.value.status).toBe(200);
    expect(calls[0]?.headers).toEqual({ 'User-Agent': 'volley-test', 'X-Trace': 't-1' });
  });

  it('should give builders the configured retry budget', async () => {
    const { transport, callsTo } = createScriptedTransport({ [URL_ITEM]: [reply(500)] });
    const client = new HttpClient({ defaultRetries: 2, transport }, effects);

    const result = await client.get(URL_ITEM).send();

    expect(result.isErr() && result.error).toBeInstanceOf(RetriesExhaustedError);
    expect(callsTo(URL_ITEM)).toBe(3);
  });

  it('should decode JSON responses', async () => {
    const { transport } = createScriptedTransport({ [URL_ITEM]: [reply(200, '{"id":42,"name":"widget"}')] });
    const client = new HttpClient({ transport }, effects);

    const result = await client.get(URL_ITEM).sendJson();

    expect(result.isOk() && result.value).toEqual({
      body: { id: 42, name: 'widget' },
      headers: { 'content-type': 'text/plain' },
      status: 200,
      url: URL_ITEM,
    });
  });

  it('should validate JSON responses against a schema', async () => {
    const { transport } = createScriptedTransport({ [URL_ITEM]: [reply(200, '{"id":"42"}')] });
    const client = new HttpClient({ transport }, effects);
    const schema = z.object({ id: z.number() });

    const result = await client.sendJson(client.get(URL_ITEM).build(), schema);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.body).toBeNull();
      expect(result.value.decodeError).toBeInstanceOf(DecodeError);
      expect(result.value.decodeError?.issues).toEqual([{ message: 'Expected number, received string', path: 'id' }]);
    }
  });

  it('should run a batch and decode each response', async () => {
    const { transport } = createScriptedTransport({
      [URL_ITEM]: [reply(503), reply(200, '{"id":42}')],
      [URL_LIST]: [reply(200, 'not json')],
    });
    const client = new HttpClient({ transport }, effects);
    const queue = client.createBatch();
    client.get(URL_ITEM).retry(1).addToBatch(queue);
    client.get(URL_LIST).addToBatch(queue);

    const results = await client.runBatchJson(queue);

    expect(results.map((result) => result.index)).toEqual([1, 0]);
    expect(results[0]?.response.body).toBeNull();
    expect(results[0]?.response.decodeError).toBeInstanceOf(DecodeError);
    expect(results[1]?.response.body).toEqual({ id: 42 });
    expect(results[1]?.attempts).toBe(2);
  });

  it('should expose metrics when instrumentation is configured', async () => {
    const { transport } = createScriptedTransport({ [URL_ITEM]: [reply(200)] });
    const instrumentation = new InstrumentationCollector();
    const client = new HttpClient({ instrumentation, transport }, effects);

    await client.get(URL_ITEM).send();

    expect(client.getMetrics()).toEqual([
      {
        attempt: 1,
        durationMs: 0,
        endpoint: '/items/{id}',
        error: undefined,
        method: 'GET',
        mode: 'single',
        round: undefined,
        status: 200,
        timestamp: 0,
      },
    ]);
    expect(new HttpClient({ transport }, effects).getMetrics()).toEqual([]);
  });

  it('should close the transport once', async () => {
    const close = vi.fn(() => Promise.resolve());
    const transport: TransportClient = { close, execute: () => Promise.resolve(reply(200)) };
    const client = new HttpClient({ transport }, effects);

    await client.close();
    await client.close();

    expect(close).toHaveBeenCalledTimes(1);
  });
});

describe('toJsonResponse', () => {
  it('should keep the transport error of the response', () => {
    const response: HttpResponse = {
      body: bytes('[1,2]'),
      headers: {},
      status: 0,
      transportError: undefined,
      url: URL_LIST,
    };

    expect(toJsonResponse(response)).toEqual({ body: [1, 2], headers: {}, status: 0, url: URL_LIST });
  });
});
