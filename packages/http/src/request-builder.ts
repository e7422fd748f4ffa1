import type { Result } from 'neverthrow';

import type { BatchQueue } from './batch-queue.js';
import { encodeQuery, isAbsoluteUrl, normalizeRetries, type QueryValue } from './core/http-utils.js';
import { encodeJson } from './core/json.js';
import {
  RequestBuildError,
  type AfterResponseHook,
  type BeforeRequestHook,
  type HttpMethod,
  type HttpResponse,
  type JsonResponse,
  type JsonSchema,
  type RequestSpec,
  type RetriesExhaustedError,
} from './types.js';

/**
 * What a bound builder sends through. Implemented by HttpClient.
 */
export interface RequestDispatcher {
  send(request: RequestSpec): Promise<Result<HttpResponse, RetriesExhaustedError>>;
  sendJson(request: RequestSpec): Promise<Result<JsonResponse, RetriesExhaustedError>>;
  sendJson<T>(request: RequestSpec, schema: JsonSchema<T>): Promise<Result<JsonResponse<T>, RetriesExhaustedError>>;
}

export interface RequestBuilderDefaults {
  retries?: number | undefined;
}

const textEncoder = new TextEncoder();

/**
 * Chainable request construction.
 *
 * ```ts
 * const spec = new RequestBuilder()
 *   .post('https://api.example.com/items')
 *   .header('Authorization', 'Bearer test-token')
 *   .json({ name: 'widget' })
 *   .retry(2)
 *   .build();
 * ```
 *
 * Builders obtained from an HttpClient can also `send()`, `sendJson()` and
 * `addToBatch(queue)` directly.
 */
export class RequestBuilder {
  private method: HttpMethod | undefined;
  private url: string | undefined;
  private headerMap: Record<string, string> = {};
  private queryPairs: string[] = [];
  private payload: Uint8Array | undefined;
  private retries: number;
  private beforeHook: BeforeRequestHook | undefined;
  private afterHook: AfterResponseHook | undefined;

  constructor(
    private readonly dispatcher?: RequestDispatcher,
    defaults: RequestBuilderDefaults = {}
  ) {
    this.retries = normalizeRetries(defaults.retries ?? 0);
  }

  request(method: HttpMethod, url: string): this {
    this.method = method;
    this.url = url;
    return this;
  }

  get(url: string): this {
    return this.request('GET', url);
  }

  post(url: string): this {
    return this.request('POST', url);
  }

  put(url: string): this {
    return this.request('PUT', url);
  }

  patch(url: string): this {
    return this.request('PATCH', url);
  }

  delete(url: string): this {
    return this.request('DELETE', url);
  }

  head(url: string): this {
    return this.request('HEAD', url);
  }

  options(url: string): this {
    return this.request('OPTIONS', url);
  }

  /** Header names compare case-insensitively; the last write keeps its spelling. */
  header(name: string, value: string): this {
    const lower = name.toLowerCase();
    for (const existing of Object.keys(this.headerMap)) {
      if (existing.toLowerCase() === lower) {
        delete this.headerMap[existing];
      }
    }
    this.headerMap[name] = value;
    return this;
  }

  headers(headers: Readonly<Record<string, string>>): this {
    for (const [name, value] of Object.entries(headers)) {
      this.header(name, value);
    }
    return this;
  }

  /**
   * Replace the query string. Keys and values are percent-encoded.
   */
  query(params: Readonly<Record<string, QueryValue>>): this {
    this.queryPairs = encodeQuery(params);
    return this;
  }

  json(value: unknown): this {
    this.payload = encodeJson(value);
    return this.header('Content-Type', 'application/json');
  }

  body(content: string | Uint8Array): this {
    this.payload = typeof content === 'string' ? textEncoder.encode(content) : content;
    return this;
  }

  /** Additional attempts after the first; negative values count as 0. */
  retry(retries: number): this {
    this.retries = normalizeRetries(retries);
    return this;
  }

  beforeRequest(hook: BeforeRequestHook): this {
    this.beforeHook = hook;
    return this;
  }

  afterResponse(hook: AfterResponseHook): this {
    this.afterHook = hook;
    return this;
  }

  build(): RequestSpec {
    if (!this.method || !this.url) {
      throw new RequestBuildError('A method and URL are required, call get(), post() or request() first');
    }
    if (!isAbsoluteUrl(this.url)) {
      throw new RequestBuildError(`URL must be an absolute http(s) URL, got "${this.url}"`);
    }
    if (this.payload && (this.method === 'GET' || this.method === 'HEAD')) {
      throw new RequestBuildError(`${this.method} requests cannot carry a body`);
    }

    const spec: RequestSpec = {
      headers: Object.freeze({ ...this.headerMap }),
      method: this.method,
      query: Object.freeze([...this.queryPairs]),
      retries: this.retries,
      url: this.url,
      ...(this.payload ? { body: this.payload.slice() } : {}),
      ...(this.beforeHook ? { beforeRequest: this.beforeHook } : {}),
      ...(this.afterHook ? { afterResponse: this.afterHook } : {}),
    };

    return Object.freeze(spec);
  }

  async send(): Promise<Result<HttpResponse, RetriesExhaustedError>> {
    return this.requireDispatcher().send(this.build());
  }

  sendJson(): Promise<Result<JsonResponse, RetriesExhaustedError>>;
  sendJson<T>(schema: JsonSchema<T>): Promise<Result<JsonResponse<T>, RetriesExhaustedError>>;
  async sendJson<T>(schema?: JsonSchema<T>): Promise<Result<JsonResponse<unknown>, RetriesExhaustedError>> {
    const dispatcher = this.requireDispatcher();
    const spec = this.build();
    return schema ? dispatcher.sendJson(spec, schema) : dispatcher.sendJson(spec);
  }

  addToBatch(queue: BatchQueue): this {
    queue.add(this.build());
    return this;
  }

  private requireDispatcher(): RequestDispatcher {
    if (!this.dispatcher) {
      throw new RequestBuildError('This builder is not bound to a client; use HttpClient to send requests');
    }
    return this.dispatcher;
  }
}
