import { getLogger } from '@volley/logger';
import type { Result } from 'neverthrow';

import { BatchQueue } from './batch-queue.js';
import { decodeJson } from './core/json.js';
import type { HttpEffects } from './core/types.js';
import { BatchExecutor } from './executors/batch-executor.js';
import { createDefaultEffects } from './executors/effects.js';
import type { ExecutorDependencies } from './executors/perform-attempt.js';
import { SingleRequestExecutor } from './executors/single-request-executor.js';
import type { AttemptMetric } from './instrumentation.js';
import { RequestBuilder, type RequestDispatcher } from './request-builder.js';
import { UndiciTransport } from './transport/undici-transport.js';
import type { TransportClient } from './transport/types.js';
import type {
  BatchResult,
  DecodeError,
  HttpClientConfig,
  HttpMethod,
  HttpResponse,
  JsonResponse,
  JsonSchema,
  RequestSpec,
  RetriesExhaustedError,
} from './types.js';

/**
 * Decode a response body as JSON. Decode and validation failures leave
 * `body` null and set `decodeError`; they are never thrown.
 */
export function toJsonResponse(response: HttpResponse): JsonResponse;
export function toJsonResponse<T>(response: HttpResponse, schema: JsonSchema<T>): JsonResponse<T>;
export function toJsonResponse<T>(response: HttpResponse, schema?: JsonSchema<T>): JsonResponse<unknown> {
  const decoded: Result<unknown, DecodeError> = schema ? decodeJson(response.body, schema) : decodeJson(response.body);
  const base = {
    headers: response.headers,
    status: response.status,
    url: response.url,
    ...(response.transportError ? { transportError: response.transportError } : {}),
  };

  return decoded.match(
    (body): JsonResponse<unknown> => ({ ...base, body }),
    (decodeError): JsonResponse<unknown> => ({ ...base, body: null, decodeError })
  );
}

export class HttpClient implements RequestDispatcher {
  private readonly config: HttpClientConfig;
  private readonly logger = getLogger('HttpClient');
  private readonly transport: TransportClient;
  private readonly single: SingleRequestExecutor;
  private readonly batch: BatchExecutor;

  // Close state (for idempotent cleanup)
  private closePromise?: Promise<void>;

  constructor(config: HttpClientConfig = {}, effects?: Partial<HttpEffects>) {
    this.config = config;
    this.transport = config.transport ?? new UndiciTransport();

    const deps = (category: string): ExecutorDependencies => ({
      defaultHeaders: config.defaultHeaders,
      effects: createDefaultEffects(category, effects),
      instrumentation: config.instrumentation,
      transport: this.transport,
    });

    this.single = new SingleRequestExecutor(deps('SingleRequestExecutor'));
    this.batch = new BatchExecutor(deps('BatchExecutor'), config.pollIntervalMs);

    this.logger.debug(
      `HTTP client initialized - DefaultRetries: ${config.defaultRetries ?? 0}, PollInterval: ${config.pollIntervalMs ?? 'default'}`
    );
  }

  request(method: HttpMethod, url: string): RequestBuilder {
    return new RequestBuilder(this, { retries: this.config.defaultRetries }).request(method, url);
  }

  get(url: string): RequestBuilder {
    return this.request('GET', url);
  }

  post(url: string): RequestBuilder {
    return this.request('POST', url);
  }

  put(url: string): RequestBuilder {
    return this.request('PUT', url);
  }

  patch(url: string): RequestBuilder {
    return this.request('PATCH', url);
  }

  delete(url: string): RequestBuilder {
    return this.request('DELETE', url);
  }

  head(url: string): RequestBuilder {
    return this.request('HEAD', url);
  }

  options(url: string): RequestBuilder {
    return this.request('OPTIONS', url);
  }

  /**
   * Send with retries. Err when every attempt got a 5xx or a transport failure.
   */
  async send(request: RequestSpec): Promise<Result<HttpResponse, RetriesExhaustedError>> {
    return this.single.send(request);
  }

  async sendJson(request: RequestSpec): Promise<Result<JsonResponse, RetriesExhaustedError>>;
  async sendJson<T>(
    request: RequestSpec,
    schema: JsonSchema<T>
  ): Promise<Result<JsonResponse<T>, RetriesExhaustedError>>;
  async sendJson<T>(
    request: RequestSpec,
    schema?: JsonSchema<T>
  ): Promise<Result<JsonResponse<unknown>, RetriesExhaustedError>> {
    const result = await this.single.send(request);
    return result.map((response) => (schema ? toJsonResponse(response, schema) : toJsonResponse(response)));
  }

  createBatch(): BatchQueue {
    return new BatchQueue();
  }

  /**
   * Run every queued request concurrently, retrying failures in later rounds.
   * Exhausted requests come back with their last failing response.
   */
  async runBatch(queue: BatchQueue): Promise<BatchResult[]> {
    return this.batch.runBatch(queue);
  }

  async runBatchJson(queue: BatchQueue): Promise<BatchResult<JsonResponse>[]>;
  async runBatchJson<T>(queue: BatchQueue, schema: JsonSchema<T>): Promise<BatchResult<JsonResponse<T>>[]>;
  async runBatchJson<T>(queue: BatchQueue, schema?: JsonSchema<T>): Promise<BatchResult<JsonResponse<unknown>>[]> {
    const results = await this.batch.runBatch(queue);
    return results.map((result) => ({
      ...result,
      response: schema ? toJsonResponse(result.response, schema) : toJsonResponse(result.response),
    }));
  }

  getMetrics(): readonly AttemptMetric[] {
    return this.config.instrumentation?.getMetrics() ?? [];
  }

  /**
   * Release transport resources (keep-alive connections).
   * Idempotent: safe to call multiple times.
   */
  async close(): Promise<void> {
    if (!this.closePromise) {
      this.logger.debug('Closing HTTP client');
      this.closePromise = this.transport.close ? this.transport.close() : Promise.resolve();
    }
    return this.closePromise;
  }
}
