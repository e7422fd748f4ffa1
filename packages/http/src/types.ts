import type { ZodType, ZodTypeDef } from 'zod';

import type { InstrumentationCollector } from './instrumentation.js';
import type { TransportClient } from './transport/types.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

/**
 * Runs before every attempt of the request it is attached to.
 * A thrown error (or rejected promise) aborts the send or batch run.
 */
export type BeforeRequestHook = (request: RequestSpec) => void | Promise<void>;

/**
 * Runs after every transport call of the request it is attached to,
 * whether or not the response is accepted.
 */
export type AfterResponseHook = (response: HttpResponse) => void | Promise<void>;

/**
 * Frozen description of one HTTP call. Produced by RequestBuilder.build().
 */
export interface RequestSpec {
  readonly method: HttpMethod;
  readonly url: string;
  /** Last write wins per key. */
  readonly headers: Readonly<Record<string, string>>;
  /** Percent-encoded `key=value` pairs in insertion order. */
  readonly query: readonly string[];
  readonly body?: Uint8Array | undefined;
  /** Additional attempts allowed after the first one. */
  readonly retries: number;
  readonly beforeRequest?: BeforeRequestHook | undefined;
  readonly afterResponse?: AfterResponseHook | undefined;
}

export interface HttpResponse {
  /** 0 when no HTTP exchange took place (see transportError). */
  readonly status: number;
  /** Header names are lower-cased. */
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Uint8Array;
  /** Effective target, query string included. */
  readonly url: string;
  readonly transportError?: TransportError | undefined;
}

/**
 * Response whose body went through the JSON codec.
 * `body` is null when decoding failed; `decodeError` says why.
 */
export interface JsonResponse<T = unknown> {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: T | null;
  readonly url: string;
  readonly decodeError?: DecodeError | undefined;
  readonly transportError?: TransportError | undefined;
}

/**
 * One finalized request of a batch run.
 * Results come back in round-completion order; `index` is the position the
 * request had in the queue when the run started.
 */
export interface BatchResult<R = HttpResponse> {
  readonly index: number;
  readonly request: RequestSpec;
  readonly response: R;
  readonly attempts: number;
}

export type JsonSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface HttpClientConfig {
  defaultHeaders?: Record<string, string> | undefined;
  /** Retry budget given to builders created through the client. */
  defaultRetries?: number | undefined;
  instrumentation?: InstrumentationCollector | undefined;
  /** Upper bound on a single wait of the batch poll loop. */
  pollIntervalMs?: number | undefined;
  transport?: TransportClient | undefined;
}

// Error classes

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class RetriesExhaustedError extends Error {
  constructor(
    public readonly retries: number,
    public readonly attempts: number,
    public readonly url: string,
    public readonly lastResponse: HttpResponse
  ) {
    super(`Request failed after ${retries} retries`, { cause: lastResponse.transportError });
    this.name = 'RetriesExhaustedError';
  }
}

export class DecodeError extends Error {
  constructor(
    message: string,
    public readonly issues: { message: string; path: string }[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

export class RequestBuildError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestBuildError';
  }
}

export class BatchInProgressError extends Error {
  constructor() {
    super('Cannot add requests to a batch queue while it is being run');
    this.name = 'BatchInProgressError';
  }
}
