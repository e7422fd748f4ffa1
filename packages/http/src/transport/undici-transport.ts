import { getLogger } from '@volley/logger';
import { Agent, fetch as undiciFetch } from 'undici';

import { sanitizeUrl } from '../core/http-utils.js';
import { TransportError } from '../types.js';

import type { TransportClient, TransportOutcome, TransportRequest } from './types.js';

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body: Uint8Array | null;
  redirect: 'follow';
}

export interface FetchResponseLike {
  status: number;
  headers: { forEach(callback: (value: string, key: string) => void): void };
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export interface UndiciTransportOptions {
  /** Replaces the undici fetch; the agent is then unused. */
  fetch?: FetchLike | undefined;
}

/**
 * Transport over undici's fetch with a shared keep-alive agent.
 * Redirects are followed. Network failures resolve as TransportError outcomes.
 */
export class UndiciTransport implements TransportClient {
  private readonly logger = getLogger('UndiciTransport');
  private readonly agent: Agent;
  private readonly fetchImpl: FetchLike;

  // Close state (for idempotent cleanup)
  private closePromise?: Promise<void>;

  constructor(options: UndiciTransportOptions = {}) {
    this.agent = new Agent({
      keepAliveMaxTimeout: 60000,
      keepAliveTimeout: 10000,
      pipelining: 1,
    });
    this.fetchImpl = options.fetch ?? ((url, init) => undiciFetch(url, { ...init, dispatcher: this.agent }));
  }

  async execute(request: TransportRequest): Promise<TransportOutcome> {
    try {
      const response = await this.fetchImpl(request.url, {
        // fetch takes null, not undefined, for an empty body
        body: request.body ?? null,
        headers: request.headers,
        method: request.method,
        redirect: 'follow',
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        body: new Uint8Array(await response.arrayBuffer()),
        headers,
        status: response.status,
      };
    } catch (error) {
      const cause = error instanceof Error && error.cause instanceof Error ? error.cause : error;
      const message = cause instanceof Error ? cause.message : String(cause);
      this.logger.debug({ error, method: request.method }, `Transport failure - URL: ${sanitizeUrl(request.url)}`);

      return {
        body: new Uint8Array(0),
        error: new TransportError(`${request.method} ${sanitizeUrl(request.url)} failed: ${message}`, request.url, {
          cause: error,
        }),
        headers: {},
        status: 0,
      };
    }
  }

  /**
   * Close the agent and its keep-alive connections.
   * Idempotent: later calls return the same promise.
   */
  async close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.agent.close().then(
        () => this.logger.debug('HTTP agent closed'),
        (error: unknown) => {
          const errorMessage = error instanceof Error ? error.message : String(error);
          this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
          throw new Error(`HTTP agent cleanup failed: ${errorMessage}`, { cause: error });
        }
      );
    }
    return this.closePromise;
  }
}
