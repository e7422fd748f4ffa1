import type { HttpMethod, TransportError } from '../types.js';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: Uint8Array | undefined;
}

/**
 * Result of one network call. A failed call resolves with `error` set,
 * status 0 and an empty body; it does not reject.
 */
export interface TransportOutcome {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
  error?: TransportError | undefined;
}

/**
 * Performs network calls. Implementations must allow many outstanding
 * `execute` calls at once (batch rounds submit them together).
 */
export interface TransportClient {
  execute(request: TransportRequest): Promise<TransportOutcome>;
  close?(): Promise<void>;
}
