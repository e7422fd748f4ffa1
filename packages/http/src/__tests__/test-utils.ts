import { vi, type Mock } from 'vitest';

import type { HttpEffects } from '../core/types.js';
import type { ExecutorDependencies } from '../executors/perform-attempt.js';
import type { InstrumentationCollector } from '../instrumentation.js';
import type { TransportClient, TransportOutcome, TransportRequest } from '../transport/types.js';
import { TransportError } from '../types.js';

const encoder = new TextEncoder();

export const bytes = (text: string): Uint8Array => encoder.encode(text);

export const text = (body: Uint8Array): string => new TextDecoder().decode(body);

export const reply = (status: number, body = ''): TransportOutcome => ({
  body: bytes(body),
  headers: { 'content-type': 'text/plain' },
  status,
});

export const networkFailure = (url: string, message = 'connect ECONNREFUSED'): TransportOutcome => ({
  body: new Uint8Array(0),
  error: new TransportError(message, url),
  headers: {},
  status: 0,
});

/**
 * Transport whose replies come from per-URL scripts. Each call to a URL takes
 * the next scripted outcome; the last one repeats once the script runs out.
 */
export function createScriptedTransport(scripts: Record<string, TransportOutcome[]>) {
  const calls: TransportRequest[] = [];
  const seen = new Map<string, number>();

  const execute = vi.fn((request: TransportRequest): Promise<TransportOutcome> => {
    calls.push(request);
    const script = scripts[request.url];
    if (!script || script.length === 0) {
      return Promise.reject(new Error(`No script for ${request.url}`));
    }

    const count = seen.get(request.url) ?? 0;
    seen.set(request.url, count + 1);
    const outcome = script[Math.min(count, script.length - 1)];
    return outcome ? Promise.resolve(outcome) : Promise.reject(new Error(`Empty script for ${request.url}`));
  });

  const transport: TransportClient = { execute };

  return {
    calls,
    execute,
    transport,
    callsTo: (url: string) => calls.filter((call) => call.url === url).length,
  };
}

export type TestEffects = HttpEffects & { delay: Mock<(ms: number, signal?: AbortSignal) => Promise<void>> };

export function createTestEffects(): TestEffects {
  return {
    delay: vi.fn((_ms: number, _signal?: AbortSignal) => Promise.resolve()),
    log: vi.fn(),
    now: () => 1000,
  };
}

export function createDeps(
  transport: TransportClient,
  options: { instrumentation?: InstrumentationCollector; defaultHeaders?: Record<string, string> } = {}
): ExecutorDependencies & { effects: TestEffects } {
  return {
    defaultHeaders: options.defaultHeaders,
    effects: createTestEffects(),
    instrumentation: options.instrumentation,
    transport,
  };
}
