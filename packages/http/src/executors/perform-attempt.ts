import { mergeHeaders } from '../core/http-utils.js';
import type { HttpEffects } from '../core/types.js';
import { sanitizeEndpoint, type InstrumentationCollector } from '../instrumentation.js';
import type { TransportClient, TransportOutcome } from '../transport/types.js';
import { TransportError, type HttpResponse, type RequestSpec } from '../types.js';

export interface ExecutorDependencies {
  transport: TransportClient;
  effects: HttpEffects;
  defaultHeaders?: Readonly<Record<string, string>> | undefined;
  instrumentation?: InstrumentationCollector | undefined;
}

export interface AttemptContext {
  mode: 'single' | 'batch';
  attempt: number;
  round?: number | undefined;
}

/**
 * One transport call for `request` against its resolved `url`.
 * Never rejects: a rejected transport promise becomes a TransportError outcome.
 */
export async function performAttempt(
  deps: ExecutorDependencies,
  request: RequestSpec,
  url: string,
  context: AttemptContext
): Promise<HttpResponse> {
  const startTime = deps.effects.now();
  let outcome: TransportOutcome;

  try {
    outcome = await deps.transport.execute({
      body: request.body,
      headers: mergeHeaders(deps.defaultHeaders ?? {}, request.headers),
      method: request.method,
      url,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    outcome = {
      body: new Uint8Array(0),
      error: error instanceof TransportError ? error : new TransportError(message, url, { cause: error }),
      headers: {},
      status: 0,
    };
  }

  const response: HttpResponse = {
    body: outcome.body,
    headers: outcome.headers,
    status: outcome.status,
    url,
    ...(outcome.error ? { transportError: outcome.error } : {}),
  };

  deps.instrumentation?.record({
    attempt: context.attempt,
    durationMs: deps.effects.now() - startTime,
    endpoint: sanitizeEndpoint(url),
    error: outcome.error?.message,
    method: request.method,
    mode: context.mode,
    round: context.round,
    status: outcome.status,
    timestamp: deps.effects.now(),
  });

  return response;
}
