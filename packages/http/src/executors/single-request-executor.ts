import { err, ok, type Result } from 'neverthrow';

import { classifyOutcome, completeAttempt, createAttemptRecord, startAttempt } from '../core/attempt.js';
import { invokeAfter, invokeBefore } from '../core/hooks.js';
import { resolveTargetUrl, sanitizeUrl } from '../core/http-utils.js';
import { RetriesExhaustedError, type HttpResponse, type RequestSpec } from '../types.js';

import { performAttempt, type ExecutorDependencies } from './perform-attempt.js';

/**
 * Runs one request to completion, one attempt at a time.
 *
 * Every attempt runs beforeRequest, the transport call, then afterResponse.
 * A response is accepted when the transport reported no error and the status
 * is below 500; the first accepted response is returned. When `retries + 1`
 * attempts are all rejected the result is a RetriesExhaustedError.
 */
export class SingleRequestExecutor {
  constructor(private readonly deps: ExecutorDependencies) {}

  async send(request: RequestSpec): Promise<Result<HttpResponse, RetriesExhaustedError>> {
    const url = resolveTargetUrl(request.url, request.query);
    const { log } = this.deps.effects;
    let record = createAttemptRecord(request.retries);

    while (true) {
      record = startAttempt(record);
      log(
        'debug',
        `Making HTTP request - URL: ${sanitizeUrl(url)}, Method: ${request.method}, Attempt: ${record.attempts}/${record.maxAttempts}`
      );

      await invokeBefore(request);
      const response = await performAttempt(this.deps, request, url, { attempt: record.attempts, mode: 'single' });
      await invokeAfter(request, response);

      record = completeAttempt(record, classifyOutcome(response));

      if (record.state === 'accepted') {
        return ok(response);
      }

      const reason = response.transportError ? response.transportError.message : `HTTP ${response.status}`;

      if (record.state === 'exhausted') {
        log('warn', `Request failed, no retries remaining - URL: ${sanitizeUrl(url)}, Reason: ${reason}`, {
          attempts: record.attempts,
          method: request.method,
        });
        return err(new RetriesExhaustedError(record.maxAttempts - 1, record.attempts, url, response));
      }

      log(
        'warn',
        `Request failed - URL: ${sanitizeUrl(url)}, Attempt: ${record.attempts}/${record.maxAttempts}, Reason: ${reason}`,
        { method: request.method }
      );
    }
  }
}
