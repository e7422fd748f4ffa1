import { classifyOutcome, completeAttempt, createAttemptRecord, startAttempt, type AttemptRecord } from '../core/attempt.js';
import { invokeAfter, invokeBefore } from '../core/hooks.js';
import { resolveTargetUrl } from '../core/http-utils.js';
import type { BatchQueue } from '../batch-queue.js';
import type { BatchResult, HttpResponse, RequestSpec } from '../types.js';

import { performAttempt, type ExecutorDependencies } from './perform-attempt.js';

export const DEFAULT_POLL_INTERVAL_MS = 100;

interface RoundEntry {
  index: number;
  request: RequestSpec;
  url: string;
  record: AttemptRecord;
}

interface SettledEntry {
  entry: RoundEntry;
  response: HttpResponse;
}

/**
 * Runs every request of a queue concurrently, in rounds.
 *
 * Each round submits all pending requests at once and waits for all of them.
 * Requests whose response was a 5xx or a transport failure and that still
 * have budget go into the next round; everything else is finalized. A request
 * that runs out of budget is returned with its last failing response rather
 * than raised as an error.
 *
 * Results are in round-completion order: first-round finals in submission
 * order, then second-round finals, and so on. `BatchResult.index` maps each
 * result back to its queue position.
 *
 * There is no per-call timeout; a transport call that never settles holds
 * its round open.
 */
export class BatchExecutor {
  private readonly pollIntervalMs: number;

  constructor(
    private readonly deps: ExecutorDependencies,
    pollIntervalMs: number = DEFAULT_POLL_INTERVAL_MS
  ) {
    this.pollIntervalMs = pollIntervalMs > 0 ? pollIntervalMs : DEFAULT_POLL_INTERVAL_MS;
  }

  async runBatch(queue: BatchQueue): Promise<BatchResult[]> {
    const requests = queue.acquire();
    const results: BatchResult[] = [];

    try {
      let pending: RoundEntry[] = requests.map((request, index) => ({
        index,
        record: createAttemptRecord(request.retries),
        request,
        url: resolveTargetUrl(request.url, request.query),
      }));
      let round = 0;

      while (pending.length > 0) {
        round++;
        this.deps.effects.log('debug', `Starting batch round ${round} with ${pending.length} request(s)`);

        const settled = await this.runRound(pending, round);
        const next: RoundEntry[] = [];

        for (const { entry, response } of settled) {
          await invokeAfter(entry.request, response);
          const record = completeAttempt(entry.record, classifyOutcome(response));

          if (record.state === 'pending') {
            next.push({ ...entry, record });
            continue;
          }

          if (record.state === 'exhausted') {
            this.deps.effects.log('warn', `Batch request exhausted its retries - Index: ${entry.index}`, {
              attempts: record.attempts,
              status: response.status,
            });
          }
          results.push({ attempts: record.attempts, index: entry.index, request: entry.request, response });
        }

        this.deps.effects.log(
          'debug',
          `Batch round ${round} finished - Finalized: ${settled.length - next.length}, Retrying: ${next.length}`
        );
        pending = next;
      }
    } finally {
      queue.release();
    }

    return results;
  }

  /**
   * Submit every entry, then poll until none is in flight.
   * Resolves with the settled entries in submission order.
   */
  private async runRound(entries: RoundEntry[], round: number): Promise<SettledEntry[]> {
    const submitted: Promise<SettledEntry>[] = [];
    let inFlight = 0;

    for (const entry of entries) {
      await invokeBefore(entry.request);
      const started: RoundEntry = { ...entry, record: startAttempt(entry.record) };

      inFlight++;
      submitted.push(
        performAttempt(this.deps, started.request, started.url, {
          attempt: started.record.attempts,
          mode: 'batch',
          round,
        }).then((response) => {
          inFlight--;
          return { entry: started, response };
        })
      );
    }

    const allSettled = Promise.all(submitted);

    // Aborting cancels the poll timer still pending when the round settles
    const poll = new AbortController();
    try {
      while (inFlight > 0) {
        await Promise.race([allSettled, this.deps.effects.delay(this.pollIntervalMs, poll.signal)]);
      }
    } finally {
      poll.abort();
    }

    return allSettled;
  }
}
