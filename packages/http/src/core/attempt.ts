// Attempt state machine shared by the single-request and batch executors.
// Records are immutable; every transition returns a new record.

import { normalizeRetries } from './http-utils.js';

/**
 * pending -> in_flight -> (accepted | pending | exhausted)
 */
export type AttemptState = 'pending' | 'in_flight' | 'accepted' | 'exhausted';

export type AttemptOutcome = 'accepted' | 'retryable';

export interface AttemptRecord {
  readonly attempts: number;
  readonly maxAttempts: number;
  readonly state: AttemptState;
}

export const createAttemptRecord = (retries: number): AttemptRecord => ({
  attempts: 0,
  maxAttempts: normalizeRetries(retries) + 1,
  state: 'pending',
});

export const startAttempt = (record: AttemptRecord): AttemptRecord => {
  if (record.state !== 'pending') {
    throw new Error(`Cannot start an attempt from state ${record.state}`);
  }

  return { ...record, attempts: record.attempts + 1, state: 'in_flight' };
};

/**
 * Accepted when the transport reported no error and the status is below 500.
 * 4xx responses are terminal successes; only 5xx and transport failures retry.
 */
export const classifyOutcome = (result: { status: number; transportError?: unknown }): AttemptOutcome =>
  result.transportError === undefined && result.status < 500 ? 'accepted' : 'retryable';

export const completeAttempt = (record: AttemptRecord, outcome: AttemptOutcome): AttemptRecord => {
  if (record.state !== 'in_flight') {
    throw new Error(`Cannot complete an attempt from state ${record.state}`);
  }

  if (outcome === 'accepted') {
    return { ...record, state: 'accepted' };
  }

  return { ...record, state: record.attempts < record.maxAttempts ? 'pending' : 'exhausted' };
};

export const isTerminal = (record: AttemptRecord): boolean =>
  record.state === 'accepted' || record.state === 'exhausted';
