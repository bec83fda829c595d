import { setTimeout as delay } from 'timers/promises';
import {
  ManagedStoreFailure,
  classifyFailure,
} from '../../managed-store/errors/managed-store.error';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | {
      ok: false;
      failure: ManagedStoreFailure;
      attempts: number;
      // true when the failure was retryable but attempts ran out
      exhausted: boolean;
    };

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Wait after the given (1-based) failed attempt
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const raw = policy.initialDelayMs * Math.pow(policy.multiplier, attempt - 1);
  return Math.min(raw, policy.maxDelayMs);
}

/**
 * Validation and not-found failures never succeed on another attempt
 */
export function isRetryable(failure: ManagedStoreFailure): boolean {
  return (
    failure.retryable &&
    failure.kind !== 'validation' &&
    failure.kind !== 'not-found'
  );
}

export async function runWithRetry<T>(
  attempt: (attemptNumber: number) => Promise<T>,
  policy: RetryPolicy,
  sleep: Sleep = defaultSleep,
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attemptNumber = 1; ; attemptNumber++) {
    try {
      const value = await attempt(attemptNumber);
      return { ok: true, value, attempts: attemptNumber };
    } catch (error) {
      const failure = classifyFailure(error);

      if (!isRetryable(failure)) {
        return { ok: false, failure, attempts: attemptNumber, exhausted: false };
      }

      if (attemptNumber >= maxAttempts) {
        return { ok: false, failure, attempts: attemptNumber, exhausted: true };
      }

      await sleep(backoffDelay(policy, attemptNumber));
    }
  }
}
