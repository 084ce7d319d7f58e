/**
 * Retry as data: a policy, the state after each attempt, and a pure function
 * deciding the next step. The loop in retryWithBackoff only sleeps through an
 * injected Clock, so tests can run it without real timers.
 */

import { AppError, classifyError, sleep } from '../utils/errors';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
};

export interface Clock {
  now(): Date;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => new Date(),
  sleep,
};

export interface RetryState {
  /** Attempts made so far. */
  attempts: number;
  lastError: AppError;
}

export type RetryStep =
  | { action: 'retry'; delayMs: number }
  | { action: 'give-up'; reason: 'permanent' | 'exhausted' };

export function backoffDelay(policy: RetryPolicy, attempts: number): number {
  const delay = policy.baseDelayMs * Math.pow(policy.multiplier, Math.max(0, attempts - 1));
  return Math.min(delay, policy.maxDelayMs);
}

export function nextRetryStep(policy: RetryPolicy, state: RetryState): RetryStep {
  if (!state.lastError.retryable) return { action: 'give-up', reason: 'permanent' };
  if (state.attempts >= policy.maxAttempts) return { action: 'give-up', reason: 'exhausted' };
  return { action: 'retry', delayMs: backoffDelay(policy, state.attempts) };
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: AppError; attempts: number; reason: 'permanent' | 'exhausted' };

/**
 * Retry a function with exponential backoff. Failures are classified; only
 * retryable ones are tried again.
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: {
    policy?: RetryPolicy;
    clock?: Clock;
    onRetry?: (error: AppError, attempt: number, delayMs: number) => void;
  } = {}
): Promise<RetryOutcome<T>> {
  const { policy = DEFAULT_RETRY_POLICY, clock = systemClock, onRetry } = options;
  let attempts = 0;

  for (;;) {
    attempts++;
    try {
      const value = await fn();
      return { ok: true, value, attempts };
    } catch (error) {
      const lastError = classifyError(error);
      const step = nextRetryStep(policy, { attempts, lastError });
      if (step.action === 'give-up') {
        return { ok: false, error: lastError, attempts, reason: step.reason };
      }

      if (onRetry) {
        onRetry(lastError, attempts, step.delayMs);
      }
      await clock.sleep(step.delayMs);
    }
  }
}
