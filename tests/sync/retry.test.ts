import { describe, it, expect } from 'vitest';
import { backoffDelay, DEFAULT_RETRY_POLICY, nextRetryStep, retryWithBackoff } from '../../src/sync/retry';
import { ErrorType } from '../../src/utils/errors';
import { FakeClock, networkDown, permissionDenied } from '../helpers';

describe('backoffDelay', () => {
  it('doubles from the base delay and stops at the cap', () => {
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 1)).toBe(1000);
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 2)).toBe(2000);
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 3)).toBe(4000);
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 10)).toBe(30000);
  });
});

describe('nextRetryStep', () => {
  it('gives up at once on a permanent error', () => {
    expect(nextRetryStep(DEFAULT_RETRY_POLICY, { attempts: 1, lastError: permissionDenied() })).toEqual({
      action: 'give-up',
      reason: 'permanent',
    });
  });

  it('retries transient errors until attempts run out', () => {
    expect(nextRetryStep(DEFAULT_RETRY_POLICY, { attempts: 2, lastError: networkDown() })).toEqual({
      action: 'retry',
      delayMs: 2000,
    });
    expect(nextRetryStep(DEFAULT_RETRY_POLICY, { attempts: 3, lastError: networkDown() })).toEqual({
      action: 'give-up',
      reason: 'exhausted',
    });
  });
});

describe('retryWithBackoff', () => {
  it('returns the value after transient failures', async () => {
    const clock = new FakeClock(new Date('2024-12-20T09:00:00.000Z'));
    const retries: Array<[number, number]> = [];
    let calls = 0;

    const outcome = await retryWithBackoff(
      async () => {
        calls++;
        if (calls < 3) throw networkDown();
        return 'ok';
      },
      { clock, onRetry: (_error, attempt, delayMs) => retries.push([attempt, delayMs]) }
    );

    expect(outcome).toEqual({ ok: true, value: 'ok', attempts: 3 });
    expect(clock.sleeps).toEqual([1000, 2000]);
    expect(retries).toEqual([
      [1, 1000],
      [2, 2000],
    ]);
  });

  it('stops after one attempt on a permanent failure', async () => {
    const clock = new FakeClock(new Date('2024-12-20T09:00:00.000Z'));

    const outcome = await retryWithBackoff(
      async () => {
        throw permissionDenied();
      },
      { clock }
    );

    expect(outcome).toMatchObject({ ok: false, attempts: 1, reason: 'permanent' });
    expect(clock.sleeps).toEqual([]);
  });

  it('reports exhaustion with the last error', async () => {
    const clock = new FakeClock(new Date('2024-12-20T09:00:00.000Z'));

    const outcome = await retryWithBackoff(
      async () => {
        throw networkDown();
      },
      { clock }
    );

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.reason).toBe('exhausted');
      expect(outcome.attempts).toBe(3);
      expect(outcome.error.type).toBe(ErrorType.NETWORK_ERROR);
    }
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it('does not retry errors it cannot classify', async () => {
    const clock = new FakeClock(new Date('2024-12-20T09:00:00.000Z'));

    const outcome = await retryWithBackoff(
      async () => {
        throw new Error('bad state');
      },
      { clock }
    );

    expect(outcome).toMatchObject({ ok: false, attempts: 1, reason: 'permanent' });
    if (!outcome.ok) expect(outcome.error.type).toBe(ErrorType.UNKNOWN_ERROR);
  });
});
