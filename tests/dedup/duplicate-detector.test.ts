import { describe, it, expect, beforeEach } from 'vitest';
import { SqliteKeyValueStore } from '../../src/db';
import { computeDedupHash, DuplicateDetector } from '../../src/dedup/duplicate-detector';
import { AppError, ErrorType, UsageError } from '../../src/utils/errors';

const DAY_MS = 24 * 60 * 60 * 1000;
const receivedAt = new Date('2024-12-18T09:00:00.000Z');

describe('computeDedupHash', () => {
  it('is a stable sha256 hex digest', () => {
    const first = computeDedupHash('VM-HDFCBK', 'Rs 500 debited', receivedAt);

    expect(first).toMatch(/^[0-9a-f]{64}$/);
    expect(computeDedupHash('VM-HDFCBK', 'Rs 500 debited', new Date(receivedAt.getTime()))).toBe(first);
  });

  it('changes when any input changes', () => {
    const base = computeDedupHash('VM-HDFCBK', 'Rs 500 debited', receivedAt);

    expect(computeDedupHash('VM-ICICIB', 'Rs 500 debited', receivedAt)).not.toBe(base);
    expect(computeDedupHash('VM-HDFCBK', 'Rs 501 debited', receivedAt)).not.toBe(base);
    expect(computeDedupHash('VM-HDFCBK', 'Rs 500 debited', new Date(receivedAt.getTime() + 1))).not.toBe(base);
  });

  it('does not let sender and content run together', () => {
    expect(computeDedupHash('ab', 'c', receivedAt)).not.toBe(computeDedupHash('a', 'bc', receivedAt));
  });
});

describe('DuplicateDetector', () => {
  let kv: SqliteKeyValueStore;
  let now: Date;
  let detector: DuplicateDetector;

  beforeEach(() => {
    kv = new SqliteKeyValueStore();
    now = new Date('2024-12-20T09:00:00.000Z');
    detector = new DuplicateDetector(kv, () => now);
  });

  it('fails fast when used before init()', async () => {
    await expect(detector.isDuplicate('abc')).rejects.toThrow(UsageError);
    await expect(detector.markProcessed('abc')).rejects.toThrow(UsageError);
    await expect(detector.withLock('abc', async () => 1)).rejects.toThrow(UsageError);
    await expect(detector.purgeOlderThan(DAY_MS)).rejects.toThrow(UsageError);
  });

  it('reports a hash as duplicate once marked', async () => {
    await detector.init();
    const hash = detector.hash('VM-HDFCBK', 'Rs 500 debited', receivedAt);

    expect(await detector.isDuplicate(hash)).toBe(false);
    await detector.markProcessed(hash);
    expect(await detector.isDuplicate(hash)).toBe(true);
    expect(await detector.count()).toBe(1);
  });

  it('keeps the first processedAt when marked twice', async () => {
    await detector.init();
    const first = await detector.markProcessed('h1');

    now = new Date('2024-12-21T09:00:00.000Z');
    const second = await detector.markProcessed('h1');

    expect(second.processedAt).toEqual(first.processedAt);
    expect(await detector.getProcessedAt('h1')).toEqual(new Date('2024-12-20T09:00:00.000Z'));
  });

  it('purges entries older than the retention window', async () => {
    await detector.init();
    await detector.markProcessed('old');
    now = new Date(now.getTime() + 10 * DAY_MS);
    await detector.markProcessed('recent');

    now = new Date(now.getTime() + 81 * DAY_MS);
    const removed = await detector.purgeOlderThan(90 * DAY_MS);

    expect(removed).toBe(1);
    expect(await detector.isDuplicate('old')).toBe(false);
    expect(await detector.isDuplicate('recent')).toBe(true);
  });

  it('rejects a negative purge duration', async () => {
    await detector.init();
    await expect(detector.purgeOlderThan(-1)).rejects.toThrow(UsageError);
  });

  it('serializes check-then-mark for the same hash', async () => {
    await detector.init();
    const hash = detector.hash('VM-HDFCBK', 'Rs 500 debited', receivedAt);

    const checkThenMark = () =>
      detector.withLock(hash, async () => {
        if (await detector.isDuplicate(hash)) return 'duplicate';
        await detector.markProcessed(hash);
        return 'new';
      });

    const results = await Promise.all([checkThenMark(), checkThenMark(), checkThenMark()]);

    expect(results.sort()).toEqual(['duplicate', 'duplicate', 'new']);
  });

  it('survives a new detector over the same store', async () => {
    await detector.init();
    await detector.markProcessed('h1');

    const reopened = new DuplicateDetector(kv);
    await reopened.init();

    expect(await reopened.isDuplicate('h1')).toBe(true);
  });

  it('removes a single hash', async () => {
    await detector.init();
    await detector.markProcessed('h1');

    expect(await detector.remove('h1')).toBe(true);
    expect(await detector.isDuplicate('h1')).toBe(false);
    expect(await detector.remove('h1')).toBe(false);
  });

  it('reports an undecodable entry as store corruption', async () => {
    await detector.init();
    await kv.put('dedup:bad', 'not json');

    const error = await detector.getProcessedAt('bad').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ type: ErrorType.STORE_CORRUPTION, retryable: false });
  });
});
