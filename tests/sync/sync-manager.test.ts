import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { OfflineQueue } from '../../src/db/queue';
import { TransactionStore } from '../../src/db/transactions';
import { EventChannel, PipelineEvent } from '../../src/events';
import { ConnectivitySignal } from '../../src/sync/connectivity';
import { SyncManager } from '../../src/sync/sync-manager';
import { FakeClock, FakeRemote, makeRecord, MemoryKeyValueStore, networkDown, permissionDenied } from '../helpers';

describe('SyncManager', () => {
  let transactions: TransactionStore;
  let queue: OfflineQueue;
  let connectivity: ConnectivitySignal;
  let remote: FakeRemote;
  let clock: FakeClock;
  let events: EventChannel<PipelineEvent>;
  let sync: SyncManager;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const kv = new MemoryKeyValueStore();
    transactions = new TransactionStore(kv);
    queue = new OfflineQueue(kv);
    connectivity = new ConnectivitySignal(true);
    remote = new FakeRemote();
    clock = new FakeClock(new Date('2024-12-20T09:00:00.000Z'));
    events = new EventChannel<PipelineEvent>();
    sync = new SyncManager({ transactions, queue, connectivity, remote, events, clock });
  });

  afterEach(() => {
    sync.stop();
    vi.restoreAllMocks();
  });

  it('confirms a record the remote accepts', async () => {
    const record = makeRecord();

    const result = await sync.persist(record);

    expect(result).toEqual({ state: 'remote_confirmed', attempts: 1 });
    expect(remote.writes).toEqual([{ ownerId: 'owner-1', record }]);
    expect((await transactions.get('txn-1'))?.synced).toBe(true);
    expect(await queue.size()).toBe(0);
  });

  it('queues after exhausting retries and syncs on the next drain', async () => {
    remote.failNext(3, networkDown);

    const result = await sync.persist(makeRecord());

    expect(result).toEqual({
      state: 'queued_for_retry',
      attempts: 3,
      reason: 'exhausted',
      lastError: { type: 'NETWORK_ERROR', message: 'network unavailable', retryable: true },
    });
    expect(clock.sleeps).toEqual([1000, 2000]);
    expect((await transactions.get('txn-1'))?.synced).toBe(false);
    expect(await sync.getState('txn-1')).toBe('queued_for_retry');

    const report = await sync.drainQueueNow();

    expect(report).toEqual({ attempted: 1, synced: 1, transientFailures: 0, permanentFailures: 0, remaining: 0 });
    expect(await sync.getState('txn-1')).toBe('remote_confirmed');
  });

  it('does not retry a permanent failure', async () => {
    remote.failNext(1, permissionDenied);

    const result = await sync.persist(makeRecord());

    expect(result).toMatchObject({ state: 'queued_for_retry', attempts: 1, reason: 'permanent' });
    expect(remote.calls).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('keeps a permanently failing entry and counts it separately', async () => {
    remote.failNext(2, permissionDenied);
    await sync.persist(makeRecord());

    const report = await sync.drainQueueNow();

    expect(report).toEqual({ attempted: 1, synced: 0, transientFailures: 0, permanentFailures: 1, remaining: 1 });
    expect((await queue.get('txn-1'))?.attempts).toBe(2);
  });

  it('queues without calling the remote while offline', async () => {
    connectivity.set(false);

    const result = await sync.persist(makeRecord());

    expect(result).toEqual({ state: 'queued_for_retry', attempts: 0, reason: 'offline' });
    expect(remote.calls).toBe(0);
    expect(await sync.drainQueueNow()).toEqual({
      attempted: 0,
      synced: 0,
      transientFailures: 0,
      permanentFailures: 0,
      remaining: 1,
      skipped: 'offline',
    });
  });

  it('queues everything when no remote is configured', async () => {
    const local = new SyncManager({ transactions, queue, connectivity, clock });

    expect(await local.persist(makeRecord())).toEqual({ state: 'queued_for_retry', attempts: 0, reason: 'no-remote' });
    expect((await local.drainQueueNow()).skipped).toBe('no-remote');
  });

  it('shares one drain between concurrent callers', async () => {
    connectivity.set(false);
    await sync.persist(makeRecord());
    connectivity.set(true);

    const first = sync.drainQueueNow();
    const second = sync.drainQueueNow();

    expect(second).toBe(first);
    await first;
    expect(remote.calls).toBe(1);
    const third = sync.drainQueueNow();
    expect(third).not.toBe(first);
    await third;
  });

  it('drops queue entries whose record is already synced', async () => {
    connectivity.set(false);
    await sync.persist(makeRecord());
    await transactions.markSynced('txn-1');
    connectivity.set(true);

    const report = await sync.drainQueueNow();

    expect(report.attempted).toBe(0);
    expect(report.remaining).toBe(0);
    expect(remote.calls).toBe(0);
  });

  it('delivers unsynced local records missing from the queue', async () => {
    await sync.persistLocally(makeRecord());

    const report = await sync.drainQueueNow();

    expect(report).toEqual({ attempted: 1, synced: 1, transientFailures: 0, permanentFailures: 0, remaining: 0 });
    expect((await transactions.get('txn-1'))?.synced).toBe(true);
  });

  it('queues an unsynced local record when its delivery fails', async () => {
    await sync.persistLocally(makeRecord());
    remote.failNext(3, networkDown);

    const report = await sync.drainQueueNow();

    expect(report).toEqual({ attempted: 1, synced: 0, transientFailures: 1, permanentFailures: 0, remaining: 1 });
    expect((await queue.get('txn-1'))?.attempts).toBe(3);
  });

  it('drains when connectivity returns after start()', async () => {
    connectivity.set(false);
    await sync.persist(makeRecord());

    sync.start();
    expect(sync.isRunning).toBe(true);
    connectivity.set(true);
    const report = await sync.drainQueueNow();

    expect(report).toMatchObject({ attempted: 1, synced: 1, remaining: 0 });
    sync.stop();
    expect(sync.isRunning).toBe(false);
  });

  it('tracks the state of a record', async () => {
    expect(await sync.getState('txn-1')).toBe('created');

    await sync.persistLocally(makeRecord());
    expect(await sync.getState('txn-1')).toBe('locally_persisted');
  });

  it('emits queued and sync-completed events', async () => {
    const seen: PipelineEvent[] = [];
    events.subscribe(event => {
      seen.push(event);
    });
    remote.failNext(3, networkDown);

    await sync.persist(makeRecord());
    await sync.drainQueueNow();

    expect(seen).toEqual([
      {
        type: 'queued',
        transactionId: 'txn-1',
        attempts: 3,
        lastError: { type: 'NETWORK_ERROR', message: 'network unavailable', retryable: true },
      },
      { type: 'sync-completed', transactionId: 'txn-1', attempts: 1 },
    ]);
  });
});
