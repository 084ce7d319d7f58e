import { AppConfig } from './config';
import { KeyValueStore, SqliteKeyValueStore } from './db';
import { OfflineQueue } from './db/queue';
import { TransactionStore } from './db/transactions';
import { DuplicateDetector } from './dedup/duplicate-detector';
import { EventChannel, PipelineEvent } from './events';
import { SmsPipeline } from './pipeline';
import { HttpRemoteStore, RemoteStore } from './remote/client';
import { Connectivity, ConnectivitySignal } from './sync/connectivity';
import { Clock, systemClock } from './sync/retry';
import { SyncManager } from './sync/sync-manager';
import { TransactionValidator } from './validation/validator';

export interface LedgerOverrides {
  kv?: KeyValueStore;
  remote?: RemoteStore | null;
  connectivity?: Connectivity;
  clock?: Clock;
  idFactory?: () => string;
}

export interface Ledger {
  config: AppConfig;
  pipeline: SmsPipeline;
  sync: SyncManager;
  dedup: DuplicateDetector;
  transactions: TransactionStore;
  queue: OfflineQueue;
  close(): void;
}

/**
 * Wire every component from configuration. Nothing is shared between two
 * ledgers; call close() when done.
 */
export async function createLedger(config: AppConfig, overrides: LedgerOverrides = {}): Promise<Ledger> {
  const kv = overrides.kv ?? new SqliteKeyValueStore(config.dbPath);
  const clock = overrides.clock ?? systemClock;
  const now = () => clock.now();

  const remote =
    overrides.remote === null
      ? undefined
      : overrides.remote ?? (config.remote ? new HttpRemoteStore(config.remote) : undefined);

  const events = new EventChannel<PipelineEvent>();
  const transactions = new TransactionStore(kv);
  const queue = new OfflineQueue(kv);
  const dedup = new DuplicateDetector(kv, now);
  const sync = new SyncManager({
    transactions,
    queue,
    remote,
    connectivity: overrides.connectivity ?? new ConnectivitySignal(true),
    events,
    clock,
    policy: {
      maxAttempts: config.sync.maxAttempts,
      baseDelayMs: config.sync.baseDelayMs,
      maxDelayMs: config.sync.maxDelayMs,
      multiplier: 2,
    },
    drainIntervalMs: config.sync.drainIntervalMs,
  });

  const pipeline = new SmsPipeline({
    ownerId: config.ownerId,
    dedup,
    transactions,
    sync,
    validator: new TransactionValidator(config.validation, now),
    events,
    clock,
    idFactory: overrides.idFactory,
  });
  await pipeline.init();

  return {
    config,
    pipeline,
    sync,
    dedup,
    transactions,
    queue,
    close: () => {
      sync.stop();
      pipeline.stopIntake();
      // Injected stores belong to the caller
      if (!overrides.kv && kv instanceof SqliteKeyValueStore) kv.close();
    },
  };
}
