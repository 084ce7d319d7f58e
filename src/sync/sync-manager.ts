import { OfflineQueue } from '../db/queue';
import { TransactionStore } from '../db/transactions';
import { PipelineEvents } from '../events';
import { RemoteStore } from '../remote/client';
import { PersistedTransaction, QueueError, SyncState } from '../types';
import { AppError, formatError } from '../utils/errors';
import { Connectivity } from './connectivity';
import { Clock, DEFAULT_RETRY_POLICY, retryWithBackoff, RetryOutcome, RetryPolicy, systemClock } from './retry';

export type QueueReason = 'no-remote' | 'offline' | 'permanent' | 'exhausted';

export type DeliveryResult =
  | { state: 'remote_confirmed'; attempts: number }
  | { state: 'queued_for_retry'; attempts: number; reason: QueueReason; lastError?: QueueError };

export interface DrainReport {
  attempted: number;
  synced: number;
  transientFailures: number;
  permanentFailures: number;
  /** Entries still queued after the drain. */
  remaining: number;
  /** Set when the drain did not run at all. */
  skipped?: 'offline' | 'no-remote';
}

export interface SyncManagerOptions {
  transactions: TransactionStore;
  queue: OfflineQueue;
  connectivity: Connectivity;
  remote?: RemoteStore;
  events?: PipelineEvents;
  clock?: Clock;
  policy?: RetryPolicy;
  drainIntervalMs?: number;
}

export function toQueueError(error: AppError): QueueError {
  return { type: error.type, message: error.message, retryable: error.retryable };
}

/**
 * Moves records from local storage to the remote store. Local persistence
 * always comes first; a record that cannot be delivered right away waits in
 * the offline queue until a drain confirms it.
 */
export class SyncManager {
  private readonly transactions: TransactionStore;
  private readonly queue: OfflineQueue;
  private readonly connectivity: Connectivity;
  private readonly remote?: RemoteStore;
  private readonly events?: PipelineEvents;
  private readonly clock: Clock;
  private readonly policy: RetryPolicy;
  private readonly drainIntervalMs: number;

  private drainInFlight: Promise<DrainReport> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private unsubscribeConnectivity: (() => void) | null = null;

  constructor(options: SyncManagerOptions) {
    this.transactions = options.transactions;
    this.queue = options.queue;
    this.connectivity = options.connectivity;
    this.remote = options.remote;
    this.events = options.events;
    this.clock = options.clock ?? systemClock;
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.drainIntervalMs = options.drainIntervalMs ?? 60000;
  }

  async persistLocally(record: PersistedTransaction): Promise<PersistedTransaction> {
    await this.transactions.save(record);
    return record;
  }

  /**
   * Write a locally persisted record to the remote store, retrying transient
   * failures. Anything not confirmed ends up in the offline queue.
   */
  async deliver(record: PersistedTransaction): Promise<DeliveryResult> {
    if (!this.remote) return this.enqueue(record, 0, 'no-remote');
    if (!this.connectivity.isOnline()) return this.enqueue(record, 0, 'offline');

    const outcome = await this.attempt(this.remote, record);
    if (outcome.ok) {
      await this.confirm(record.id, outcome.attempts);
      return { state: 'remote_confirmed', attempts: outcome.attempts };
    }

    return this.enqueue(record, outcome.attempts, outcome.reason, toQueueError(outcome.error));
  }

  async persist(record: PersistedTransaction): Promise<DeliveryResult> {
    await this.persistLocally(record);
    return this.deliver(record);
  }

  /**
   * Re-attempt every queued entry and every unsynced local record. Calls
   * made while a drain is running get that drain's report.
   */
  drainQueueNow(): Promise<DrainReport> {
    if (!this.drainInFlight) {
      this.drainInFlight = this.runDrain().finally(() => {
        this.drainInFlight = null;
      });
    }
    return this.drainInFlight;
  }

  async getState(id: string): Promise<SyncState> {
    const record = await this.transactions.get(id);
    if (!record) return 'created';
    if (record.synced) return 'remote_confirmed';
    if (await this.queue.get(id)) return 'queued_for_retry';
    return 'locally_persisted';
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => this.triggerDrain('interval'), this.drainIntervalMs);
    this.timer.unref();
    this.unsubscribeConnectivity = this.connectivity.onChange(online => {
      if (online) this.triggerDrain('connectivity restored');
    });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.unsubscribeConnectivity) {
      this.unsubscribeConnectivity();
      this.unsubscribeConnectivity = null;
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  private triggerDrain(reason: string): void {
    this.drainQueueNow()
      .then(report => {
        if (report.attempted > 0) {
          console.log(`[Sync] Drain (${reason}): ${report.synced}/${report.attempted} synced, ${report.remaining} queued`);
        }
      })
      .catch(error => {
        console.error(`[Sync] Drain (${reason}) failed: ${formatError(error)}`);
      });
  }

  private async runDrain(): Promise<DrainReport> {
    const report: DrainReport = {
      attempted: 0,
      synced: 0,
      transientFailures: 0,
      permanentFailures: 0,
      remaining: 0,
    };

    const remote = this.remote;
    if (!remote || !this.connectivity.isOnline()) {
      report.skipped = remote ? 'offline' : 'no-remote';
      report.remaining = await this.queue.size();
      return report;
    }

    for (const transaction of await this.pendingDeliveries()) {
      if (!this.connectivity.isOnline()) break;

      // Confirmed earlier but the entry outlived it
      const local = await this.transactions.get(transaction.id);
      if (local?.synced) {
        await this.queue.remove(transaction.id);
        continue;
      }

      report.attempted++;
      const outcome = await this.attempt(remote, transaction);
      if (outcome.ok) {
        await this.confirm(transaction.id, outcome.attempts);
        report.synced++;
        continue;
      }

      const lastError = toQueueError(outcome.error);
      await this.queue.enqueue(transaction, outcome.attempts, lastError, this.clock.now());
      if (lastError.retryable) {
        report.transientFailures++;
      } else {
        report.permanentFailures++;
      }
    }

    report.remaining = await this.queue.size();
    return report;
  }

  /**
   * Queued records, then unsynced local records that never made it into the
   * queue (the enqueue write failed, or the process stopped mid-delivery).
   */
  private async pendingDeliveries(): Promise<PersistedTransaction[]> {
    const queued = (await this.queue.list()).map(entry => entry.transaction);
    const queuedIds = new Set(queued.map(record => record.id));
    const stranded = (await this.transactions.list()).filter(record => !record.synced && !queuedIds.has(record.id));
    return [...queued, ...stranded];
  }

  private attempt(remote: RemoteStore, record: PersistedTransaction): Promise<RetryOutcome<void>> {
    return retryWithBackoff(() => remote.write(record.ownerId, record), {
      policy: this.policy,
      clock: this.clock,
      onRetry: (error, attempt, delayMs) => {
        console.warn(
          `[Sync] Retrying ${record.id} in ${delayMs}ms (attempt ${attempt} failed): ${error.message}`
        );
      },
    });
  }

  private async confirm(id: string, attempts: number): Promise<void> {
    await this.transactions.markSynced(id);
    await this.queue.remove(id);
    this.events?.emit({ type: 'sync-completed', transactionId: id, attempts });
  }

  private async enqueue(
    record: PersistedTransaction,
    attempts: number,
    reason: QueueReason,
    lastError?: QueueError
  ): Promise<DeliveryResult> {
    const entry = await this.queue.enqueue(record, attempts, lastError, this.clock.now());

    if (lastError) {
      const label = lastError.retryable ? 'will retry on next drain' : 'needs attention';
      console.warn(`[Sync] Queued ${record.id} after ${attempts} attempt(s), ${label}: ${lastError.message}`);
    }
    this.events?.emit({
      type: 'queued',
      transactionId: record.id,
      attempts: entry.attempts,
      ...(lastError ? { lastError } : {}),
    });

    return {
      state: 'queued_for_retry',
      attempts: entry.attempts,
      reason,
      ...(lastError ? { lastError } : {}),
    };
  }
}
