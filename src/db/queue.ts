import { z } from 'zod';
import { PersistedTransaction, QueueEntry, QueueError } from '../types';
import { decodeStored, KeyValueStore } from './index';
import { persistedTransactionSchema } from './transactions';

export const QUEUE_PREFIX = 'queue:';

const queueEntrySchema = z.object({
  transaction: persistedTransactionSchema,
  enqueuedAt: z.coerce.date(),
  attempts: z.number().int().nonnegative(),
  lastError: z
    .object({
      type: z.string(),
      message: z.string(),
      retryable: z.boolean(),
    })
    .optional(),
});

export function queueKey(id: string): string {
  return `${QUEUE_PREFIX}${id}`;
}

function serializeEntry(entry: QueueEntry): string {
  return JSON.stringify({
    ...entry,
    transaction: { ...entry.transaction, createdAt: entry.transaction.createdAt.toISOString() },
    enqueuedAt: entry.enqueuedAt.toISOString(),
  });
}

/**
 * Durable queue of transactions waiting for remote delivery. One entry per
 * transaction id; re-enqueueing an id updates its attempt count and error.
 */
export class OfflineQueue {
  constructor(private readonly kv: KeyValueStore) {}

  async enqueue(
    transaction: PersistedTransaction,
    attempts: number,
    lastError: QueueError | undefined,
    now: Date
  ): Promise<QueueEntry> {
    const existing = await this.get(transaction.id);
    const entry: QueueEntry = {
      transaction,
      enqueuedAt: existing?.enqueuedAt ?? now,
      attempts: (existing?.attempts ?? 0) + attempts,
      ...(lastError ? { lastError } : {}),
    };
    await this.kv.put(queueKey(transaction.id), serializeEntry(entry));
    return entry;
  }

  async get(id: string): Promise<QueueEntry | undefined> {
    const key = queueKey(id);
    const raw = await this.kv.get(key);
    return raw === undefined ? undefined : decodeStored(queueEntrySchema, key, raw);
  }

  /** Snapshot of the queue, oldest first. */
  async list(): Promise<QueueEntry[]> {
    const entries = await this.kv.list(QUEUE_PREFIX);
    return entries.map(entry => decodeStored(queueEntrySchema, entry.key, entry.value));
  }

  async remove(id: string): Promise<boolean> {
    return this.kv.delete(queueKey(id));
  }

  async size(): Promise<number> {
    return (await this.kv.list(QUEUE_PREFIX)).length;
  }
}
