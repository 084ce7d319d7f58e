import { z } from 'zod';
import { PersistedTransaction } from '../types';
import { decodeStored, KeyValueStore } from './index';

export const TRANSACTION_PREFIX = 'txn:';

export const persistedTransactionSchema = z.object({
  id: z.string().min(1),
  ownerId: z.string().min(1),
  amount: z.number(),
  type: z.enum(['debit', 'credit', 'unknown']),
  accountRef: z.string().optional(),
  date: z.string(),
  time: z.string(),
  sourceText: z.string(),
  senderId: z.string(),
  confidence: z.number(),
  createdAt: z.coerce.date(),
  synced: z.boolean(),
  dedupHash: z.string(),
  isManualEntry: z.boolean(),
});

export function transactionKey(id: string): string {
  return `${TRANSACTION_PREFIX}${id}`;
}

export function serializeTransaction(record: PersistedTransaction): string {
  return JSON.stringify({ ...record, createdAt: record.createdAt.toISOString() });
}

/**
 * Local copy of every persisted transaction, keyed by id.
 */
export class TransactionStore {
  constructor(private readonly kv: KeyValueStore) {}

  async save(record: PersistedTransaction): Promise<void> {
    await this.kv.put(transactionKey(record.id), serializeTransaction(record));
  }

  async get(id: string): Promise<PersistedTransaction | undefined> {
    const key = transactionKey(id);
    const raw = await this.kv.get(key);
    return raw === undefined ? undefined : decodeStored(persistedTransactionSchema, key, raw);
  }

  async list(): Promise<PersistedTransaction[]> {
    const entries = await this.kv.list(TRANSACTION_PREFIX);
    return entries.map(entry => decodeStored(persistedTransactionSchema, entry.key, entry.value));
  }

  async listByOwner(ownerId: string): Promise<PersistedTransaction[]> {
    const all = await this.list();
    return all.filter(record => record.ownerId === ownerId);
  }

  /**
   * Flip `synced` to true. A record that is already synced, or missing, is
   * left alone; the flag never goes back to false.
   */
  async markSynced(id: string): Promise<PersistedTransaction | undefined> {
    const record = await this.get(id);
    if (!record || record.synced) return record;

    const updated: PersistedTransaction = { ...record, synced: true };
    await this.save(updated);
    return updated;
  }

  async count(): Promise<number> {
    return (await this.kv.list(TRANSACTION_PREFIX)).length;
  }
}
