import crypto from 'crypto';
import { z } from 'zod';
import { decodeStored, KeyValueStore } from '../db';
import { DedupRecord } from '../types';
import { UsageError } from '../utils/errors';
import { KeyedMutex } from '../utils/mutex';

export const DEDUP_PREFIX = 'dedup:';

const dedupRecordSchema = z.object({
  hash: z.string().min(1),
  processedAt: z.coerce.date(),
});

/**
 * SHA-256 over a JSON array of the three inputs, so no choice of sender or
 * content can collide with another by shifting a separator.
 */
export function computeDedupHash(sender: string, content: string, receivedAt: Date): string {
  const serialized = JSON.stringify([sender, content, receivedAt.getTime()]);
  return crypto.createHash('sha256').update(serialized, 'utf8').digest('hex');
}

/**
 * Remembers which messages have been processed. Call init() before anything
 * else; check-then-mark for one hash belongs inside withLock().
 */
export class DuplicateDetector {
  private initialized = false;
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly kv: KeyValueStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  hash(sender: string, content: string, receivedAt: Date): string {
    return computeDedupHash(sender, content, receivedAt);
  }

  async init(): Promise<void> {
    if (this.initialized) return;
    // Surfaces an unreadable store here rather than on the first message
    await this.kv.list(DEDUP_PREFIX);
    this.initialized = true;
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  async isDuplicate(hash: string): Promise<boolean> {
    this.ensureInitialized('isDuplicate');
    return (await this.kv.get(this.key(hash))) !== undefined;
  }

  /**
   * Idempotent: marking an already processed hash keeps its original
   * processedAt.
   */
  async markProcessed(hash: string): Promise<DedupRecord> {
    this.ensureInitialized('markProcessed');
    const existing = await this.getRecord(hash);
    if (existing) return existing;

    const record: DedupRecord = { hash, processedAt: this.now() };
    await this.kv.put(this.key(hash), JSON.stringify({ hash, processedAt: record.processedAt.toISOString() }));
    return record;
  }

  async getProcessedAt(hash: string): Promise<Date | undefined> {
    this.ensureInitialized('getProcessedAt');
    return (await this.getRecord(hash))?.processedAt;
  }

  async remove(hash: string): Promise<boolean> {
    this.ensureInitialized('remove');
    return this.kv.delete(this.key(hash));
  }

  /**
   * Delete entries processed more than `durationMs` ago. Returns how many
   * were removed.
   */
  async purgeOlderThan(durationMs: number): Promise<number> {
    this.ensureInitialized('purgeOlderThan');
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      throw new UsageError(`purgeOlderThan expects a non-negative duration, got ${durationMs}`);
    }

    const cutoff = this.now().getTime() - durationMs;
    let removed = 0;
    for (const entry of await this.kv.list(DEDUP_PREFIX)) {
      const record = decodeStored(dedupRecordSchema, entry.key, entry.value);
      if (record.processedAt.getTime() < cutoff && (await this.kv.delete(entry.key))) {
        removed++;
      }
    }
    return removed;
  }

  async count(): Promise<number> {
    this.ensureInitialized('count');
    return (await this.kv.list(DEDUP_PREFIX)).length;
  }

  async withLock<T>(hash: string, fn: () => Promise<T>): Promise<T> {
    this.ensureInitialized('withLock');
    return this.mutex.runExclusive(hash, fn);
  }

  private async getRecord(hash: string): Promise<DedupRecord | undefined> {
    const key = this.key(hash);
    const raw = await this.kv.get(key);
    return raw === undefined ? undefined : decodeStored(dedupRecordSchema, key, raw);
  }

  private key(hash: string): string {
    return `${DEDUP_PREFIX}${hash}`;
  }

  private ensureInitialized(operation: string): void {
    if (!this.initialized) {
      throw new UsageError(`DuplicateDetector.${operation}() called before init()`);
    }
  }
}
