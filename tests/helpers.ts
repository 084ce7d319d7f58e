import { AxiosError, AxiosHeaders, InternalAxiosRequestConfig } from 'axios';
import { KeyValueEntry, KeyValueStore } from '../src/db';
import { RemoteStore } from '../src/remote/client';
import { Clock } from '../src/sync/retry';
import { PersistedTransaction } from '../src/types';
import { AppError, ErrorType } from '../src/utils/errors';

/**
 * Clock whose sleep() returns at once and moves time forward.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.advance(ms);
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

/**
 * Remote store that accepts every write unless failures were scheduled.
 */
export class FakeRemote implements RemoteStore {
  readonly writes: Array<{ ownerId: string; record: PersistedTransaction }> = [];
  calls = 0;
  private readonly failures: Array<() => unknown> = [];

  failNext(count: number, error: () => unknown): void {
    for (let i = 0; i < count; i++) {
      this.failures.push(error);
    }
  }

  async write(ownerId: string, record: PersistedTransaction): Promise<void> {
    this.calls++;
    const failure = this.failures.shift();
    if (failure) throw failure();
    this.writes.push({ ownerId, record });
  }
}

/**
 * In-memory store with an optional hook to fail writes to chosen keys.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  readonly data = new Map<string, string>();
  failPutsFor: ((key: string) => boolean) | null = null;

  async put(key: string, value: string): Promise<void> {
    if (this.failPutsFor && this.failPutsFor(key)) {
      throw new Error(`disk full writing ${key}`);
    }
    this.data.set(key, value);
  }

  async get(key: string): Promise<string | undefined> {
    return this.data.get(key);
  }

  async delete(key: string): Promise<boolean> {
    return this.data.delete(key);
  }

  async list(prefix: string): Promise<KeyValueEntry[]> {
    return [...this.data.entries()]
      .filter(([key]) => key.startsWith(prefix))
      .map(([key, value]) => ({ key, value }));
  }
}

export const networkDown = () => new AppError({ type: ErrorType.NETWORK_ERROR, message: 'network unavailable' });

export const permissionDenied = () =>
  new AppError({ type: ErrorType.PERMISSION_DENIED, message: 'write not allowed' });

export function httpError(status: number, data: unknown = {}): AxiosError {
  const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
  return new AxiosError(
    `Request failed with status code ${status}`,
    status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
    config,
    {},
    { data, status, statusText: String(status), headers: {}, config }
  );
}

export function makeRecord(overrides: Partial<PersistedTransaction> = {}): PersistedTransaction {
  return {
    id: 'txn-1',
    ownerId: 'owner-1',
    amount: 1500,
    type: 'debit',
    accountRef: 'xxxxxx1234',
    date: '2024-12-15',
    time: '10:00:00',
    sourceText: 'Your account XXXXXX1234 has been debited with Rs.1,500.00 on 15-Dec-2024',
    senderId: 'VM-HDFCBK',
    confidence: 0.9,
    createdAt: new Date('2024-12-20T09:00:00.000Z'),
    synced: false,
    dedupHash: 'hash-1',
    isManualEntry: false,
    ...overrides,
  };
}
