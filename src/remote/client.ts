import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { PersistedTransaction } from '../types';
import { classifyError } from '../utils/errors';

/**
 * Document store keyed by owner and record id. write() resolves once the
 * remote accepted the record and rejects with a classified AppError
 * otherwise.
 */
export interface RemoteStore {
  write(ownerId: string, record: PersistedTransaction): Promise<void>;
}

export interface HttpRemoteConfig {
  baseUrl: string;
  token?: string;
  timeoutMs: number;
}

export function transactionPath(ownerId: string, id: string): string {
  return `/users/${encodeURIComponent(ownerId)}/transactions/${encodeURIComponent(id)}`;
}

export class HttpRemoteStore implements RemoteStore {
  private readonly http: AxiosInstance;

  /**
   * `adapter` replaces axios' transport, for running against an in-process
   * stand-in.
   */
  constructor(config: HttpRemoteConfig, options: { adapter?: AxiosAdapter } = {}) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        ...(config.token ? { Authorization: `Bearer ${config.token}` } : {}),
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async write(ownerId: string, record: PersistedTransaction): Promise<void> {
    try {
      await this.http.put(transactionPath(ownerId, record.id), {
        ...record,
        createdAt: record.createdAt.toISOString(),
        synced: true,
      });
    } catch (error) {
      throw classifyError(error, { ownerId, transactionId: record.id });
    }
  }
}
