import Database, { Database as DatabaseType, Statement } from 'better-sqlite3';
import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { AppError, ErrorType } from '../utils/errors';

export const MEMORY_DB = ':memory:';

export interface KeyValueEntry {
  key: string;
  value: string;
}

/**
 * String-keyed durable storage. Records, dedup entries and the offline queue
 * all live behind this interface under their own key prefixes.
 */
export interface KeyValueStore {
  put(key: string, value: string): Promise<void>;
  get(key: string): Promise<string | undefined>;
  delete(key: string): Promise<boolean>;
  /** Entries whose key starts with `prefix`, in insertion order. */
  list(prefix: string): Promise<KeyValueEntry[]>;
}

export function initDB(dbPath: string): DatabaseType {
  if (dbPath !== MEMORY_DB) {
    fs.ensureDirSync(path.dirname(dbPath));
  }
  const db = new Database(dbPath);
  if (dbPath !== MEMORY_DB) {
    db.pragma('journal_mode = WAL');
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS kv (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
    );
  `);

  return db;
}

export class SqliteKeyValueStore implements KeyValueStore {
  private readonly db: DatabaseType;
  private readonly putStmt: Statement<[string, string]>;
  private readonly getStmt: Statement<[string], { value: string }>;
  private readonly deleteStmt: Statement<[string]>;
  private readonly listStmt: Statement<[number, string], KeyValueEntry>;

  constructor(dbPath: string = MEMORY_DB) {
    this.db = initDB(dbPath);
    this.putStmt = this.db.prepare<[string, string]>(`
      INSERT INTO kv (key, value) VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = CURRENT_TIMESTAMP
    `);
    this.getStmt = this.db.prepare<[string], { value: string }>('SELECT value FROM kv WHERE key = ?');
    this.deleteStmt = this.db.prepare<[string]>('DELETE FROM kv WHERE key = ?');
    this.listStmt = this.db.prepare<[number, string], KeyValueEntry>(
      'SELECT key, value FROM kv WHERE substr(key, 1, ?) = ? ORDER BY rowid'
    );
  }

  async put(key: string, value: string): Promise<void> {
    this.putStmt.run(key, value);
  }

  async get(key: string): Promise<string | undefined> {
    return this.getStmt.get(key)?.value;
  }

  async delete(key: string): Promise<boolean> {
    return this.deleteStmt.run(key).changes > 0;
  }

  async list(prefix: string): Promise<KeyValueEntry[]> {
    return this.listStmt.all(prefix.length, prefix);
  }

  close(): void {
    this.db.close();
  }
}

/**
 * Parse a stored JSON value against its schema. Anything that does not decode
 * means the store was written by something else or damaged.
 */
export function decodeStored<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, key: string, raw: string): T {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new AppError({
      type: ErrorType.STORE_CORRUPTION,
      message: `Stored value for ${key} is not valid JSON`,
      context: { key },
      originalError: error,
    });
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    throw new AppError({
      type: ErrorType.STORE_CORRUPTION,
      message: `Stored value for ${key} does not match its schema`,
      context: { key, issues: result.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`) },
      originalError: result.error,
    });
  }
  return result.data;
}
