export type TransactionType = 'debit' | 'credit' | 'unknown';

export interface RawMessage {
  sender: string;
  content: string;
  receivedAt: Date;
  threadId?: string;
}

export interface ExtractedTransaction {
  readonly amount: number;
  readonly type: TransactionType;
  readonly accountRef?: string;
  readonly date: string; // YYYY-MM-DD
  readonly time: string; // HH:MM:SS, 24h
  readonly sourceText: string;
  readonly senderId: string;
  readonly confidence: number;
}

export interface PersistedTransaction extends ExtractedTransaction {
  readonly id: string;
  readonly ownerId: string;
  readonly createdAt: Date;
  readonly synced: boolean;
  readonly dedupHash: string;
  readonly isManualEntry: boolean;
}

export interface DedupRecord {
  hash: string;
  processedAt: Date;
}

export type SyncState = 'created' | 'locally_persisted' | 'remote_confirmed' | 'queued_for_retry';

export interface QueueError {
  type: string;
  message: string;
  retryable: boolean;
}

export interface QueueEntry {
  transaction: PersistedTransaction;
  enqueuedAt: Date;
  attempts: number;
  lastError?: QueueError;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface Parser {
  name: string;
  canParse(message: RawMessage): boolean;
  parse(message: RawMessage): ExtractedTransaction | null;
}
