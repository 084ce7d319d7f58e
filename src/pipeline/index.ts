import { v4 as uuidv4 } from 'uuid';
import { DuplicateDetector } from '../dedup/duplicate-detector';
import { TransactionStore } from '../db/transactions';
import { EventChannel, PipelineEvent, PipelineEvents } from '../events';
import { TransactionAssembler } from '../parsers/assembler';
import { DeliveryResult, DrainReport, SyncManager } from '../sync/sync-manager';
import { Clock, systemClock } from '../sync/retry';
import { PersistedTransaction, RawMessage } from '../types';
import { AppError, classifyError, formatError, UsageError } from '../utils/errors';
import { TransactionValidator } from '../validation/validator';

export type MessageListener = (message: RawMessage) => void;

/**
 * Push-based message feed. The same message may be delivered more than once.
 */
export interface MessageSource {
  subscribe(listener: MessageListener): () => void;
}

/**
 * Replays a fixed list of messages to its subscribers on flush().
 */
export class ArrayMessageSource implements MessageSource {
  private readonly listeners = new Set<MessageListener>();

  constructor(private readonly messages: readonly RawMessage[]) {}

  subscribe(listener: MessageListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  flush(): number {
    for (const message of this.messages) {
      for (const listener of [...this.listeners]) {
        listener(message);
      }
    }
    return this.messages.length;
  }
}

export type SubmitResult =
  | { status: 'rejected'; reason: 'empty' | 'not-financial' }
  | { status: 'duplicate'; hash: string }
  | { status: 'unparsed'; hash: string; reason: 'no-amount' }
  | { status: 'invalid'; hash: string; errors: string[]; warnings: string[] }
  | { status: 'processed'; transaction: PersistedTransaction; delivery: DeliveryResult; warnings: string[] }
  | { status: 'error'; error: AppError };

export interface PipelineStats {
  received: number;
  rejected: number;
  duplicates: number;
  unparsed: number;
  invalid: number;
  processed: number;
  confirmed: number;
  queued: number;
  errors: number;
  inFlight: number;
}

export interface SmsPipelineOptions {
  ownerId: string;
  dedup: DuplicateDetector;
  transactions: TransactionStore;
  sync: SyncManager;
  assembler?: TransactionAssembler;
  validator?: TransactionValidator;
  events?: PipelineEvents;
  clock?: Clock;
  idFactory?: () => string;
}

type LockedOutcome = Exclude<SubmitResult, { status: 'processed' } | { status: 'error' }> | {
  status: 'persisted';
  transaction: PersistedTransaction;
  warnings: string[];
};

/**
 * Runs each message through detection, deduplication, extraction,
 * validation and persistence, then hands the record to the sync manager.
 * Messages are processed concurrently; only identical messages (same dedup
 * hash) are serialized.
 */
export class SmsPipeline {
  readonly events: PipelineEvents;
  readonly ownerId: string;

  private readonly dedup: DuplicateDetector;
  private readonly transactions: TransactionStore;
  private readonly sync: SyncManager;
  private readonly assembler: TransactionAssembler;
  private readonly validator: TransactionValidator;
  private readonly clock: Clock;
  private readonly idFactory: () => string;

  private readonly inFlight = new Set<Promise<unknown>>();
  private readonly subscriptions = new Set<() => void>();
  private readonly stats: Omit<PipelineStats, 'inFlight'> = {
    received: 0,
    rejected: 0,
    duplicates: 0,
    unparsed: 0,
    invalid: 0,
    processed: 0,
    confirmed: 0,
    queued: 0,
    errors: 0,
  };

  constructor(options: SmsPipelineOptions) {
    this.ownerId = options.ownerId;
    this.dedup = options.dedup;
    this.transactions = options.transactions;
    this.sync = options.sync;
    this.assembler = options.assembler ?? new TransactionAssembler();
    this.validator = options.validator ?? new TransactionValidator();
    this.events = options.events ?? new EventChannel<PipelineEvent>();
    this.clock = options.clock ?? systemClock;
    this.idFactory = options.idFactory ?? (() => uuidv4());
  }

  async init(): Promise<void> {
    await this.dedup.init();
  }

  /**
   * Entry point for both the automatic source and manual entry. Resolves
   * with what happened to the message; only usage errors reject.
   */
  submitRawMessage(message: RawMessage, options: { manual?: boolean } = {}): Promise<SubmitResult> {
    const work = this.process(message, options.manual ?? false);
    this.inFlight.add(work);
    const untrack = () => {
      this.inFlight.delete(work);
    };
    void work.then(untrack, untrack);
    return work;
  }

  attachSource(source: MessageSource): () => void {
    const unsubscribe = source.subscribe(message => {
      this.submitRawMessage(message).catch(error => {
        console.error(`[Pipeline] Message from ${message.sender} failed: ${formatError(error)}`);
      });
    });

    const detach = () => {
      unsubscribe();
      this.subscriptions.delete(detach);
    };
    this.subscriptions.add(detach);
    return detach;
  }

  /**
   * Detach every source. Work already accepted keeps running; see whenIdle().
   */
  stopIntake(): void {
    for (const detach of [...this.subscriptions]) {
      detach();
    }
  }

  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  drainQueueNow(): Promise<DrainReport> {
    return this.sync.drainQueueNow();
  }

  listTransactions(ownerId: string = this.ownerId): Promise<PersistedTransaction[]> {
    return this.transactions.listByOwner(ownerId);
  }

  getStats(): PipelineStats {
    return { ...this.stats, inFlight: this.inFlight.size };
  }

  private async process(message: RawMessage, manual: boolean): Promise<SubmitResult> {
    if (!this.dedup.isInitialized) {
      throw new UsageError('SmsPipeline.init() must be called before submitting messages');
    }
    this.stats.received++;

    if (!message.content.trim()) {
      return this.reject(message, 'empty');
    }
    if (!this.assembler.canParse(message)) {
      return this.reject(message, 'not-financial');
    }

    const hash = this.dedup.hash(message.sender, message.content, message.receivedAt);
    this.events.emit({
      type: 'financial-message-detected',
      hash,
      sender: message.sender,
      score: this.assembler.financialScore(message.content),
    });

    try {
      const outcome = await this.dedup.withLock(hash, () => this.processLocked(message, hash, manual));
      if (outcome.status !== 'persisted') return outcome;

      const delivery = await this.sync.deliver(outcome.transaction);
      if (delivery.state === 'remote_confirmed') {
        this.stats.confirmed++;
      } else {
        this.stats.queued++;
      }
      return { status: 'processed', transaction: outcome.transaction, delivery, warnings: outcome.warnings };
    } catch (error) {
      if (error instanceof UsageError) throw error;

      const appError = classifyError(error, { hash, sender: message.sender });
      this.stats.errors++;
      console.error(`[Pipeline] Failed to process message from ${message.sender}: ${formatError(appError)}`);
      this.events.emit({ type: 'error', message: appError.message, hash });
      return { status: 'error', error: appError };
    }
  }

  /**
   * Check-then-mark for one hash. The hash is marked only once the record is
   * safely stored locally.
   */
  private async processLocked(message: RawMessage, hash: string, manual: boolean): Promise<LockedOutcome> {
    if (await this.dedup.isDuplicate(hash)) {
      this.stats.duplicates++;
      this.events.emit({ type: 'duplicate-detected', hash, sender: message.sender });
      return { status: 'duplicate', hash };
    }

    const assembled = this.assembler.assemble(message);
    if (assembled.status === 'rejected') {
      this.stats.rejected++;
      this.events.emit({ type: 'not-financial', sender: message.sender, reason: assembled.reason });
      return assembled;
    }

    if (assembled.status === 'unparsed') {
      this.stats.unparsed++;
      this.events.emit({ type: 'unparsed', hash, sender: message.sender, reason: assembled.reason });
      return { status: 'unparsed', hash, reason: assembled.reason };
    }

    this.events.emit({ type: 'parsed', hash, transaction: assembled.transaction, details: assembled.details });

    const record: PersistedTransaction = {
      ...assembled.transaction,
      id: this.idFactory(),
      ownerId: this.ownerId,
      createdAt: this.clock.now(),
      synced: false,
      dedupHash: hash,
      isManualEntry: manual,
    };

    const validation = this.validator.validate(record);
    if (!validation.valid) {
      this.stats.invalid++;
      this.events.emit({ type: 'validation-failed', hash, errors: validation.errors, warnings: validation.warnings });
      return { status: 'invalid', hash, errors: validation.errors, warnings: validation.warnings };
    }

    await this.sync.persistLocally(record);
    await this.dedup.markProcessed(hash);

    this.stats.processed++;
    this.events.emit({ type: 'persisted', transaction: record, warnings: validation.warnings });
    return { status: 'persisted', transaction: record, warnings: validation.warnings };
  }

  private reject(message: RawMessage, reason: 'empty' | 'not-financial'): SubmitResult {
    this.stats.rejected++;
    this.events.emit({ type: 'not-financial', sender: message.sender, reason });
    return { status: 'rejected', reason };
  }
}
