import { ExtractionDetails } from './parsers/assembler';
import { ExtractedTransaction, PersistedTransaction, QueueError } from './types';
import { formatError } from './utils/errors';

export type PipelineEvent =
  | { type: 'financial-message-detected'; hash: string; sender: string; score: number }
  | { type: 'not-financial'; sender: string; reason: 'empty' | 'not-financial' }
  | { type: 'parsed'; hash: string; transaction: ExtractedTransaction; details: ExtractionDetails }
  | { type: 'unparsed'; hash: string; sender: string; reason: 'no-amount' }
  | { type: 'validation-failed'; hash: string; errors: string[]; warnings: string[] }
  | { type: 'duplicate-detected'; hash: string; sender: string }
  | { type: 'persisted'; transaction: PersistedTransaction; warnings: string[] }
  | { type: 'queued'; transactionId: string; attempts: number; lastError?: QueueError }
  | { type: 'sync-completed'; transactionId: string; attempts: number }
  | { type: 'error'; message: string; hash?: string; transactionId?: string };

export type PipelineEventType = PipelineEvent['type'];

export type EventListener<E> = (event: E) => void | Promise<void>;

/**
 * Broadcast channel. Listeners run in subscription order; one that throws
 * or rejects is logged and does not affect the others or the emitter.
 */
export class EventChannel<E extends { type: string }> {
  private readonly listeners = new Set<EventListener<E>>();

  subscribe(listener: EventListener<E>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: E): void {
    for (const listener of [...this.listeners]) {
      try {
        const result = listener(event);
        if (result instanceof Promise) {
          result.catch(error => this.report(event, error));
        }
      } catch (error) {
        this.report(event, error);
      }
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  private report(event: E, error: unknown): void {
    console.error(`[Events] Listener failed on "${event.type}": ${formatError(error)}`);
  }
}

export type PipelineEvents = EventChannel<PipelineEvent>;
