import fs from 'fs-extra';
import { z } from 'zod';
import { createLedger, Ledger } from '../app';
import { createConfigTemplate, loadConfig } from '../config';
import { TransactionAssembler } from '../parsers/assembler';
import { ArrayMessageSource } from '../pipeline';
import { ConnectivitySignal } from '../sync/connectivity';
import { RawMessage } from '../types';
import { AppError, ErrorType, formatError } from '../utils/errors';
import { TransactionValidator } from '../validation/validator';

const DAY_MS = 24 * 60 * 60 * 1000;

const rawMessageSchema = z.object({
  sender: z.string(),
  content: z.string(),
  receivedAt: z.union([z.string(), z.number()]).pipe(z.coerce.date()),
  threadId: z.string().optional(),
});

/**
 * Validate an ingest file: a JSON array of { sender, content, receivedAt,
 * threadId? } with receivedAt as an ISO string or epoch milliseconds.
 */
export function parseMessages(raw: unknown): RawMessage[] {
  const parsed = z.array(rawMessageSchema).safeParse(raw);
  if (!parsed.success) {
    throw new AppError({
      type: ErrorType.MALFORMED_DATA,
      message: `Invalid messages file: ${parsed.error.errors
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
    });
  }
  return parsed.data;
}

async function withLedger(options: { offline?: boolean }, fn: (ledger: Ledger) => Promise<void>): Promise<void> {
  let ledger: Ledger | undefined;
  try {
    const config = loadConfig();
    ledger = await createLedger(config, {
      connectivity: new ConnectivitySignal(!options.offline),
    });
    await fn(ledger);
  } catch (error) {
    console.error('Command failed:', formatError(error));
    process.exitCode = 1;
  } finally {
    ledger?.close();
  }
}

export async function parseText(text: string, options: { sender?: string; at?: string } = {}) {
  const receivedAt = options.at ? new Date(options.at) : new Date();
  if (Number.isNaN(receivedAt.getTime())) {
    console.error(`Invalid --at value: ${options.at}`);
    process.exitCode = 1;
    return;
  }

  const assembler = new TransactionAssembler();
  const result = assembler.assemble({ sender: options.sender ?? 'CLI', content: text, receivedAt });

  if (result.status !== 'extracted') {
    console.log(`[${result.status.toUpperCase()}] ${result.reason}`);
    return;
  }

  const { transaction, details } = result;
  console.log(`[MATCH] ${transaction.type} ${transaction.amount} on ${transaction.date} ${transaction.time}`);
  console.log(`  Account:    ${transaction.accountRef ?? '-'}`);
  console.log(`  Confidence: ${transaction.confidence}`);
  console.log(`  Amount tier: ${details.amountTier}, type basis: ${details.typeDecision.basis}`);
  console.log(`  Date from ${details.dateSource}, time from ${details.timeSource}`);

  const validation = new TransactionValidator().validate({
    ...transaction,
    id: 'dry-run',
    ownerId: 'dry-run',
    createdAt: receivedAt,
    synced: false,
    dedupHash: '',
    isManualEntry: true,
  });
  for (const error of validation.errors) console.log(`  [ERROR] ${error}`);
  for (const warning of validation.warnings) console.log(`  [WARN] ${warning}`);
}

export async function ingest(file: string, options: { offline?: boolean } = {}) {
  await withLedger(options, async ({ pipeline }) => {
    const messages = parseMessages(await fs.readJson(file));
    console.log(`Ingesting ${messages.length} messages from ${file}...`);

    pipeline.events.subscribe(event => {
      if (event.type === 'validation-failed') {
        console.warn(`[INVALID] ${event.errors.join('; ')}`);
      } else if (event.type === 'unparsed') {
        console.warn(`[UNPARSED] No amount found in message from ${event.sender}`);
      }
    });

    const source = new ArrayMessageSource(messages);
    pipeline.attachSource(source);
    source.flush();
    pipeline.stopIntake();
    await pipeline.whenIdle();

    const stats = pipeline.getStats();
    console.log(`Ingest complete.`);
    console.log(`  Processed:  ${stats.processed} (${stats.confirmed} synced, ${stats.queued} queued)`);
    console.log(`  Duplicates: ${stats.duplicates}`);
    console.log(`  Rejected:   ${stats.rejected}`);
    console.log(`  Unparsed:   ${stats.unparsed}`);
    console.log(`  Invalid:    ${stats.invalid}`);
    console.log(`  Errors:     ${stats.errors}`);
  });
}

export async function drain() {
  await withLedger({}, async ({ pipeline }) => {
    const report = await pipeline.drainQueueNow();
    if (report.skipped) {
      console.log(`Drain skipped (${report.skipped}); ${report.remaining} entries queued.`);
      return;
    }
    console.log(`Drain complete:`);
    console.log(`  Attempted: ${report.attempted}`);
    console.log(`  Synced:    ${report.synced}`);
    console.log(`  Transient failures: ${report.transientFailures}`);
    console.log(`  Permanent failures: ${report.permanentFailures}`);
    console.log(`  Remaining: ${report.remaining}`);
  });
}

export async function list(options: { owner?: string } = {}) {
  await withLedger({}, async ({ pipeline }) => {
    const records = await pipeline.listTransactions(options.owner);
    if (records.length === 0) {
      console.log('No transactions stored.');
      return;
    }
    console.log('─'.repeat(60));
    for (const record of records) {
      const sign = record.type === 'debit' ? '-' : record.type === 'credit' ? '+' : '?';
      console.log(`${record.date} ${record.time}  ${sign}${record.amount}  ${record.accountRef ?? '-'}`);
      console.log(`  ${record.senderId} | confidence ${record.confidence} | ${record.synced ? 'synced' : 'pending'}`);
    }
    console.log('─'.repeat(60));
    console.log(`${records.length} transactions.`);
  });
}

export async function showQueue() {
  await withLedger({}, async ({ queue }) => {
    const entries = await queue.list();
    if (entries.length === 0) {
      console.log('Queue is empty.');
      return;
    }
    for (const entry of entries) {
      const { transaction, lastError } = entry;
      const status = !lastError ? 'waiting' : lastError.retryable ? 'transient' : 'needs attention';
      console.log(`${transaction.id}  ${transaction.amount}  attempts=${entry.attempts}  ${status}`);
      if (lastError) console.log(`  [${lastError.type}] ${lastError.message}`);
    }
  });
}

export async function purgeDedup(options: { days?: number } = {}) {
  await withLedger({}, async ({ config, dedup }) => {
    const days = options.days ?? config.dedup.retentionDays;
    if (!Number.isFinite(days) || days < 0) {
      console.error(`Invalid --days value: ${options.days}`);
      process.exitCode = 1;
      return;
    }
    const removed = await dedup.purgeOlderThan(days * DAY_MS);
    console.log(`Purged ${removed} dedup entries older than ${days} days.`);
  });
}

export async function setup() {
  createConfigTemplate();
}
