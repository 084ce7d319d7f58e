#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { drain, ingest, list, parseText, purgeDedup, setup, showQueue } from './commands';

const program = new Command();

program
  .name('sms-ledger')
  .description('Turn bank and payment SMS into deduplicated transaction records')
  .version('1.0.0');

program.command('parse')
  .description('Extract a transaction from one message without storing it')
  .argument('<text>', 'Message text')
  .option('-s, --sender <string>', 'Sender id', 'CLI')
  .option('--at <datetime>', 'Receipt time used when the text has no date/time (ISO 8601)')
  .action(async (text: string, options: { sender: string; at?: string }) => {
    await parseText(text, options);
  });

program.command('ingest')
  .description('Process a JSON array of messages through the full pipeline')
  .argument('<file>', 'Path to a JSON file of { sender, content, receivedAt }')
  .option('--offline', 'Queue every record instead of writing to the remote store')
  .action(async (file: string, options: { offline?: boolean }) => {
    await ingest(file, options);
  });

program.command('drain')
  .description('Retry delivery of every queued transaction')
  .action(async () => {
    await drain();
  });

program.command('list')
  .description('List stored transactions')
  .option('-o, --owner <string>', 'Owner id (defaults to the configured one)')
  .action(async (options: { owner?: string }) => {
    await list(options);
  });

program.command('queue')
  .description('Show transactions waiting for remote delivery')
  .action(async () => {
    await showQueue();
  });

program.command('purge-dedup')
  .description('Forget processed-message hashes older than the retention window')
  .option('-d, --days <number>', 'Retention in days (defaults to the configured one)')
  .action(async (options: { days?: string }) => {
    await purgeDedup({ days: options.days ? parseInt(options.days) : undefined });
  });

program.command('setup')
  .description('Create sms-ledger.json configuration template file')
  .action(async () => {
    await setup();
  });

program.parseAsync(process.argv).catch(error => {
  console.error(error);
  process.exitCode = 1;
});
