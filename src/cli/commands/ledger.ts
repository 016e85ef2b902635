// src/cli/commands/ledger.ts
import { Command, InvalidArgumentError } from 'commander';
import { getDefaultLedgerPath } from '../../core/config/app-dirs.js';
import { DEFAULT_OUTPUT_DIR, LEDGER_FILENAME } from '../../core/config/constants.js';
import { SQLiteLedger, type ProcessedLink } from '../../core/ledger/index.js';
import type { LedgerKind } from '../../core/types/index.js';
import { parsePositiveInt, reportError } from './options.js';

interface LedgerCommandOptions {
  out: string;
  db?: string;
}

interface LedgerListOptions extends LedgerCommandOptions {
  kind?: LedgerKind;
  limit?: number;
}

function parseKind(value: string): LedgerKind {
  if (value === 'page' || value === 'channel-post') {
    return value;
  }
  throw new InvalidArgumentError('Use page or channel-post.');
}

function openLedger(options: LedgerCommandOptions): SQLiteLedger {
  return new SQLiteLedger(options.db ?? getDefaultLedgerPath(options.out, LEDGER_FILENAME));
}

export function formatRecord(record: ProcessedLink): string {
  return [record.downloadedAt ?? '-', record.kind ?? '-', record.link, record.folder ?? ''].join('\t').trimEnd();
}

export function registerLedgerCommand(program: Command): void {
  const ledgerCmd = program
    .command('ledger')
    .description('Inspect the processed-links ledger');

  ledgerCmd
    .command('list')
    .description('List processed links, newest first')
    .option('--out <dir>', 'Output directory holding the ledger', DEFAULT_OUTPUT_DIR)
    .option('--db <path>', 'Ledger database (default: <out>/.processed-links.db)')
    .option('--kind <kind>', 'Only page or channel-post records', parseKind)
    .option('--limit <n>', 'Maximum records to show', parsePositiveInt)
    .action((options: LedgerListOptions) => {
      try {
        const ledger = openLedger(options);
        try {
          const records = ledger.list({ kind: options.kind, limit: options.limit });
          records.forEach(record => console.log(formatRecord(record)));
          console.log(`${records.length} of ${ledger.count()} records`);
        } finally {
          ledger.close();
        }
      } catch (error) {
        reportError(error);
        process.exit(1);
      }
    });

  ledgerCmd
    .command('check <link>')
    .description('Show whether a link has been processed')
    .option('--out <dir>', 'Output directory holding the ledger', DEFAULT_OUTPUT_DIR)
    .option('--db <path>', 'Ledger database (default: <out>/.processed-links.db)')
    .action((link: string, options: LedgerCommandOptions) => {
      try {
        const ledger = openLedger(options);
        try {
          const record = ledger.get(link.trim());
          console.log(record ? `✓ ${formatRecord(record)}` : `✗ ${link.trim()} not processed`);
        } finally {
          ledger.close();
        }
      } catch (error) {
        reportError(error);
        process.exit(1);
      }
    });
}
