// src/cli/commands/crawl.ts
import { Command } from 'commander';
import { CrawlRunner } from '../../core/batch/runner.js';
import { getDefaultCredentialsPath, getDefaultLedgerPath } from '../../core/config/app-dirs.js';
import {
  APP_NAME,
  CREDENTIALS_FILENAME,
  DEFAULT_IMAGE_CONCURRENCY,
  DEFAULT_LINK_CONCURRENCY,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_TIMEOUT,
  LEDGER_FILENAME,
} from '../../core/config/constants.js';
import { parsePositiveInt, reportError } from './options.js';

export interface CrawlCommandOptions {
  out: string;
  full: boolean;
  file?: string;
  stdin?: boolean;
  db?: string;
  credentials?: string;
  linkConcurrency: number;
  imageConcurrency: number;
  timeout: number;
  verbose: boolean;
}

export function registerCrawlCommand(program: Command): void {
  program
    .argument('[inputs...]', 'Telegraph/Graph links, t.me/c post links, @channels, or "all"')
    .option('--out <dir>', 'Output directory', DEFAULT_OUTPUT_DIR)
    .option('--full', 'Walk entire channel histories instead of the newest message with links', false)
    .option('--file <path>', 'Read inputs from file')
    .option('--stdin', 'Read inputs from stdin')
    .option('--db <path>', 'Ledger database (default: <out>/.processed-links.db)')
    .option('--credentials <path>', 'Telegram credentials JSON (apiId, apiHash, session)')
    .option('--link-concurrency <n>', 'Pages/posts fetched at once', parsePositiveInt, DEFAULT_LINK_CONCURRENCY)
    .option('--image-concurrency <n>', 'Images downloaded at once', parsePositiveInt, DEFAULT_IMAGE_CONCURRENCY)
    .option('--timeout <ms>', 'HTTP timeout in milliseconds', parsePositiveInt, DEFAULT_TIMEOUT)
    .option('--verbose', 'Verbose output', false)
    .action(async (inputs: string[], options: CrawlCommandOptions) => {
      if (inputs.length === 0 && !options.file && !options.stdin) {
        console.error('Error: inputs, --file or --stdin is required');
        process.exit(1);
        return;
      }

      const runner = new CrawlRunner();

      try {
        await runner.run({
          inputs,
          filePath: options.file,
          stdin: options.stdin ?? false,
          outputDir: options.out,
          dbPath: options.db ?? getDefaultLedgerPath(options.out, LEDGER_FILENAME),
          credentialsPath: options.credentials ?? getDefaultCredentialsPath(APP_NAME, CREDENTIALS_FILENAME),
          fullHistory: options.full,
          linkConcurrency: options.linkConcurrency,
          imageConcurrency: options.imageConcurrency,
          timeout: options.timeout,
          verbose: options.verbose,
        });
      } catch (error) {
        reportError(error);
        process.exit(1);
      }
    });
}
