// src/core/batch/runner.ts
import { readFile } from 'node:fs/promises';
import { loadCredentials, type PlatformCredentials } from '../config/credentials.js';
import { ErrorCode, ScrapeError, errorMessage } from '../errors.js';
import { HttpClient, type FetchImpl } from '../fetch/http.js';
import { ImageDownloader } from '../fetch/assets.js';
import { PageScraper } from '../fetch/page.js';
import { PostFetcher } from '../fetch/post.js';
import { ResourceFetcher } from '../fetch/fetcher.js';
import { SQLiteLedger } from '../ledger/index.js';
import { CrawlOrchestrator, planEntries, planNeedsPlatform, type RunReport } from '../orchestrator.js';
import { TelegramPlatform } from '../platform/telegram.js';
import type { MessagingPlatform } from '../platform/types.js';
import { createFetchPools } from '../pool.js';
import type { FetchOutcome } from '../types/index.js';

// Reads stdin to the end
async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export interface RunOptions {
  inputs: string[];
  filePath?: string;
  stdin?: boolean;
  outputDir: string;
  dbPath: string;
  credentialsPath: string;
  fullHistory: boolean;
  linkConcurrency: number;
  imageConcurrency: number;
  timeout: number;
  verbose?: boolean;
}

export interface RunSummary {
  total: number;
  downloaded: number;
  empty: number;
  skipped: number;
  failed: number;
  channels: number;
  duration: number;
  failures: Array<{ link: string; error: string }>;
}

export interface RunnerDependencies {
  readStdin?: () => Promise<string>;
  loadCredentials?: (filePath: string) => Promise<PlatformCredentials>;
  createPlatform?: (credentials: PlatformCredentials) => MessagingPlatform;
  fetchImpl?: FetchImpl;
  now?: () => Date;
}

export class CrawlRunner {
  private readStdin: () => Promise<string>;
  private loadCredentials: (filePath: string) => Promise<PlatformCredentials>;
  private createPlatform: (credentials: PlatformCredentials) => MessagingPlatform;
  private fetchImpl?: FetchImpl;
  private now?: () => Date;

  constructor(deps?: RunnerDependencies) {
    this.readStdin = deps?.readStdin ?? readStdin;
    this.loadCredentials = deps?.loadCredentials ?? (filePath => loadCredentials({ filePath }));
    this.createPlatform = deps?.createPlatform ?? (credentials => new TelegramPlatform(credentials));
    this.fetchImpl = deps?.fetchImpl;
    this.now = deps?.now;
  }

  async run(options: RunOptions): Promise<RunSummary> {
    const entries = await this.collectEntries(options);
    if (entries.length === 0) {
      throw new ScrapeError(
        ErrorCode.INVALID_CONFIG,
        'No inputs given',
        'Pass links, @channels or "all", or use --file/--stdin'
      );
    }

    const plan = planEntries(entries, options.fullHistory);
    const credentials = planNeedsPlatform(plan)
      ? await this.loadCredentials(options.credentialsPath)
      : undefined;

    const startTime = Date.now();
    const ledger = new SQLiteLedger(options.dbPath, { now: this.now });
    const platform = credentials ? this.createPlatform(credentials) : undefined;
    const controller = new AbortController();
    let interrupts = 0;
    const onInterrupt = () => {
      interrupts++;
      if (interrupts > 1) {
        process.exit(130);
      }
      console.log('\nInterrupted – letting in-flight downloads unwind…');
      controller.abort();
    };
    process.on('SIGINT', onInterrupt);

    try {
      if (platform) {
        await platform.connect();
      }

      const pools = createFetchPools(options.linkConcurrency, options.imageConcurrency);
      const http = new HttpClient({ timeout: options.timeout, fetchImpl: this.fetchImpl });
      const images = new ImageDownloader(http, pools.images, { verbose: options.verbose });
      const pages = new PageScraper({ ledger, http, images, outputDir: options.outputDir, verbose: options.verbose });
      const posts = new PostFetcher({ ledger, platform, outputDir: options.outputDir, verbose: options.verbose });
      const orchestrator = new CrawlOrchestrator({
        fetcher: new ResourceFetcher(pools.links, pages, posts),
        platform,
        fullHistory: options.fullHistory,
        verbose: options.verbose,
      });

      const report = await orchestrator.run(plan, controller.signal);
      const summary = this.summarize(report, Date.now() - startTime);
      this.printSummary(summary);
      return summary;
    } finally {
      process.off('SIGINT', onInterrupt);
      ledger.close();
      if (platform) {
        await platform.disconnect().catch(error => {
          console.warn(`Disconnect failed – ${errorMessage(error)}`);
        });
      }
    }
  }

  async collectEntries(options: Pick<RunOptions, 'inputs' | 'filePath' | 'stdin'>): Promise<string[]> {
    const entries = options.inputs.flatMap(input => this.parseEntries(input));

    if (options.filePath) {
      let content: string;
      try {
        content = await readFile(options.filePath, 'utf-8');
      } catch (error) {
        throw new ScrapeError(ErrorCode.INVALID_CONFIG, `Cannot read ${options.filePath}: ${errorMessage(error)}`);
      }
      entries.push(...this.parseEntries(content));
    }

    if (options.stdin) {
      entries.push(...this.parseEntries(await this.readStdin()));
    }

    return entries;
  }

  // Entries are separated by commas or newlines; '#' starts a comment line.
  parseEntries(content: string): string[] {
    return content
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0 && !line.startsWith('#'))
      .flatMap(line => line.split(','))
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0);
  }

  summarize(report: RunReport, duration: number): RunSummary {
    const outcomes: FetchOutcome[] = [
      ...report.outcomes,
      ...report.channels.flatMap(channel => channel.outcomes),
    ];
    const count = (status: FetchOutcome['status']) => outcomes.filter(o => o.status === status).length;

    return {
      total: outcomes.length,
      downloaded: count('downloaded'),
      empty: count('empty'),
      skipped: count('skipped'),
      failed: count('failed'),
      channels: report.channels.length,
      duration,
      failures: [
        ...outcomes
          .filter(o => o.status === 'failed')
          .map(o => ({ link: o.link, error: o.error?.message ?? 'Unknown error' })),
        ...report.skippedChannels.map(({ ref, reason }) => ({ link: ref, error: reason })),
      ],
    };
  }

  private printSummary(summary: RunSummary): void {
    console.log('\n' + '━'.repeat(50));
    console.log(
      `Summary: ${summary.downloaded} downloaded, ${summary.empty} empty, ${summary.skipped} skipped, ${summary.failed} failed, ${summary.channels} channels, ${(summary.duration / 1000).toFixed(1)}s`
    );

    if (summary.failures.length > 0) {
      console.log('\nFailed:');
      summary.failures.forEach(({ link, error }) => {
        console.log(`  - ${link}: ${error}`);
      });
    }
  }
}
