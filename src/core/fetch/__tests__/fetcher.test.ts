import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { Ledger } from '../../ledger/index.js';
import { SQLiteLedger } from '../../ledger/index.js';
import { ConcurrencyPool } from '../../pool.js';
import { ImageDownloader } from '../assets.js';
import { ResourceFetcher } from '../fetcher.js';
import { HttpClient } from '../http.js';
import { PageScraper } from '../page.js';
import { PostFetcher } from '../post.js';
import { FakeFetch } from '../../__tests__/fixtures/fake-fetch.js';
import { FakePlatform, textMessage } from '../../__tests__/fixtures/fake-platform.js';

describe('ResourceFetcher', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fetcher-'));
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function createFetcher(ledger: Ledger, linkConcurrency = 2) {
    const fake = new FakeFetch(
      {
        'https://telegra.ph/A-1': { body: '<p>a</p>' },
        'https://graph.org/B-2': { body: '<p>b</p>' },
        'https://telegra.ph/C-3': { body: '<p>c</p>' },
      },
      10
    );
    const http = new HttpClient({ fetchImpl: fake.impl });
    const images = new ImageDownloader(http, new ConcurrencyPool('image', 10));
    const platform = new FakePlatform([
      { id: '5', title: 'News', refs: ['-1005'], messages: [textMessage(1, 'pic', true)] },
    ]);
    const pages = new PageScraper({ ledger, http, images, outputDir: tmpDir });
    const posts = new PostFetcher({ ledger, platform, outputDir: tmpDir });
    const fetcher = new ResourceFetcher(new ConcurrencyPool('link', linkConcurrency), pages, posts);
    return { fake, platform, fetcher };
  }

  it('routes each kind to its fetcher', async () => {
    const ledger = new SQLiteLedger(':memory:');
    const { fake, platform, fetcher } = createFetcher(ledger);

    const outcomes = await Promise.all([
      fetcher.fetch({ rawUrl: 'https://telegra.ph/A-1', kind: 'telegraph-page' }),
      fetcher.fetch({ rawUrl: 'https://graph.org/B-2', kind: 'graph-page' }),
      fetcher.fetch({ rawUrl: 'https://t.me/c/5/1', kind: 'channel-post' }),
    ]);

    expect(outcomes.map(o => o.status)).toEqual(['empty', 'empty', 'downloaded']);
    expect(fake.requests.sort()).toEqual(['https://graph.org/B-2', 'https://telegra.ph/A-1']);
    expect(platform.downloads).toHaveLength(1);
    expect(console.log).toHaveBeenCalledWith('↳ Graph page: https://graph.org/B-2');
    ledger.close();
  });

  it('prints a status line for each finished link', async () => {
    const ledger = new SQLiteLedger(':memory:');
    ledger.markProcessed('https://telegra.ph/C-3', 'page');
    const { fetcher } = createFetcher(ledger);

    await fetcher.fetch({ rawUrl: 'https://telegra.ph/A-1', kind: 'telegraph-page' });
    await fetcher.fetch({ rawUrl: 'https://t.me/c/5/1', kind: 'channel-post' });
    await fetcher.fetch({ rawUrl: 'https://t.me/c/9/1', kind: 'channel-post' });
    await fetcher.fetch({ rawUrl: 'https://telegra.ph/C-3', kind: 'telegraph-page' });

    const statusLines = jest
      .mocked(console.log)
      .mock.calls.map(([line]) => String(line))
      .filter(line => line.startsWith('✓') || line.startsWith('✗'));
    expect(statusLines).toEqual([
      '✓ https://telegra.ph/A-1 (empty)',
      '✓ https://t.me/c/5/1 (1 files)',
      '✗ https://t.me/c/9/1 (access_denied)',
    ]);
    ledger.close();
  });

  it('holds at most the link pool size of fetches at once', async () => {
    const ledger = new SQLiteLedger(':memory:');
    const { fake, fetcher } = createFetcher(ledger, 1);

    await Promise.all(
      ['https://telegra.ph/A-1', 'https://graph.org/B-2', 'https://telegra.ph/C-3'].map(rawUrl =>
        fetcher.fetch({ rawUrl, kind: rawUrl.includes('graph') ? 'graph-page' : 'telegraph-page' })
      )
    );

    expect(fake.peak).toBe(1);
    ledger.close();
  });

  it('turns an unexpected error into a failed outcome', async () => {
    const broken: Ledger = {
      isProcessed: () => {
        throw new Error('database is locked');
      },
      markProcessed: () => true,
    };
    const { fetcher } = createFetcher(broken);

    const outcome = await fetcher.fetch({ rawUrl: 'https://telegra.ph/A-1', kind: 'telegraph-page' });

    expect(outcome).toMatchObject({
      status: 'failed',
      error: { code: 'unknown', message: 'database is locked' },
    });
  });
});
