// src/core/fetch/page.ts
import * as fs from 'fs/promises';
import { join } from 'path';
import { PAGE_FILENAME } from '../config/constants.js';
import { ErrorCode, ScrapeError, createFailedOutcome, errorMessage, toScrapeError } from '../errors.js';
import type { Ledger } from '../ledger/index.js';
import type { ClassifiedLink, FetchOutcome } from '../types/index.js';
import type { ImageDownloader } from './assets.js';
import type { HttpClient } from './http.js';
import { extractImageSources } from './images.js';
import { pageFolderName } from './paths.js';

export interface PageScraperOptions {
  ledger: Ledger;
  http: HttpClient;
  images: ImageDownloader;
  outputDir: string;
  verbose?: boolean;
}

export class PageScraper {
  constructor(private options: PageScraperOptions) {}

  async scrape(link: ClassifiedLink, signal?: AbortSignal): Promise<FetchOutcome> {
    const { ledger, http, images, outputDir } = this.options;
    const url = link.rawUrl;

    if (ledger.isProcessed(url)) {
      if (this.options.verbose) {
        console.log(`⊘ ${url} (already processed)`);
      }
      return { link: url, kind: link.kind, status: 'skipped', files: 0, failedFiles: 0 };
    }

    const folderName = pageFolderName(url);
    const folder = join(outputDir, folderName);

    let html: string;
    try {
      html = await http.getText(url, { signal });
    } catch (error) {
      const failure = toScrapeError(error, ErrorCode.TRANSPORT_ERROR);
      console.warn(`Page fetch failed ${url} – ${failure.message}`);
      return createFailedOutcome(link, failure);
    }

    await this.savePage(folder, html);

    const sources = extractImageSources(html, url);
    if (sources.length === 0) {
      console.log(`[Page] No images on ${url}`);
      ledger.markProcessed(url, 'page', folderName);
      return { link: url, kind: link.kind, status: 'empty', folder, files: 0, failedFiles: 0 };
    }

    console.log(`↳ ${sources.length} images detected on ${url}, downloading…`);
    const results = await images.downloadImages(sources, folder, signal);
    const failedFiles = results.filter(r => r.status === 'failed').length;

    if (signal?.aborted) {
      return createFailedOutcome(link, new ScrapeError(ErrorCode.ABORTED, 'Run interrupted before the page finished'), folder);
    }

    ledger.markProcessed(url, 'page', folderName);
    return {
      link: url,
      kind: link.kind,
      status: 'downloaded',
      folder,
      files: results.length - failedFiles,
      failedFiles,
    };
  }

  // The saved document is for inspection only; a write failure does not stop the page.
  private async savePage(folder: string, html: string): Promise<void> {
    try {
      await fs.mkdir(folder, { recursive: true });
      await fs.writeFile(join(folder, PAGE_FILENAME), html, 'utf-8');
    } catch (error) {
      console.warn(`[Page] Could not save ${PAGE_FILENAME} in ${folder} – ${errorMessage(error)}`);
    }
  }
}
