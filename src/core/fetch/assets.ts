// src/core/fetch/assets.ts
import * as fs from 'fs/promises';
import { basename, join } from 'path';
import type { ConcurrencyPool } from '../pool.js';
import { ErrorCode, ScrapeError, toScrapeError } from '../errors.js';
import type { HttpClient } from './http.js';
import { assignImageFileNames, imageFileName } from './paths.js';

/**
 * Result of one image download attempt.
 *
 * @example
 * { url: 'https://telegra.ph/file/a.jpg', status: 'saved', path: 'out/Example/a.jpg' }
 *
 * @example
 * { url: 'https://telegra.ph/file/b.jpg', status: 'failed', path: 'out/Example/b.jpg', error: { code: 'transport_error', reason: 'HTTP 404: Not Found' } }
 */
export interface DownloadResult {
  url: string;
  /** `exists` means the file was already on disk and was not fetched again */
  status: 'saved' | 'exists' | 'failed';
  path: string;
  error?: {
    code: ErrorCode;
    reason: string;
  };
}

export interface ImageDownloaderOptions {
  verbose?: boolean;
}

export class ImageDownloader {
  private verbose: boolean;

  constructor(
    private http: HttpClient,
    private pool: ConcurrencyPool,
    options?: ImageDownloaderOptions
  ) {
    this.verbose = options?.verbose ?? false;
  }

  /**
   * Downloads every image into `folder` through the image pool. Never
   * rejects: each failure is logged and reported in its own result, so one
   * bad image leaves its siblings untouched.
   */
  async downloadImages(urls: string[], folder: string, signal?: AbortSignal): Promise<DownloadResult[]> {
    await fs.mkdir(folder, { recursive: true });
    const names = assignImageFileNames(urls);

    return Promise.all(
      urls.map(url =>
        this.pool.run(() => this.downloadOne(url, join(folder, names.get(url) ?? imageFileName(url)), signal))
      )
    );
  }

  private async downloadOne(url: string, filepath: string, signal?: AbortSignal): Promise<DownloadResult> {
    const name = basename(filepath);
    try {
      if (await fileExists(filepath)) {
        return this.exists(url, filepath);
      }

      if (signal?.aborted) {
        throw new ScrapeError(ErrorCode.ABORTED, 'Run interrupted');
      }

      const response = await this.http.get(url, { signal });
      if (!(await writeImage(filepath, response.body))) {
        return this.exists(url, filepath);
      }
      console.log(`    ▸ ${name}`);
      return { url, status: 'saved', path: filepath };
    } catch (error) {
      const failure = toScrapeError(error, ErrorCode.TRANSPORT_ERROR);
      console.warn(`Image download failed ${url} – ${failure.message}`);
      return {
        url,
        status: 'failed',
        path: filepath,
        error: { code: failure.code, reason: failure.message },
      };
    }
  }

  private exists(url: string, filepath: string): DownloadResult {
    if (this.verbose) {
      console.log(`    ⊘ ${basename(filepath)} (exists)`);
    }
    return { url, status: 'exists', path: filepath };
  }
}

async function fileExists(filepath: string): Promise<boolean> {
  try {
    await fs.access(filepath);
    return true;
  } catch {
    return false;
  }
}

// Returns false when the file appeared after the existence check.
async function writeImage(filepath: string, body: Buffer): Promise<boolean> {
  try {
    await fs.writeFile(filepath, body, { flag: 'wx' });
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      return false;
    }
    throw toScrapeError(error, ErrorCode.STORAGE_ERROR);
  }
}
