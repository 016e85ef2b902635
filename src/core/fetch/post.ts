// src/core/fetch/post.ts
import { join } from 'path';
import { parsePostLink } from '../classify/index.js';
import { ErrorCode, ScrapeError, createFailedOutcome, toScrapeError } from '../errors.js';
import type { Ledger } from '../ledger/index.js';
import type { MessagingPlatform } from '../platform/types.js';
import type { ClassifiedLink, FetchOutcome } from '../types/index.js';
import { postFolderName } from './paths.js';

export interface PostFetcherOptions {
  ledger: Ledger;
  platform?: MessagingPlatform;
  outputDir: string;
  verbose?: boolean;
}

export class PostFetcher {
  constructor(private options: PostFetcherOptions) {}

  async fetch(link: ClassifiedLink, signal?: AbortSignal): Promise<FetchOutcome> {
    const { ledger, platform, outputDir } = this.options;
    const url = link.rawUrl;

    if (ledger.isProcessed(url)) {
      if (this.options.verbose) {
        console.log(`⊘ ${url} (already processed)`);
      }
      return { link: url, kind: link.kind, status: 'skipped', files: 0, failedFiles: 0 };
    }

    const post = parsePostLink(url);
    if (!post) {
      const failure = new ScrapeError(ErrorCode.ACCESS_DENIED, `Malformed channel post link: ${url}`);
      console.warn(`Cannot access ${url} – ${failure.message}`);
      return createFailedOutcome(link, failure);
    }

    if (!platform) {
      const failure = new ScrapeError(
        ErrorCode.PLATFORM_UNAVAILABLE,
        'No messaging platform configured',
        'Provide Telegram credentials to fetch channel posts'
      );
      console.warn(`Cannot access ${url} – ${failure.message}`);
      return createFailedOutcome(link, failure);
    }

    const folderName = postFolderName(post);
    const folder = join(outputDir, folderName);

    try {
      const entity = await platform.resolveChannel(post.peerId);
      const message = await platform.getMessage(entity, post.messageId);

      if (!message || !message.hasMedia) {
        console.log(`[Post] No media in ${url}`);
        ledger.markProcessed(url, 'channel-post', folderName);
        return { link: url, kind: link.kind, status: 'empty', files: 0, failedFiles: 0 };
      }

      console.log(`↳ Telegram post: ${url}`);
      const written = await platform.downloadMedia(message, folder);

      if (signal?.aborted) {
        throw new ScrapeError(ErrorCode.ABORTED, 'Run interrupted before the post finished');
      }

      ledger.markProcessed(url, 'channel-post', folderName);
      return {
        link: url,
        kind: link.kind,
        status: written ? 'downloaded' : 'empty',
        folder,
        files: written ? 1 : 0,
        failedFiles: 0,
      };
    } catch (error) {
      const failure = toScrapeError(error, ErrorCode.ACCESS_DENIED);
      console.warn(`Cannot access ${url} – ${failure.message}`);
      return createFailedOutcome(link, failure);
    }
  }
}
