// src/core/fetch/fetcher.ts
import { ErrorCode, createFailedOutcome, toScrapeError } from '../errors.js';
import type { ConcurrencyPool } from '../pool.js';
import type { ClassifiedLink, FetchOutcome } from '../types/index.js';
import type { PageScraper } from './page.js';
import type { PostFetcher } from './post.js';

export interface LinkFetcher {
  fetch(link: ClassifiedLink, signal?: AbortSignal): Promise<FetchOutcome>;
}

/**
 * Dispatches a classified link to the fetcher for its kind. The link-pool
 * slot is taken before anything else and held until the whole fetch, image
 * downloads included, has settled.
 */
export class ResourceFetcher implements LinkFetcher {
  constructor(
    private pool: ConcurrencyPool,
    private pages: PageScraper,
    private posts: PostFetcher
  ) {}

  fetch(link: ClassifiedLink, signal?: AbortSignal): Promise<FetchOutcome> {
    return this.pool.run(async () => {
      const outcome = await this.dispatch(link, signal);
      reportOutcome(outcome);
      return outcome;
    });
  }

  private async dispatch(link: ClassifiedLink, signal?: AbortSignal): Promise<FetchOutcome> {
    try {
      if (link.kind === 'channel-post') {
        return await this.posts.fetch(link, signal);
      }
      console.log(`↳ ${link.kind === 'telegraph-page' ? 'Telegraph' : 'Graph'} page: ${link.rawUrl}`);
      return await this.pages.scrape(link, signal);
    } catch (error) {
      const failure = toScrapeError(error, ErrorCode.UNKNOWN);
      console.warn(`Unexpected failure on ${link.rawUrl} – ${failure.message}`);
      return createFailedOutcome(link, failure);
    }
  }
}

// Skips are already reported by the fetchers in verbose mode.
function reportOutcome(outcome: FetchOutcome): void {
  switch (outcome.status) {
    case 'downloaded':
      console.log(`✓ ${outcome.link} (${outcome.files} files)`);
      break;
    case 'empty':
      console.log(`✓ ${outcome.link} (empty)`);
      break;
    case 'failed':
      console.log(`✗ ${outcome.link} (${outcome.error?.code ?? ErrorCode.UNKNOWN})`);
      break;
  }
}
