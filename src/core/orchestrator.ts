// src/core/orchestrator.ts
import { classifyEntry, classifyText, parsePostLink } from './classify/index.js';
import { ErrorCode, ScrapeError, errorMessage } from './errors.js';
import type { LinkFetcher } from './fetch/fetcher.js';
import type { MessagingPlatform, PlatformEntity } from './platform/types.js';
import type { ClassifiedLink, FetchOutcome } from './types/index.js';

export interface CrawlPlan {
  walkAll: boolean;
  links: ClassifiedLink[];
  channelRefs: string[];
  unrecognised: string[];
}

export interface ChannelWalk {
  id: string;
  title: string;
  messagesScanned: number;
  outcomes: FetchOutcome[];
  error?: string;
}

export interface RunReport {
  outcomes: FetchOutcome[];
  channels: ChannelWalk[];
  skippedChannels: Array<{ ref: string; reason: string }>;
  unrecognised: string[];
}

export interface CrawlOrchestratorOptions {
  fetcher: LinkFetcher;
  platform?: MessagingPlatform;
  /** Walk whole histories instead of stopping at the newest message with links */
  fullHistory: boolean;
  verbose?: boolean;
}

/**
 * Turns user entries into work. `all` on its own walks every dialog; post
 * links become channel walks in full-history mode and single fetches
 * otherwise; repeated links and channel refs are collapsed.
 */
export function planEntries(entries: string[], fullHistory: boolean): CrawlPlan {
  const plan: CrawlPlan = { walkAll: false, links: [], channelRefs: [], unrecognised: [] };
  const classified = entries.map(classifyEntry);

  if (classified.length === 1 && classified[0].type === 'all') {
    plan.walkAll = true;
    return plan;
  }

  const seenLinks = new Set<string>();
  const seenRefs = new Set<string>();
  const addRef = (ref: string) => {
    if (!seenRefs.has(ref)) {
      seenRefs.add(ref);
      plan.channelRefs.push(ref);
    }
  };

  for (const entry of classified) {
    switch (entry.type) {
      case 'all':
        addRef('all');
        break;
      case 'channel':
        addRef(entry.ref);
        break;
      case 'link': {
        const post = entry.link.kind === 'channel-post' ? parsePostLink(entry.link.rawUrl) : null;
        if (post && fullHistory) {
          addRef(post.peerId);
        } else if (!seenLinks.has(entry.link.rawUrl)) {
          seenLinks.add(entry.link.rawUrl);
          plan.links.push(entry.link);
        }
        break;
      }
      case 'unknown':
        plan.unrecognised.push(entry.raw);
        break;
    }
  }

  return plan;
}

export function planNeedsPlatform(plan: CrawlPlan): boolean {
  return plan.walkAll
    || plan.channelRefs.length > 0
    || plan.links.some(link => link.kind === 'channel-post');
}

export class CrawlOrchestrator {
  private fetcher: LinkFetcher;
  private platform?: MessagingPlatform;
  private fullHistory: boolean;
  private verbose: boolean;
  private walked = new Set<string>();

  constructor(options: CrawlOrchestratorOptions) {
    this.fetcher = options.fetcher;
    this.platform = options.platform;
    this.fullHistory = options.fullHistory;
    this.verbose = options.verbose ?? false;
  }

  async run(plan: CrawlPlan, signal?: AbortSignal): Promise<RunReport> {
    const report: RunReport = {
      outcomes: [],
      channels: [],
      skippedChannels: [],
      unrecognised: [...plan.unrecognised],
    };

    for (const raw of plan.unrecognised) {
      console.warn(`Unrecognised input: ${raw}`);
    }

    if (plan.walkAll) {
      report.channels = await this.walkAll(signal);
      return report;
    }

    report.outcomes = await this.fetchLinks(plan.links, signal);

    for (const ref of plan.channelRefs) {
      if (signal?.aborted) break;

      let entity: PlatformEntity;
      try {
        entity = await this.requirePlatform().resolveChannel(ref);
      } catch (error) {
        const reason = errorMessage(error);
        console.error(`Channel error ${ref} – ${reason}`);
        report.skippedChannels.push({ ref, reason });
        continue;
      }

      if (this.walked.has(entity.id)) {
        if (this.verbose) {
          console.log(`[Channel] ${ref} resolves to ${entity.title}, already walked`);
        }
        continue;
      }

      report.channels.push(await this.walkChannel(entity, signal));
    }

    return report;
  }

  /**
   * Fetches links concurrently. The fetcher's link pool bounds how many run
   * at once; outcomes come back in input order.
   */
  async fetchLinks(links: ClassifiedLink[], signal?: AbortSignal): Promise<FetchOutcome[]> {
    if (links.length === 0 || signal?.aborted) {
      return [];
    }
    return Promise.all(links.map(link => this.fetcher.fetch(link, signal)));
  }

  async walkChannel(entity: PlatformEntity, signal?: AbortSignal): Promise<ChannelWalk> {
    const platform = this.requirePlatform();
    const walk: ChannelWalk = { id: entity.id, title: entity.title, messagesScanned: 0, outcomes: [] };
    this.walked.add(entity.id);

    console.log(`═══ Crawling ${entity.title} ═══`);

    try {
      for await (const message of platform.iterHistory(entity, { urlsOnly: true })) {
        if (signal?.aborted) break;
        walk.messagesScanned++;

        if (!message.text) continue;
        const links = classifyText(message.text);
        if (links.length === 0) continue;

        walk.outcomes.push(...await this.fetchLinks(links, signal));

        if (!this.fullHistory) break;
      }
    } catch (error) {
      walk.error = errorMessage(error);
      console.error(`[Channel] Walk of ${entity.title} stopped – ${walk.error}`);
    }

    return walk;
  }

  async walkAll(signal?: AbortSignal): Promise<ChannelWalk[]> {
    const platform = this.requirePlatform();
    const walks: ChannelWalk[] = [];

    try {
      for await (const entity of platform.iterDialogs()) {
        if (signal?.aborted) break;
        if (this.walked.has(entity.id)) continue;
        walks.push(await this.walkChannel(entity, signal));
      }
    } catch (error) {
      console.error(`[Channel] Listing dialogs failed – ${errorMessage(error)}`);
    }

    return walks;
  }

  private requirePlatform(): MessagingPlatform {
    if (!this.platform) {
      throw new ScrapeError(
        ErrorCode.PLATFORM_UNAVAILABLE,
        'No messaging platform configured',
        'Provide Telegram credentials to walk channels'
      );
    }
    return this.platform;
  }
}
