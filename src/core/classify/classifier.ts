// src/core/classify/classifier.ts
import type { ClassifiedLink, InputEntry, LinkKind, PostReference } from '../types/index.js';

interface LinkShape {
  kind: LinkKind;
  source: string;
}

const SLUG = '[\\p{L}\\p{N}_-]+';

const LINK_SHAPES: readonly LinkShape[] = [
  { kind: 'telegraph-page', source: `https?://telegra\\.ph/${SLUG}` },
  { kind: 'graph-page', source: `https?://graph\\.org/${SLUG}` },
  { kind: 'channel-post', source: 'https?://t\\.me/c/\\d+/\\d+' },
];

const SEARCH_PATTERNS = LINK_SHAPES.map(shape => ({
  kind: shape.kind,
  pattern: new RegExp(shape.source, 'gu'),
}));

const EXACT_PATTERNS = LINK_SHAPES.map(shape => ({
  kind: shape.kind,
  pattern: new RegExp(`^${shape.source}/?$`, 'u'),
}));

const POST_LINK = /\/c\/(\d+)\/(\d+)\/?$/;

/**
 * Finds every recognised link in a block of text. Each shape is matched
 * independently and repeated links collapse to one entry.
 */
export function classifyText(text: string): ClassifiedLink[] {
  const seen = new Set<string>();
  const links: ClassifiedLink[] = [];

  for (const { kind, pattern } of SEARCH_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const rawUrl = match[0];
      const key = `${kind} ${rawUrl}`;
      if (!seen.has(key)) {
        seen.add(key);
        links.push({ rawUrl, kind });
      }
    }
  }

  return links;
}

export function classifyLink(url: string): ClassifiedLink | null {
  const trimmed = url.trim();
  const shape = EXACT_PATTERNS.find(({ pattern }) => pattern.test(trimmed));
  return shape ? { rawUrl: trimmed.replace(/\/$/, ''), kind: shape.kind } : null;
}

// Classifies one user-supplied entry as a whole.
export function classifyEntry(entry: string): InputEntry {
  const trimmed = entry.trim();

  if (trimmed.toLowerCase() === 'all') {
    return { type: 'all' };
  }

  const link = classifyLink(trimmed);
  if (link) {
    return { type: 'link', link };
  }

  if (trimmed.startsWith('@') || (trimmed.length > 0 && !/^https?:/i.test(trimmed))) {
    return { type: 'channel', ref: trimmed };
  }

  return { type: 'unknown', raw: trimmed };
}

export function parsePostLink(url: string): PostReference | null {
  const match = POST_LINK.exec(url.trim());
  if (!match) {
    return null;
  }
  const [, channelId, messageId] = match;
  return {
    channelId,
    messageId: Number(messageId),
    peerId: `-100${channelId}`,
  };
}
