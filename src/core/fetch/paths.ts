// src/core/fetch/paths.ts
import * as path from 'path';
import { createHash } from 'crypto';
import type { PostReference } from '../types/index.js';

// Folder names are derived from the link alone so re-runs reuse them.
export function pageFolderName(pageUrl: string): string {
  const segments = new URL(pageUrl).pathname.split('/').filter(Boolean);
  const last = segments[segments.length - 1];
  return last ? sanitizeName(decodeSegment(last)) : shortHash(pageUrl);
}

export function postFolderName(post: PostReference): string {
  return `post_${post.channelId}_${post.messageId}`;
}

export function imageFileName(imageUrl: string): string {
  const base = path.posix.basename(new URL(imageUrl).pathname);
  return base ? sanitizeName(decodeSegment(base)) : `${shortHash(imageUrl)}.jpg`;
}

/**
 * Names every image of one page. Distinct URLs that share a file name get a
 * hash of their URL appended, so no two images write the same path.
 */
export function assignImageFileNames(imageUrls: string[]): Map<string, string> {
  const taken = new Set<string>();
  const names = new Map<string, string>();

  for (const url of imageUrls) {
    let name = imageFileName(url);
    if (taken.has(name)) {
      const ext = path.posix.extname(name);
      name = `${name.substring(0, name.length - ext.length)}-${shortHash(url).substring(0, 8)}${ext}`;
    }
    taken.add(name);
    names.set(url, name);
  }

  return names;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function sanitizeName(name: string): string {
  const cleaned = name.replace(/[<>:"/\\|?*\u0000-\u001f]/g, '_');
  return cleaned === '.' || cleaned === '..' ? cleaned.replace(/\./g, '_') : cleaned;
}

function shortHash(value: string): string {
  return createHash('sha1').update(value).digest('hex').substring(0, 12);
}
