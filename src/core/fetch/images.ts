import * as cheerio from 'cheerio';

/**
 * Collects every `<img src>` in a document. Relative references resolve
 * against the page's origin; anything that is not http(s) afterwards, such as
 * inline data URIs, is dropped.
 */
export function extractImageSources(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html);
  const root = `${new URL(pageUrl).origin}/`;
  const sources = new Set<string>();

  $('img').each((_, element) => {
    const src = $(element).attr('src')?.trim();
    if (!src) {
      return;
    }
    const resolved = resolveSource(src, root);
    if (resolved) {
      sources.add(resolved);
    }
  });

  return [...sources];
}

function resolveSource(src: string, root: string): string | null {
  try {
    const url = new URL(src, root);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : null;
  } catch {
    return null;
  }
}
