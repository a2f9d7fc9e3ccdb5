import * as cheerio from "cheerio";
import type { HttpClient } from "./fetchHtml";

const MAX_SITEMAP_DEPTH = 3;

export interface SitemapDiscoveryOptions {
  sitemapUrl: string;
  /** Nested sitemaps are only followed when their own URL contains this keyword (case-insensitive). */
  nestedKeyword: string;
  /** Leaf URLs are kept when their path matches. */
  permalinkPattern: RegExp;
}

export interface SitemapDocument {
  sitemaps: string[];
  urls: string[];
}

/** Split a sitemap or sitemap index into nested sitemap locations and page locations. */
export function parseSitemap(xml: string): SitemapDocument {
  const $ = cheerio.load(xml, { xml: true });
  const locs = (selector: string) =>
    $(selector)
      .toArray()
      .map((el) => $(el).text().trim())
      .filter((loc) => loc.length > 0);
  return {
    sitemaps: locs("sitemap > loc"),
    urls: locs("url > loc"),
  };
}

/** Lowercased path of a sitemap URL; the host never counts towards the keyword. */
function sitemapPath(url: string): string {
  try {
    return new URL(url).pathname.toLowerCase();
  } catch {
    return "";
  }
}

export function matchesPermalink(url: string, pattern: RegExp): boolean {
  try {
    return pattern.test(new URL(url).pathname);
  } catch {
    return false;
  }
}

/**
 * Walk a sitemap index breadth-first, following nested sitemaps whose path carries the keyword.
 * A failing fetch or unparsable document rejects, so the caller can fall back to the listing page.
 */
export async function discoverFromSitemap(client: HttpClient, options: SitemapDiscoveryOptions): Promise<string[]> {
  const keyword = options.nestedKeyword.toLowerCase();
  const queue: { url: string; depth: number }[] = [{ url: options.sitemapUrl, depth: 0 }];
  const visited = new Set<string>();
  const found: string[] = [];
  const seen = new Set<string>();

  while (queue.length > 0) {
    const next = queue.shift();
    if (!next || visited.has(next.url)) continue;
    visited.add(next.url);

    const xml = await client.fetchHtml(next.url);
    const doc = parseSitemap(xml);

    if (next.depth < MAX_SITEMAP_DEPTH) {
      for (const nested of doc.sitemaps) {
        if (sitemapPath(nested).includes(keyword)) queue.push({ url: nested, depth: next.depth + 1 });
      }
    }
    for (const url of doc.urls) {
      if (seen.has(url) || !matchesPermalink(url, options.permalinkPattern)) continue;
      seen.add(url);
      found.push(url);
    }
  }

  return found;
}

/** Permalinks linked from a listing page, resolved against the page URL, in document order. */
export function extractPermalinks(html: string, baseUrl: string, pattern: RegExp): string[] {
  const $ = cheerio.load(html);
  const seen = new Set<string>();
  const found: string[] = [];
  $("a[href]").each((_, el) => {
    const href = $(el).attr("href");
    if (!href) return;
    let url: string;
    try {
      const resolved = new URL(href, baseUrl);
      resolved.hash = "";
      url = resolved.href;
    } catch {
      return;
    }
    if (seen.has(url) || !matchesPermalink(url, pattern)) return;
    seen.add(url);
    found.push(url);
  });
  return found;
}
