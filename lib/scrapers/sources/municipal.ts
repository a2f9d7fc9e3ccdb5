import * as cheerio from "cheerio";
import type { EventRecord } from "@/types";
import type { Scraper, Discovery, DetailTarget } from "../types";
import type { HttpClient } from "../fetchHtml";
import { discoverFromSitemap, extractPermalinks } from "../sitemap";
import {
  extractJsonLdEvents,
  titleFromJsonLdEvent,
  dateTimeFromIsoRange,
  locationFromJsonLd,
} from "../jsonLdEvent";
import { documentLines, normalizeWs } from "@/lib/text/normalize";
import { externalEventUid } from "@/lib/identity/uid";

export const DEFAULT_EVENTS_SITE_URL = "https://www.witzenhausen.eu";
export const DEFAULT_PERMALINK_PATTERN = /^\/veranstaltung\/[^/]+\/?$/;

export interface MunicipalSiteOptions {
  siteUrl?: string;
  sitemapUrl?: string;
  listingUrl?: string;
  nestedKeyword?: string;
  permalinkPattern?: RegExp;
}

const DATE_PATTERN = /\b(\d{2}\.\d{2}\.\d{4})\b/;
const TIME_PATTERN = /\b(\d{1,2}:\d{2})(?:\s*(?:-|–|bis)\s*(\d{1,2}:\d{2}))?\s*Uhr\b/;
const POSTAL_CODE = /\b\d{5}\b/;
const DIGIT = /\d/;
const LINK_LIKE = /https?:|www\.|@/i;

function padClock(clock: string): string {
  return clock.length === 4 ? `0${clock}` : clock;
}

/** "19:00 Uhr", or "19:00 bis 21:00 Uhr" for a range with a distinct end. */
export function timeFromText(text: string): string {
  const m = text.match(TIME_PATTERN);
  if (!m?.[1]) return "";
  const start = padClock(m[1]);
  const end = m[2] ? padClock(m[2]) : null;
  return end && end !== start ? `${start} bis ${end} Uhr` : `${start} Uhr`;
}

/** First line that looks like an address: a postal code wins, else any line with a digit. The title line never counts. */
export function locationFromLines(lines: readonly string[], title = ""): string {
  const candidates = lines.filter((line) => {
    if (line === title || LINK_LIKE.test(line)) return false;
    const rest = line.replace(DATE_PATTERN, "").replace(TIME_PATTERN, "");
    return DIGIT.test(rest);
  });
  return candidates.find((line) => POSTAL_CODE.test(line)) ?? candidates[0] ?? "";
}

function pageTitle(html: string): string {
  const $ = cheerio.load(html);
  return (
    normalizeWs($('meta[property="og:title"]').attr("content")) ||
    normalizeWs($("h1").first().text()) ||
    normalizeWs($("title").first().text())
  );
}

/**
 * Records from one event permalink page. Embedded schema.org events win;
 * without them the page text is scanned for a date, a clock time and an address line.
 */
export function parseMunicipalEvent(html: string, url: string): EventRecord[] {
  const structured = extractJsonLdEvents(html);
  if (structured.length > 0) {
    const records: EventRecord[] = [];
    for (const ld of structured) {
      const title = titleFromJsonLdEvent(ld);
      if (!title) continue;
      const { date, time } = dateTimeFromIsoRange(ld.startDate, ld.endDate);
      const location = locationFromJsonLd(ld.location);
      const start = typeof ld.startDate === "string" ? normalizeWs(ld.startDate) : date;
      records.push({
        uid: externalEventUid(url, title, start, location),
        title,
        date,
        time,
        location,
        url,
        source: "external-structured",
      });
    }
    return records;
  }

  const title = pageTitle(html);
  if (!title) return [];
  const lines = documentLines(html);
  const date = lines.map((l) => l.match(DATE_PATTERN)?.[1]).find((d) => d !== undefined) ?? "";
  const time = lines.map(timeFromText).find((t) => t !== "") ?? "";
  const location = locationFromLines(lines, title);

  return [
    {
      uid: externalEventUid(url, title, date, location),
      title,
      date,
      time,
      location,
      url,
      source: "external-fallback",
    },
  ];
}

/** Events of the municipal site: permalinks from the sitemap index, or from the listing page when that fails. */
export function createMunicipalScraper(options: MunicipalSiteOptions = {}): Scraper {
  const siteUrl = options.siteUrl ?? DEFAULT_EVENTS_SITE_URL;
  const sitemapUrl = options.sitemapUrl ?? new URL("/sitemap_index.xml", siteUrl).href;
  const listingUrl = options.listingUrl ?? new URL("/veranstaltungen/", siteUrl).href;
  const nestedKeyword = options.nestedKeyword ?? "event";
  const permalinkPattern = options.permalinkPattern ?? DEFAULT_PERMALINK_PATTERN;

  async function discoverUrls(client: HttpClient): Promise<string[]> {
    try {
      const urls = await discoverFromSitemap(client, { sitemapUrl, nestedKeyword, permalinkPattern });
      if (urls.length > 0) return urls;
      console.warn(`[municipal] sitemap ${sitemapUrl} listed no event permalinks, using listing page`);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      console.warn(`[municipal] sitemap discovery failed (${msg}), using listing page`);
    }
    const { html, finalUrl } = await client.fetchHtmlWithUrl(listingUrl);
    return extractPermalinks(html, finalUrl, permalinkPattern);
  }

  return {
    id: "municipal",
    name: "Veranstaltungskalender",

    async discover(client: HttpClient): Promise<Discovery> {
      const urls = await discoverUrls(client);
      const targets: DetailTarget[] = urls.map((url) => ({ url }));
      return { events: [], targets };
    },

    parseDetail(html, target) {
      return parseMunicipalEvent(html, target.url);
    },
  };
}
