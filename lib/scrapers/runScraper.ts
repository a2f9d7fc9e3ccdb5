import { setTimeout as sleep } from "node:timers/promises";
import type { EventRecord } from "@/types";
import type { Discovery, Scraper, ScrapeResult } from "./types";
import type { HttpClient } from "./fetchHtml";

export interface RunScraperOptions {
  /** Pause between successive detail fetches of one source. */
  delayMs: number;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Run one source: discovery, then every detail page in order.
 * Never rejects. A failed page drops that page; a failed discovery yields zero events.
 */
export async function runScraper(scraper: Scraper, client: HttpClient, options: RunScraperOptions): Promise<ScrapeResult> {
  const errors: string[] = [];

  let discovery: Discovery;
  try {
    discovery = await scraper.discover(client);
  } catch (e) {
    console.error(`[scrape] ${scraper.id} discovery failed:`, e);
    return { sourceId: scraper.id, events: [], errors: [errorMessage(e)] };
  }

  const events: EventRecord[] = [...discovery.events];

  for (let i = 0; i < discovery.targets.length; i++) {
    const target = discovery.targets[i];
    if (!target) continue;
    if (i > 0 && options.delayMs > 0) await sleep(options.delayMs);
    try {
      const html = await client.fetchHtml(target.url);
      events.push(...scraper.parseDetail(html, target));
    } catch (e) {
      errors.push(`${target.url}: ${errorMessage(e)}`);
    }
  }

  if (errors.length > 0) {
    console.warn(`[scrape] ${scraper.id}: ${events.length} events, ${errors.length} errors`, errors.slice(0, 3));
  } else {
    console.info(`[scrape] ${scraper.id}: ${events.length} events`);
  }
  return { sourceId: scraper.id, events, errors };
}
