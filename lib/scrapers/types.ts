import type { EventRecord } from "@/types";
import type { HttpClient } from "./fetchHtml";

/** A page the pipeline fetches after discovery. id is the source's natural key when it has one. */
export interface DetailTarget {
  url: string;
  id?: string;
}

/**
 * Outcome of a source's discovery stage: events readable straight from the index
 * document(s), and the detail pages still to visit.
 */
export interface Discovery {
  events: EventRecord[];
  targets: DetailTarget[];
}

/**
 * Per-source descriptor. Every source runs through the same pipeline (runScraper):
 * discover once, then fetch and parse each target in order.
 */
export interface Scraper {
  id: string;
  name: string;
  /** Throwing here degrades the whole source to zero events for the run. */
  discover(client: HttpClient): Promise<Discovery>;
  /** Parse one fetched detail page. Throwing here drops only that page. */
  parseDetail(html: string, target: DetailTarget): EventRecord[];
}

export interface ScrapeResult {
  sourceId: string;
  events: EventRecord[];
  errors: string[];
}
