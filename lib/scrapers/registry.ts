import type { Scraper } from "./types";

const scrapers: Scraper[] = [];

export function registerScraper(scraper: Scraper): void {
  if (scrapers.some((s) => s.id === scraper.id)) return;
  scrapers.push(scraper);
}

export function getScrapers(): Scraper[] {
  return [...scrapers];
}

/** Empty the registry (tests register their own sources). */
export function clearScrapers(): void {
  scrapers.length = 0;
}
