import type { DeliveryFailurePolicy, EventRecord } from "@/types";
import type { Scraper, ScrapeResult } from "@/lib/scrapers/types";
import type { HttpClient } from "@/lib/scrapers/fetchHtml";
import { runScraper } from "@/lib/scrapers/runScraper";
import { mergeSessionEvents } from "@/lib/merge/mergeSessionEvents";
import { sortEvents } from "@/lib/agenda/sortEvents";
import { deliverNewEvents, type DeliveryReport } from "@/lib/delivery/deliverNewEvents";
import type { Notifier, SeenStore } from "@/lib/delivery/types";

export interface RunOptions {
  client: HttpClient;
  scrapers: readonly Scraper[];
  store: SeenStore;
  notifier: Notifier;
  postExisting: boolean;
  failurePolicy: DeliveryFailurePolicy;
  delayMs: number;
  /** Hand the unseen events to the notifier but never commit the seen-set. */
  dryRun?: boolean;
}

export interface RunSummary {
  results: { sourceId: string; count: number; errors: string[] }[];
  events: EventRecord[];
  delivery: DeliveryReport | null;
}

/** All sources in order, one after another; a source's failure never touches the others. */
export async function collectEvents(
  client: HttpClient,
  scrapers: readonly Scraper[],
  delayMs: number
): Promise<{ events: EventRecord[]; results: ScrapeResult[] }> {
  const results: ScrapeResult[] = [];
  for (const scraper of scrapers) {
    results.push(await runScraper(scraper, client, { delayMs }));
  }
  const events = sortEvents(mergeSessionEvents(results.flatMap((r) => r.events)));
  return { events, results };
}

/**
 * One full run: scrape every source, reconcile, sort and deliver what is new.
 * Rejections from the store or from delivery (under the abort policy) propagate, leaving the seen-set untouched.
 */
export async function runOnce(options: RunOptions): Promise<RunSummary> {
  const { events, results } = await collectEvents(options.client, options.scrapers, options.delayMs);
  const summary = results.map((r) => ({ sourceId: r.sourceId, count: r.events.length, errors: r.errors }));
  console.info(`[run] ${events.length} events after merge from ${results.length} sources`);

  if (options.dryRun) {
    const seen = await options.store.load();
    for (const ev of events) {
      if (!seen.has(ev.uid)) await options.notifier.send(ev);
    }
    return { results: summary, events, delivery: null };
  }

  const delivery = await deliverNewEvents({
    events,
    store: options.store,
    notifier: options.notifier,
    postExisting: options.postExisting,
    failurePolicy: options.failurePolicy,
  });
  return { results: summary, events, delivery };
}
