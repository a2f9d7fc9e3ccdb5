/**
 * One ticker run, started by an external scheduler (cron, CI schedule).
 * Exit code 0 means the seen-set was committed (or nothing had to be); anything else means it was not.
 */
import { loadConfig, ConfigError, type AppConfig } from "@/lib/config";
import { createHttpClient, type HttpClient } from "@/lib/scrapers/fetchHtml";
import { registerAllScrapers } from "@/lib/scrapers/sources";
import { getScrapers } from "@/lib/scrapers/registry";
import { FileSeenStore } from "@/lib/delivery/fileSeenStore";
import { FirestoreSeenStore } from "@/lib/delivery/firestoreSeenStore";
import { createConsoleNotifier, createTelegramNotifier } from "@/lib/delivery/telegram";
import type { Notifier, SeenStore } from "@/lib/delivery/types";
import { getAdminDb } from "@/lib/firebase/admin";
import { runOnce } from "@/lib/pipeline/runOnce";

function createStore(config: AppConfig): SeenStore {
  if (config.seenStore === "firestore") {
    return new FirestoreSeenStore(getAdminDb(config.firebase));
  }
  return new FileSeenStore(config.stateFile);
}

function createNotifier(config: AppConfig, client: HttpClient): Notifier {
  if (config.dryRun || !config.telegram) return createConsoleNotifier();
  return createTelegramNotifier(client, config.telegram);
}

async function main(): Promise<void> {
  const config = loadConfig();
  const client = createHttpClient({ userAgent: config.userAgent, timeoutMs: config.fetchTimeoutMs });

  registerAllScrapers({
    sessionNetUrl: config.sessionNetUrl,
    municipal: {
      siteUrl: config.eventsSiteUrl,
      sitemapUrl: config.eventsSitemapUrl,
      listingUrl: config.eventsListingUrl,
    },
  });

  const summary = await runOnce({
    client,
    scrapers: getScrapers(),
    store: createStore(config),
    notifier: createNotifier(config, client),
    postExisting: config.postExisting,
    failurePolicy: config.failurePolicy,
    delayMs: config.fetchDelayMs,
    dryRun: config.dryRun,
  });

  for (const r of summary.results) {
    console.info(`[run] ${r.sourceId}: ${r.count} events${r.errors.length ? `, ${r.errors.length} errors` : ""}`);
  }
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error("[run] failed, seen-set not committed:", error);
  }
  process.exit(1);
});
