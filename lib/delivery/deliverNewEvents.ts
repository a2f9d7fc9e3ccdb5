import type { DeliveryFailurePolicy, EventRecord } from "@/types";
import { sortEvents } from "@/lib/agenda/sortEvents";
import type { Notifier, SeenStore } from "./types";

export interface DeliverOptions {
  events: readonly EventRecord[];
  store: SeenStore;
  notifier: Notifier;
  /** Deliver everything currently listed even when the seen-set is empty (operator catch-up). */
  postExisting: boolean;
  /**
   * "abort": the first failed send rejects before the seen-set is committed, so the next run retries
   * every undelivered event (at-least-once). "continue": failures are logged and the run commits anyway.
   */
  failurePolicy: DeliveryFailurePolicy;
}

export interface DeliveryReport {
  bootstrap: boolean;
  current: number;
  delivered: string[];
  failed: string[];
  /** Already seen on an earlier run. */
  skipped: number;
}

/**
 * Deliver each event whose uid is not yet in the seen-set, in sort order, then commit the seen-set once:
 * previous uids plus every uid observed now, delivered or not.
 */
export async function deliverNewEvents(options: DeliverOptions): Promise<DeliveryReport> {
  const { store, notifier, postExisting, failurePolicy } = options;
  const events = sortEvents(options.events);
  const seen = await store.load();
  const current = new Set(events.map((ev) => ev.uid));
  const bootstrap = seen.size === 0;

  if (bootstrap && !postExisting) {
    await store.save(current);
    console.info(`[deliver] first run: recorded ${current.size} events as seen, nothing sent`);
    return { bootstrap, current: current.size, delivered: [], failed: [], skipped: current.size };
  }

  const queued = new Set<string>();
  const fresh = events.filter((ev) => {
    if (seen.has(ev.uid) || queued.has(ev.uid)) return false;
    queued.add(ev.uid);
    return true;
  });
  const delivered: string[] = [];
  const failed: string[] = [];

  for (const ev of fresh) {
    try {
      await notifier.send(ev);
      delivered.push(ev.uid);
    } catch (e) {
      if (failurePolicy === "abort") {
        console.error(`[deliver] sending ${ev.uid} failed; seen-set left unchanged`);
        throw e;
      }
      console.warn(`[deliver] sending ${ev.uid} failed, continuing:`, e);
      failed.push(ev.uid);
    }
  }

  const next = new Set(seen);
  for (const uid of current) next.add(uid);
  await store.save(next);

  console.info(
    `[deliver] ${delivered.length} sent, ${failed.length} failed, ${current.size - fresh.length} already seen`
  );
  return { bootstrap, current: current.size, delivered, failed, skipped: current.size - fresh.length };
}
