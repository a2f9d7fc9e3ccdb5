import type { EventRecord } from "@/types";
import { eventSignature } from "@/lib/identity/uid";

/**
 * Reconcile the two SessionNet views. A text record describing the same (date, title) as a detail
 * record is dropped in favour of the detail record; text-only sessions and all other sources pass through.
 * The result holds each uid once, first occurrence winning.
 */
export function mergeSessionEvents(events: readonly EventRecord[]): EventRecord[] {
  const detailSignatures = new Set(events.filter((ev) => ev.source === "detail").map(eventSignature));

  const merged = new Map<string, EventRecord>();
  for (const ev of events) {
    if (ev.source === "text" && detailSignatures.has(eventSignature(ev))) continue;
    if (!merged.has(ev.uid)) merged.set(ev.uid, ev);
  }
  return [...merged.values()];
}
