import type { EventRecord } from "@/types";
import { normalizeWs } from "@/lib/text/normalize";

/** Undated and untimed events sort after everything else. */
export const MAX_DATE_KEY = "9999-12-31";
export const NO_TIME_KEY = "99:99";

const GERMAN_DATE = /^(\d{2})\.(\d{2})\.(\d{4})$/;
const CLOCK = /(\d{1,2}):(\d{2})/;

/** "05.01.2026" -> "2026-01-05"; null when the text is not a real calendar date. */
export function parseGermanDate(text: string): string | null {
  const m = normalizeWs(text).match(GERMAN_DATE);
  if (!m) return null;
  const [, dd, mm, yyyy] = m;
  const day = Number(dd);
  const month = Number(mm);
  const year = Number(yyyy);
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return `${yyyy}-${mm}-${dd}`;
}

/** First clock time anywhere in the text, zero-padded ("9:30 Uhr" -> "09:30"). */
export function firstTimeToken(text: string): string {
  const m = text.match(CLOCK);
  if (!m) return NO_TIME_KEY;
  const [, h = "", min = ""] = m;
  return `${h.padStart(2, "0")}:${min}`;
}

export function eventSortKey(ev: EventRecord): [string, string, string] {
  return [
    parseGermanDate(ev.date) ?? MAX_DATE_KEY,
    firstTimeToken(normalizeWs(ev.time)),
    normalizeWs(ev.title).toLowerCase(),
  ];
}

function compareKeys(a: [string, string, string], b: [string, string, string]): number {
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? "";
    const y = b[i] ?? "";
    if (x < y) return -1;
    if (x > y) return 1;
  }
  return 0;
}

/** Ascending by date, first clock time, lowercased title. Stable; the input is not modified. */
export function sortEvents(events: readonly EventRecord[]): EventRecord[] {
  return events
    .map((ev) => ({ ev, key: eventSortKey(ev) }))
    .sort((a, b) => compareKeys(a.key, b.key))
    .map(({ ev }) => ev);
}
