import type { EventRecord } from "@/types";
import { normalizeWs } from "@/lib/text/normalize";

/** Title, Datum, Zeit, Ort, Link: one line each, empty fields left out. */
export function formatMessage(ev: EventRecord): string {
  const title = normalizeWs(ev.title);
  const date = normalizeWs(ev.date);
  const time = normalizeWs(ev.time);
  const location = normalizeWs(ev.location);
  const url = ev.url.trim();

  const lines = [
    title,
    date ? `Datum: ${date}` : "",
    time ? `Zeit: ${time}` : "",
    location ? `Ort: ${location}` : "",
    url ? `Link: ${url}` : "",
  ];
  return lines.filter(Boolean).join("\n");
}
