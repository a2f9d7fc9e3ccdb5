import * as cheerio from "cheerio";
import type { EventRecord } from "@/types";
import type { DetailTarget } from "../types";
import { documentLines } from "@/lib/text/normalize";
import { sessionUid } from "@/lib/identity/uid";

const SESSION_ID_PARAM = /__ksinr=(\d+)/;
const DATE_TOKEN = /\b(\d{2}\.\d{2}\.\d{4})\b/;

export const DETAIL_LABELS = {
  title: "Gremium",
  date: "Datum",
  time: "Zeit",
  location: "Raum",
} as const;

export function extractSessionId(href: string | null | undefined): string | null {
  const m = (href ?? "").match(SESSION_ID_PARAM);
  return m?.[1] ?? null;
}

/** Every distinct session linked from the listing, in document order (first link per id wins). */
export function extractSessionLinks(html: string, baseUrl: string): DetailTarget[] {
  const $ = cheerio.load(html);
  const seen = new Set<string>();
  const targets: DetailTarget[] = [];

  $("a[href]").each((_, el) => {
    const href = $(el).attr("href");
    const id = extractSessionId(href);
    if (!href || !id || seen.has(id)) return;
    let url: string;
    try {
      url = new URL(href, baseUrl).href;
    } catch {
      return;
    }
    seen.add(id);
    targets.push({ id, url });
  });

  return targets;
}

/** Value on the line after the first exact label line; "" when the label is missing. */
export function valueAfterLabel(lines: readonly string[], label: string): string {
  for (let i = 0; i < lines.length - 1; i++) {
    const line = lines[i];
    if (line === label || line === `${label}:`) return lines[i + 1] ?? "";
  }
  return "";
}

export function parseSessionDetail(html: string, target: DetailTarget): EventRecord {
  const id = target.id ?? extractSessionId(target.url);
  if (!id) throw new Error(`No session id in ${target.url}`);

  const lines = documentLines(html);
  const rawDate = valueAfterLabel(lines, DETAIL_LABELS.date);

  return {
    uid: sessionUid(id),
    title: valueAfterLabel(lines, DETAIL_LABELS.title),
    date: rawDate.match(DATE_TOKEN)?.[1] ?? rawDate,
    time: valueAfterLabel(lines, DETAIL_LABELS.time),
    location: valueAfterLabel(lines, DETAIL_LABELS.location),
    url: target.url,
    source: "detail",
  };
}
