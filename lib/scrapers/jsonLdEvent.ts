/**
 * schema.org Event objects embedded as JSON-LD.
 * A page may carry several ld+json blocks, each with events at any depth (@graph, arrays, nested objects).
 */
import * as cheerio from "cheerio";
import { isText } from "domhandler";
import { normalizeWs } from "@/lib/text/normalize";

export interface JsonLdPlace {
  name?: unknown;
  address?: unknown;
}

export interface JsonLdEvent {
  "@type"?: unknown;
  name?: unknown;
  startDate?: unknown;
  endDate?: unknown;
  location?: unknown;
  url?: unknown;
}

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

function isEventType(type: unknown): boolean {
  const matches = (t: unknown) => typeof t === "string" && (t === "Event" || t.endsWith("Event"));
  if (Array.isArray(type)) return type.some(matches);
  return matches(type);
}

/**
 * Collect every Event-typed object in a parsed JSON value.
 * Uses an explicit worklist instead of recursion so hostile nesting depth cannot exhaust the stack.
 */
export function collectJsonLdEvents(root: unknown): JsonLdEvent[] {
  const found: JsonLdEvent[] = [];
  const stack: unknown[] = [root];

  while (stack.length > 0) {
    const value = stack.pop();
    if (Array.isArray(value)) {
      for (let i = value.length - 1; i >= 0; i--) stack.push(value[i]);
    } else if (isObject(value)) {
      if (isEventType(value["@type"])) found.push(value);
      const children = Object.values(value);
      for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
    }
  }

  return found;
}

/** Every Event object from every application/ld+json block. Blocks that are not valid JSON are skipped. */
export function extractJsonLdEvents(html: string): JsonLdEvent[] {
  const $ = cheerio.load(html);
  const events: JsonLdEvent[] = [];
  $('script[type="application/ld+json"]').each((_, el) => {
    const text = el.children
      .filter(isText)
      .map((node) => node.data)
      .join("")
      .trim();
    if (!text) return;
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      return;
    }
    events.push(...collectJsonLdEvents(json));
  });
  return events;
}

function str(value: unknown): string {
  return typeof value === "string" ? normalizeWs(value) : "";
}

export function titleFromJsonLdEvent(ld: JsonLdEvent): string {
  return str(ld.name);
}

const ISO_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2}))?/;

interface IsoParts {
  date: string;
  clock: string | null;
}

function parseIsoParts(value: string): IsoParts | null {
  const m = value.match(ISO_DATE_TIME);
  if (!m) return null;
  const [, year, month, day, hour, minute] = m;
  return {
    date: `${day}.${month}.${year}`,
    clock: hour && minute ? `${hour}:${minute}` : null,
  };
}

/**
 * Date and time text from an ISO-8601 start/end pair, copying the wall-clock time literally:
 * ("2026-03-10T19:00:00", "2026-03-10T21:00:00") -> { date: "10.03.2026", time: "19:00 bis 21:00 Uhr" }.
 */
export function dateTimeFromIsoRange(startDate: unknown, endDate?: unknown): { date: string; time: string } {
  const start = str(startDate);
  const startParts = parseIsoParts(start);
  if (!startParts) return { date: start, time: "" };
  if (!startParts.clock) return { date: startParts.date, time: "" };

  const endParts = parseIsoParts(str(endDate));
  if (endParts?.clock && endParts.clock !== startParts.clock) {
    return { date: startParts.date, time: `${startParts.clock} bis ${endParts.clock} Uhr` };
  }
  return { date: startParts.date, time: `${startParts.clock} Uhr` };
}

/** "Name, Street 1, 37213 Town" from a schema.org Place, leaving out parts that are absent. */
export function locationFromJsonLd(value: unknown): string {
  let location = value;
  while (Array.isArray(location)) location = location[0];
  if (typeof location === "string") return normalizeWs(location);
  if (!isObject(location)) return "";

  const place: JsonLdPlace = location;
  const parts = [str(place.name)];
  const address = place.address;
  if (typeof address === "string") {
    parts.push(normalizeWs(address));
  } else if (isObject(address)) {
    parts.push(str(address.streetAddress));
    parts.push([str(address.postalCode), str(address.addressLocality)].filter(Boolean).join(" "));
  }
  return parts.filter(Boolean).join(", ");
}
