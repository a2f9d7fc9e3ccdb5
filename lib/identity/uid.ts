import { createHash } from "node:crypto";
import { normalizeWs } from "@/lib/text/normalize";

function sha1(input: string): string {
  return createHash("sha1").update(input, "utf8").digest("hex");
}

/**
 * Content identity for events reconstructed from the listing text.
 * No natural key exists there, so every semantic field takes part.
 */
export function textEventUid(date: string, title: string, time: string, location: string): string {
  const raw = [
    normalizeWs(date),
    normalizeWs(title).toLowerCase(),
    normalizeWs(time).toLowerCase(),
    normalizeWs(location).toLowerCase(),
  ].join("|");
  return `txt:${sha1(raw)}`;
}

/** Natural key: the session id alone, so later edits to the detail page never change it. */
export function sessionUid(sessionId: string): string {
  return `ksinr:${sessionId}`;
}

/** External pages include their url so two events sharing a title and day stay apart. */
export function externalEventUid(url: string, title: string, dateOrStart: string, location: string): string {
  const raw = [normalizeWs(url), normalizeWs(title), normalizeWs(dateOrStart), normalizeWs(location)].join("|");
  return `ext:${sha1(raw)}`;
}

/** Secondary (date, lowercased title) key, used only when merging the two SessionNet views. */
export function eventSignature(ev: { date: string; title: string }): string {
  return `${normalizeWs(ev.date)}|${normalizeWs(ev.title).toLowerCase()}`;
}
