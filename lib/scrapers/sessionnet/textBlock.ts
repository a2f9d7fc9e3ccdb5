import type { EventRecord } from "@/types";
import { documentLines, normalizeLines, normalizeWs, stripBullets } from "@/lib/text/normalize";
import { textEventUid } from "@/lib/identity/uid";

export const SECTION_HEADER = "Aktuelle Sitzungen";
export const TRAILER_PREFIX = "Software:";
export const DAY_TOKENS: ReadonlySet<string> = new Set(["Mo", "Di", "Mi", "Do", "Fr", "Sa", "So"]);

const DATE_LINE = /^(\d{2}\.\d{2}\.\d{4})\b(.*)$/;

export interface TextBlockOptions {
  header?: string;
  trailerPrefix?: string;
}

/**
 * Read-only cursor over the flattened listing lines.
 * The trailer counts as end of input for every look-ahead.
 */
export class LineCursor {
  private pos = 0;

  constructor(
    private readonly lines: readonly string[],
    private readonly trailerPrefix: string
  ) {}

  seek(index: number): void {
    this.pos = index;
  }

  peek(): string | undefined {
    return this.atEnd() ? undefined : this.lines[this.pos];
  }

  advance(): void {
    this.pos++;
  }

  atEnd(): boolean {
    if (this.pos >= this.lines.length) return true;
    const line = this.lines[this.pos] ?? "";
    return line.startsWith(this.trailerPrefix);
  }

  /** Skip blank and day-name lines. */
  skipNoise(): void {
    while (!this.atEnd() && isNoise(this.lines[this.pos] ?? "")) this.pos++;
  }

  /** Skip blank lines only (the title look-ahead keeps day names). */
  skipBlank(): void {
    while (!this.atEnd() && (this.lines[this.pos] ?? "") === "") this.pos++;
  }

  /** A line that opens the next event ends the current one's look-ahead. */
  isBoundary(): boolean {
    const line = this.peek();
    return line !== undefined && DATE_LINE.test(line);
  }
}

function isNoise(line: string): boolean {
  return line === "" || DAY_TOKENS.has(line);
}

interface ParsedSession {
  date: string;
  title: string;
  time: string;
  location: string;
}

/** Scan the listing lines for sessions. Unrecognized lines are skipped, never fatal. */
export function parseTextBlockLines(lines: readonly string[], options: TextBlockOptions = {}): ParsedSession[] {
  const header = options.header ?? SECTION_HEADER;
  const trailer = options.trailerPrefix ?? TRAILER_PREFIX;

  const start = lines.indexOf(header);
  if (start < 0) return [];

  const cursor = new LineCursor(lines, trailer);
  cursor.seek(start + 1);
  const sessions: ParsedSession[] = [];

  while (!cursor.atEnd()) {
    const line = cursor.peek() ?? "";
    if (DAY_TOKENS.has(line)) {
      cursor.advance();
      continue;
    }
    const m = line.match(DATE_LINE);
    if (!m) {
      cursor.advance();
      continue;
    }
    cursor.advance();

    const date = m[1] ?? "";
    let title = normalizeWs(m[2]);
    if (!title) {
      cursor.skipBlank();
      if (cursor.atEnd()) break;
      title = normalizeWs(cursor.peek());
      cursor.advance();
    }

    cursor.skipNoise();
    if (cursor.atEnd()) break;
    let time = "";
    if (!cursor.isBoundary()) {
      time = stripBullets(cursor.peek());
      cursor.advance();
    }

    cursor.skipNoise();
    let location = "";
    if (!cursor.atEnd() && !cursor.isBoundary()) {
      location = stripBullets(cursor.peek());
      cursor.advance();
    }

    sessions.push({ date, title, time, location });
  }

  return sessions;
}

/** Text-derived records from the listing document. */
export function parseTextBlock(html: string, listingUrl: string, options: TextBlockOptions = {}): EventRecord[] {
  return parseTextBlockFromLines(documentLines(html), listingUrl, options);
}

export function parseTextBlockFromLines(
  lines: readonly string[],
  listingUrl: string,
  options: TextBlockOptions = {}
): EventRecord[] {
  return parseTextBlockLines(normalizeLines(lines), options).map((s) => ({
    uid: textEventUid(s.date, s.title, s.time, s.location),
    title: s.title,
    date: s.date,
    time: s.time,
    location: s.location,
    url: listingUrl,
    source: "text",
  }));
}
