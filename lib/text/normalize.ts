import * as cheerio from "cheerio";
import { hasChildren, isTag, isText, type AnyNode } from "domhandler";

const IGNORED_TAGS = new Set(["script", "style", "noscript", "template", "head"]);

/** Collapse whitespace runs (\s covers NBSP) to single spaces and trim. */
export function normalizeWs(s: string | null | undefined): string {
  if (s == null) return "";
  return s.replace(/\s+/g, " ").trim();
}

/** Normalize and drop leading bullet glyphs ("• 18:00 Uhr" -> "18:00 Uhr"). */
export function stripBullets(s: string | null | undefined): string {
  return normalizeWs(s).replace(/^[•*·\- ]+/, "").trim();
}

/** Normalize every line and drop the ones left empty. */
export function normalizeLines(lines: readonly string[]): string[] {
  return lines.map(normalizeWs).filter((l) => l.length > 0);
}

/**
 * Flatten an HTML document into its visible text, one line per text node.
 * Walks the tree with an explicit stack so deeply nested markup cannot blow the call stack.
 */
export function documentLines(html: string): string[] {
  const $ = cheerio.load(html);
  const raw: string[] = [];
  const stack: AnyNode[] = $.root().contents().toArray().reverse();

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (isText(node)) {
      raw.push(node.data);
      continue;
    }
    if (isTag(node) && IGNORED_TAGS.has(node.name.toLowerCase())) continue;
    if (isTag(node) || hasChildren(node)) {
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i];
        if (child) stack.push(child);
      }
    }
  }

  return normalizeLines(raw);
}
