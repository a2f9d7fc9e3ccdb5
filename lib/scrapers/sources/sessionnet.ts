import type { Scraper, Discovery } from "../types";
import type { HttpClient } from "../fetchHtml";
import { parseTextBlock } from "../sessionnet/textBlock";
import { extractSessionLinks, parseSessionDetail } from "../sessionnet/sessionDetail";

export const DEFAULT_SESSIONNET_URL = "https://sessionnet.owl-it.de/witzenhausen/bi/info.asp";

/**
 * Council sessions from a SessionNet "info.asp" page. The listing is fetched once and read two ways:
 * its "Aktuelle Sitzungen" text block (text records) and its links to session detail pages (detail records).
 */
export function createSessionNetScraper(infoUrl: string = DEFAULT_SESSIONNET_URL): Scraper {
  return {
    id: "sessionnet",
    name: "SessionNet",

    async discover(client: HttpClient): Promise<Discovery> {
      const { html, finalUrl } = await client.fetchHtmlWithUrl(infoUrl);
      return {
        events: parseTextBlock(html, infoUrl),
        targets: extractSessionLinks(html, finalUrl),
      };
    },

    parseDetail(html, target) {
      return [parseSessionDetail(html, target)];
    },
  };
}
