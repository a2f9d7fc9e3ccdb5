import { registerScraper } from "../registry";
import { createSessionNetScraper } from "./sessionnet";
import { createMunicipalScraper, type MunicipalSiteOptions } from "./municipal";

export interface SourceUrls {
  sessionNetUrl?: string;
  municipal?: MunicipalSiteOptions;
}

/** Registration order is run order: council sessions first, then the events site. */
export function registerAllScrapers(urls: SourceUrls = {}): void {
  registerScraper(createSessionNetScraper(urls.sessionNetUrl));
  registerScraper(createMunicipalScraper(urls.municipal));
}

export { createSessionNetScraper, createMunicipalScraper };
