import { describe, it, expect, vi, beforeEach } from "vitest";
import { runOnce } from "./runOnce";
import { createSessionNetScraper } from "@/lib/scrapers/sources/sessionnet";
import { createMunicipalScraper } from "@/lib/scrapers/sources/municipal";
import { FakeHttpClient, MemorySeenStore, RecordingNotifier, readFixture } from "@/lib/testing/fakes";

const INFO_URL = "https://sessionnet.example/bi/info.asp";
const SITE_URL = "https://events.example";
const ABGESAGT = "https://events.example/veranstaltung/abgesagt/";

function site(): FakeHttpClient {
  return new FakeHttpClient({
    [INFO_URL]: readFixture("sessionnet/info.html"),
    "https://sessionnet.example/bi/si0057.asp?__ksinr=1201": readFixture("sessionnet/detail-1201.html"),
    "https://sessionnet.example/bi/si0057.asp?__ksinr=1202": readFixture("sessionnet/detail-1202.html"),
    "https://events.example/sitemap_index.xml": readFixture("municipal/sitemap_index.xml"),
    "https://events.example/tribe_events-sitemap.xml": readFixture("municipal/events-sitemap.xml"),
    "https://events.example/veranstaltung/stadtfest/": readFixture("municipal/event-structured.html"),
    "https://events.example/veranstaltung/lesung-im-rathaus/": readFixture("municipal/event-fallback.html"),
  });
}

const scrapers = [createSessionNetScraper(INFO_URL), createMunicipalScraper({ siteUrl: SITE_URL })];

const EXPECTED_TITLES = [
  "Stadtfest",
  "Stadtverordnetenversammlung",
  "Bauausschuss",
  "Lesung im Rathaus",
  "Haupt- und Finanzausschuss",
];

describe("runOnce", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("merges both session views, keeps external events and delivers in agenda order", async () => {
    const store = new MemorySeenStore(["old"]);
    const notifier = new RecordingNotifier();
    const summary = await runOnce({
      client: site(),
      scrapers,
      store,
      notifier,
      postExisting: false,
      failurePolicy: "abort",
      delayMs: 0,
    });

    expect(summary.events.map((e) => e.title)).toEqual(EXPECTED_TITLES);
    expect(summary.events.map((e) => e.source)).toEqual([
      "external-structured",
      "detail",
      "text",
      "external-fallback",
      "detail",
    ]);
    expect(summary.results).toEqual([
      { sourceId: "sessionnet", count: 5, errors: [] },
      { sourceId: "municipal", count: 2, errors: [`${ABGESAGT}: HTTP 404: ${ABGESAGT}`] },
    ]);
    expect(notifier.sent.map((e) => e.title)).toEqual(EXPECTED_TITLES);
    expect(store.uids.size).toBe(6);
    expect(summary.delivery?.delivered).toHaveLength(5);
  });

  it("sends nothing on a second run over the same pages", async () => {
    const store = new MemorySeenStore(["old"]);
    const options = { scrapers, store, postExisting: false, failurePolicy: "abort" as const, delayMs: 0 };
    await runOnce({ ...options, client: site(), notifier: new RecordingNotifier() });

    const second = new RecordingNotifier();
    const summary = await runOnce({ ...options, client: site(), notifier: second });
    expect(second.sent).toEqual([]);
    expect(summary.delivery?.skipped).toBe(5);
  });

  it("shows unseen events on a dry run without committing", async () => {
    const store = new MemorySeenStore(["old"]);
    const notifier = new RecordingNotifier();
    const summary = await runOnce({
      client: site(),
      scrapers,
      store,
      notifier,
      postExisting: false,
      failurePolicy: "abort",
      delayMs: 0,
      dryRun: true,
    });
    expect(notifier.sent).toHaveLength(5);
    expect(store.saves).toBe(0);
    expect(summary.delivery).toBeNull();
  });

  it("propagates a delivery failure and leaves the seen-set alone", async () => {
    const store = new MemorySeenStore(["old"]);
    await expect(
      runOnce({
        client: site(),
        scrapers,
        store,
        notifier: new RecordingNotifier([1]),
        postExisting: false,
        failurePolicy: "abort",
        delayMs: 0,
      })
    ).rejects.toThrow("send failed for");
    expect([...store.uids]).toEqual(["old"]);
  });
});
