import { describe, it, expect } from "vitest";
import { collectJsonLdEvents, dateTimeFromIsoRange, extractJsonLdEvents, locationFromJsonLd } from "./jsonLdEvent";
import { readFixture } from "@/lib/testing/fakes";

describe("dateTimeFromIsoRange", () => {
  it("formats a start/end pair on the same evening as a range", () => {
    expect(dateTimeFromIsoRange("2026-03-10T19:00:00", "2026-03-10T21:00:00")).toEqual({
      date: "10.03.2026",
      time: "19:00 bis 21:00 Uhr",
    });
  });

  it("shows a single time when the end is missing or equal", () => {
    expect(dateTimeFromIsoRange("2026-03-10T19:00:00")).toEqual({ date: "10.03.2026", time: "19:00 Uhr" });
    expect(dateTimeFromIsoRange("2026-03-10T19:00", "2026-03-11T19:00")).toEqual({ date: "10.03.2026", time: "19:00 Uhr" });
  });

  it("copies the wall-clock time without converting offsets", () => {
    expect(dateTimeFromIsoRange("2026-03-10T19:00:00+01:00", "2026-03-10T22:30:00+01:00")).toEqual({
      date: "10.03.2026",
      time: "19:00 bis 22:30 Uhr",
    });
  });

  it("has no time for date-only values", () => {
    expect(dateTimeFromIsoRange("2026-03-10")).toEqual({ date: "10.03.2026", time: "" });
  });

  it("keeps unparsable start text as the date", () => {
    expect(dateTimeFromIsoRange("  im Frühjahr ")).toEqual({ date: "im Frühjahr", time: "" });
    expect(dateTimeFromIsoRange(undefined)).toEqual({ date: "", time: "" });
  });
});

describe("locationFromJsonLd", () => {
  it("joins place name, street and postal code with locality", () => {
    expect(
      locationFromJsonLd({
        "@type": "Place",
        name: "Marktplatz",
        address: { streetAddress: "Am Markt 1", postalCode: "37213", addressLocality: "Witzenhausen" },
      })
    ).toBe("Marktplatz, Am Markt 1, 37213 Witzenhausen");
  });

  it("omits absent parts", () => {
    expect(locationFromJsonLd({ name: "Marktplatz", address: { addressLocality: "Witzenhausen" } })).toBe(
      "Marktplatz, Witzenhausen"
    );
    expect(locationFromJsonLd({ address: { streetAddress: "Am Markt 1" } })).toBe("Am Markt 1");
  });

  it("accepts plain strings and arrays", () => {
    expect(locationFromJsonLd("Rathaus")).toBe("Rathaus");
    expect(locationFromJsonLd([{ name: "Bürgerhaus" }, { name: "Zweiter Ort" }])).toBe("Bürgerhaus");
    expect(locationFromJsonLd(undefined)).toBe("");
  });
});

describe("collectJsonLdEvents", () => {
  it("finds events at any depth, including typed arrays and subtypes", () => {
    const events = collectJsonLdEvents({
      "@graph": [
        { "@type": "WebPage", name: "Seite" },
        { "@type": ["Thing", "Event"], name: "A" },
        { "@type": "ItemList", itemListElement: [{ item: { "@type": "MusicEvent", name: "B" } }] },
      ],
    });
    expect(events.map((e) => e.name)).toEqual(["A", "B"]);
  });

  it("survives very deep nesting", () => {
    let value: unknown = { "@type": "Event", name: "tief" };
    for (let i = 0; i < 50_000; i++) value = [value];
    expect(collectJsonLdEvents(value)).toHaveLength(1);
  });
});

describe("extractJsonLdEvents", () => {
  it("skips invalid blocks and reads the valid one", () => {
    const events = extractJsonLdEvents(readFixture("municipal/event-structured.html"));
    expect(events).toHaveLength(1);
    expect(events[0]?.name).toBe("Stadtfest");
  });

  it("returns nothing for pages without JSON-LD", () => {
    expect(extractJsonLdEvents(readFixture("municipal/event-fallback.html"))).toEqual([]);
  });
});
