import { describe, it, expect } from "vitest";
import { mergeSessionEvents } from "./mergeSessionEvents";
import { makeEvent } from "@/lib/testing/fakes";

describe("mergeSessionEvents", () => {
  it("keeps the detail record when both views describe the same session", () => {
    const text = makeEvent({ uid: "txt:a", source: "text", date: "10.03.2026", title: "Stadtverordnetenversammlung" });
    const detail = makeEvent({ uid: "ksinr:1201", source: "detail", date: "10.03.2026", title: "STADTVERORDNETENVERSAMMLUNG " });
    expect(mergeSessionEvents([text, detail])).toEqual([detail]);
  });

  it("keeps text-only sessions", () => {
    const text = makeEvent({ uid: "txt:b", source: "text", date: "12.03.2026", title: "Bauausschuss" });
    const detail = makeEvent({ uid: "ksinr:1201", source: "detail", date: "10.03.2026", title: "Bauausschuss" });
    expect(mergeSessionEvents([text, detail])).toEqual([text, detail]);
  });

  it("never drops external records, even when their signature matches a session", () => {
    const detail = makeEvent({ uid: "ksinr:1", source: "detail", date: "10.03.2026", title: "Stadtfest" });
    const external = makeEvent({ uid: "ext:1", source: "external-structured", date: "10.03.2026", title: "Stadtfest" });
    expect(mergeSessionEvents([detail, external])).toEqual([detail, external]);
  });

  it("holds each uid once", () => {
    const a = makeEvent({ uid: "ext:1", source: "external-fallback", title: "A" });
    const b = makeEvent({ uid: "ext:1", source: "external-fallback", title: "B" });
    expect(mergeSessionEvents([a, b])).toEqual([a]);
  });
});
