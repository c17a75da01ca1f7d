import { describe, expect, it } from "vitest";
import {
  CITATION_ID_MAX,
  CitationRegistry,
  findCitationReferences,
  formatCitationGroup,
  formatCitationId,
  isCitationId,
  quoteHash
} from "../src/pipeline/citations.js";

describe("citation ids", () => {
  it("zero-pads to three digits", () => {
    expect(formatCitationId(1)).toBe("C001");
    expect(formatCitationId(42)).toBe("C042");
    expect(formatCitationId(CITATION_ID_MAX)).toBe("C999");
  });

  it("rejects numbers outside the id space", () => {
    expect(() => formatCitationId(0)).toThrow(RangeError);
    expect(() => formatCitationId(1000)).toThrow(RangeError);
    expect(() => formatCitationId(1.5)).toThrow(RangeError);
  });

  it("only accepts an uppercase C followed by exactly three digits", () => {
    expect(isCitationId("C001")).toBe(true);
    expect(isCitationId("c001")).toBe(false);
    expect(isCitationId("C01")).toBe(false);
    expect(isCitationId("C0001")).toBe(false);
    expect(isCitationId(" C001")).toBe(false);
  });

  it("formats a group with comma and space separators", () => {
    expect(formatCitationGroup(["C001"])).toBe("(C001)");
    expect(formatCitationGroup(["C001", "C002", "C010"])).toBe("(C001, C002, C010)");
  });

  it("hashes quotes to the first 16 hex chars of their md5", () => {
    // md5("hello") = 5d41402abc4b2a76b9719d911017c592
    expect(quoteHash("hello")).toBe("5d41402abc4b2a76");
  });

  it("finds every id inside parenthesised groups only", () => {
    const text = "Claim one (C001). Claim two (C002, C003) and a stray C004 outside.\nLoose (C005 ,C006)";
    expect(findCitationReferences(text)).toEqual(["C001", "C002", "C003", "C005", "C006"]);
    expect(findCitationReferences("no groups here (see above)")).toEqual([]);
  });
});

describe("CitationRegistry", () => {
  it("allocates ids in sequence and looks them up", () => {
    const registry = new CitationRegistry();
    const a = registry.add({ url: "https://example.com/a", title: "A", quote: "hello" });
    const b = registry.add({ url: "https://example.com/b", title: "B", locator: "p. 4", fetchedAt: "2026-01-01T00:00:00.000Z" });

    expect(a.cid).toBe("C001");
    expect(a.locator).toBe("");
    expect(a.quoteHash).toBe("5d41402abc4b2a76");
    expect(b).toEqual({
      cid: "C002",
      url: "https://example.com/b",
      title: "B",
      locator: "p. 4",
      fetchedAt: "2026-01-01T00:00:00.000Z"
    });
    expect(registry.lookup("C002")?.title).toBe("B");
    expect(registry.lookup("C003")).toBeNull();
    expect(registry.has("C001")).toBe(true);
    expect(registry.size).toBe(2);
  });

  it("continues after the highest registered id so ids are never reused", () => {
    const registry = new CitationRegistry();
    registry.register("C005", { url: "u5", title: "five" });
    registry.register("C002", { url: "u2", title: "two" });
    expect(registry.nextId()).toBe("C006");
    expect(registry.nextId()).toBe("C007");
    expect(registry.all().map((c) => c.cid)).toEqual(["C005", "C002"]);
  });

  it("rejects malformed and duplicate ids", () => {
    const registry = new CitationRegistry();
    registry.register("C001", { url: "u", title: "t" });
    expect(() => registry.register("C001", { url: "u", title: "t" })).toThrow("Citation id already registered: C001");
    expect(() => registry.register("X001", { url: "u", title: "t" })).toThrow(RangeError);
    expect(registry.size).toBe(1);
  });

  it("refuses to allocate beyond C999", () => {
    const registry = new CitationRegistry();
    registry.register("C999", { url: "u", title: "t" });
    expect(() => registry.nextId()).toThrow(RangeError);
  });

  it("counts references that resolve and those that do not", () => {
    const registry = new CitationRegistry();
    registry.add({ url: "u1", title: "t1" });
    registry.add({ url: "u2", title: "t2" });
    expect(registry.countValid("First (C001). Second (C002, C009).")).toEqual({ valid: 2, invalid: 1 });
    expect(registry.findReferences("(C002)")).toEqual(["C002"]);
  });

  it("reset clears entries and restarts numbering", () => {
    const registry = new CitationRegistry();
    registry.add({ url: "u1", title: "t1" });
    registry.reset();
    expect(registry.size).toBe(0);
    expect(registry.lookup("C001")).toBeNull();
    expect(registry.add({ url: "u2", title: "t2" }).cid).toBe("C001");
  });

  it("round-trips through a snapshot without sharing state", () => {
    const registry = new CitationRegistry();
    registry.add({ url: "u1", title: "t1", fetchedAt: "2026-01-01T00:00:00.000Z" });
    registry.add({ url: "u2", title: "t2", fetchedAt: "2026-01-01T00:00:00.000Z", localPath: "cache/u2.html" });

    const snapshot = JSON.parse(JSON.stringify(registry));
    const restored = CitationRegistry.fromSnapshot(snapshot);
    expect(restored.all()).toEqual(registry.all());
    expect(restored.nextId()).toBe("C003");

    const copy = registry.all();
    copy.pop();
    expect(registry.size).toBe(2);
  });
});
