import { describe, it, expect } from "vitest";
import { defaultOrderSpec, parseOrderSpec, parseOrderToken } from "../order-tokens.js";
import { MalformedOrderSpec } from "../../core/errors.js";
import type { SectionMap } from "../../core/types.js";

describe("parseOrderToken", () => {
  it("maps abbreviations to labels", () => {
    expect(parseOrderToken("V1").label).toEqual({ kind: "Verse", index: 1 });
    expect(parseOrderToken("V").label).toEqual({ kind: "Verse" });
    expect(parseOrderToken("C").label).toEqual({ kind: "Chorus" });
    expect(parseOrderToken("B").label).toEqual({ kind: "Bridge" });
    expect(parseOrderToken("Va").label).toEqual({ kind: "Vamp" });
    expect(parseOrderToken("PC").label).toEqual({ kind: "PreChorus" });
    expect(parseOrderToken("Intro").label).toEqual({ kind: "Intro" });
    expect(parseOrderToken("Outro").label).toEqual({ kind: "Outro" });
    expect(parseOrderToken("Tag").label).toEqual({ kind: "Tag" });
  });

  it("is case-insensitive and trims", () => {
    expect(parseOrderToken(" va ")).toEqual({ text: "va", label: { kind: "Vamp" } });
    expect(parseOrderToken("c2").label).toEqual({ kind: "Chorus", index: 2 });
  });

  it("reads a part letter only after an index", () => {
    expect(parseOrderToken("C1a").label).toEqual({ kind: "Chorus", index: 1, variant: "A" });
    expect(parseOrderToken("V2B").label).toEqual({ kind: "Verse", index: 2, variant: "B" });
    expect(parseOrderToken("Va").label).toEqual({ kind: "Vamp" });
    expect(() => parseOrderToken("Cb")).toThrow(MalformedOrderSpec);
  });

  it("accepts multi-digit indexes", () => {
    expect(parseOrderToken("V10").label).toEqual({ kind: "Verse", index: 10 });
  });

  it("rejects unknown tokens", () => {
    expect(() => parseOrderToken("X1")).toThrow(MalformedOrderSpec);
    expect(() => parseOrderToken("V0")).toThrow(MalformedOrderSpec);
    expect(() => parseOrderToken("")).toThrow(MalformedOrderSpec);
  });
});

describe("parseOrderSpec", () => {
  it("splits on dashes", () => {
    expect(parseOrderSpec("V1-C-V2-C-Va").map((t) => t.text)).toEqual([
      "V1",
      "C",
      "V2",
      "C",
      "Va",
    ]);
  });

  it("returns no tokens for a blank spec", () => {
    expect(parseOrderSpec("")).toEqual([]);
    expect(parseOrderSpec("   ")).toEqual([]);
  });

  it("reports the spec and the offending token", () => {
    try {
      parseOrderSpec("V1-X1-C");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedOrderSpec);
      if (err instanceof MalformedOrderSpec) {
        expect(err.spec).toBe("V1-X1-C");
        expect(err.token).toBe("X1");
        expect(err.code).toBe("MALFORMED_ORDER_SPEC");
      }
    }
  });

  it("rejects an empty token between dashes", () => {
    expect(() => parseOrderSpec("V1--C")).toThrow('Order "V1--C" contains an empty token');
  });
});

describe("defaultOrderSpec", () => {
  it("lists sections in document order", () => {
    const sections: SectionMap = new Map();
    sections.set("Verse#1", { label: { kind: "Verse", index: 1 }, lines: ["a"] });
    sections.set("Chorus", { label: { kind: "Chorus" }, lines: ["b"] });
    sections.set("Verse#2", { label: { kind: "Verse", index: 2 }, lines: ["c"] });
    sections.set("Vamp", { label: { kind: "Vamp" }, lines: ["d"] });
    expect(defaultOrderSpec(sections)).toBe("V1-C-V2-Va");
  });
});
