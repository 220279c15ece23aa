import { describe, it, expect } from "vitest";
import {
  parseSectionLabel,
  labelKey,
  displayTitle,
  labelAbbreviation,
} from "../section-label.js";

describe("parseSectionLabel", () => {
  it("reads bracketed labels", () => {
    expect(parseSectionLabel("[Verse 1]")).toEqual({ kind: "Verse", index: 1 });
    expect(parseSectionLabel("[Chorus]")).toEqual({ kind: "Chorus" });
  });

  it("reads trailing-colon labels", () => {
    expect(parseSectionLabel("Bridge:")).toEqual({ kind: "Bridge" });
    expect(parseSectionLabel("Verse 2 :")).toEqual({ kind: "Verse", index: 2 });
  });

  it("reads bare labels case-insensitively", () => {
    expect(parseSectionLabel("CHORUS")).toEqual({ kind: "Chorus" });
    expect(parseSectionLabel("  vamp  ")).toEqual({ kind: "Vamp" });
    expect(parseSectionLabel("Verse3")).toEqual({ kind: "Verse", index: 3 });
  });

  it("accepts every pre-chorus spelling", () => {
    expect(parseSectionLabel("Pre-Chorus")).toEqual({ kind: "PreChorus" });
    expect(parseSectionLabel("[Prechorus 2]")).toEqual({ kind: "PreChorus", index: 2 });
    expect(parseSectionLabel("pre chorus:")).toEqual({ kind: "PreChorus" });
  });

  it("reads intro, outro and tag", () => {
    expect(parseSectionLabel("Intro")).toEqual({ kind: "Intro" });
    expect(parseSectionLabel("[Outro]")).toEqual({ kind: "Outro" });
    expect(parseSectionLabel("Tag:")).toEqual({ kind: "Tag" });
  });

  it("trims surrounding punctuation", () => {
    expect(parseSectionLabel("*Chorus*")).toEqual({ kind: "Chorus" });
    expect(parseSectionLabel("(Verse 1)")).toEqual({ kind: "Verse", index: 1 });
  });

  it("rejects lyric lines", () => {
    expect(parseSectionLabel("Holy is the Lord")).toBeNull();
    expect(parseSectionLabel("Chorus of angels sing")).toBeNull();
    expect(parseSectionLabel("Jesus:")).toBeNull();
    expect(parseSectionLabel("")).toBeNull();
    expect(parseSectionLabel("   ")).toBeNull();
  });

  it("reads a part letter after the index", () => {
    expect(parseSectionLabel("CHORUS 1A")).toEqual({ kind: "Chorus", index: 1, variant: "A" });
    expect(parseSectionLabel("[Verse 2b]")).toEqual({ kind: "Verse", index: 2, variant: "B" });
  });

  it("ignores a repeat count after the label", () => {
    expect(parseSectionLabel("Chorus x2")).toEqual({ kind: "Chorus" });
    expect(parseSectionLabel("[Verse 1 x2]")).toEqual({ kind: "Verse", index: 1 });
    expect(parseSectionLabel("Tag (x3)")).toEqual({ kind: "Tag" });
    expect(parseSectionLabel("Sing it x2")).toBeNull();
  });

  it("rejects a zero index", () => {
    expect(parseSectionLabel("Verse 0")).toBeNull();
  });
});

describe("label helpers", () => {
  it("builds stable keys", () => {
    expect(labelKey({ kind: "Verse", index: 1 })).toBe("Verse#1");
    expect(labelKey({ kind: "Chorus" })).toBe("Chorus");
  });

  it("builds display titles", () => {
    expect(displayTitle({ kind: "Verse", index: 1 })).toBe("Verse 1");
    expect(displayTitle({ kind: "Chorus" })).toBe("Chorus");
    expect(displayTitle({ kind: "PreChorus", index: 2 })).toBe("Pre-Chorus 2");
  });

  it("builds order abbreviations", () => {
    expect(labelAbbreviation({ kind: "Verse", index: 2 })).toBe("V2");
    expect(labelAbbreviation({ kind: "Vamp" })).toBe("Va");
    expect(labelAbbreviation({ kind: "PreChorus" })).toBe("PC");
  });

  it("carries the part letter through keys, titles and abbreviations", () => {
    const label = { kind: "Chorus", index: 1, variant: "A" } as const;
    expect(labelKey(label)).toBe("Chorus#1A");
    expect(displayTitle(label)).toBe("Chorus 1A");
    expect(labelAbbreviation(label)).toBe("C1A");
  });
});
