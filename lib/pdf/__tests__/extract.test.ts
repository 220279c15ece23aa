import { describe, it, expect } from "vitest";
import { arrangeColumns, extractPdfText, groupIntoLines } from "../extract";
import { column, createLyricsPdf } from "./create-test-pdf";

describe("extractPdfText", () => {
  it("reads a single-column sheet top to bottom", () => {
    const pdfBuffer = createLyricsPdf([
      column(["[Verse 1]", "I love you", "[Chorus]", "Holy is he"], 72),
    ]);
    const { lines, pageCount } = extractPdfText({ pdfBuffer });

    expect(pageCount).toBe(1);
    expect(lines).toContain("[Verse 1]");
    expect(lines).toContain("Holy is he");
    expect(lines.indexOf("[Verse 1]")).toBeLessThan(lines.indexOf("I love you"));
    expect(lines.indexOf("I love you")).toBeLessThan(lines.indexOf("[Chorus]"));
  });

  it("reads pages in order", () => {
    const pdfBuffer = createLyricsPdf([
      column(["[Verse 1]", "First page"], 72),
      column(["[Chorus]", "Second page"], 72),
    ]);
    const { lines, pageCount } = extractPdfText({ pdfBuffer });

    expect(pageCount).toBe(2);
    expect(lines.indexOf("First page")).toBeLessThan(lines.indexOf("Second page"));
  });

  it("reads the left column before the right one", () => {
    const pdfBuffer = createLyricsPdf([
      [
        ...column(["[Verse 1]", "Left one", "Left two"], 72, 720),
        ...column(["[Chorus]", "Right one", "Right two"], 340, 710),
      ],
    ]);
    const { lines } = extractPdfText({ pdfBuffer, layout: "columns" });

    expect(lines).toEqual([
      "[Verse 1]",
      "Left one",
      "Left two",
      "[Chorus]",
      "Right one",
      "Right two",
    ]);
  });

  it("returns the document title when set", () => {
    const pdfBuffer = createLyricsPdf([column(["[Chorus]", "Sing"], 72)], "Psalm 90");
    expect(extractPdfText({ pdfBuffer }).title).toBe("Psalm 90");
  });

  it("leaves the title undefined when absent", () => {
    const pdfBuffer = createLyricsPdf([column(["[Chorus]", "Sing"], 72)]);
    expect(extractPdfText({ pdfBuffer }).title).toBeUndefined();
  });
});

describe("arrangeColumns", () => {
  it("splits fragments at the page midline", () => {
    const lines = arrangeColumns(
      [
        { text: "Right top", x: 320, y: 80 },
        { text: "Left top", x: 40, y: 80 },
        { text: "Left bottom", x: 40, y: 100 },
        { text: "Right bottom", x: 320, y: 100 },
      ],
      612
    );
    expect(lines).toEqual(["Left top", "Left bottom", "Right top", "Right bottom"]);
  });
});

describe("groupIntoLines", () => {
  it("joins fragments on the same baseline left to right", () => {
    expect(
      groupIntoLines([
        { text: "world", x: 120, y: 52 },
        { text: "Hello", x: 40, y: 50 },
        { text: "Next line", x: 40, y: 70 },
      ])
    ).toEqual(["Hello world", "Next line"]);
  });

  it("drops empty fragments and NUL characters", () => {
    expect(
      groupIntoLines([
        { text: "  ", x: 40, y: 10 },
        { text: "Ho\u0000ly", x: 40, y: 30 },
      ])
    ).toEqual(["Holy"]);
  });
});
