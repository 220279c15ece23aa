import { describe, it, expect } from "vitest";
import { slugFromPath, songTitleFromFilename } from "../slug.js";

describe("slugFromPath", () => {
  it("strips directory and extension", () => {
    expect(slugFromPath("/some/dir/Psalm 90.pdf")).toBe("psalm-90");
  });

  it("lowercases", () => {
    expect(slugFromPath("HolyHoly.pdf")).toBe("holyholy");
  });

  it("replaces non-alphanumeric with hyphens", () => {
    expect(slugFromPath("03. Psalm 90 - C~D.pdf")).toBe("03-psalm-90-c-d");
  });

  it("strips leading and trailing hyphens", () => {
    expect(slugFromPath("--amen--.pdf")).toBe("amen");
  });

  it("handles paths without extension", () => {
    expect(slugFromPath("simple")).toBe("simple");
  });
});

describe("songTitleFromFilename", () => {
  it("drops the set-list number and the key", () => {
    expect(songTitleFromFilename("charts/03. Psalm 90 - C~D.pdf")).toBe("Psalm 90");
  });

  it("drops a single key suffix", () => {
    expect(songTitleFromFilename("Amazing Grace - G.pdf")).toBe("Amazing Grace");
    expect(songTitleFromFilename("Be Thou My Vision - Eb.pdf")).toBe("Be Thou My Vision");
  });

  it("keeps titles without number or key", () => {
    expect(songTitleFromFilename("Trading My Sorrows.pdf")).toBe("Trading My Sorrows");
  });

  it("keeps a dash that is part of the title", () => {
    expect(songTitleFromFilename("10. Holy - Forever.pdf")).toBe("Holy - Forever");
  });
});
