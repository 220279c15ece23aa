import { describe, it, expect } from "vitest";
import { renderPrompt } from "../prompt";

describe("renderPrompt", () => {
  const context = {
    song_title: "Psalm 90",
    section_title: "Verse 1",
    lyrics: "Lord You have been\nour dwelling place",
  };

  it("renders the lyrics_cleanup template", async () => {
    const messages = await renderPrompt("lyrics_cleanup", context);
    expect(messages.map((m) => m.role)).toEqual(["system", "user"]);
  });

  it("substitutes variables into the template", async () => {
    const [, user] = await renderPrompt("lyrics_cleanup", context);
    expect(user.content).toContain('Song: "Psalm 90"');
    expect(user.content).toContain("Section: Verse 1");
    expect(user.content).toContain("Lord You have been\nour dwelling place");
  });

  it("system content is a trimmed string", async () => {
    const [system] = await renderPrompt("lyrics_cleanup", context);
    expect(system.content).not.toMatch(/^\s/);
    expect(system.content).not.toMatch(/\s$/);
    expect(system.content).toContain("Keep the original line breaks");
  });

  it("fails for a missing template", async () => {
    await expect(renderPrompt("no_such_prompt", context)).rejects.toThrow();
  });
});
