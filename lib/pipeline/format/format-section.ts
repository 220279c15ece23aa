import type { Section, SlideChunk } from "../core/types";

export const DEFAULT_MAX_LINES = 4;

export interface FormatOptions {
  /** Canonical forms ("He", "Holy Spirit"); matched case-insensitively */
  reverentWords: string[];
  maxLines?: number;
}

/**
 * Build a replacer for whole-word, case-insensitive matches of the given
 * canonical forms. Multi-word forms are tried before their single words.
 */
export function createReverentCapitalizer(
  words: string[]
): (line: string) => string {
  const canonical = new Map<string, string>();
  for (const word of words) {
    const trimmed = word.trim();
    if (trimmed) canonical.set(normalizeKey(trimmed), trimmed);
  }
  if (canonical.size === 0) return (line) => line;

  const alternatives = [...canonical.values()]
    .sort((a, b) => b.length - a.length)
    .map((w) => escapeRegex(w).replace(/\s+/g, "\\s+"));
  const pattern = new RegExp(`\\b(?:${alternatives.join("|")})\\b`, "gi");

  return (line) =>
    line.replace(pattern, (match) => {
      const replacement = canonical.get(normalizeKey(match));
      if (replacement === undefined) return match;
      // Keep the source spacing between the words of a multi-word form.
      const sourceGaps = match.match(/\s+/g) ?? [];
      return replacement
        .split(/\s+/)
        .map((part, i) => (i === 0 ? part : sourceGaps[i - 1] + part))
        .join("");
    });
}

export function capitalizeReverentWords(line: string, words: string[]): string {
  return createReverentCapitalizer(words)(line);
}

/**
 * Partition lines into consecutive chunks of at most `maxLines`. Lines are
 * never split; zero lines give zero chunks.
 */
export function splitIntoChunks(
  lines: readonly string[],
  maxLines = DEFAULT_MAX_LINES
): string[][] {
  if (!Number.isInteger(maxLines) || maxLines < 1) {
    throw new RangeError(`maxLines must be a positive integer, got ${maxLines}`);
  }
  const chunks: string[][] = [];
  for (let i = 0; i < lines.length; i += maxLines) {
    chunks.push(lines.slice(i, i + maxLines));
  }
  return chunks;
}

/**
 * Capitalization pass, then splitting pass. Pure: the same section always
 * yields the same chunks.
 */
export function formatSection(
  section: Section,
  options: FormatOptions
): SlideChunk[] {
  const capitalize = createReverentCapitalizer(options.reverentWords);
  const lines = section.lines.map(capitalize);
  return splitIntoChunks(lines, options.maxLines).map((chunkLines) => ({
    label: section.label,
    lines: chunkLines,
  }));
}

function normalizeKey(word: string): string {
  return word.toLowerCase().replace(/\s+/g, " ");
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
