/**
 * Song order files: one song per line, e.g.
 *
 *   Psalm 90: V1-V2-C-V3-C
 *   Trading My Sorrows C Va C Va V
 *   # comments and blank lines are ignored
 */

export interface SongOrderLine {
  title: string;
  /** Order tokens; empty when the line only names the song */
  tokens: string[];
}

const INLINE_MARKER = /\s+(?:V\d*|C\d*|B\d*|Va|PC|Intro|Outro|Tag)(?=[-\s]|$)/i;

const LONG_NAMES: [RegExp, string][] = [
  [/^verse(\d*)$/i, "V$1"],
  [/^chorus(\d*)$/i, "C$1"],
  [/^bridge(\d*)$/i, "B$1"],
  [/^vamp(\d*)$/i, "Va$1"],
  [/^pre-?chorus(\d*)$/i, "PC$1"],
];

export function parseSongOrderLine(line: string): SongOrderLine | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;

  const colon = trimmed.indexOf(":");
  if (colon !== -1) {
    return {
      title: trimmed.slice(0, colon).trim(),
      tokens: normalizeOrderTokens(trimmed.slice(colon + 1)),
    };
  }

  const marker = trimmed.match(INLINE_MARKER);
  if (marker?.index !== undefined) {
    return {
      title: trimmed.slice(0, marker.index).trim(),
      tokens: normalizeOrderTokens(trimmed.slice(marker.index)),
    };
  }

  return { title: trimmed, tokens: [] };
}

/**
 * Split a loosely written order ("Verse 1 C - V2") into abbreviation tokens.
 * Tokens are not validated here; the order resolver does that.
 */
export function normalizeOrderTokens(order: string): string[] {
  return order
    .replace(/\b(verse|chorus|bridge|vamp)\s+(\d+)\b/gi, "$1$2")
    .replace(/\bpre-chorus\b/gi, "prechorus")
    .split(/[-\s]+/)
    .filter((token) => token !== "")
    .map((token) => {
      for (const [pattern, replacement] of LONG_NAMES) {
        if (pattern.test(token)) return token.replace(pattern, replacement);
      }
      return token;
    });
}

export function toOrderSpec(tokens: string[]): string {
  return tokens.join("-");
}

/** Titles mapped to their order tokens; lines without an order are skipped. */
export function parseSongOrderFile(content: string): Map<string, string[]> {
  const orders = new Map<string, string[]>();
  for (const line of content.split(/\r?\n/)) {
    const parsed = parseSongOrderLine(line);
    if (parsed && parsed.title && parsed.tokens.length > 0) {
      orders.set(parsed.title, parsed.tokens);
    }
  }
  return orders;
}

/**
 * Find the order for a song title: exact match, then one title containing
 * the other, then the entry sharing the most words (at least two).
 */
export function matchSongOrder(
  title: string,
  orders: Map<string, string[]>
): string[] | undefined {
  const wanted = title.trim().toLowerCase();

  for (const [name, tokens] of orders) {
    if (name.trim().toLowerCase() === wanted) return tokens;
  }

  for (const [name, tokens] of orders) {
    const candidate = name.trim().toLowerCase();
    if (candidate.includes(wanted) || wanted.includes(candidate)) return tokens;
  }

  const wantedWords = new Set(wanted.split(/\s+/));
  let best: string[] | undefined;
  let bestScore = 0;
  for (const [name, tokens] of orders) {
    const score = name
      .toLowerCase()
      .split(/\s+/)
      .filter((word, i, all) => wantedWords.has(word) && all.indexOf(word) === i).length;
    if (score > bestScore) {
      bestScore = score;
      best = tokens;
    }
  }
  return bestScore >= 2 ? best : undefined;
}
