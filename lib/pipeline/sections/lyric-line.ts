/**
 * Line-level cleanup for text pulled out of chord charts and lead sheets.
 *
 * Chord rows, publisher footers, tempo/key headers and navigation cues are
 * not lyrics; everything else is normalized and kept.
 */

const CHORD = new RegExp(
  "^[A-G][#b]?" + // root
    "(?:maj|min|m|dim|aug|sus|add)?" + // quality
    "[0-9]*" + // extension
    "(?:\\([0-9]+\\))?" + // parenthesized extension, G(4)
    "(?:/[A-G][#b]?)?$" // bass note
);

// Chord spellings that are also everyday words at the start of a lyric line.
const AMBIGUOUS_CHORDS = new Set(["A", "Am"]);

const REPEAT_MARKS = new Set(["x2", "x3", "x4", "|", "||", "-"]);

const FOOTER_MARKERS = [
  "ccli",
  "license",
  "copyright",
  "©",
  "www.",
  ".com",
  ".org",
  "all rights reserved",
  "used by permission",
  "terms of use",
  "songselect",
  "praisecharts",
  "praise charts",
  "integrity music",
  "based on the recording",
];

const METADATA_LINE = /^(?:key|tempo|time|bpm)\s*[-–:]/i;

const NAVIGATION_MARKERS = [
  /\(\s*to\s+[^)]*\)/gi, // (To Chorus), (To Turnaround)
  /\(\s*\d+\.\s*\)/g, // (1.), (2.)
  /^to\s+(?:turnaround|instrumental|chorus|verse|bridge|vamp|coda|intro|outro|ending|tag)\b.*$/i,
];

export function isChord(word: string): boolean {
  const trimmed = word.trim();
  return trimmed !== "" && CHORD.test(trimmed);
}

/** A row made only of chord symbols and bar/repeat marks. */
export function isChordLine(line: string): boolean {
  const words = line
    .split(/[\s|]+/)
    .filter((w) => w !== "" && !REPEAT_MARKS.has(w.toLowerCase()));
  return words.length > 0 && words.every(isChord);
}

export function isFooterLine(line: string): boolean {
  const lower = line.toLowerCase();
  return FOOTER_MARKERS.some((marker) => lower.includes(marker));
}

export function isMetadataLine(line: string): boolean {
  return METADATA_LINE.test(line.trim());
}

/**
 * Headers such as "Instrumental" or "[Turnaround 2]" that close the current
 * section without opening a lyric section.
 */
export function isBreakHeader(line: string, breakHeaders: string[]): boolean {
  const normalized = line
    .trim()
    .replace(/[[\]():]/g, "")
    .trim()
    .toLowerCase();
  if (!normalized) return false;
  return breakHeaders.some((header) => {
    const h = header.toLowerCase();
    return normalized === h || new RegExp(`^${escapeRegex(h)}\\s+\\d+$`).test(normalized);
  });
}

/**
 * Normalize one lyric line. Returns null when the line carries no lyrics.
 */
export function cleanLyricLine(line: string): string | null {
  let text = line.replace(/\u0000/g, "").replace(/\u00a0/g, " ").trim();
  if (!text) return null;
  if (isChordLine(text) || isFooterLine(text) || isMetadataLine(text)) {
    return null;
  }

  for (const marker of NAVIGATION_MARKERS) {
    text = text.replace(marker, " ");
  }

  text = text
    .split(/\s+/)
    .filter((word) => word !== "" && !isInlineChord(word))
    .join(" ");

  text = text
    // Hyphenated syllables under notes: "sor - rows" -> "sorrows"
    .replace(/(\w)\s+-\s+(\w)/g, "$1$2")
    .replace(/,(?=[A-Za-z])/g, ", ")
    // Words glued by extraction: "everlastingYou" -> "everlasting You"
    .replace(/([a-z])([A-Z])/g, "$1 $2")
    .replace(/\s{2,}/g, " ")
    .trim();

  return text.length < 2 ? null : text;
}

function isInlineChord(word: string): boolean {
  if (AMBIGUOUS_CHORDS.has(word)) return false;
  return isChord(word) || /^\/[A-G][#b]?$/.test(word);
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
