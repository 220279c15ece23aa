import type { LabelVariant, SectionKind, SectionLabel } from "../core/types";

const KIND_KEYWORDS: [RegExp, SectionKind][] = [
  [/^pre[\s-]?chorus$/i, "PreChorus"],
  [/^verse$/i, "Verse"],
  [/^chorus$/i, "Chorus"],
  [/^bridge$/i, "Bridge"],
  [/^vamp$/i, "Vamp"],
  [/^intro$/i, "Intro"],
  [/^outro$/i, "Outro"],
  [/^tag$/i, "Tag"],
];

const DISPLAY_NAMES: Record<SectionKind, string> = {
  Verse: "Verse",
  Chorus: "Chorus",
  Bridge: "Bridge",
  Vamp: "Vamp",
  PreChorus: "Pre-Chorus",
  Intro: "Intro",
  Outro: "Outro",
  Tag: "Tag",
  Other: "Other",
};

const ABBREVIATIONS: Record<SectionKind, string> = {
  Verse: "V",
  Chorus: "C",
  Bridge: "B",
  Vamp: "Va",
  PreChorus: "PC",
  Intro: "Intro",
  Outro: "Outro",
  Tag: "Tag",
  Other: "Other",
};

// Tried in priority order; each yields the candidate label text.
const LABEL_MATCHERS: ((line: string) => string | null)[] = [
  (line) => line.match(/^\[([^\]]+)\]$/)?.[1] ?? null,
  (line) => line.match(/^(.+?)\s*:$/)?.[1] ?? null,
  (line) => line,
];

const LABEL_BODY = /^([a-z]+(?:[\s-][a-z]+)?)\s*(?:(\d+)\s*([ab])?)?$/i;
// "Chorus x2", "Tag (x3)": how often the band repeats it, not part of the label
const REPEAT_SUFFIX = /\s*\(?\s*x\s*\d+\s*\)?$/i;
const EDGE_PUNCTUATION = /^[\s.,;:!?'"()[\]*_~-]+|[\s.,;:!?'"()[\]*_~-]+$/g;

/**
 * Recognize a section label line ("[Verse 1]", "CHORUS", "Bridge:").
 * Returns null for anything that is not a label.
 */
export function parseSectionLabel(line: string): SectionLabel | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  for (const matcher of LABEL_MATCHERS) {
    const candidate = matcher(trimmed);
    if (candidate === null) continue;
    const label = parseLabelBody(
      candidate.replace(EDGE_PUNCTUATION, "").replace(REPEAT_SUFFIX, "")
    );
    if (label) return label;
  }
  return null;
}

function parseLabelBody(text: string): SectionLabel | null {
  const match = text.match(LABEL_BODY);
  if (!match) return null;
  const [, keyword, digits, letter] = match;
  const kind = kindFromKeyword(keyword);
  if (!kind) return null;
  if (digits === undefined) return { kind };
  const index = parseInt(digits, 10);
  if (index <= 0) return null;
  const variant = toVariant(letter);
  return variant ? { kind, index, variant } : { kind, index };
}

export function toVariant(letter: string | undefined): LabelVariant | undefined {
  const upper = letter?.toUpperCase();
  return upper === "A" || upper === "B" ? upper : undefined;
}

function indexSuffix(label: SectionLabel): string {
  return label.index === undefined ? "" : `${label.index}${label.variant ?? ""}`;
}

export function kindFromKeyword(keyword: string): SectionKind | null {
  const normalized = keyword.trim().replace(/\s+/g, " ");
  for (const [pattern, kind] of KIND_KEYWORDS) {
    if (pattern.test(normalized)) return kind;
  }
  return null;
}

/** Stable map key: "Verse#1", "Chorus#1A", "Chorus" */
export function labelKey(label: SectionLabel): string {
  return label.index === undefined ? label.kind : `${label.kind}#${indexSuffix(label)}`;
}

/** Slide title form: "Verse 1", "Chorus", "Pre-Chorus 2", "Chorus 1A" */
export function displayTitle(label: SectionLabel): string {
  const name = DISPLAY_NAMES[label.kind];
  return label.index === undefined ? name : `${name} ${indexSuffix(label)}`;
}

/** Order-spec form: "V1", "C", "Va", "PC2", "C1A" */
export function labelAbbreviation(label: SectionLabel): string {
  return `${ABBREVIATIONS[label.kind]}${indexSuffix(label)}`;
}
