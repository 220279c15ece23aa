import type { OrderToken, SectionKind, SectionMap } from "../core/types";
import { MalformedOrderSpec } from "../core/errors";
import { labelAbbreviation, toVariant } from "../sections/section-label";

// Longer abbreviations first so "Va" is not read as "V" + "a". A part
// letter only follows an index: "V1a" is Verse 1A, "Va" is Vamp.
const TOKEN_PATTERN = /^(va|pc|intro|outro|tag|v|c|b)(?:([1-9]\d*)([ab])?)?$/i;

const TOKEN_KINDS: Record<string, SectionKind> = {
  v: "Verse",
  c: "Chorus",
  b: "Bridge",
  va: "Vamp",
  pc: "PreChorus",
  intro: "Intro",
  outro: "Outro",
  tag: "Tag",
};

export function parseOrderToken(text: string, spec = text): OrderToken {
  const trimmed = text.trim();
  const match = trimmed.match(TOKEN_PATTERN);
  if (!match) {
    throw new MalformedOrderSpec(spec, trimmed);
  }
  const [, abbrev, digits, letter] = match;
  const kind = TOKEN_KINDS[abbrev.toLowerCase()];
  if (digits === undefined) return { text: trimmed, label: { kind } };
  const index = parseInt(digits, 10);
  const variant = toVariant(letter);
  return { text: trimmed, label: variant ? { kind, index, variant } : { kind, index } };
}

/**
 * Tokenize an order spec ("V1-C-V2-C-Va"). A blank spec is an empty order;
 * any empty or unknown token rejects the whole spec.
 */
export function parseOrderSpec(spec: string): OrderToken[] {
  if (spec.trim() === "") return [];
  return spec.split("-").map((part) => parseOrderToken(part, spec));
}

/** The sections in document order, written as an order spec */
export function defaultOrderSpec(sections: SectionMap): string {
  return [...sections.values()]
    .map((section) => labelAbbreviation(section.label))
    .join("-");
}
