import type {
  OrderBinding,
  OrderToken,
  ResolvedOrder,
  Section,
  SectionKind,
  SectionMap,
  VerseRepeatPolicy,
} from "../core/types";
import { SectionNotFound } from "../core/errors";
import { labelKey } from "../sections/section-label";
import { parseOrderSpec } from "./order-tokens";

export interface ResolveOrderOptions {
  verseRepeat?: VerseRepeatPolicy;
}

/**
 * Bind every token of an order spec to an extracted section. The result has
 * exactly one binding per token, in token order.
 */
export function resolveOrder(
  spec: string,
  sections: SectionMap,
  options: ResolveOrderOptions = {}
): ResolvedOrder {
  const tokens = parseOrderSpec(spec);
  const verses = createVerseCursor(sections, options.verseRepeat ?? "advance");

  const bindings: OrderBinding[] = tokens.map((token) => {
    const section = bindToken(token, sections, verses);
    if (!section) {
      throw new SectionNotFound(token.text);
    }
    if (section.label.kind === "Verse") verses.markUsed(section);
    return { token, section };
  });

  return { bindings };
}

function bindToken(
  token: OrderToken,
  sections: SectionMap,
  verses: VerseCursor
): Section | undefined {
  const { label } = token;
  if (label.index !== undefined) {
    return sections.get(labelKey(label));
  }
  if (label.kind === "Verse") {
    return verses.next();
  }
  // "C" against a song that only numbers its choruses binds the first one.
  return (
    sections.get(labelKey(label)) ??
    sectionsOfKind(sections, label.kind)[0]
  );
}

function sectionsOfKind(sections: SectionMap, kind: SectionKind): Section[] {
  return [...sections.values()]
    .filter((s) => s.label.kind === kind)
    .sort((a, b) => (a.label.index ?? 0) - (b.label.index ?? 0));
}

interface VerseCursor {
  next(): Section | undefined;
  markUsed(section: Section): void;
}

/**
 * Tracks which verses bare "V" tokens have consumed. Under "advance" each
 * bare V takes the lowest-index unused verse and wraps to the first once all
 * are used; under "reuse" every bare V repeats the first verse it bound.
 */
function createVerseCursor(
  sections: SectionMap,
  policy: VerseRepeatPolicy
): VerseCursor {
  const verses = sectionsOfKind(sections, "Verse");
  const used = new Set<Section>();
  let firstBound: Section | undefined;

  return {
    next() {
      if (verses.length === 0) return undefined;
      if (policy === "reuse" && firstBound) return firstBound;

      let verse = verses.find((v) => !used.has(v));
      if (!verse) {
        used.clear();
        verse = verses[0];
      }
      firstBound ??= verse;
      return verse;
    },
    markUsed(section) {
      used.add(section);
    },
  };
}
