import type { Section, SectionMap } from "../core/types";
import { ConflictingSectionBody, NoSectionsFound } from "../core/errors";
import { displayTitle, labelKey, parseSectionLabel } from "./section-label";
import { cleanLyricLine, isBreakHeader } from "./lyric-line";

export interface ExtractSectionsOptions {
  /** Headers that close the current section without opening one */
  breakHeaders?: string[];
  /** Strip chords, footers and navigation cues from lyric lines (default true) */
  cleanLines?: boolean;
}

/**
 * Partition extracted document lines into labeled sections.
 *
 * Lines before the first label are front matter and are dropped. A label
 * seen again with the same body is a repeat marker; with a different body
 * it is rejected.
 */
export function extractSections(
  lines: readonly string[],
  options: ExtractSectionsOptions = {}
): SectionMap {
  const breakHeaders = options.breakHeaders ?? [];
  const cleanLines = options.cleanLines ?? true;
  const sections: SectionMap = new Map();
  let current: Section | null = null;

  for (const line of lines) {
    const label = parseSectionLabel(line);
    if (label) {
      if (current) commitSection(sections, current);
      current = { label, lines: [] };
      continue;
    }

    if (isBreakHeader(line, breakHeaders)) {
      if (current) commitSection(sections, current);
      current = null;
      continue;
    }

    if (!current) continue;

    const text = cleanLines ? cleanLyricLine(line) : line.trim();
    if (text) current.lines.push(text);
  }

  if (current) commitSection(sections, current);

  if (sections.size === 0) {
    throw new NoSectionsFound();
  }
  return sections;
}

function commitSection(sections: SectionMap, section: Section): void {
  const key = labelKey(section.label);
  const existing = sections.get(key);
  if (!existing) {
    sections.set(key, section);
    return;
  }
  // A bare repeat of the label ("Chorus" with nothing under it) or an
  // identical copy refers back to the stored section.
  if (section.lines.length === 0 || sameBody(existing, section)) return;
  throw new ConflictingSectionBody(displayTitle(section.label));
}

function sameBody(a: Section, b: Section): boolean {
  return (
    a.lines.length === b.lines.length &&
    a.lines.every((line, i) => line === b.lines[i])
  );
}
