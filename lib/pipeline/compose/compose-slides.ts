import type { ResolvedOrder, Section, SlideChunk, SlideRecord } from "../core/types";
import { displayTitle, labelKey } from "../sections/section-label";
import { formatSection, type FormatOptions } from "../format/format-section";
import { cleanSection, type CleanSectionOptions } from "../format/clean-section";

export interface ComposeOptions extends FormatOptions {
  /** Optional cleanup applied to each distinct section before formatting */
  cleanup?: CleanSectionOptions;
}

/**
 * Walk the resolved order and emit one slide per formatted chunk. Each
 * distinct section is cleaned and formatted once, however often the order
 * repeats it; every chunk of a section carries the section's title.
 */
export async function composeSlides(
  order: ResolvedOrder,
  options: ComposeOptions
): Promise<SlideRecord[]> {
  const distinct = new Map<string, Section>();
  for (const { section } of order.bindings) {
    const key = labelKey(section.label);
    if (!distinct.has(key)) distinct.set(key, section);
  }

  const prepared = await Promise.all(
    [...distinct].map(
      async ([key, section]) => [key, await prepareSection(section, options)] as const
    )
  );
  const formatted = new Map<string, SlideChunk[]>(prepared);

  const slides: SlideRecord[] = [];
  for (const { section } of order.bindings) {
    const chunks = formatted.get(labelKey(section.label)) ?? [];
    for (const chunk of chunks) {
      slides.push({ title: displayTitle(chunk.label), body: chunk.lines });
    }
  }
  return slides;
}

async function prepareSection(
  section: Section,
  options: ComposeOptions
): Promise<SlideChunk[]> {
  const source = options.cleanup
    ? await cleanSection(section, options.cleanup)
    : section;
  return formatSection(source, options);
}
