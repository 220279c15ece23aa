/**
 * Core types for the lyric pipeline.
 *
 * These types define the data that flows from extracted PDF text to the
 * final slide sequence. They are independent of storage, UI, or any
 * external service.
 */

// ============================================================================
// Sections
// ============================================================================

export const SECTION_KINDS = [
  "Verse",
  "Chorus",
  "Bridge",
  "Vamp",
  "PreChorus",
  "Intro",
  "Outro",
  "Tag",
  "Other",
] as const;

export type SectionKind = (typeof SECTION_KINDS)[number];

export interface SectionLabel {
  kind: SectionKind;
  /** Positive integer ("1" in "Verse 1"); absent for a generic label */
  index?: number;
  /** Part letter of a split section ("A" in "Chorus 1A"); only with an index */
  variant?: LabelVariant;
}

export type LabelVariant = "A" | "B";

export interface Section {
  label: SectionLabel;
  /** Non-empty lyric lines in document order */
  lines: string[];
}

/**
 * Sections keyed by `labelKey`, in the order their labels first appear in
 * the document.
 */
export type SectionMap = Map<string, Section>;

// ============================================================================
// Order
// ============================================================================

export interface OrderToken {
  /** Token as written in the order spec, trimmed ("V1", "C", "Va") */
  text: string;
  label: SectionLabel;
}

export interface OrderBinding {
  token: OrderToken;
  section: Section;
}

export interface ResolvedOrder {
  bindings: OrderBinding[];
}

/** How repeated bare "V" tokens bind when a song has several verses */
export type VerseRepeatPolicy = "advance" | "reuse";

// ============================================================================
// Slides
// ============================================================================

export interface SlideChunk {
  label: SectionLabel;
  /** At most `maxLines` lines */
  lines: string[];
}

export interface SlideRecord {
  title: string;
  body: string[];
}

export interface DeckSlide extends SlideRecord {
  footer?: string;
}

// ============================================================================
// Cleanup - optional remote text repair
// ============================================================================

export interface CleanupRequest {
  songTitle: string;
  sectionTitle: string;
  text: string;
}

/**
 * Repairs OCR/extraction noise in one section's text. Implementations may
 * reject or hang; callers bound them with a timeout and fall back to the
 * uncleaned text.
 */
export interface TextCleaner {
  readonly name: string;
  clean(request: CleanupRequest, signal: AbortSignal): Promise<string>;
}
