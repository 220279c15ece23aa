/**
 * PDF Text Extraction
 *
 * Pulls the text lines of a lyric sheet out of a PDF using mupdf.
 */

import mupdf, { type Document as MupdfDocument } from "mupdf";
import { z } from "zod/v4";

// ============================================================================
// Types
// ============================================================================

/**
 * `single` reads each page top to bottom; `columns` reads the left half of
 * each page before the right half (two-column lyric sheets).
 */
export type PdfLayout = "single" | "columns";

export interface ExtractTextInput {
  /** PDF file contents as a Buffer */
  pdfBuffer: Buffer;
  layout?: PdfLayout;
}

export interface ExtractTextResult {
  /** Text lines of every page, in reading order */
  lines: string[];
  pageCount: number;
  /** The PDF's info:Title, when set */
  title?: string;
}

/** A run of text positioned on the page (top-left origin, points). */
export interface TextFragment {
  text: string;
  x: number;
  y: number;
}

// Fragments whose tops are closer than this share a line.
const LINE_THRESHOLD = 5;

// ============================================================================
// Main extraction function
// ============================================================================

export function extractPdfText(input: ExtractTextInput): ExtractTextResult {
  const { pdfBuffer, layout = "single" } = input;
  const doc = openPdfFromBuffer(pdfBuffer);

  const pageCount = doc.countPages();
  const lines: string[] = [];
  for (let i = 0; i < pageCount; i++) {
    const page = doc.loadPage(i);
    if (layout === "columns") {
      const [x0, , x1] = page.getBounds();
      const fragments = readFragments(page.toStructuredText("").asJSON());
      lines.push(...arrangeColumns(fragments, x1 - x0));
    } else {
      lines.push(...splitLines(page.toStructuredText("").asText()));
    }
  }

  const title = doc.getMetaData("info:Title")?.trim();
  return { lines, pageCount, title: title || undefined };
}

/**
 * Split fragments at the page's vertical midline and return the left
 * column's lines followed by the right column's.
 */
export function arrangeColumns(fragments: TextFragment[], pageWidth: number): string[] {
  const mid = pageWidth / 2;
  const left = fragments.filter((f) => f.x < mid);
  const right = fragments.filter((f) => f.x >= mid);
  return [...groupIntoLines(left), ...groupIntoLines(right)];
}

/**
 * Join fragments sharing a baseline (within LINE_THRESHOLD) into one line,
 * ordered left to right.
 */
export function groupIntoLines(fragments: TextFragment[]): string[] {
  const sorted = [...fragments].sort((a, b) => a.y - b.y || a.x - b.x);
  const rows: TextFragment[][] = [];
  for (const fragment of sorted) {
    const row = rows[rows.length - 1];
    const last = row?.[row.length - 1];
    if (row && last && Math.abs(fragment.y - last.y) < LINE_THRESHOLD) {
      row.push(fragment);
    } else {
      rows.push([fragment]);
    }
  }
  return rows
    .map((row) =>
      [...row]
        .sort((a, b) => a.x - b.x)
        .map((f) => f.text.replace(/\u0000/g, "").trim())
        .filter(Boolean)
        .join(" ")
    )
    .filter((line) => line !== "");
}

// ============================================================================
// Internal helpers
// ============================================================================

const stextSchema = z.object({
  blocks: z.array(
    z.object({
      type: z.string(),
      lines: z
        .array(
          z.object({
            text: z.string(),
            bbox: z.object({ x: z.number(), y: z.number() }),
          })
        )
        .optional(),
    })
  ),
});

function readFragments(json: string): TextFragment[] {
  const stext = stextSchema.parse(JSON.parse(json));
  return stext.blocks
    .filter((block) => block.type === "text")
    .flatMap((block) => block.lines ?? [])
    .map((line) => ({ text: line.text, x: line.bbox.x, y: line.bbox.y }));
}

function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.replace(/\u0000/g, "").trimEnd())
    .filter((line) => line.trim() !== "");
}

function openPdfFromBuffer(buffer: Buffer): MupdfDocument {
  // Suppress mupdf stderr warnings
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    return mupdf.Document.openDocument(buffer, "application/pdf");
  } finally {
    process.stderr.write = origWrite;
  }
}
