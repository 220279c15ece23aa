/**
 * Helper to generate lyric sheet PDFs for tests.
 * Uses mupdf to create PDFs programmatically so tests don't depend on external files.
 */
import mupdf from "mupdf";

export interface TextLine {
  text: string;
  x: number;
  /** PDF user space: 0 is the bottom of a 792pt page */
  y: number;
}

/**
 * Create a PDF with one page per entry of `pages`, each line drawn in 12pt
 * Helvetica at its position.
 */
export function createLyricsPdf(pages: TextLine[][], title?: string): Buffer {
  const doc = new mupdf.PDFDocument();
  const font = doc.addSimpleFont(new mupdf.Font("Helvetica"));

  for (const lines of pages) {
    const fonts = doc.newDictionary();
    fonts.put("F1", font);
    const resources = doc.newDictionary();
    resources.put("Font", fonts);

    const content = lines
      .map((line) => `BT /F1 12 Tf ${line.x} ${line.y} Td (${escapePdfString(line.text)}) Tj ET`)
      .join("\n");
    doc.insertPage(-1, doc.addPage([0, 0, 612, 792], 0, resources, content));
  }

  if (title) doc.setMetaData("info:Title", title);
  return Buffer.from(doc.saveToBuffer("").asUint8Array());
}

/** Stack lines top-down in one column starting at `top`. */
export function column(texts: string[], x: number, top = 720, leading = 20): TextLine[] {
  return texts.map((text, i) => ({ text, x, y: top - i * leading }));
}

function escapePdfString(text: string): string {
  return text.replace(/[\\()]/g, "\\$&");
}
