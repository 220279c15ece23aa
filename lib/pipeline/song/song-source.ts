import fs from "node:fs";
import { extractPdfText, type PdfLayout } from "../../pdf/extract";
import { slugFromPath, songTitleFromFilename } from "../slug";
import { matchSongOrder, toOrderSpec } from "../order/song-order-file";

export interface SongSource {
  songId: string;
  title: string;
  lines: string[];
  pageCount: number;
}

/**
 * Read a lyric sheet PDF. The title comes from the file name, falling back
 * to the PDF's own title when the name is only a number or key.
 */
export function readSongSource(pdfPath: string, layout: PdfLayout = "single"): SongSource {
  const pdfBuffer = fs.readFileSync(pdfPath);
  const { lines, pageCount, title: pdfTitle } = extractPdfText({ pdfBuffer, layout });
  const songId = slugFromPath(pdfPath) || "song";
  const fromName = songTitleFromFilename(pdfPath);
  return {
    songId,
    title: /[a-z]{2}/i.test(fromName) ? fromName : pdfTitle || fromName || songId,
    lines,
    pageCount,
  };
}

/**
 * The order for one song: an explicit spec wins over a song order file
 * entry; undefined means document order.
 */
export function pickOrderSpec(
  title: string,
  options: { orderSpec?: string; orders?: Map<string, string[]> }
): string | undefined {
  if (options.orderSpec !== undefined) return options.orderSpec;
  const tokens = options.orders && matchSongOrder(title, options.orders);
  return tokens ? toOrderSpec(tokens) : undefined;
}
