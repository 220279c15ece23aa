import path from "node:path";

export function slugFromPath(filePath: string): string {
  const base = path.basename(filePath, path.extname(filePath));
  return base
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Song title from a chart's file name: drops the set-list number prefix
 * and the trailing key ("03. Psalm 90 - C~D.pdf" -> "Psalm 90").
 */
export function songTitleFromFilename(filePath: string): string {
  return path
    .basename(filePath, path.extname(filePath))
    .replace(/^\d+\.\s*/, "")
    .replace(/\s*-\s*[A-G][#b]?(?:~[A-G][#b]?)?\s*$/, "")
    .trim();
}
