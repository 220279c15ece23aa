import type { Section, TextCleaner } from "../core/types";
import { displayTitle } from "../sections/section-label";

export const DEFAULT_CLEANUP_TIMEOUT_MS = 20_000;

export interface CleanSectionOptions {
  cleaner: TextCleaner;
  songTitle: string;
  timeoutMs?: number;
  /** Called with the reason whenever the uncleaned text is kept */
  onFallback?: (error: Error, section: Section) => void;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export class CleanupTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Cleanup did not answer within ${timeoutMs}ms`);
    this.name = "CleanupTimeoutError";
  }
}

/**
 * A cleanup reply must be bare lyric text: not empty, not fenced or wrapped
 * in JSON.
 */
export function validateCleanedLyrics(text: unknown): ValidationResult {
  if (typeof text !== "string") {
    return { valid: false, errors: ["Reply is not text"] };
  }
  const trimmed = text.trim();
  const errors: string[] = [];
  if (trimmed === "") errors.push("Reply is empty");
  if (trimmed.startsWith("```")) errors.push("Reply is wrapped in a code fence");
  if (/^[{[]/.test(trimmed) && /[}\]]$/.test(trimmed)) {
    errors.push("Reply looks like JSON, expected plain lyrics");
  }
  return { valid: errors.length === 0, errors };
}

/**
 * Run the section's text through the cleaner, bounded by a timeout. Any
 * failure keeps the section as extracted; this never throws.
 */
export async function cleanSection(
  section: Section,
  options: CleanSectionOptions
): Promise<Section> {
  if (section.lines.length === 0) return section;

  const timeoutMs = options.timeoutMs ?? DEFAULT_CLEANUP_TIMEOUT_MS;
  const request = {
    songTitle: options.songTitle,
    sectionTitle: displayTitle(section.label),
    text: section.lines.join("\n"),
  };

  try {
    const cleaned = await withTimeout(
      (signal) => options.cleaner.clean(request, signal),
      timeoutMs
    );
    const check = validateCleanedLyrics(cleaned);
    if (!check.valid) {
      throw new Error(`Unusable cleanup reply: ${check.errors.join("; ")}`);
    }
    const lines = cleaned
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== "");
    return { label: section.label, lines };
  } catch (err) {
    options.onFallback?.(err instanceof Error ? err : new Error(String(err)), section);
    return section;
  }
}

function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new CleanupTimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  const work = Promise.resolve().then(() => run(controller.signal));
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}
