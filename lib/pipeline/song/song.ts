import { defer, type Observable } from "rxjs";
import type { ResolvedOrder, SectionMap, SlideRecord } from "../core/types";
import { extractSections } from "../sections/extract-sections";
import { displayTitle } from "../sections/section-label";
import { defaultOrderSpec } from "../order/order-tokens";
import { resolveOrder } from "../order/resolve-order";
import { composeSlides } from "../compose/compose-slides";
import { createContext, defineNode, resolveNode, type Node, type PipelineContext } from "../node";
import type { SongStepName } from "../runner/progress";
import {
  getBreakHeaders,
  getCleanupSettings,
  getMaxLines,
  getReverentWords,
  getVerseRepeat,
} from "../../config";

/**
 * Wrap one song step so it reports start/complete/error and forwards the
 * step's error to subscribers.
 */
function runStep<T>(
  ctx: PipelineContext,
  step: SongStepName,
  run: () => Promise<T>
): Observable<T> {
  return defer(async () => {
    ctx.progress.emit({ type: "song-step-start", songId: ctx.songId, step });
    try {
      const result = await run();
      ctx.progress.emit({ type: "song-step-complete", songId: ctx.songId, step });
      return result;
    } catch (err) {
      ctx.progress.emit({
        type: "song-step-error",
        songId: ctx.songId,
        step,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  });
}

export const sectionsNode: Node<SectionMap> = defineNode({
  name: "sections",
  resolve: (ctx) =>
    runStep(ctx, "sections", async () => {
      const sections = extractSections(ctx.lines, {
        breakHeaders: getBreakHeaders(ctx.config),
      });
      ctx.progress.emit({
        type: "song-step-progress",
        songId: ctx.songId,
        step: "sections",
        message: `found ${[...sections.values()].map((s) => displayTitle(s.label)).join(", ")}`,
      });
      return sections;
    }),
});

export const orderNode: Node<ResolvedOrder> = defineNode({
  name: "order",
  resolve: (ctx) =>
    runStep(ctx, "order", async () => {
      const sections = await resolveNode(sectionsNode, ctx);
      const spec = ctx.orderSpec ?? defaultOrderSpec(sections);
      ctx.progress.emit({
        type: "song-step-progress",
        songId: ctx.songId,
        step: "order",
        message: `order ${spec}`,
      });
      return resolveOrder(spec, sections, { verseRepeat: getVerseRepeat(ctx.config) });
    }),
});

export const slidesNode: Node<SlideRecord[]> = defineNode({
  name: "slides",
  resolve: (ctx) =>
    runStep(ctx, "slides", async () => {
      const order = await resolveNode(orderNode, ctx);
      const { cleaner } = ctx;
      const { timeoutMs } = getCleanupSettings(ctx.config);
      return composeSlides(order, {
        reverentWords: getReverentWords(ctx.config),
        maxLines: getMaxLines(ctx.config),
        cleanup: cleaner && {
          cleaner,
          songTitle: ctx.title,
          timeoutMs,
          onFallback: (error, section) =>
            ctx.progress.emit({
              type: "cleanup-fallback",
              songId: ctx.songId,
              section: displayTitle(section.label),
              reason: error.message,
            }),
        },
      });
    }),
});

/**
 * Run one song through sections, order and slides in a fresh context.
 */
export function generateSongSlides(
  songId: string,
  options: Parameters<typeof createContext>[1]
): Promise<SlideRecord[]> {
  return resolveNode(slidesNode, createContext(songId, options));
}
