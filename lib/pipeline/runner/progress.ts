/**
 * Progress events emitted while a song moves through the pipeline.
 *
 * Implementations can log to console, collect events in tests, etc.
 */

export type SongStepName = "extract" | "sections" | "order" | "slides";

export type ProgressEvent =
  | { type: "song-step-start"; songId: string; step: SongStepName }
  | { type: "song-step-progress"; songId: string; step: SongStepName; message: string }
  | { type: "song-step-complete"; songId: string; step: SongStepName }
  | { type: "song-step-error"; songId: string; step: SongStepName; error: string }
  | { type: "cleanup-fallback"; songId: string; section: string; reason: string };

export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

/**
 * Console-based progress emitter for CLI usage.
 */
export function createConsoleProgress(): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "song-step-start":
          console.log(`[${event.songId}] Starting ${formatStepName(event.step)}...`);
          break;
        case "song-step-progress":
          console.log(`[${event.songId}] ${formatStepName(event.step)}: ${event.message}`);
          break;
        case "song-step-complete":
          console.log(`[${event.songId}] Completed ${formatStepName(event.step)}`);
          break;
        case "song-step-error":
          console.error(`[${event.songId}] Error in ${formatStepName(event.step)}: ${event.error}`);
          break;
        case "cleanup-fallback":
          console.warn(
            `[${event.songId}] Cleanup skipped for ${event.section}: ${event.reason}`
          );
          break;
      }
    },
  };
}

export function formatStepName(step: SongStepName): string {
  switch (step) {
    case "extract":
      return "text extraction";
    case "sections":
      return "section extraction";
    case "order":
      return "order resolution";
    case "slides":
      return "slide composition";
  }
}
