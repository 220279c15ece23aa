/**
 * CLI progress display and bounded-concurrency executor for multi-song runs.
 */

// ANSI escape codes
const ESC = "\x1b";
const CLEAR_LINE = `${ESC}[2K`;
const DIM = `${ESC}[2m`;
const RESET = `${ESC}[0m`;
const GREEN = `${ESC}[32m`;
const YELLOW = `${ESC}[33m`;
const RED = `${ESC}[31m`;
const CYAN = `${ESC}[36m`;
const BOLD = `${ESC}[1m`;

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const BAR_WIDTH = 24;

export type TaskStatus = "pending" | "running" | "completed" | "failed";

export interface TaskState {
  id: string;
  status: TaskStatus;
  error?: string;
}

export interface SongProgressOptions {
  stream?: NodeJS.WriteStream;
}

/**
 * Single-line spinner and bar for songs processed in parallel. Failures are
 * listed in the summary printed by stop().
 */
export class SongProgress {
  private tasks = new Map<string, TaskState>();
  private totalCount = 0;
  private frame = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private stream: NodeJS.WriteStream;
  private startTime = Date.now();

  constructor(options: SongProgressOptions = {}) {
    this.stream = options.stream ?? process.stderr;
  }

  start(totalCount: number): void {
    this.totalCount = totalCount;
    this.startTime = Date.now();
    this.timer = setInterval(() => {
      this.frame++;
      this.render();
    }, 80);
    this.render();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.stream.write(`\r${CLEAR_LINE}`);
    this.renderSummary();
  }

  updateTask(id: string, status: TaskStatus, error?: string): void {
    this.tasks.set(id, { id, status, error });
  }

  getStats(): { completed: number; failed: number; running: number } {
    let completed = 0;
    let failed = 0;
    let running = 0;
    for (const task of this.tasks.values()) {
      if (task.status === "completed") completed++;
      if (task.status === "failed") failed++;
      if (task.status === "running") running++;
    }
    return { completed, failed, running };
  }

  private render(): void {
    const spinner = SPINNER_FRAMES[this.frame % SPINNER_FRAMES.length];
    const { completed, failed, running } = this.getStats();
    const done = completed + failed;
    const filled = Math.round((done / Math.max(this.totalCount, 1)) * BAR_WIDTH);
    const bar = `${GREEN}${"█".repeat(filled)}${RESET}${DIM}${"░".repeat(BAR_WIDTH - filled)}${RESET}`;
    this.stream.write(
      `\r${CLEAR_LINE}${BOLD}${CYAN}${spinner}${RESET} Processing songs  ${bar}  ${done}/${this.totalCount}  ${DIM}running ${running}  ${formatDuration(Date.now() - this.startTime)}${RESET}`
    );
  }

  private renderSummary(): void {
    const { completed, failed } = this.getStats();
    const elapsed = formatDuration(Date.now() - this.startTime);
    if (failed === 0) {
      this.stream.write(`${GREEN}✔${RESET} ${BOLD}Completed${RESET} ${completed} songs in ${elapsed}\n`);
      return;
    }
    this.stream.write(
      `${YELLOW}⚠${RESET} ${BOLD}Completed${RESET} ${completed} songs, ${RED}${failed} failed${RESET} in ${elapsed}\n`
    );
    for (const task of this.tasks.values()) {
      if (task.status === "failed") {
        this.stream.write(`  ${RED}✗${RESET} ${task.id}: ${task.error ?? "unknown error"}\n`);
      }
    }
  }
}

// ============================================================================
// Parallel Executor
// ============================================================================

export interface ParallelExecutorOptions<T> {
  concurrency?: number;
  progress?: SongProgress;
  onTaskError?: (item: T, error: Error) => void;
}

export interface ParallelResult {
  completed: number;
  failed: number;
  errors: Array<{ id: string; error: Error }>;
}

/**
 * Execute tasks with at most `concurrency` running at once. A failing task
 * is recorded and never stops the others.
 */
export function runParallel<T>(
  items: T[],
  getId: (item: T) => string,
  execute: (item: T) => Promise<void>,
  options: ParallelExecutorOptions<T> = {}
): Promise<ParallelResult> {
  const { concurrency = 4, progress, onTaskError } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    return Promise.reject(new RangeError(`concurrency must be a positive integer, got ${concurrency}`));
  }

  const queue = [...items];
  const errors: Array<{ id: string; error: Error }> = [];
  let completed = 0;
  let failed = 0;
  let running = 0;

  return new Promise((resolve) => {
    function tryStartNext(): void {
      while (running < concurrency) {
        const next = queue.shift();
        if (next === undefined) break;
        const item = next;
        const id = getId(item);
        running++;
        progress?.updateTask(id, "running");

        void execute(item)
          .then(() => {
            completed++;
            progress?.updateTask(id, "completed");
          })
          .catch((err: unknown) => {
            failed++;
            const error = err instanceof Error ? err : new Error(String(err));
            errors.push({ id, error });
            progress?.updateTask(id, "failed", error.message);
            onTaskError?.(item, error);
          })
          .finally(() => {
            running--;
            tryStartNext();
            if (running === 0 && queue.length === 0) {
              resolve({ completed, failed, errors });
            }
          });
      }
    }

    if (items.length === 0) {
      resolve({ completed: 0, failed: 0, errors: [] });
      return;
    }

    tryStartNext();
  });
}

// ============================================================================
// Helpers
// ============================================================================

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  if (minutes < 60) return `${minutes}m ${secs}s`;
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${hours}h ${mins}m`;
}
