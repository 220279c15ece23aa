import fs from "node:fs";
import path from "node:path";
import type { ModelMessage } from "ai";

export interface LlmLogTokenUsage {
  inputTokens: number;
  outputTokens: number;
  cachedInputTokens?: number;
}

export interface LlmLogEntry {
  timestamp: string;
  songId: string;
  taskType: string;
  section?: string;
  promptName: string;
  modelId: string;
  cacheHit: boolean;
  attempt: number;
  durationMs: number;
  usage?: LlmLogTokenUsage;
  validationErrors?: string[];
  error?: string;
  system?: string;
  messages: LlmLogMessage[];
}

export interface LlmLogMessage {
  role: string;
  text: string;
}

/**
 * Flatten AI SDK messages to role + text for the log.
 */
export function sanitizeMessages(messages: ModelMessage[]): LlmLogMessage[] {
  return messages.map((m) => {
    if (typeof m.content === "string") {
      return { role: m.role, text: m.content };
    }
    const text = m.content
      .map((part) => ("text" in part && typeof part.text === "string" ? part.text : `[${part.type}]`))
      .join("\n");
    return { role: m.role, text };
  });
}

export function getSongsRoot(): string {
  return path.resolve(process.env.SONGS_ROOT ?? "songs");
}

/**
 * Working directory for one song's task: `<SONGS_ROOT>/<songId>/<taskType>`.
 */
export function resolveTaskDir(songId: string, taskType: string): string {
  return path.join(getSongsRoot(), songId, taskType);
}

function logPath(songId: string): string {
  return path.join(getSongsRoot(), songId, "llm-log.jsonl");
}

export const MAX_LOG_ENTRIES = 250;

/**
 * Append a log entry to the song's JSONL log file, keeping at most
 * MAX_LOG_ENTRIES entries (oldest are dropped).
 */
export function appendLogEntry(entry: LlmLogEntry): void {
  const filePath = logPath(entry.songId);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.appendFileSync(filePath, JSON.stringify(entry) + "\n");

  const lines = fs.readFileSync(filePath, "utf-8").split("\n").filter(Boolean);
  if (lines.length > MAX_LOG_ENTRIES) {
    fs.writeFileSync(filePath, lines.slice(lines.length - MAX_LOG_ENTRIES).join("\n") + "\n");
  }
}

export function readLogEntries(songId: string): LlmLogEntry[] {
  const filePath = logPath(songId);
  if (!fs.existsSync(filePath)) return [];
  return fs
    .readFileSync(filePath, "utf-8")
    .split("\n")
    .filter(Boolean)
    .map((line): LlmLogEntry => JSON.parse(line));
}

/** One-line summary: "12:00:01 cleanup Chorus gpt-4o-mini miss #0 812ms 20/10 tok" */
export function formatLogEntry(entry: LlmLogEntry): string {
  const parts = [
    entry.timestamp.slice(11, 19),
    entry.taskType,
    entry.section ?? "-",
    entry.modelId,
    entry.cacheHit ? "hit" : "miss",
    `#${entry.attempt}`,
    `${entry.durationMs}ms`,
  ];
  if (entry.usage) parts.push(`${entry.usage.inputTokens}/${entry.usage.outputTokens} tok`);
  if (entry.validationErrors?.length) parts.push(`invalid: ${entry.validationErrors.join("; ")}`);
  if (entry.error) parts.push(`error: ${entry.error}`);
  return parts.join(" ");
}
