import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { generateText } from "ai";
import type { LanguageModel, ModelMessage } from "ai";
import { z } from "zod/v4";
import { renderPrompt, type PromptMessage } from "./prompt";
import {
  appendLogEntry,
  resolveTaskDir,
  sanitizeMessages,
  type LlmLogTokenUsage,
} from "./llm-log";
import type { ValidationResult } from "./format/clean-section";

const cachedReplySchema = z.object({ text: z.string() });

export interface CachedGenerateTextOptions {
  model: LanguageModel;
  system?: string;
  messages: ModelMessage[];
  temperature?: number;
  abortSignal?: AbortSignal;
}

export interface CachedGenerateTextContext {
  songId: string;
  taskType: string;
  section?: string;
  promptName: string;
  validate?: (text: string) => ValidationResult;
  maxRetries?: number;
  skipCache?: boolean;
}

/**
 * generateText with an on-disk reply cache under
 * `<SONGS_ROOT>/<songId>/<taskType>/.cache`, validation retries that feed
 * the errors back to the model, and a JSONL log entry per call.
 */
export async function cachedGenerateText(
  options: CachedGenerateTextOptions,
  ctx: CachedGenerateTextContext
): Promise<string> {
  const cacheRoot = path.join(resolveTaskDir(ctx.songId, ctx.taskType), ".cache");
  const maxRetries = ctx.maxRetries ?? 0;
  const modelId = typeof options.model === "string" ? options.model : options.model.modelId;

  const t0 = Date.now();
  const allErrors: string[] = [];
  const totalUsage: LlmLogTokenUsage = { inputTokens: 0, outputTokens: 0 };
  let messages = options.messages;
  let lastErrors: string[] = [];

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const cacheFile = path.join(cacheRoot, `${computeHash(modelId, options.system, messages)}.json`);
    let cacheHit = false;

    try {
      let text: string;
      const cached = ctx.skipCache || process.env.RECACHE ? null : readCache(cacheFile);
      if (cached !== null) {
        text = cached;
        cacheHit = true;
      } else {
        const generated = await generateText({
          model: options.model,
          system: options.system,
          messages,
          temperature: options.temperature,
          abortSignal: options.abortSignal,
          maxRetries: 0,
        });
        text = generated.text;
        totalUsage.inputTokens += generated.usage.inputTokens ?? 0;
        totalUsage.outputTokens += generated.usage.outputTokens ?? 0;
        if (generated.usage.cachedInputTokens) {
          totalUsage.cachedInputTokens =
            (totalUsage.cachedInputTokens ?? 0) + generated.usage.cachedInputTokens;
        }
      }

      const check = ctx.validate?.(text);
      if (check && !check.valid) {
        lastErrors = check.errors;
        allErrors.push(...check.errors);
        bustCache(cacheFile);
        messages = appendValidationFeedback(messages, text, check.errors);
        continue;
      }

      if (!cacheHit && !ctx.skipCache) writeCache(cacheFile, text);
      writeLog(ctx, {
        modelId,
        cacheHit,
        attempt,
        durationMs: Date.now() - t0,
        system: options.system,
        messages: [...messages, { role: "assistant", content: text }],
        usage: usageOrUndefined(totalUsage),
        validationErrors: allErrors.length > 0 ? allErrors : undefined,
      });
      return text;
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      allErrors.push(errMsg);
      writeLog(ctx, {
        modelId,
        cacheHit: false,
        attempt,
        durationMs: Date.now() - t0,
        system: options.system,
        messages,
        usage: usageOrUndefined(totalUsage),
        validationErrors: allErrors,
        error: errMsg,
      });
      throw err;
    }
  }

  writeLog(ctx, {
    modelId,
    cacheHit: false,
    attempt: maxRetries,
    durationMs: Date.now() - t0,
    system: options.system,
    messages,
    usage: usageOrUndefined(totalUsage),
    validationErrors: allErrors,
  });
  throw new Error(
    `Validation failed after ${maxRetries + 1} attempts. Errors:\n${lastErrors.join("\n")}`
  );
}

/**
 * Render a prompt template and run it through cachedGenerateText.
 */
export async function cachedPromptGenerateText(options: {
  model: LanguageModel;
  promptName: string;
  promptContext: Record<string, unknown>;
  temperature?: number;
  abortSignal?: AbortSignal;
  context: Omit<CachedGenerateTextContext, "promptName">;
}): Promise<string> {
  const promptMessages = await renderPrompt(options.promptName, options.promptContext);
  const systemMessage = promptMessages.find((m) => m.role === "system");

  return cachedGenerateText(
    {
      model: options.model,
      system: systemMessage?.content,
      messages: toModelMessages(promptMessages),
      temperature: options.temperature,
      abortSignal: options.abortSignal,
    },
    { ...options.context, promptName: options.promptName }
  );
}

export function toModelMessages(messages: PromptMessage[]): ModelMessage[] {
  return messages.flatMap((m): ModelMessage[] => {
    switch (m.role) {
      case "system":
        return [];
      case "user":
        return [{ role: "user", content: m.content }];
      case "assistant":
        return [{ role: "assistant", content: m.content }];
    }
  });
}

interface LogFields {
  modelId: string;
  cacheHit: boolean;
  attempt: number;
  durationMs: number;
  system?: string;
  messages: ModelMessage[];
  usage?: LlmLogTokenUsage;
  validationErrors?: string[];
  error?: string;
}

function writeLog(ctx: CachedGenerateTextContext, fields: LogFields): void {
  try {
    appendLogEntry({
      timestamp: new Date().toISOString(),
      songId: ctx.songId,
      taskType: ctx.taskType,
      section: ctx.section,
      promptName: ctx.promptName,
      modelId: fields.modelId,
      cacheHit: fields.cacheHit,
      attempt: fields.attempt,
      durationMs: fields.durationMs,
      usage: fields.usage,
      validationErrors: fields.validationErrors,
      error: fields.error,
      system: fields.system,
      messages: sanitizeMessages(fields.messages),
    });
  } catch (err) {
    // Logging must never break the pipeline
    console.warn(`Could not write LLM log: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function appendValidationFeedback(
  messages: ModelMessage[],
  failedText: string,
  errors: string[]
): ModelMessage[] {
  return [
    ...messages,
    { role: "assistant", content: failedText },
    {
      role: "user",
      content:
        "Your previous response failed validation with these errors:\n" +
        errors.map((e) => `- ${e}`).join("\n") +
        "\n\nPlease fix these issues and try again.",
    },
  ];
}

function readCache(cacheFile: string): string | null {
  if (!fs.existsSync(cacheFile)) return null;
  const parsed = cachedReplySchema.safeParse(JSON.parse(fs.readFileSync(cacheFile, "utf-8")));
  return parsed.success ? parsed.data.text : null;
}

function writeCache(cacheFile: string, text: string): void {
  fs.mkdirSync(path.dirname(cacheFile), { recursive: true });
  fs.writeFileSync(cacheFile, JSON.stringify({ text }, null, 2) + "\n");
}

function bustCache(cacheFile: string): void {
  fs.rmSync(cacheFile, { force: true });
}

function usageOrUndefined(usage: LlmLogTokenUsage): LlmLogTokenUsage | undefined {
  return usage.inputTokens > 0 || usage.outputTokens > 0 ? usage : undefined;
}

function computeHash(modelId: string, system: string | undefined, messages: ModelMessage[]): string {
  const json = JSON.stringify({ modelId, system, messages });
  return crypto.createHash("sha256").update(json).digest("hex");
}
