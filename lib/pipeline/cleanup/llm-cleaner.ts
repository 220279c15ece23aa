import type { LanguageModel } from "ai";
import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import type { CleanupRequest, TextCleaner } from "../core/types";
import { cachedPromptGenerateText } from "../cache";
import { validateCleanedLyrics } from "../format/clean-section";

export type LLMProvider = "openai" | "anthropic" | "google";

const PROVIDERS: readonly LLMProvider[] = ["openai", "anthropic", "google"];

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-haiku-latest",
  google: "gemini-2.0-flash",
};

const MODEL_FACTORIES: Record<LLMProvider, (id: string) => LanguageModel> = {
  openai: (id) => openai(id),
  anthropic: (id) => anthropic(id),
  google: (id) => google(id),
};

/**
 * Resolve a model from config. `configModel` is either "provider:model-id"
 * or a bare model id for `provider`.
 */
export function resolveModel(provider: LLMProvider, configModel?: string): LanguageModel {
  if (configModel) {
    const colonIdx = configModel.indexOf(":");
    if (colonIdx !== -1) {
      const prefix = configModel.slice(0, colonIdx);
      const named = PROVIDERS.find((p) => p === prefix);
      if (!named) {
        throw new Error(`Unknown LLM provider "${prefix}" in model "${configModel}"`);
      }
      return MODEL_FACTORIES[named](configModel.slice(colonIdx + 1));
    }
    return MODEL_FACTORIES[provider](configModel);
  }
  return MODEL_FACTORIES[provider](DEFAULT_MODELS[provider]);
}

export interface LlmCleanerOptions {
  songId: string;
  provider?: LLMProvider;
  model?: string | LanguageModel;
  promptName?: string;
  skipCache?: boolean;
}

export function createLlmCleaner(options: LlmCleanerOptions): TextCleaner {
  const model =
    typeof options.model === "string" || options.model === undefined
      ? resolveModel(options.provider ?? "openai", options.model)
      : options.model;
  const promptName = options.promptName ?? "lyrics_cleanup";

  return {
    name: "llm",
    clean(request: CleanupRequest, signal: AbortSignal): Promise<string> {
      return cachedPromptGenerateText({
        model,
        promptName,
        promptContext: {
          song_title: request.songTitle,
          section_title: request.sectionTitle,
          lyrics: request.text,
        },
        temperature: 0.1,
        abortSignal: signal,
        context: {
          songId: options.songId,
          taskType: "cleanup",
          section: request.sectionTitle,
          validate: validateCleanedLyrics,
          maxRetries: 1,
          skipCache: options.skipCache,
        },
      });
    },
  };
}
