import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";
import type { VerseRepeatPolicy } from "./pipeline/core/types";
import { DEFAULT_MAX_LINES } from "./pipeline/format/format-section";
import { DEFAULT_CLEANUP_TIMEOUT_MS } from "./pipeline/format/clean-section";

const configSchema = z.object({
  provider: z.enum(["openai", "anthropic", "google"]).optional(),
  slides: z
    .object({
      max_lines: z.number().int().min(2).max(8).optional(),
      title_slide: z.boolean().optional(),
      footer: z.boolean().optional(),
    })
    .optional(),
  order: z
    .object({
      verse_repeat: z.enum(["advance", "reuse"]).optional(),
    })
    .optional(),
  sections: z
    .object({
      ignored: z.array(z.string()).optional(),
    })
    .optional(),
  reverent_words: z.array(z.string()).optional(),
  cleanup: z
    .object({
      enabled: z.boolean().optional(),
      model: z.string().optional(),
      prompt: z.string().optional(),
      timeout_ms: z.number().int().min(1).optional(),
    })
    .optional(),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins.
 */
export function deepMerge(
  base: Record<string, unknown>,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(overrides)) {
    const baseVal = result[key];
    const overVal = overrides[key];
    if (isPlainObject(baseVal) && isPlainObject(overVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else {
      result[key] = overVal;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function readYaml(filePath: string): unknown {
  return yaml.load(fs.readFileSync(filePath, "utf-8"));
}

export function loadConfig(configPath?: string): AppConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), "config.yaml");
  return configSchema.parse(readYaml(resolved) ?? {});
}

/**
 * Base config with a per-run override file merged on top.
 */
export function loadConfigWithOverrides(
  overridePath: string,
  basePath?: string
): AppConfig {
  const base = loadConfig(basePath);
  const overrides = readYaml(overridePath) ?? {};
  if (!isPlainObject(overrides)) {
    throw new Error(`Config override ${overridePath} must be a YAML mapping`);
  }
  return configSchema.parse(deepMerge(base, overrides));
}

export function parseConfig(raw: unknown): AppConfig {
  return configSchema.parse(raw);
}

export function getMaxLines(cfg: AppConfig): number {
  return cfg.slides?.max_lines ?? DEFAULT_MAX_LINES;
}

export function getVerseRepeat(cfg: AppConfig): VerseRepeatPolicy {
  return cfg.order?.verse_repeat ?? "advance";
}

export function getBreakHeaders(cfg: AppConfig): string[] {
  return cfg.sections?.ignored ?? [];
}

export function getReverentWords(cfg: AppConfig): string[] {
  return cfg.reverent_words ?? [];
}

export function getDeckOptions(cfg: AppConfig): {
  titleSlide: boolean;
  footer: boolean;
} {
  return {
    titleSlide: cfg.slides?.title_slide ?? false,
    footer: cfg.slides?.footer ?? false,
  };
}

export function getCleanupSettings(cfg: AppConfig): {
  enabled: boolean;
  model?: string;
  prompt: string;
  timeoutMs: number;
} {
  return {
    enabled: cfg.cleanup?.enabled ?? false,
    model: cfg.cleanup?.model,
    prompt: cfg.cleanup?.prompt ?? "lyrics_cleanup",
    timeoutMs: cfg.cleanup?.timeout_ms ?? DEFAULT_CLEANUP_TIMEOUT_MS,
  };
}
