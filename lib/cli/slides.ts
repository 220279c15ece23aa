#!/usr/bin/env node
/**
 * Slides CLI
 *
 * Turn lyric sheet PDFs into the slide deck handed to the renderer.
 *
 * Usage:
 *   npm run slides -- run <pdf...> [options]   Build the deck for one or more songs
 *   npm run slides -- sections <pdf>           Show detected sections and default order
 *   npm run slides -- log <pdf>                Show the LLM calls logged for a song
 */

import fs from "node:fs";
import path from "node:path";
import {
  deepMerge,
  getBreakHeaders,
  getCleanupSettings,
  getDeckOptions,
  loadConfig,
  loadConfigWithOverrides,
  parseConfig,
  type AppConfig,
} from "../config";
import type { DeckSlide, SlideRecord } from "../pipeline/core/types";
import type { PdfLayout } from "../pdf/extract";
import { generateSongSlides } from "../pipeline/song/song";
import { pickOrderSpec, readSongSource, type SongSource } from "../pipeline/song/song-source";
import { extractSections } from "../pipeline/sections/extract-sections";
import { displayTitle } from "../pipeline/sections/section-label";
import { defaultOrderSpec } from "../pipeline/order/order-tokens";
import { parseSongOrderFile } from "../pipeline/order/song-order-file";
import { composeDeck, type SongSlides } from "../pipeline/compose/compose-deck";
import { createLlmCleaner } from "../pipeline/cleanup/llm-cleaner";
import { slugFromPath } from "../pipeline/slug";
import { formatLogEntry, readLogEntries } from "../pipeline/llm-log";
import { createConsoleProgress, nullProgress } from "../pipeline/runner/progress";
import { SongProgress, runParallel } from "./progress";

const DEFAULT_CONCURRENCY = 4;

const USAGE = `Usage: npm run slides -- <command> [args] [options]

Commands:
  run <pdf...>          Build the slide deck for one or more lyric PDFs
  sections <pdf>        Print detected sections and the default order
  log <pdf>             Print the LLM calls logged for a song

Options:
  --order <spec>        Order for a single song, e.g. V1-C-V2-C-B-C
  --order-file <path>   Song order file ("Title: V1 C V2 C")
  --out <file>          Write the deck as JSON instead of printing it
  --layout <layout>     single | columns (default: single)
  --max-lines <n>       Lines per slide (default from config.yaml)
  --clean               Clean extracted lyrics with the configured LLM
  --concurrency <n>     Max songs processed at once (default: ${DEFAULT_CONCURRENCY})
  --config <path>       Config file merged over config.yaml
  --skip-cache          Skip the LLM reply cache`;

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    process.exit(0);
  }

  const flags = parseFlags(args.slice(1));
  const positional = flags.positional;
  const config = buildConfig(flags);

  switch (command) {
    case "run": {
      if (positional.length === 0) {
        console.error("Usage: npm run slides -- run <pdf...>");
        process.exit(1);
      }
      if (flags.order !== undefined && positional.length > 1) {
        console.error("--order applies to a single song; use --order-file for several");
        process.exit(1);
      }
      for (const pdfPath of positional) {
        if (!fs.existsSync(pdfPath)) {
          console.error(`PDF not found: ${pdfPath}`);
          process.exit(1);
        }
      }

      const orders = flags.orderFile
        ? parseSongOrderFile(fs.readFileSync(flags.orderFile, "utf-8"))
        : undefined;

      const songs = await buildSongs(positional, config, flags, orders);
      const deck = composeDeck(songs, getDeckOptions(config));

      if (flags.out) {
        fs.mkdirSync(path.dirname(path.resolve(flags.out)), { recursive: true });
        fs.writeFileSync(flags.out, JSON.stringify({ slides: deck }, null, 2) + "\n");
        console.log(`Wrote ${deck.length} slides to ${flags.out}`);
      } else {
        printDeck(deck);
      }
      break;
    }

    case "sections": {
      const [pdfPath] = positional;
      if (!pdfPath) {
        console.error("Usage: npm run slides -- sections <pdf>");
        process.exit(1);
      }
      const source = readSongSource(pdfPath, flags.layout);
      const sections = extractSections(source.lines, {
        breakHeaders: getBreakHeaders(config),
      });

      console.log(`${source.title} (${source.pageCount} page${source.pageCount === 1 ? "" : "s"})\n`);
      for (const section of sections.values()) {
        console.log(`[${displayTitle(section.label)}] ${section.lines.length} lines`);
        for (const line of section.lines) console.log(`  ${line}`);
      }
      console.log(`\nDefault order: ${defaultOrderSpec(sections)}`);
      break;
    }

    case "log": {
      const [pdfPath] = positional;
      if (!pdfPath) {
        console.error("Usage: npm run slides -- log <pdf>");
        process.exit(1);
      }
      const songId = slugFromPath(pdfPath) || "song";
      const entries = readLogEntries(songId);
      if (entries.length === 0) {
        console.log(`No LLM calls logged for ${songId}`);
        break;
      }
      for (const entry of entries) console.log(formatLogEntry(entry));
      break;
    }

    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(USAGE);
      process.exit(1);
  }
}

async function buildSongs(
  pdfPaths: string[],
  config: AppConfig,
  flags: ParsedFlags,
  orders: Map<string, string[]> | undefined
): Promise<SongSlides[]> {
  const single = pdfPaths.length === 1;
  const results: Array<SongSlides | undefined> = new Array(pdfPaths.length);
  const cleanup = getCleanupSettings(config);

  const runSong = async (pdfPath: string, index: number): Promise<void> => {
    const progress = single ? createConsoleProgress() : nullProgress;
    const songId = slugFromPath(pdfPath) || "song";
    progress.emit({ type: "song-step-start", songId, step: "extract" });
    const source: SongSource = readSongSource(pdfPath, flags.layout);
    progress.emit({
      type: "song-step-progress",
      songId,
      step: "extract",
      message: `${source.lines.length} lines from ${source.pageCount} page(s)`,
    });
    progress.emit({ type: "song-step-complete", songId, step: "extract" });

    const slides: SlideRecord[] = await generateSongSlides(source.songId, {
      title: source.title,
      lines: source.lines,
      config,
      orderSpec: pickOrderSpec(source.title, { orderSpec: flags.order, orders }),
      cleaner: cleanup.enabled
        ? createLlmCleaner({
            songId: source.songId,
            provider: config.provider,
            model: cleanup.model,
            promptName: cleanup.prompt,
            skipCache: flags.skipCache,
          })
        : undefined,
      progress,
    });
    results[index] = { title: source.title, slides };
  };

  if (single) {
    await runSong(pdfPaths[0], 0);
  } else {
    const progress = new SongProgress();
    progress.start(pdfPaths.length);
    const indexed = pdfPaths.map((pdfPath, index) => ({ pdfPath, index }));
    const { failed } = await runParallel(
      indexed,
      (item) => path.basename(item.pdfPath),
      (item) => runSong(item.pdfPath, item.index),
      { concurrency: flags.concurrency, progress }
    );
    progress.stop();
    if (failed > 0) process.exitCode = 1;
  }

  return results.filter((song): song is SongSlides => song !== undefined);
}

function printDeck(deck: DeckSlide[]): void {
  deck.forEach((slide, i) => {
    console.log(`\n--- ${i + 1}. ${slide.title} ---`);
    for (const line of slide.body) console.log(line);
    if (slide.footer) console.log(`  (${slide.footer})`);
  });
}

function buildConfig(flags: ParsedFlags): AppConfig {
  const base = flags.config ? loadConfigWithOverrides(flags.config) : loadConfig();
  const overrides: Record<string, unknown> = {};
  if (flags.maxLines !== undefined) overrides.slides = { max_lines: flags.maxLines };
  if (flags.clean) overrides.cleanup = { enabled: true };
  return parseConfig(deepMerge(base, overrides));
}

interface ParsedFlags {
  positional: string[];
  order?: string;
  orderFile?: string;
  out?: string;
  layout: PdfLayout;
  maxLines?: number;
  clean: boolean;
  concurrency: number;
  config?: string;
  skipCache: boolean;
}

function parseFlags(args: string[]): ParsedFlags {
  const flags: ParsedFlags = {
    positional: [],
    layout: "single",
    clean: false,
    concurrency: DEFAULT_CONCURRENCY,
    skipCache: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];
    if (arg === "--order" && value !== undefined) {
      flags.order = value;
      i++;
    } else if (arg === "--order-file" && value) {
      flags.orderFile = value;
      i++;
    } else if (arg === "--out" && value) {
      flags.out = value;
      i++;
    } else if (arg === "--layout" && value) {
      if (value !== "single" && value !== "columns") {
        throw new Error(`--layout must be "single" or "columns", got "${value}"`);
      }
      flags.layout = value;
      i++;
    } else if (arg === "--max-lines" && value) {
      flags.maxLines = parseInt(value, 10);
      i++;
    } else if (arg === "--concurrency" && value) {
      flags.concurrency = parseInt(value, 10);
      i++;
    } else if (arg === "--config" && value) {
      flags.config = value;
      i++;
    } else if (arg === "--clean") {
      flags.clean = true;
    } else if (arg === "--skip-cache") {
      flags.skipCache = true;
    } else if (!arg.startsWith("-")) {
      flags.positional.push(arg);
    }
  }

  return flags;
}

main().catch((err: unknown) => {
  console.error("\nPipeline failed:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
