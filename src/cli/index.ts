#!/usr/bin/env node

/**
 * CLI for the podcast transcript pipeline.
 * Scrapes feeds into the episode store and exports recent transcripts.
 */

import { Command } from "commander";
import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { TranscriptAcquirer } from "../acquirer.js";
import { createSpeechToText } from "../adapters/speech-to-text.js";
import { createTranscriptAdapter } from "../adapters/transcript-adapters.js";
import {
  getCacheDir,
  getDbPath,
  getSpeechToTextConfig,
  inferFeedName,
  loadFeedGroups,
  selectGroup,
} from "../config.js";
import { StoreFailureError, errorMessage } from "../errors.js";
import {
  DEFAULT_DELIMITER,
  DEFAULT_EXCERPT_LIMITS,
  DEFAULT_LOOKBACK_HOURS,
  exportExcerpts,
  exportText,
} from "../export.js";
import { scrapeAll } from "../scrape.js";
import { AudioCache } from "../storage/audio-cache.js";
import { EpisodeStore } from "../storage/database.js";
import type { FeedGroups, RunSummary, WindowBasis } from "../types/index.js";
import type { HttpOptions } from "../utils/http.js";
import { createLogger, type Logger } from "../utils/log.js";
import { parseBasis, parseIntArg, resolveFeedNames } from "./options.js";

interface AcquireOpts {
  db?: string;
  cacheDir?: string;
  modelSize: string;
  timeout?: number;
  audioTimeout?: number;
  retries?: number;
  quiet?: boolean;
}

interface ScrapeOpts extends AcquireOpts {
  feedsFile?: string;
  group?: string;
  maxEpisodes: number;
  concurrency: number;
  strict?: boolean;
}

interface AdhocOpts extends AcquireOpts {
  name?: string;
  maxEpisodes: number;
  output?: string;
}

interface ExportOpts {
  feedsFile?: string;
  group?: string;
  lookback: number;
  output?: string;
  db?: string;
  delimiter: string;
  windowBasis: WindowBasis;
  strict?: boolean;
}

interface ExportJsonOpts extends Omit<ExportOpts, "output" | "delimiter"> {
  maxEpisodesTotal: number;
  maxEpisodesPerFeed: number;
  excerptChars: number;
}

function httpOptionsFrom(opts: AcquireOpts): HttpOptions {
  const http: HttpOptions = {};
  if (opts.timeout !== undefined) http.timeoutMs = opts.timeout * 1000;
  if (opts.retries !== undefined) http.retries = opts.retries;
  return http;
}

function buildAcquirer(store: EpisodeStore, opts: AcquireOpts, log: Logger): TranscriptAcquirer {
  const http = httpOptionsFrom(opts);
  const cache = new AudioCache(resolve(opts.cacheDir ?? getCacheDir()), {
    retries: http.retries,
    downloadTimeoutMs: opts.audioTimeout === undefined ? undefined : opts.audioTimeout * 1000,
    logger: log,
  });
  const speechToText = createSpeechToText({ ...getSpeechToTextConfig(), logger: log });
  const adapter = createTranscriptAdapter({
    cache,
    speechToText,
    modelSize: opts.modelSize,
    http,
    logger: log,
  });
  return new TranscriptAcquirer({ store, adapter, logger: log });
}

function writeExport(outputPath: string, text: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, text);
}

/** First Ctrl-C lets running feeds finish; a second one exits immediately */
function interruptSignal(log: Logger): AbortSignal {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    log("\nInterrupted: finishing feeds in progress...");
    controller.abort(new Error("Interrupted"));
  });
  return controller.signal;
}

function printFailedFeeds(summary: RunSummary): void {
  for (const feed of summary.feeds) {
    if (feed.feedError) console.error(`  - ${feed.feedName}: ${feed.feedError}`);
  }
}

const program = new Command();

program
  .name("podcast-pipeline")
  .description(
    "Podcast transcript pipeline.\n" +
      "Scrapes podcast feeds, acquires transcripts, and exports recent episodes."
  )
  .version("1.0.0");

// ---- scrape ----
program
  .command("scrape")
  .description("Fetch feeds and acquire transcripts for new episodes")
  .option("-f, --feeds-file <path>", "Path to feeds.json")
  .option("-g, --group <name>", "Feed group to scrape (default: all)")
  .option("-n, --max-episodes <n>", "Max episodes to check per feed, already-stored ones included", parseIntArg, 10)
  .option("--db <path>", "SQLite database path")
  .option("--cache-dir <path>", "Audio cache directory")
  .option("--model-size <size>", "Whisper model size (tiny/base/small/medium/large-v3)", "base")
  .option("--concurrency <n>", "Feeds processed in parallel", parseIntArg, 1)
  .option("--timeout <seconds>", "Per-request timeout for feeds and transcript links", parseIntArg)
  .option("--audio-timeout <seconds>", "Per-download timeout for episode audio (default: 1800)", parseIntArg)
  .option("--retries <n>", "Retries per network request", parseIntArg)
  .option("--strict", "Exit non-zero when any feed fails")
  .option("--quiet", "Suppress progress output")
  .action(async (opts: ScrapeOpts) => {
    const log = createLogger({ verbose: !opts.quiet });
    let groups: FeedGroups = loadFeedGroups(opts.feedsFile);
    if (opts.group) groups = selectGroup(groups, opts.group);

    const store = new EpisodeStore(resolve(opts.db ?? getDbPath()));
    try {
      const acquirer = buildAcquirer(store, opts, log);
      const summary = await scrapeAll(groups, acquirer, {
        maxEpisodesToCheck: opts.maxEpisodes,
        concurrency: opts.concurrency,
        feedHttp: httpOptionsFrom(opts),
        logger: log,
        signal: interruptSignal(log),
      });

      if (summary.failedFeeds > 0) {
        console.error(`${summary.failedFeeds} feed(s) failed:`);
        printFailedFeeds(summary);
        if (opts.strict) process.exitCode = 1;
      }
      if (summary.interrupted) process.exitCode = 130;
    } finally {
      store.close();
    }
  });

// ---- adhoc ----
program
  .command("adhoc <url>")
  .description("Scrape a one-off feed URL and export its fresh transcripts")
  .option("--name <name>", "Feed name (inferred from the URL if omitted)")
  .option("-n, --max-episodes <n>", "Max episodes to check", parseIntArg, 1)
  .option("-o, --output <path>", "Export file path (default: /tmp/podcasts_adhoc_export.txt)")
  .option("--db <path>", "SQLite database path")
  .option("--cache-dir <path>", "Audio cache directory")
  .option("--model-size <size>", "Whisper model size (tiny/base/small/medium/large-v3)", "base")
  .option("--timeout <seconds>", "Per-request timeout for feeds and transcript links", parseIntArg)
  .option("--audio-timeout <seconds>", "Per-download timeout for episode audio (default: 1800)", parseIntArg)
  .option("--retries <n>", "Retries per network request", parseIntArg)
  .option("--quiet", "Suppress progress output")
  .action(async (url: string, opts: AdhocOpts) => {
    const log = createLogger({ verbose: !opts.quiet });
    const feed = { name: opts.name ?? inferFeedName(url), feedUrl: url };
    log(`\n=== Ad-hoc: ${feed.name} ===`);

    const store = new EpisodeStore(resolve(opts.db ?? getDbPath()));
    try {
      const acquirer = buildAcquirer(store, opts, log);
      const summary = await scrapeAll({ adhoc: [feed] }, acquirer, {
        maxEpisodesToCheck: opts.maxEpisodes,
        feedHttp: httpOptionsFrom(opts),
        logger: log,
        signal: interruptSignal(log),
      });

      if (summary.failedFeeds > 0) {
        printFailedFeeds(summary);
        process.exitCode = 1;
        return;
      }
      if (summary.newEpisodes === 0) {
        log("\nNo new episodes to process.");
        return;
      }

      // Just the episodes stored by this run
      const result = exportText(store, { feedNames: [feed.name], lookbackHours: 1, basis: "scraped" });
      const outputPath = resolve(opts.output ?? "/tmp/podcasts_adhoc_export.txt");
      writeExport(outputPath, result.text);

      log(`\n=== Ad-hoc complete ===`);
      log(`New episodes transcribed: ${summary.newEpisodes}`);
      log(`Export: ${outputPath}`);
    } finally {
      store.close();
    }
  });

// ---- export ----
program
  .command("export")
  .description("Export recent transcripts to a delimited text file")
  .option("-f, --feeds-file <path>", "Path to feeds.json")
  .option("-g, --group <name>", "Feed group to export (default: all)")
  .option("-l, --lookback <hours>", "Lookback window in hours", parseIntArg, DEFAULT_LOOKBACK_HOURS)
  .option("-o, --output <path>", "Output file path (default: /tmp/podcasts_<group>_export.txt)")
  .option("--db <path>", "SQLite database path")
  .option("--delimiter <text>", "Line separating episodes", DEFAULT_DELIMITER)
  .option("--window-basis <basis>", "Compare the window against published or scraped time", parseBasis, "published")
  .option("--strict", "Exit non-zero when nothing matches")
  .action((opts: ExportOpts) => {
    const feedNames = resolveFeedNames(opts.feedsFile, opts.group);
    const outputPath = resolve(opts.output ?? `/tmp/podcasts_${opts.group ?? "all"}_export.txt`);

    const store = new EpisodeStore(resolve(opts.db ?? getDbPath()));
    try {
      const result = exportText(store, {
        feedNames,
        lookbackHours: opts.lookback,
        basis: opts.windowBasis,
        delimiter: opts.delimiter,
      });

      if (result.episodeCount === 0) {
        console.log("No episodes found within the lookback window.");
        if (opts.strict) process.exitCode = 1;
        return;
      }

      writeExport(outputPath, result.text);
      console.log(`Exported ${result.episodeCount} episode(s) to ${outputPath}`);
      console.log(`Total words: ${result.totalWords.toLocaleString("en-US")}`);
    } finally {
      store.close();
    }
  });

// ---- export-json ----
program
  .command("export-json")
  .description("Print a size-capped JSON excerpt payload to stdout")
  .option("-f, --feeds-file <path>", "Path to feeds.json")
  .option("-g, --group <name>", "Feed group to export (default: all)")
  .option("-l, --lookback <hours>", "Lookback window in hours", parseIntArg, DEFAULT_LOOKBACK_HOURS)
  .option("--max-episodes-total <n>", "Max episodes in the payload", parseIntArg, DEFAULT_EXCERPT_LIMITS.maxEpisodesTotal)
  .option("--max-episodes-per-feed <n>", "Max episodes per feed", parseIntArg, DEFAULT_EXCERPT_LIMITS.maxEpisodesPerFeed)
  .option("--excerpt-chars <n>", "Max characters per excerpt", parseIntArg, DEFAULT_EXCERPT_LIMITS.excerptChars)
  .option("--db <path>", "SQLite database path")
  .option("--window-basis <basis>", "Compare the window against published or scraped time", parseBasis, "published")
  .option("--strict", "Exit non-zero when nothing matches")
  .action((opts: ExportJsonOpts) => {
    // stdout carries only the payload
    const log = createLogger({ stderr: true });
    const feedNames = resolveFeedNames(opts.feedsFile, opts.group);

    const store = new EpisodeStore(resolve(opts.db ?? getDbPath()));
    try {
      const payload = exportExcerpts(store, {
        group: opts.group ?? "all",
        feedNames,
        basis: opts.windowBasis,
        lookbackHours: opts.lookback,
        maxEpisodesTotal: opts.maxEpisodesTotal,
        maxEpisodesPerFeed: opts.maxEpisodesPerFeed,
        excerptChars: opts.excerptChars,
      });

      log(`Selected ${payload.episodes.length} episode(s) for ${payload.group}`);
      process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`);
      if (payload.episodes.length === 0 && opts.strict) process.exitCode = 1;
    } finally {
      store.close();
    }
  });

// ---- list ----
program
  .command("list")
  .description("List the most recently stored episodes")
  .option("--db <path>", "SQLite database path")
  .option("--limit <n>", "Max episodes to show", parseIntArg, 50)
  .option("--json", "Output as JSON")
  .action((opts: { db?: string; limit: number; json?: boolean }) => {
    const store = new EpisodeStore(resolve(opts.db ?? getDbPath()));

    try {
      const episodes = store.listRecent(opts.limit);

      if (opts.json) {
        console.log(JSON.stringify(episodes, null, 2));
        return;
      }

      if (episodes.length === 0) {
        console.log("No episodes stored yet. Run 'scrape' first.");
        return;
      }

      console.log(
        `${"Title".padEnd(50)} ${"Feed".padEnd(30)} ${"Words".padStart(8)} ${"Source".padStart(21)} ${"Scraped At".padEnd(20)}`
      );
      console.log("-".repeat(133));
      for (const ep of episodes) {
        const words = ep.wordCount.toLocaleString("en-US");
        console.log(
          `${ep.title.slice(0, 48).padEnd(50)} ${ep.feedName.slice(0, 28).padEnd(30)} ${words.padStart(8)} ${ep.transcriptSource.padStart(21)} ${ep.scrapedAt.slice(0, 19).padEnd(20)}`
        );
      }
    } finally {
      store.close();
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = err instanceof StoreFailureError ? 2 : 1;
});
