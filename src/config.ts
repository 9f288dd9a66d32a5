import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { SpeechToTextConfig, SpeechToTextProvider } from "./adapters/speech-to-text.js";
import type { FeedConfig, FeedGroups } from "./types/index.js";

const DEFAULT_FEEDS_PATH = "feeds.json";
const STT_PROVIDERS: readonly SpeechToTextProvider[] = ["openai", "whisper-cpp"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/**
 * Validate a parsed feeds.json document:
 *
 *   { "<group>": [{ "name": "...", "feedUrl": "https://..." }] }
 *
 * `feed_url` is accepted as an alias of `feedUrl`.
 */
export function parseFeedGroups(parsed: unknown, source = DEFAULT_FEEDS_PATH): FeedGroups {
  if (!isRecord(parsed)) {
    throw new Error(`${source} must contain a JSON object mapping group names to feed lists`);
  }

  const groups: FeedGroups = {};
  for (const [group, entries] of Object.entries(parsed)) {
    if (!Array.isArray(entries)) {
      throw new Error(`Group "${group}" in ${source} must be an array of feeds`);
    }

    const feeds: FeedConfig[] = [];
    for (const entry of entries) {
      const name = isRecord(entry) ? nonEmptyString(entry.name) : undefined;
      const feedUrl = isRecord(entry) ? nonEmptyString(entry.feedUrl ?? entry.feed_url) : undefined;
      if (!name || !feedUrl) {
        throw new Error(
          `Each feed in group "${group}" must have name and feedUrl. Got: ${JSON.stringify(entry)}`
        );
      }
      try {
        new URL(feedUrl);
      } catch {
        throw new Error(`Feed "${name}" in group "${group}" has an invalid URL: ${feedUrl}`);
      }
      feeds.push({ name, feedUrl });
    }
    groups[group] = feeds;
  }

  return groups;
}

export function getFeedsPath(configPath?: string): string {
  return resolve(configPath ?? process.env.PODCAST_PIPELINE_FEEDS ?? DEFAULT_FEEDS_PATH);
}

export function loadFeedGroups(configPath?: string): FeedGroups {
  const path = getFeedsPath(configPath);

  if (!existsSync(path)) {
    throw new Error(
      `Feed config not found at ${path}.\n` +
        `Create a feeds.json file. See feeds.example.json for format.`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new Error(`Cannot parse ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseFeedGroups(parsed, path);
}

/** Narrow to one group, or fail listing the groups that exist */
export function selectGroup(groups: FeedGroups, group: string): FeedGroups {
  const feeds = groups[group];
  if (!feeds) {
    throw new Error(
      `Group "${group}" not found. Available groups: ${Object.keys(groups).join(", ") || "(none)"}`
    );
  }
  return { [group]: feeds };
}

export function feedNamesOf(groups: FeedGroups): string[] {
  return Object.values(groups).flatMap((feeds) => feeds.map((f) => f.name));
}

export function getDataDir(): string {
  return resolve(process.env.PODCAST_PIPELINE_DATA_DIR ?? "./data");
}

export function getDbPath(): string {
  return resolve(getDataDir(), "podcasts.db");
}

export function getCacheDir(): string {
  return resolve(getDataDir(), "audio_cache");
}

export function getSpeechToTextConfig(env: NodeJS.ProcessEnv = process.env): SpeechToTextConfig {
  const requested = env.PODCAST_PIPELINE_STT ?? "openai";
  const provider = STT_PROVIDERS.find((p) => p === requested);
  if (!provider) {
    throw new Error(
      `Unknown speech-to-text provider "${requested}". Expected one of: ${STT_PROVIDERS.join(", ")}`
    );
  }
  return {
    provider,
    apiKey: env.OPENAI_API_KEY,
    whisperCppPath: env.WHISPER_CPP_PATH,
  };
}

const FEED_HOST_PREFIXES = ["www.", "feeds.", "feed.", "rss."];
const GENERIC_PATH_SEGMENTS = new Set(["feed", "feeds", "rss", "feed.xml", "rss.xml", "podcast", "index.xml"]);

/**
 * Display name for an ad-hoc feed URL, built from the host and the first
 * path segment that says something about the show:
 * https://feeds.example.com/my-show/rss.xml -> "my-show (example.com)"
 */
export function inferFeedName(feedUrl: string): string {
  let url: URL;
  try {
    url = new URL(feedUrl);
  } catch {
    return feedUrl;
  }

  let host = url.hostname.toLowerCase();
  const prefix = FEED_HOST_PREFIXES.find((p) => host.startsWith(p));
  if (prefix) host = host.slice(prefix.length);

  const segment = url.pathname
    .split("/")
    .map((s) => s.trim())
    .find((s) => s && !GENERIC_PATH_SEGMENTS.has(s.toLowerCase()));

  return segment ? `${segment} (${host})` : host;
}
