/**
 * Exports over stored episodes for downstream summarization.
 *
 * Plain text (delimiter-separated blocks):
 *
 *   [Feed Name]: Episode Title (2026-02-10)
 *   transcript text...
 *   ---
 *   [Feed Name]: Another Episode (2026-02-08)
 *   transcript text...
 *
 * JSON excerpts: the same episodes capped per feed, then in total, with
 * each transcript cut to a fixed number of characters.
 */

import type { EpisodeStore } from "./storage/database.js";
import type {
  Episode,
  ExcerptEntry,
  ExcerptPayload,
  TextExportResult,
  WindowBasis,
} from "./types/index.js";
import { formatDisplayDate, hoursAgo } from "./utils/dates.js";
import { truncateExcerpt } from "./utils/format-transcript.js";

export const DEFAULT_DELIMITER = "---";
export const DEFAULT_LOOKBACK_HOURS = 168;

export interface ExportWindow {
  /** Feed names of the group; omitted means every feed */
  feedNames?: string[];
  lookbackHours?: number;
  basis?: WindowBasis;
  now?: Date;
}

export function episodeHeader(episode: Episode): string {
  const date = formatDisplayDate(episode.publishedAt, episode.publishedRaw);
  return `[${episode.feedName}]: ${episode.title} (${date})`;
}

/** Episodes with an empty transcript are left out */
export function formatTextExport(episodes: Episode[], delimiter = DEFAULT_DELIMITER): TextExportResult {
  const blocks: string[] = [];
  let totalWords = 0;

  for (const episode of episodes) {
    if (!episode.transcript) continue;
    blocks.push(`${episodeHeader(episode)}\n${episode.transcript}`);
    totalWords += episode.wordCount;
  }

  if (blocks.length === 0) return { text: "", episodeCount: 0, totalWords: 0 };

  return {
    text: `${blocks.join(`\n${delimiter}\n`)}\n`,
    episodeCount: blocks.length,
    totalWords,
  };
}

function queryWindow(store: EpisodeStore, window: ExportWindow): Episode[] {
  const lookbackHours = window.lookbackHours ?? DEFAULT_LOOKBACK_HOURS;
  return store.query({
    feedNames: window.feedNames,
    since: hoursAgo(lookbackHours, window.now),
    basis: window.basis,
  });
}

export function exportText(
  store: EpisodeStore,
  options: ExportWindow & { delimiter?: string } = {}
): TextExportResult {
  return formatTextExport(queryWindow(store, options), options.delimiter);
}

export interface ExcerptOptions {
  group: string;
  lookbackHours: number;
  maxEpisodesTotal: number;
  maxEpisodesPerFeed: number;
  excerptChars: number;
  now?: Date;
}

export const DEFAULT_EXCERPT_LIMITS = {
  maxEpisodesTotal: 40,
  maxEpisodesPerFeed: 4,
  excerptChars: 10_000,
} satisfies Partial<ExcerptOptions>;

/**
 * Apply the per-feed cap, then the total cap, then cut each transcript.
 * `episodes` must already be in store order (most recent first).
 */
export function buildExcerptPayload(episodes: Episode[], options: ExcerptOptions): ExcerptPayload {
  const perFeed = new Map<string, number>();
  const selected: Episode[] = [];

  for (const episode of episodes) {
    const count = perFeed.get(episode.feedName) ?? 0;
    if (count >= options.maxEpisodesPerFeed) continue;
    perFeed.set(episode.feedName, count + 1);
    selected.push(episode);
  }

  const entries: ExcerptEntry[] = selected.slice(0, Math.max(0, options.maxEpisodesTotal)).map((episode) => {
    const { excerpt, truncated } = truncateExcerpt(episode.transcript, options.excerptChars);
    return {
      guid: episode.guid,
      feedName: episode.feedName,
      title: episode.title,
      publishedAt: episode.publishedAt,
      publishedDate: formatDisplayDate(episode.publishedAt, episode.publishedRaw),
      wordCount: episode.wordCount,
      truncated,
      excerpt,
    };
  });

  return {
    group: options.group,
    lookbackHours: options.lookbackHours,
    maxEpisodesTotal: options.maxEpisodesTotal,
    maxEpisodesPerFeed: options.maxEpisodesPerFeed,
    excerptChars: options.excerptChars,
    generatedAt: (options.now ?? new Date()).toISOString(),
    episodes: entries,
  };
}

export function exportExcerpts(
  store: EpisodeStore,
  options: ExcerptOptions & Pick<ExportWindow, "feedNames" | "basis">
): ExcerptPayload {
  const episodes = queryWindow(store, options);
  return buildExcerptPayload(episodes, options);
}
