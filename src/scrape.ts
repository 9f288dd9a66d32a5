/**
 * Scrape orchestration - walks feed groups and hands each feed to the
 * acquirer. Feeds run one at a time unless `concurrency` is raised, in
 * which case independent feeds share a bounded pool.
 */

import { createRunContext, type TranscriptAcquirer } from "./acquirer.js";
import type { FeedConfig, FeedGroups, FeedScrapeResult, RunSummary } from "./types/index.js";
import { pooledMap } from "./utils/concurrency.js";
import type { HttpOptions } from "./utils/http.js";
import { silentLogger, type Logger } from "./utils/log.js";

export interface ScrapeOptions {
  /** Candidates inspected per feed, already-stored ones included (default: 10) */
  maxEpisodesToCheck?: number;
  /** Feeds processed in parallel (default: 1) */
  concurrency?: number;
  /** Fetch options for feed documents */
  feedHttp?: HttpOptions;
  logger?: Logger;
  /** Aborting stops new feeds from starting */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS = {
  maxEpisodesToCheck: 10,
  concurrency: 1,
  feedHttp: {},
  logger: silentLogger,
} satisfies Required<Omit<ScrapeOptions, "signal">>;

interface FeedJob {
  group: string;
  feed: FeedConfig;
}

export async function scrapeAll(
  groups: FeedGroups,
  acquirer: TranscriptAcquirer,
  options: ScrapeOptions = {}
): Promise<RunSummary> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const log = opts.logger;
  const context = createRunContext(opts.maxEpisodesToCheck, opts.feedHttp);
  const startTime = Date.now();

  const jobs: FeedJob[] = Object.entries(groups).flatMap(([group, feeds]) =>
    feeds.map((feed) => ({ group, feed }))
  );

  let currentGroup: string | undefined;
  const finished = new Map<number, FeedScrapeResult>();
  let interrupted = false;
  try {
    await pooledMap(
      jobs,
      async ({ group, feed }, index): Promise<FeedScrapeResult> => {
        if (opts.concurrency === 1 && group !== currentGroup) {
          currentGroup = group;
          log(`\n=== Group: ${group} ===`);
        }
        const result = await acquirer.acquireFeed(feed, group, context);
        finished.set(index, result);
        return result;
      },
      { concurrency: Math.max(1, opts.concurrency), signal: opts.signal }
    );
  } catch (err) {
    // An interrupt ends the run early; the feeds that finished still count
    if (!opts.signal?.aborted || err !== opts.signal.reason) throw err;
    interrupted = true;
  }

  const feeds = [...finished.entries()].sort(([a], [b]) => a - b).map(([, result]) => result);
  const { counters } = context;
  const summary: RunSummary = {
    feeds,
    newEpisodes: counters.stored,
    alreadyStored: counters.alreadyStored,
    skipped: counters.skipped,
    failedFeeds: counters.failedFeeds,
    interrupted,
    durationMs: Date.now() - startTime,
  };

  log(interrupted ? `\n=== Interrupted (${feeds.length}/${jobs.length} feeds) ===` : `\n=== Done ===`);
  log(`New episodes: ${summary.newEpisodes}`);
  log(`Skipped (already stored): ${summary.alreadyStored}`);
  if (summary.skipped > 0) log(`Skipped (no transcript): ${summary.skipped}`);
  if (summary.failedFeeds > 0) log(`Failed feeds: ${summary.failedFeeds}`);

  return summary;
}
