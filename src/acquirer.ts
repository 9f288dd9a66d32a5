/**
 * Transcript acquirer - resolves feed candidates into stored episodes.
 *
 * Per candidate: skip if already stored, otherwise ask the adapter chain
 * for a transcript (structured link first, audio second) and upsert the
 * result. Per-episode and per-feed failures are recorded and the run
 * continues; StoreFailureError always propagates.
 */

import { readFeed } from "./adapters/rss-parser.js";
import { PipelineError, StoreFailureError, errorMessage } from "./errors.js";
import type { EpisodeStore } from "./storage/database.js";
import type {
  AcquisitionOutcome,
  AcquisitionStep,
  EpisodeCandidate,
  FeedConfig,
  FeedScrapeResult,
  TranscriptAdapter,
} from "./types/index.js";
import type { HttpOptions } from "./utils/http.js";
import { silentLogger, type Logger } from "./utils/log.js";

export interface RunCounters {
  stored: number;
  alreadyStored: number;
  skipped: number;
  failedFeeds: number;
}

/**
 * State for one scrape run, passed explicitly to every feed.
 * `maxEpisodesToCheck` is applied to each feed independently.
 */
export interface RunContext {
  maxEpisodesToCheck: number;
  /** Fetch options for the feed documents */
  feedHttp: HttpOptions;
  counters: RunCounters;
}

export function createRunContext(maxEpisodesToCheck: number, feedHttp: HttpOptions = {}): RunContext {
  return {
    maxEpisodesToCheck,
    feedHttp,
    counters: { stored: 0, alreadyStored: 0, skipped: 0, failedFeeds: 0 },
  };
}

export interface TranscriptAcquirerDeps {
  store: EpisodeStore;
  adapter: TranscriptAdapter;
  logger?: Logger;
}

function failureStep(err: unknown, candidate: EpisodeCandidate): AcquisitionStep {
  if (err instanceof PipelineError) return err.step;
  return candidate.audioUrl ? "speech-to-text" : "structured-transcript";
}

export class TranscriptAcquirer {
  private store: EpisodeStore;
  private adapter: TranscriptAdapter;
  private log: Logger;

  constructor(deps: TranscriptAcquirerDeps) {
    this.store = deps.store;
    this.adapter = deps.adapter;
    this.log = deps.logger ?? silentLogger;
  }

  async acquireCandidate(candidate: EpisodeCandidate): Promise<AcquisitionOutcome> {
    const { guid } = candidate;

    if (this.store.exists(guid)) {
      this.log(`  [skip] Already stored: ${candidate.title}`);
      return { status: "already-stored", guid };
    }

    if (!candidate.transcriptUrl && !candidate.audioUrl) {
      const reason = "no transcript link and no audio URL";
      this.log(`  [skip] ${candidate.feedName} ${guid}: ${reason}`);
      return { status: "unresolvable", guid, reason };
    }

    this.log(`  [new] ${candidate.title}`);

    let acquired;
    try {
      acquired = await this.adapter.fetchTranscript(candidate);
    } catch (err) {
      if (err instanceof StoreFailureError) throw err;
      const step = failureStep(err, candidate);
      const reason = errorMessage(err);
      this.log(`  [error] ${candidate.feedName} ${guid} (${step}): ${reason}`);
      return { status: "failed", guid, step, reason };
    }

    if (!acquired) {
      const reason = "structured transcript unavailable and no audio URL";
      this.log(`  [skip] ${candidate.feedName} ${guid}: ${reason}`);
      return { status: "unresolvable", guid, reason };
    }

    const { isNew, episode } = this.store.upsert({
      guid,
      feedName: candidate.feedName,
      feedUrl: candidate.feedUrl,
      title: candidate.title,
      publishedAt: candidate.published.instant,
      publishedRaw: candidate.published.raw,
      audioUrl: candidate.audioUrl ?? null,
      audioPath: acquired.audioPath ?? null,
      transcript: acquired.text,
      transcriptSource: acquired.source,
    });

    this.log(`  [stored] ${candidate.title} (${acquired.source}, ${episode.wordCount} words)`);
    return { status: "stored", guid, source: acquired.source, isNew, wordCount: episode.wordCount };
  }

  /**
   * Acquire candidates from one feed until `maxEpisodesToCheck` have been
   * inspected. Already-stored candidates count toward the limit.
   */
  async acquireFeed(feed: FeedConfig, group: string, context: RunContext): Promise<FeedScrapeResult> {
    const result: FeedScrapeResult = {
      feedName: feed.name,
      group,
      checked: 0,
      stored: 0,
      alreadyStored: 0,
      skipped: 0,
      degraded: 0,
      errors: [],
    };
    const { counters } = context;

    this.log(`\n--- ${feed.name} ---`);
    this.log(`  Feed: ${feed.feedUrl}`);

    try {
      const candidates = readFeed(feed, {
        ...context.feedHttp,
        onDegraded: (entry) => {
          result.degraded++;
          this.log(`  [degraded] ${entry.title}: ${entry.reason}`);
        },
      });

      for await (const candidate of candidates) {
        if (result.checked >= context.maxEpisodesToCheck) break;
        result.checked++;

        const outcome = await this.acquireCandidate(candidate);
        switch (outcome.status) {
          case "stored":
            result.stored++;
            counters.stored++;
            break;
          case "already-stored":
            result.alreadyStored++;
            counters.alreadyStored++;
            break;
          case "unresolvable":
            result.skipped++;
            counters.skipped++;
            break;
          case "failed":
            result.skipped++;
            counters.skipped++;
            result.errors.push(`${outcome.guid} (${outcome.step}): ${outcome.reason}`);
            break;
        }
      }
    } catch (err) {
      if (err instanceof StoreFailureError) throw err;
      const msg = errorMessage(err);
      result.feedError = msg;
      result.errors.push(msg);
      counters.failedFeeds++;
      this.log(`  [error] ${msg}`);
    }

    return result;
  }
}
