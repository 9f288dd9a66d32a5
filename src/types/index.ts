/** Core types for the podcast transcript pipeline */

export interface FeedConfig {
  /** Display name, also the feed identity used for grouping and exports */
  name: string;
  /** RSS or Atom feed URL */
  feedUrl: string;
}

/** Group name → ordered feed list, as loaded from feeds.json */
export type FeedGroups = Record<string, FeedConfig[]>;

/**
 * A publication date as declared by the feed.
 * `instant` is null when the raw text could not be parsed ("unknown").
 */
export interface PublishedDate {
  raw: string | null;
  instant: string | null;
}

/** An episode as seen in a feed, before its transcript is acquired */
export interface EpisodeCandidate {
  feedName: string;
  feedUrl: string;
  /** Feed-declared unique identifier, the dedup key */
  guid: string;
  title: string;
  published: PublishedDate;
  /** Direct audio URL from the enclosure */
  audioUrl?: string;
  /** Published transcript link (podcast:transcript or link rel="transcript") */
  transcriptUrl?: string;
  /** MIME type declared for the transcript link */
  transcriptType?: string;
}

/** A feed entry that could not become a candidate */
export interface DegradedEntry {
  feedName: string;
  title: string;
  reason: string;
}

export type TranscriptSource = "structured-transcript" | "speech-to-text";

/** What a caller hands to the store; derived fields are computed on write */
export interface EpisodeInput {
  guid: string;
  feedName: string;
  feedUrl: string;
  title: string;
  /** Canonical ISO instant, or null when unknown */
  publishedAt: string | null;
  /** Publication date text exactly as the feed declared it */
  publishedRaw: string | null;
  audioUrl: string | null;
  /** Local audio cache path, when the transcript came from audio */
  audioPath: string | null;
  transcript: string;
  transcriptSource: TranscriptSource;
}

export interface Episode extends EpisodeInput {
  /** Set on every write */
  scrapedAt: string;
  /** Whitespace-token count of `transcript`, recomputed on every write */
  wordCount: number;
}

/** Lightweight listing entry (no transcript body) */
export interface EpisodeListEntry {
  guid: string;
  title: string;
  feedName: string;
  publishedAt: string | null;
  wordCount: number;
  transcriptSource: TranscriptSource;
  scrapedAt: string;
}

/** Which timestamp the lookback window is compared against */
export type WindowBasis = "published" | "scraped";

export interface EpisodeQuery {
  /** Feed names of the group; omitted or empty means every feed */
  feedNames?: string[];
  /** Minimum timestamp (ISO instant) */
  since: string;
  basis?: WindowBasis;
}

export interface AcquiredTranscript {
  text: string;
  source: TranscriptSource;
  /** Local audio path when the transcript was produced from audio */
  audioPath?: string;
}

/**
 * One strategy for obtaining a transcript.
 * Returns null when the strategy does not apply to the candidate,
 * throws when it applies but fails.
 */
export interface TranscriptAdapter {
  name: string;
  fetchTranscript(candidate: EpisodeCandidate): Promise<AcquiredTranscript | null>;
}

/** Step at which a candidate was resolved or abandoned */
export type AcquisitionStep =
  | "dedup"
  | "feed"
  | "structured-transcript"
  | "audio-download"
  | "speech-to-text"
  | "store";

export type AcquisitionOutcome =
  | { status: "stored"; guid: string; source: TranscriptSource; isNew: boolean; wordCount: number }
  | { status: "already-stored"; guid: string }
  | { status: "unresolvable"; guid: string; reason: string }
  | { status: "failed"; guid: string; step: AcquisitionStep; reason: string };

export interface FeedScrapeResult {
  feedName: string;
  group: string;
  /** Candidates inspected (counts toward the per-feed limit) */
  checked: number;
  stored: number;
  alreadyStored: number;
  skipped: number;
  degraded: number;
  /** Set when the feed itself could not be fetched or parsed */
  feedError?: string;
  errors: string[];
}

export interface RunSummary {
  feeds: FeedScrapeResult[];
  newEpisodes: number;
  alreadyStored: number;
  skipped: number;
  failedFeeds: number;
  /** True when an interrupt stopped the run before every feed started */
  interrupted: boolean;
  durationMs: number;
}

// ---- Exports ----

export interface TextExportResult {
  text: string;
  episodeCount: number;
  totalWords: number;
}

export interface ExcerptEntry {
  guid: string;
  feedName: string;
  title: string;
  publishedAt: string | null;
  /** Display date: YYYY-MM-DD, raw feed text, or "unknown date" */
  publishedDate: string;
  wordCount: number;
  truncated: boolean;
  excerpt: string;
}

export interface ExcerptPayload {
  group: string;
  lookbackHours: number;
  maxEpisodesTotal: number;
  maxEpisodesPerFeed: number;
  excerptChars: number;
  generatedAt: string;
  episodes: ExcerptEntry[];
}
