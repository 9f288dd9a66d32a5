/**
 * Main entry point for programmatic usage.
 * Re-exports all public APIs for use as a library.
 */

export { EpisodeStore } from "./storage/database.js";
export { AudioCache, DEFAULT_DOWNLOAD_TIMEOUT_MS, type AudioCacheOptions } from "./storage/audio-cache.js";
export { TranscriptAcquirer, createRunContext } from "./acquirer.js";
export type { RunContext, RunCounters } from "./acquirer.js";
export { scrapeAll } from "./scrape.js";
export type { ScrapeOptions } from "./scrape.js";
export {
  buildExcerptPayload,
  exportExcerpts,
  exportText,
  formatTextExport,
} from "./export.js";
export {
  loadFeedGroups,
  parseFeedGroups,
  selectGroup,
  inferFeedName,
  getDbPath,
  getDataDir,
  getCacheDir,
} from "./config.js";
export { readFeed, parseFeedXml, fetchTranscriptFromUrl } from "./adapters/rss-parser.js";
export {
  StructuredTranscriptAdapter,
  AudioTranscriptAdapter,
  CompositeTranscriptAdapter,
  createTranscriptAdapter,
} from "./adapters/transcript-adapters.js";
export {
  OpenAIWhisperTranscriber,
  WhisperCppTranscriber,
  createSpeechToText,
} from "./adapters/speech-to-text.js";
export type { SpeechToText, SpeechToTextConfig } from "./adapters/speech-to-text.js";
export * from "./errors.js";
export type {
  FeedConfig,
  FeedGroups,
  EpisodeCandidate,
  Episode,
  EpisodeInput,
  AcquisitionOutcome,
  RunSummary,
  ExcerptPayload,
  TranscriptAdapter,
} from "./types/index.js";
