/**
 * Transcript acquisition strategies.
 *
 * Sources are tried in order until one produces text:
 * 1. Structured transcript - the link the feed declares for the episode
 * 2. Audio - download through the audio cache, then speech-to-text
 */

import { FetchFailureError, PipelineError, errorMessage } from "../errors.js";
import type { AudioCache } from "../storage/audio-cache.js";
import type { AcquiredTranscript, EpisodeCandidate, TranscriptAdapter } from "../types/index.js";
import type { HttpOptions } from "../utils/http.js";
import { silentLogger, type Logger } from "../utils/log.js";
import { fetchTranscriptFromUrl } from "./rss-parser.js";
import type { SpeechToText } from "./speech-to-text.js";

export class StructuredTranscriptAdapter implements TranscriptAdapter {
  name = "structured-transcript";
  private httpOptions: HttpOptions;

  constructor(httpOptions: HttpOptions = {}) {
    this.httpOptions = httpOptions;
  }

  async fetchTranscript(candidate: EpisodeCandidate): Promise<AcquiredTranscript | null> {
    const url = candidate.transcriptUrl;
    if (!url) return null;

    try {
      const text = await fetchTranscriptFromUrl(url, candidate.transcriptType, this.httpOptions);
      return { text, source: "structured-transcript" };
    } catch (err) {
      if (err instanceof PipelineError) throw err;
      throw new FetchFailureError(url, `Transcript fetch failed for ${url}: ${errorMessage(err)}`, "structured-transcript", {
        cause: err,
      });
    }
  }
}

export class AudioTranscriptAdapter implements TranscriptAdapter {
  name = "speech-to-text";
  private cache: AudioCache;
  private speechToText: SpeechToText;
  private modelSize: string;

  constructor(cache: AudioCache, speechToText: SpeechToText, modelSize: string) {
    this.cache = cache;
    this.speechToText = speechToText;
    this.modelSize = modelSize;
  }

  async fetchTranscript(candidate: EpisodeCandidate): Promise<AcquiredTranscript | null> {
    if (!candidate.audioUrl) return null;

    const audioPath = await this.cache.getOrFetch(candidate.audioUrl);
    const text = await this.speechToText.transcribe(audioPath, this.modelSize);
    return { text, source: "speech-to-text", audioPath };
  }
}

/**
 * Tries each adapter in order until one returns a transcript.
 *
 * A failing adapter is logged and the next one is tried. If the chain
 * ends on a failure, that failure is rethrown; if it ends on an adapter
 * that does not apply, the result is null.
 */
export class CompositeTranscriptAdapter implements TranscriptAdapter {
  name = "composite";
  private adapters: TranscriptAdapter[];
  private log: Logger;

  constructor(adapters: TranscriptAdapter[], logger: Logger = silentLogger) {
    this.adapters = adapters;
    this.log = logger;
  }

  async fetchTranscript(candidate: EpisodeCandidate): Promise<AcquiredTranscript | null> {
    let lastError: unknown = undefined;

    for (const adapter of this.adapters) {
      try {
        const result = await adapter.fetchTranscript(candidate);
        if (result) return result;
        lastError = undefined;
      } catch (err) {
        this.log(`  [${adapter.name}] ${candidate.guid}: ${errorMessage(err)}`);
        lastError = err;
      }
    }

    if (lastError !== undefined) throw lastError;
    return null;
  }
}

export interface TranscriptAdapterOptions {
  cache: AudioCache;
  speechToText: SpeechToText;
  /** Model size handed to the speech-to-text adapter (e.g. "base") */
  modelSize: string;
  http?: HttpOptions;
  logger?: Logger;
}

/** The default chain: structured transcript first, audio fallback second */
export function createTranscriptAdapter(options: TranscriptAdapterOptions): TranscriptAdapter {
  return new CompositeTranscriptAdapter(
    [
      new StructuredTranscriptAdapter(options.http),
      new AudioTranscriptAdapter(options.cache, options.speechToText, options.modelSize),
    ],
    options.logger
  );
}
