/**
 * Error taxonomy for the ingestion pipeline.
 *
 * Feed, fetch and transcription errors are recovered per feed or per
 * episode. StoreFailureError aborts the run.
 */

import type { AcquisitionStep } from "./types/index.js";

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly step: AcquisitionStep,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PipelineError";
  }
}

/** A feed could not be fetched or parsed. Isolated to that feed. */
export class FeedUnavailableError extends PipelineError {
  constructor(
    public readonly feedName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Feed "${feedName}" unavailable: ${message}`, "feed", options);
    this.name = "FeedUnavailableError";
  }
}

/** Missing guid, or neither a transcript link nor an audio URL */
export class CandidateUnresolvableError extends PipelineError {
  constructor(message: string) {
    super(message, "dedup");
    this.name = "CandidateUnresolvableError";
  }
}

/** Transcript-link or audio download failed after the retry budget */
export class FetchFailureError extends PipelineError {
  constructor(
    public readonly url: string,
    message: string,
    step: AcquisitionStep,
    options?: { cause?: unknown }
  ) {
    super(message, step, options);
    this.name = "FetchFailureError";
  }
}

/** The speech-to-text collaborator failed or returned no text */
export class TranscriptionFailureError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "speech-to-text", options);
    this.name = "TranscriptionFailureError";
  }
}

/** The persistence layer is unavailable. Fatal for the run. */
export class StoreFailureError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "store", options);
    this.name = "StoreFailureError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
