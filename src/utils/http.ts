/**
 * HTTP fetching with a bounded timeout and a retry budget.
 *
 * Network errors, timeouts, 429 and 5xx responses are retried with
 * exponential backoff; any other non-2xx response fails immediately.
 */

import { FetchFailureError, errorMessage } from "../errors.js";
import type { AcquisitionStep } from "../types/index.js";

export type FetchLike = typeof fetch;

export const USER_AGENT = "PodcastTranscriptPipeline/1.0 (podcast transcript collector)";

export interface HttpOptions {
  /** Per-attempt timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Extra attempts after the first (default: 2) */
  retries?: number;
  /** Base backoff delay in ms, doubled per attempt (default: 1000) */
  retryDelayMs?: number;
  /** Injected fetch implementation (tests) */
  fetchImpl?: FetchLike;
}

export const DEFAULT_HTTP_OPTIONS = {
  timeoutMs: 30_000,
  retries: 2,
  retryDelayMs: 1000,
} satisfies Required<Omit<HttpOptions, "fetchImpl">>;

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export async function fetchWithRetry(
  url: string,
  step: AcquisitionStep,
  options: HttpOptions & { headers?: Record<string, string> } = {}
): Promise<Response> {
  const { timeoutMs, retries, retryDelayMs } = { ...DEFAULT_HTTP_OPTIONS, ...options };
  const fetchImpl = options.fetchImpl ?? fetch;
  const attempts = Math.max(1, retries + 1);
  let lastError = "no attempt made";

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const response = await fetchImpl(url, {
        headers: { "User-Agent": USER_AGENT, ...options.headers },
        redirect: "follow",
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (response.ok) return response;

      lastError = `HTTP ${response.status} ${response.statusText}`.trim();
      // Release the connection before retrying or giving up
      await response.body?.cancel();
      if (!isRetryableStatus(response.status)) {
        throw new FetchFailureError(url, `${lastError} for ${url}`, step);
      }
    } catch (err) {
      if (err instanceof FetchFailureError) throw err;
      lastError = errorMessage(err);
    }

    if (attempt < attempts && retryDelayMs > 0) {
      const delay = Math.pow(2, attempt - 1) * retryDelayMs;
      await new Promise((r) => setTimeout(r, delay));
    }
  }

  throw new FetchFailureError(
    url,
    `Failed to fetch ${url} after ${attempts} attempt(s): ${lastError}`,
    step
  );
}
