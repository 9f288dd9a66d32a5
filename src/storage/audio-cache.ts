/**
 * Content-addressed audio cache.
 *
 * Files are named by the SHA-256 of the audio URL, so a second run over
 * the same feed finds the file and skips the download entirely. Downloads
 * stream to a temporary name and are renamed into place only once complete.
 */

import { createHash, randomUUID } from "node:crypto";
import { createWriteStream, existsSync, mkdirSync } from "node:fs";
import { rename, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { FetchFailureError, errorMessage } from "../errors.js";
import { fetchWithRetry, type HttpOptions } from "../utils/http.js";
import { silentLogger, type Logger } from "../utils/log.js";

const CACHE_EXTENSIONS = [".mp3", ".m4a", ".ogg", ".wav", ".mp4"];

/** Covers the whole download, body included, so it is sized for long episodes */
export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 30 * 60 * 1000;

export interface AudioCacheOptions extends Omit<HttpOptions, "timeoutMs"> {
  /** Per-attempt download timeout in ms (default: 30 min) */
  downloadTimeoutMs?: number;
  logger?: Logger;
}

export class AudioCache {
  readonly cacheDir: string;
  private http: HttpOptions;
  private log: Logger;
  /** In-flight downloads by cache key, so concurrent callers share one fetch */
  private inflight = new Map<string, Promise<string>>();

  constructor(cacheDir: string, options: AudioCacheOptions = {}) {
    const { downloadTimeoutMs, logger, ...http } = options;
    this.cacheDir = cacheDir;
    this.http = { ...http, timeoutMs: downloadTimeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS };
    this.log = logger ?? silentLogger;
  }

  /** Deterministic, filename-safe key for an audio URL */
  static keyFor(audioUrl: string): string {
    return createHash("sha256").update(audioUrl).digest("hex");
  }

  static extensionFor(audioUrl: string): string {
    const path = audioUrl.toLowerCase().split("?")[0];
    return CACHE_EXTENSIONS.find((ext) => path.endsWith(ext)) ?? ".mp3";
  }

  pathFor(audioUrl: string): string {
    return join(this.cacheDir, `${AudioCache.keyFor(audioUrl)}${AudioCache.extensionFor(audioUrl)}`);
  }

  has(audioUrl: string): boolean {
    return existsSync(this.pathFor(audioUrl));
  }

  /** Local path of the cached audio, downloading it on a miss */
  async getOrFetch(audioUrl: string): Promise<string> {
    const localPath = this.pathFor(audioUrl);
    if (existsSync(localPath)) {
      this.log(`  [cache hit] ${AudioCache.keyFor(audioUrl).slice(0, 16)}`);
      return localPath;
    }

    const key = AudioCache.keyFor(audioUrl);
    const pending = this.inflight.get(key);
    if (pending) return pending;

    const download = this.download(audioUrl, localPath).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, download);
    return download;
  }

  private async download(audioUrl: string, localPath: string): Promise<string> {
    mkdirSync(this.cacheDir, { recursive: true });
    const tempPath = `${localPath}.${randomUUID()}.part`;
    this.log(`  [downloading] ${audioUrl.slice(0, 100)}`);

    try {
      const response = await fetchWithRetry(audioUrl, "audio-download", this.http);
      if (!response.body) {
        throw new FetchFailureError(audioUrl, `Empty response body for ${audioUrl}`, "audio-download");
      }

      await pipeline(Readable.fromWeb(response.body), createWriteStream(tempPath));

      const { size } = await stat(tempPath);
      if (size === 0) {
        throw new FetchFailureError(audioUrl, `Zero-byte audio at ${audioUrl}`, "audio-download");
      }

      await rename(tempPath, localPath);
      this.log(`  [saved] ${(size / (1024 * 1024)).toFixed(1)} MB`);
      return localPath;
    } catch (err) {
      await rm(tempPath, { force: true });
      if (err instanceof FetchFailureError) throw err;
      throw new FetchFailureError(
        audioUrl,
        `Audio download failed for ${audioUrl}: ${errorMessage(err)}`,
        "audio-download",
        { cause: err }
      );
    }
  }
}
