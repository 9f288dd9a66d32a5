import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TranscriptAcquirer, createRunContext } from "./acquirer.js";
import type { SpeechToText } from "./adapters/speech-to-text.js";
import { createTranscriptAdapter } from "./adapters/transcript-adapters.js";
import { StoreFailureError, TranscriptionFailureError } from "./errors.js";
import { scrapeAll } from "./scrape.js";
import { AudioCache } from "./storage/audio-cache.js";
import { EpisodeStore } from "./storage/database.js";
import type { EpisodeCandidate, FeedConfig } from "./types/index.js";
import type { FetchLike, HttpOptions } from "./utils/http.js";

interface ItemSpec {
  guid?: string;
  title: string;
  transcriptUrl?: string;
  audioUrl?: string;
}

function rss(items: ItemSpec[]): string {
  const body = items
    .map((item) => {
      const parts = [`<title>${item.title}</title>`, "<pubDate>Tue, 10 Feb 2026 08:00:00 +0000</pubDate>"];
      if (item.guid) parts.push(`<guid>${item.guid}</guid>`);
      if (item.transcriptUrl) {
        parts.push(`<podcast:transcript url="${item.transcriptUrl}" type="text/plain"/>`);
      }
      if (item.audioUrl) parts.push(`<enclosure url="${item.audioUrl}" type="audio/mpeg"/>`);
      return `<item>${parts.join("")}</item>`;
    })
    .join("");
  return `<?xml version="1.0"?><rss version="2.0" xmlns:podcast="https://podcastindex.org/namespace/1.0"><channel><title>Show</title>${body}</channel></rss>`;
}

const FEED_A: FeedConfig = { name: "Feed A", feedUrl: "https://feeds.example.com/a.xml" };
const FEED_B: FeedConfig = { name: "Feed B", feedUrl: "https://feeds.example.com/b.xml" };

function candidate(overrides: Partial<EpisodeCandidate> & Pick<EpisodeCandidate, "guid">): EpisodeCandidate {
  return {
    feedName: FEED_A.name,
    feedUrl: FEED_A.feedUrl,
    title: `Episode ${overrides.guid}`,
    published: { raw: null, instant: null },
    ...overrides,
  };
}

describe("TranscriptAcquirer", () => {
  let routes: Map<string, () => Response>;
  let fetchImpl: Mock<FetchLike>;
  let http: HttpOptions;
  let transcribe: Mock<SpeechToText["transcribe"]>;
  let cacheDir: string;
  let cache: AudioCache;
  let store: EpisodeStore;
  let acquirer: TranscriptAcquirer;

  const fetchedUrls = (): string[] => fetchImpl.mock.calls.map(([input]) => String(input));

  beforeEach(() => {
    routes = new Map();
    fetchImpl = vi.fn<FetchLike>().mockImplementation(async (input) => {
      const route = routes.get(String(input));
      return route ? route() : new Response("", { status: 404, statusText: "Not Found" });
    });
    http = { fetchImpl, retries: 0 };

    transcribe = vi.fn<SpeechToText["transcribe"]>().mockResolvedValue("spoken words here");
    cacheDir = mkdtempSync(join(tmpdir(), "acquirer-"));
    cache = new AudioCache(cacheDir, http);
    store = new EpisodeStore(":memory:");
    acquirer = new TranscriptAcquirer({
      store,
      adapter: createTranscriptAdapter({
        cache,
        speechToText: { name: "fake", transcribe },
        modelSize: "base",
        http,
      }),
    });
  });

  afterEach(() => {
    store.close();
    rmSync(cacheDir, { recursive: true, force: true });
  });

  it("prefers the published transcript and falls back to audio per feed", async () => {
    routes.set(FEED_A.feedUrl, () =>
      new Response(
        rss([
          {
            guid: "a-1",
            title: "A One",
            transcriptUrl: "https://example.com/a-1.txt",
            audioUrl: "https://cdn.example.com/a-1.mp3",
          },
        ])
      )
    );
    routes.set("https://example.com/a-1.txt", () => new Response("Published transcript text"));
    routes.set(FEED_B.feedUrl, () =>
      new Response(rss([{ guid: "b-1", title: "B One", audioUrl: "https://cdn.example.com/b-1.mp3" }]))
    );
    routes.set("https://cdn.example.com/b-1.mp3", () => new Response(new Uint8Array([1, 2, 3])));

    const summary = await scrapeAll({ news: [FEED_A, FEED_B] }, acquirer, { feedHttp: http });

    expect(summary.newEpisodes).toBe(2);
    expect(store.get("a-1")).toMatchObject({
      transcriptSource: "structured-transcript",
      transcript: "Published transcript text",
      audioPath: null,
      publishedAt: "2026-02-10T08:00:00.000Z",
    });
    expect(store.get("b-1")).toMatchObject({
      transcriptSource: "speech-to-text",
      transcript: "spoken words here",
      audioPath: cache.pathFor("https://cdn.example.com/b-1.mp3"),
    });
    expect(transcribe).toHaveBeenCalledTimes(1);
    expect(transcribe).toHaveBeenCalledWith(cache.pathFor("https://cdn.example.com/b-1.mp3"), "base");
    expect(fetchedUrls()).not.toContain("https://cdn.example.com/a-1.mp3");
  });

  it("does no downloads or transcription for episodes already stored", async () => {
    const audioUrl = "https://cdn.example.com/ep-123.mp3";
    routes.set(FEED_A.feedUrl, () => new Response(rss([{ guid: "ep-123", title: "Once", audioUrl }])));
    routes.set(audioUrl, () => new Response(new Uint8Array([7])));

    const first = await scrapeAll({ news: [FEED_A] }, acquirer, { feedHttp: http });
    const second = await scrapeAll({ news: [FEED_A] }, acquirer, { feedHttp: http });

    expect(first.newEpisodes).toBe(1);
    expect(second.newEpisodes).toBe(0);
    expect(second.alreadyStored).toBe(1);
    expect(store.count()).toBe(1);
    expect(fetchedUrls().filter((url) => url === audioUrl)).toHaveLength(1);
    expect(transcribe).toHaveBeenCalledTimes(1);
  });

  it("isolates a malformed feed from the rest of the run", async () => {
    const broken: FeedConfig = { name: "Broken", feedUrl: "https://feeds.example.com/broken.xml" };
    routes.set(broken.feedUrl, () => new Response("<rss><channel><item></channel></rss>"));
    routes.set(FEED_A.feedUrl, () =>
      new Response(rss([{ guid: "a-1", title: "A One", transcriptUrl: "https://example.com/a-1.txt" }]))
    );
    routes.set("https://example.com/a-1.txt", () => new Response("text"));

    const summary = await scrapeAll({ news: [broken, FEED_A] }, acquirer, { feedHttp: http });

    expect(summary.failedFeeds).toBe(1);
    expect(summary.newEpisodes).toBe(1);
    expect(summary.feeds[0].feedError).toMatch(/^Feed "Broken" unavailable: invalid XML/);
    expect(summary.feeds[1]).toMatchObject({ feedName: "Feed A", stored: 1, errors: [] });
  });

  it("reports the feeds that finished when the run is interrupted", async () => {
    const controller = new AbortController();
    routes.set(FEED_A.feedUrl, () => {
      controller.abort(new Error("Interrupted"));
      return new Response(rss([{ guid: "a-1", title: "A One", transcriptUrl: "https://example.com/a-1.txt" }]));
    });
    routes.set("https://example.com/a-1.txt", () => new Response("text"));

    const summary = await scrapeAll({ news: [FEED_A, FEED_B] }, acquirer, {
      feedHttp: http,
      signal: controller.signal,
    });

    expect(summary).toMatchObject({ interrupted: true, newEpisodes: 1, failedFeeds: 0 });
    expect(summary.feeds.map((feed) => feed.feedName)).toEqual(["Feed A"]);
    expect(fetchedUrls()).not.toContain(FEED_B.feedUrl);
  });

  it("stops after inspecting maxEpisodesToCheck candidates, counting stored ones", async () => {
    store.upsert({
      guid: "ep-1",
      feedName: FEED_A.name,
      feedUrl: FEED_A.feedUrl,
      title: "Episode 1",
      publishedAt: null,
      publishedRaw: null,
      audioUrl: null,
      audioPath: null,
      transcript: "already here",
      transcriptSource: "structured-transcript",
    });
    routes.set(FEED_A.feedUrl, () =>
      new Response(
        rss([
          { guid: "ep-1", title: "One", transcriptUrl: "https://example.com/1.txt" },
          { guid: "ep-2", title: "Two", transcriptUrl: "https://example.com/2.txt" },
          { guid: "ep-3", title: "Three", transcriptUrl: "https://example.com/3.txt" },
        ])
      )
    );
    routes.set("https://example.com/2.txt", () => new Response("two"));
    routes.set("https://example.com/3.txt", () => new Response("three"));

    const result = await acquirer.acquireFeed(FEED_A, "news", createRunContext(2, http));

    expect(result).toMatchObject({ checked: 2, alreadyStored: 1, stored: 1, skipped: 0 });
    expect(store.exists("ep-3")).toBe(false);
  });

  it("counts entries without a guid as degraded, not inspected", async () => {
    routes.set(FEED_A.feedUrl, () =>
      new Response(rss([{ title: "Nameless", transcriptUrl: "https://example.com/x.txt" }]))
    );

    const result = await acquirer.acquireFeed(FEED_A, "news", createRunContext(5, http));

    expect(result).toMatchObject({ checked: 0, degraded: 1, stored: 0 });
  });

  it("skips candidates with neither a transcript link nor audio", async () => {
    await expect(acquirer.acquireCandidate(candidate({ guid: "bare" }))).resolves.toEqual({
      status: "unresolvable",
      guid: "bare",
      reason: "no transcript link and no audio URL",
    });
  });

  it("falls back to audio when the transcript link fails", async () => {
    routes.set("https://cdn.example.com/fb.mp3", () => new Response(new Uint8Array([1])));

    const outcome = await acquirer.acquireCandidate(
      candidate({
        guid: "fb",
        transcriptUrl: "https://example.com/missing.txt",
        audioUrl: "https://cdn.example.com/fb.mp3",
      })
    );

    expect(outcome).toEqual({
      status: "stored",
      guid: "fb",
      source: "speech-to-text",
      isNew: true,
      wordCount: 3,
    });
  });

  it("treats a failed transcript link without audio as unresolvable", async () => {
    const outcome = await acquirer.acquireCandidate(
      candidate({ guid: "gone", transcriptUrl: "https://example.com/missing.txt" })
    );

    expect(outcome).toEqual({
      status: "unresolvable",
      guid: "gone",
      reason: "structured transcript unavailable and no audio URL",
    });
  });

  it("reports the failing step and stores nothing", async () => {
    routes.set("https://cdn.example.com/t.mp3", () => new Response(new Uint8Array([1])));
    transcribe.mockRejectedValueOnce(new TranscriptionFailureError("Transcription of t.mp3 returned no text"));

    const sttFailure = await acquirer.acquireCandidate(
      candidate({ guid: "t", audioUrl: "https://cdn.example.com/t.mp3" })
    );
    const downloadFailure = await acquirer.acquireCandidate(
      candidate({ guid: "d", audioUrl: "https://cdn.example.com/absent.mp3" })
    );

    expect(sttFailure).toEqual({
      status: "failed",
      guid: "t",
      step: "speech-to-text",
      reason: "Transcription of t.mp3 returned no text",
    });
    expect(downloadFailure).toEqual({
      status: "failed",
      guid: "d",
      step: "audio-download",
      reason: "HTTP 404 Not Found for https://cdn.example.com/absent.mp3",
    });
    expect(store.count()).toBe(0);
  });

  it("propagates store failures", async () => {
    const closed = new EpisodeStore(":memory:");
    closed.close();
    const broken = new TranscriptAcquirer({ store: closed, adapter: { name: "none", fetchTranscript: async () => null } });
    routes.set(FEED_A.feedUrl, () =>
      new Response(rss([{ guid: "a-1", title: "A One", transcriptUrl: "https://example.com/a-1.txt" }]))
    );

    await expect(broken.acquireFeed(FEED_A, "news", createRunContext(5, http))).rejects.toThrow(
      StoreFailureError
    );
  });
});
