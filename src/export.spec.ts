import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { feedNamesOf, selectGroup } from "./config.js";
import { buildExcerptPayload, exportExcerpts, exportText, formatTextExport } from "./export.js";
import { EpisodeStore } from "./storage/database.js";
import type { Episode } from "./types/index.js";
import { countWords } from "./utils/format-transcript.js";

function episode(overrides: Partial<Episode> & Pick<Episode, "guid">): Episode {
  const transcript = overrides.transcript ?? "some transcript text";
  return {
    feedName: "Feed A",
    feedUrl: "https://feeds.example.com/a.xml",
    title: `Episode ${overrides.guid}`,
    publishedAt: "2026-02-10T08:00:00.000Z",
    publishedRaw: null,
    audioUrl: null,
    audioPath: null,
    transcriptSource: "structured-transcript",
    scrapedAt: "2026-02-13T00:00:00.000Z",
    wordCount: countWords(transcript),
    ...overrides,
    transcript,
  };
}

describe("formatTextExport", () => {
  it("writes a header and transcript per episode separated by the delimiter", () => {
    const result = formatTextExport([
      episode({ guid: "1", title: "One", transcript: "first transcript" }),
      episode({ guid: "2", feedName: "Feed B", title: "Two", publishedAt: null, transcript: "second one here" }),
      episode({ guid: "3", transcript: "" }),
    ]);

    expect(result).toEqual({
      text: "[Feed A]: One (2026-02-10)\nfirst transcript\n---\n[Feed B]: Two (unknown date)\nsecond one here\n",
      episodeCount: 2,
      totalWords: 5,
    });
  });

  it("shows the raw date text when the instant is unknown", () => {
    const { text } = formatTextExport(
      [episode({ guid: "1", title: "One", publishedAt: null, publishedRaw: "Spring 2025", transcript: "x" })],
      "==="
    );
    expect(text).toBe("[Feed A]: One (Spring 2025)\nx\n");
  });

  it("returns an empty result when nothing matches", () => {
    expect(formatTextExport([])).toEqual({ text: "", episodeCount: 0, totalWords: 0 });
  });
});

describe("buildExcerptPayload", () => {
  const options = {
    group: "news",
    lookbackHours: 168,
    maxEpisodesTotal: 3,
    maxEpisodesPerFeed: 2,
    excerptChars: 5,
    now: new Date("2026-02-13T12:00:00.000Z"),
  };

  it("applies the per-feed cap, then the total cap, then cuts each excerpt", () => {
    const payload = buildExcerptPayload(
      [
        episode({ guid: "a1", transcript: "alpha one" }),
        episode({ guid: "b1", feedName: "Feed B", transcript: "bravo" }),
        episode({ guid: "a2", transcript: "alpha two" }),
        episode({ guid: "a3", transcript: "alpha three" }),
        episode({ guid: "b2", feedName: "Feed B", transcript: "bravo two" }),
      ],
      options
    );

    expect(payload.episodes.map((e) => e.guid)).toEqual(["a1", "b1", "a2"]);
    expect(payload.episodes.map((e) => [e.excerpt, e.truncated])).toEqual([
      ["alpha", true],
      ["bravo", false],
      ["alpha", true],
    ]);
    expect(payload).toMatchObject({
      group: "news",
      lookbackHours: 168,
      maxEpisodesTotal: 3,
      maxEpisodesPerFeed: 2,
      excerptChars: 5,
      generatedAt: "2026-02-13T12:00:00.000Z",
    });
  });

  it("keeps episode metadata alongside the excerpt", () => {
    const [entry] = buildExcerptPayload([episode({ guid: "a1", title: "Alpha", transcript: "alpha one" })], options).episodes;

    expect(entry).toEqual({
      guid: "a1",
      feedName: "Feed A",
      title: "Alpha",
      publishedAt: "2026-02-10T08:00:00.000Z",
      publishedDate: "2026-02-10",
      wordCount: 2,
      truncated: true,
      excerpt: "alpha",
    });
  });
});

describe("store-backed exports", () => {
  let store: EpisodeStore;
  const now = new Date("2026-02-13T00:00:00.000Z");

  beforeEach(() => {
    store = new EpisodeStore(":memory:", { now: () => now });
  });

  afterEach(() => {
    store.close();
  });

  function add(guid: string, publishedAt: string, feedName = "Solo"): void {
    store.upsert({
      guid,
      feedName,
      feedUrl: "https://feeds.example.com/solo.xml",
      title: guid,
      publishedAt,
      publishedRaw: null,
      audioUrl: null,
      audioPath: null,
      transcript: `transcript of ${guid}`,
      transcriptSource: "structured-transcript",
    });
  }

  it("returns the most recent episodes of a feed under a per-feed cap", () => {
    add("feb-10", "2026-02-10T08:00:00.000Z");
    add("feb-12", "2026-02-12T08:00:00.000Z");
    add("feb-11", "2026-02-11T08:00:00.000Z");

    const payload = exportExcerpts(store, {
      group: "solo",
      feedNames: ["Solo"],
      lookbackHours: 168,
      maxEpisodesTotal: 10,
      maxEpisodesPerFeed: 2,
      excerptChars: 100,
      now,
    });

    expect(payload.episodes.map((e) => e.guid)).toEqual(["feb-12", "feb-11"]);
  });

  it("produces a valid payload with no episodes when nothing is in the window", () => {
    add("old", "2025-06-01T00:00:00.000Z");

    const payload = exportExcerpts(store, {
      group: "solo",
      lookbackHours: 24,
      maxEpisodesTotal: 10,
      maxEpisodesPerFeed: 2,
      excerptChars: 100,
      now,
    });

    expect(payload.episodes).toEqual([]);
    expect(payload.generatedAt).toBe("2026-02-13T00:00:00.000Z");
  });

  it("exports text for the lookback window only", () => {
    add("recent", "2026-02-12T08:00:00.000Z");
    add("old", "2025-06-01T00:00:00.000Z");

    const result = exportText(store, { lookbackHours: 168, now });

    expect(result).toEqual({
      text: "[Solo]: recent (2026-02-12)\ntranscript of recent\n",
      episodeCount: 1,
      totalWords: 3,
    });
  });

  it("exports nothing for a group without feeds", () => {
    add("other", "2026-02-12T08:00:00.000Z", "Other Feed");
    const groups = { news: [], tech: [{ name: "Other Feed", feedUrl: "https://feeds.example.com/other.xml" }] };

    const payload = exportExcerpts(store, {
      group: "news",
      feedNames: feedNamesOf(selectGroup(groups, "news")),
      lookbackHours: 168,
      maxEpisodesTotal: 10,
      maxEpisodesPerFeed: 2,
      excerptChars: 100,
      now,
    });

    expect(payload.episodes).toEqual([]);
  });
});
