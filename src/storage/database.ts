import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { StoreFailureError, errorMessage } from "../errors.js";
import type {
  Episode,
  EpisodeInput,
  EpisodeListEntry,
  EpisodeQuery,
  TranscriptSource,
} from "../types/index.js";
import { countWords } from "../utils/format-transcript.js";

/** Row shape returned by SQLite for the episodes table (snake_case columns) */
interface EpisodeRow {
  guid: string;
  feed_name: string;
  feed_url: string;
  title: string;
  published_at: string | null;
  published_raw: string | null;
  audio_url: string | null;
  audio_path: string | null;
  transcript: string;
  transcript_source: TranscriptSource;
  scraped_at: string;
  word_count: number;
}

type ListRow = Pick<
  EpisodeRow,
  "guid" | "title" | "feed_name" | "published_at" | "word_count" | "transcript_source" | "scraped_at"
>;

function rowToEpisode(row: EpisodeRow): Episode {
  return {
    guid: row.guid,
    feedName: row.feed_name,
    feedUrl: row.feed_url,
    title: row.title,
    publishedAt: row.published_at,
    publishedRaw: row.published_raw,
    audioUrl: row.audio_url,
    audioPath: row.audio_path,
    transcript: row.transcript,
    transcriptSource: row.transcript_source,
    scrapedAt: row.scraped_at,
    wordCount: row.word_count,
  };
}

export interface EpisodeStoreOptions {
  /** Clock used for scraped_at (tests) */
  now?: () => Date;
}

/**
 * Durable episode storage keyed by feed guid.
 *
 * Every write is a single INSERT ... ON CONFLICT statement, so a guid
 * maps to exactly one row and an interrupted write leaves no partial row.
 */
export class EpisodeStore {
  private db: Database.Database;
  private now: () => Date;

  constructor(dbPath: string, options: EpisodeStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    try {
      if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
      this.db = new Database(dbPath);
      this.db.pragma("journal_mode = WAL");
      this.initialize();
    } catch (err) {
      throw new StoreFailureError(`Cannot open episode store at ${dbPath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS episodes (
        guid TEXT PRIMARY KEY,
        feed_name TEXT NOT NULL,
        feed_url TEXT NOT NULL,
        title TEXT NOT NULL,
        published_at TEXT,
        published_raw TEXT,
        audio_url TEXT,
        audio_path TEXT,
        transcript TEXT NOT NULL,
        transcript_source TEXT NOT NULL
          CHECK (transcript_source IN ('structured-transcript', 'speech-to-text')),
        scraped_at TEXT NOT NULL,
        word_count INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_episodes_feed_name ON episodes(feed_name);
      CREATE INDEX IF NOT EXISTS idx_episodes_scraped_at ON episodes(scraped_at);
      CREATE INDEX IF NOT EXISTS idx_episodes_published_at ON episodes(published_at);
    `);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StoreFailureError(`Episode store ${operation} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  /**
   * Insert or fully overwrite the episode with this guid.
   * scraped_at is stamped and word_count recomputed on every write.
   */
  upsert(input: EpisodeInput): { isNew: boolean; episode: Episode } {
    const episode: Episode = {
      ...input,
      scrapedAt: this.now().toISOString(),
      wordCount: countWords(input.transcript),
    };

    const write = (ep: Episode): boolean => {
      const existing = this.db
        .prepare<[string], { guid: string }>("SELECT guid FROM episodes WHERE guid = ?")
        .get(ep.guid);

      this.db
        .prepare<Record<string, string | number | null>>(
          `INSERT INTO episodes (guid, feed_name, feed_url, title, published_at, published_raw,
             audio_url, audio_path, transcript, transcript_source, scraped_at, word_count)
           VALUES (@guid, @feedName, @feedUrl, @title, @publishedAt, @publishedRaw,
             @audioUrl, @audioPath, @transcript, @transcriptSource, @scrapedAt, @wordCount)
           ON CONFLICT(guid) DO UPDATE SET
             feed_name = excluded.feed_name,
             feed_url = excluded.feed_url,
             title = excluded.title,
             published_at = excluded.published_at,
             published_raw = excluded.published_raw,
             audio_url = excluded.audio_url,
             audio_path = excluded.audio_path,
             transcript = excluded.transcript,
             transcript_source = excluded.transcript_source,
             scraped_at = excluded.scraped_at,
             word_count = excluded.word_count`
        )
        .run({
          guid: ep.guid,
          feedName: ep.feedName,
          feedUrl: ep.feedUrl,
          title: ep.title,
          publishedAt: ep.publishedAt,
          publishedRaw: ep.publishedRaw,
          audioUrl: ep.audioUrl,
          audioPath: ep.audioPath,
          transcript: ep.transcript,
          transcriptSource: ep.transcriptSource,
          scrapedAt: ep.scrapedAt,
          wordCount: ep.wordCount,
        });

      return existing === undefined;
    };

    const isNew = this.guard("upsert", () => this.db.transaction(write)(episode));
    return { isNew, episode };
  }

  /** Whether an episode with this guid is already stored (the dedup gate) */
  exists(guid: string): boolean {
    return this.guard("lookup", () =>
      this.db.prepare<[string], { found: number }>("SELECT 1 AS found FROM episodes WHERE guid = ?").get(guid)
    ) !== undefined;
  }

  get(guid: string): Episode | null {
    const row = this.guard("lookup", () =>
      this.db.prepare<[string], EpisodeRow>("SELECT * FROM episodes WHERE guid = ?").get(guid)
    );
    return row ? rowToEpisode(row) : null;
  }

  count(): number {
    const row = this.guard("count", () =>
      this.db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM episodes").get()
    );
    return row?.total ?? 0;
  }

  /**
   * Episodes of the given feeds at or after `since`, newest published first.
   * Episodes without a parseable publish date sort last. With the default
   * "published" basis they are windowed by scraped_at instead of excluded.
   */
  query(options: EpisodeQuery): Episode[] {
    const { feedNames, since, basis = "published" } = options;
    // An explicit empty list is a group with no feeds, not "every feed"
    if (feedNames && feedNames.length === 0) return [];
    const windowColumn = basis === "scraped" ? "scraped_at" : "COALESCE(published_at, scraped_at)";

    const conditions = [`${windowColumn} >= ?`];
    const params: string[] = [since];

    if (feedNames) {
      conditions.push(`feed_name IN (${feedNames.map(() => "?").join(",")})`);
      params.push(...feedNames);
    }

    const sql = `
      SELECT * FROM episodes
      WHERE ${conditions.join(" AND ")}
      ORDER BY published_at IS NULL, published_at DESC, scraped_at DESC
    `;

    const rows = this.guard("query", () => this.db.prepare<string[], EpisodeRow>(sql).all(...params));
    return rows.map(rowToEpisode);
  }

  /** Most recently scraped episodes, metadata only */
  listRecent(limit = 50): EpisodeListEntry[] {
    const rows = this.guard("list", () =>
      this.db
        .prepare<[number], ListRow>(
          `SELECT guid, title, feed_name, published_at, word_count, transcript_source, scraped_at
           FROM episodes
           ORDER BY scraped_at DESC
           LIMIT ?`
        )
        .all(limit)
    );

    return rows.map((row) => ({
      guid: row.guid,
      title: row.title,
      feedName: row.feed_name,
      publishedAt: row.published_at,
      wordCount: row.word_count,
      transcriptSource: row.transcript_source,
      scrapedAt: row.scraped_at,
    }));
  }

  close(): void {
    this.db.close();
  }
}
