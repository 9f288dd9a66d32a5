import { XMLParser, XMLValidator } from "fast-xml-parser";
import { FeedUnavailableError, FetchFailureError, errorMessage } from "../errors.js";
import type { DegradedEntry, EpisodeCandidate, FeedConfig } from "../types/index.js";
import { parsePublishedDate } from "../utils/dates.js";
import { transcriptToText } from "../utils/format-transcript.js";
import { fetchWithRetry, type HttpOptions } from "../utils/http.js";

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  // guids like "12345" must stay strings
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (name) =>
    ["item", "entry", "enclosure", "link", "podcast:transcript", "media:content"].includes(name),
});

const AUDIO_EXTENSIONS = [".mp3", ".m4a", ".ogg", ".wav"];

/** Transcript MIME preference: plain text, SRT, VTT, JSON, HTML, anything else */
const TRANSCRIPT_TYPE_RANK: Array<[RegExp, number]> = [
  [/plain/, 0],
  [/srt|subrip/, 1],
  [/vtt/, 2],
  [/json/, 3],
  [/html/, 4],
];

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Text content of an element, whether it parsed to a scalar or a node with attributes */
function textOf(value: unknown): string | undefined {
  if (Array.isArray(value)) return textOf(value[0]);
  if (typeof value === "string") return value.trim() || undefined;
  if (typeof value === "number") return String(value);
  if (isNode(value)) return textOf(value["#text"]);
  return undefined;
}

function nodesOf(value: unknown): XmlNode[] {
  const list = Array.isArray(value) ? value : value === undefined ? [] : [value];
  return list.filter(isNode);
}

function attr(node: XmlNode, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function resolveUrl(href: string | undefined, base: string): string | undefined {
  if (!href) return undefined;
  try {
    return new URL(href, base).href;
  } catch {
    return undefined;
  }
}

function looksLikeAudio(url: string, type: string | undefined): boolean {
  if (type?.toLowerCase().includes("audio")) return true;
  const path = url.toLowerCase().split("?")[0];
  return AUDIO_EXTENSIONS.some((ext) => path.endsWith(ext));
}

function transcriptRank(type: string | undefined): number {
  const lower = type?.toLowerCase() ?? "";
  for (const [pattern, rank] of TRANSCRIPT_TYPE_RANK) {
    if (pattern.test(lower)) return rank;
  }
  return TRANSCRIPT_TYPE_RANK.length;
}

function extractAudioUrl(entry: XmlNode, feedUrl: string): string | undefined {
  // Enclosures are purpose-built for podcast audio
  for (const enc of nodesOf(entry.enclosure)) {
    const url = resolveUrl(attr(enc, "url"), feedUrl);
    if (url && looksLikeAudio(url, attr(enc, "type"))) return url;
  }
  for (const media of nodesOf(entry["media:content"])) {
    const url = resolveUrl(attr(media, "url"), feedUrl);
    if (url && looksLikeAudio(url, attr(media, "type"))) return url;
  }
  // Atom: <link rel="enclosure" href="..." type="audio/mpeg"/>
  for (const link of nodesOf(entry.link)) {
    if (attr(link, "rel") !== "enclosure") continue;
    const url = resolveUrl(attr(link, "href"), feedUrl);
    if (url && looksLikeAudio(url, attr(link, "type"))) return url;
  }
  return undefined;
}

function extractTranscriptLink(
  entry: XmlNode,
  feedUrl: string
): { url: string; type?: string } | undefined {
  let best: { url: string; type?: string; rank: number } | undefined;

  for (const t of nodesOf(entry["podcast:transcript"])) {
    const url = resolveUrl(attr(t, "url"), feedUrl);
    if (!url) continue;
    const type = attr(t, "type");
    const rank = transcriptRank(type);
    if (!best || rank < best.rank) best = { url, type, rank };
  }
  if (best) return { url: best.url, type: best.type };

  for (const link of nodesOf(entry.link)) {
    if (attr(link, "rel") !== "transcript") continue;
    const url = resolveUrl(attr(link, "href"), feedUrl);
    if (url) return { url, type: attr(link, "type") };
  }
  return undefined;
}

/** Convert one feed entry; returns a reason string when it cannot be a candidate */
function entryToCandidate(entry: XmlNode, feed: FeedConfig): EpisodeCandidate | string {
  const guid = textOf(entry.guid) ?? textOf(entry.id);
  if (!guid) return "missing guid";

  const dateText =
    textOf(entry.pubDate) ??
    textOf(entry["dc:date"]) ??
    textOf(entry.published) ??
    textOf(entry.updated);
  const transcript = extractTranscriptLink(entry, feed.feedUrl);

  const candidate: EpisodeCandidate = {
    feedName: feed.name,
    feedUrl: feed.feedUrl,
    guid,
    title: textOf(entry.title) ?? "Untitled",
    published: parsePublishedDate(dateText),
  };
  const audioUrl = extractAudioUrl(entry, feed.feedUrl);
  if (audioUrl) candidate.audioUrl = audioUrl;
  if (transcript) {
    candidate.transcriptUrl = transcript.url;
    if (transcript.type) candidate.transcriptType = transcript.type;
  }
  return candidate;
}

export interface FeedDocument {
  title: string;
  entries: XmlNode[];
}

/** Validate and parse feed XML (RSS 2.0 or Atom) into its raw entries */
export function parseFeedDocument(xml: string, feed: FeedConfig): FeedDocument {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new FeedUnavailableError(feed.name, `invalid XML (line ${line}): ${msg}`);
  }

  const parsed: unknown = parser.parse(xml);
  if (!isNode(parsed)) {
    throw new FeedUnavailableError(feed.name, "empty document");
  }

  const rss = parsed.rss;
  if (isNode(rss) && isNode(rss.channel)) {
    const channel = rss.channel;
    return {
      title: textOf(channel.title) ?? feed.name,
      entries: nodesOf(channel.item),
    };
  }

  const atom = parsed.feed;
  if (isNode(atom)) {
    return {
      title: textOf(atom.title) ?? feed.name,
      entries: nodesOf(atom.entry),
    };
  }

  throw new FeedUnavailableError(feed.name, "no channel element");
}

/**
 * Lazily convert entries to candidates in feed-declared order.
 * Entries without a guid are reported through `onDegraded` and skipped.
 */
export function* candidatesFrom(
  doc: FeedDocument,
  feed: FeedConfig,
  onDegraded?: (entry: DegradedEntry) => void
): Generator<EpisodeCandidate, void, undefined> {
  for (const entry of doc.entries) {
    const result = entryToCandidate(entry, feed);
    if (typeof result === "string") {
      onDegraded?.({ feedName: feed.name, title: textOf(entry.title) ?? "Untitled", reason: result });
      continue;
    }
    yield result;
  }
}

export interface ParsedFeed {
  title: string;
  candidates: EpisodeCandidate[];
  degraded: DegradedEntry[];
}

export function parseFeedXml(xml: string, feed: FeedConfig): ParsedFeed {
  const doc = parseFeedDocument(xml, feed);
  const degraded: DegradedEntry[] = [];
  const candidates = [...candidatesFrom(doc, feed, (d) => degraded.push(d))];
  return { title: doc.title, candidates, degraded };
}

export async function fetchFeedXml(feed: FeedConfig, options: HttpOptions = {}): Promise<string> {
  try {
    const response = await fetchWithRetry(feed.feedUrl, "feed", {
      ...options,
      headers: { Accept: "application/rss+xml, application/atom+xml, application/xml, text/xml" },
    });
    return await response.text();
  } catch (err) {
    if (err instanceof FetchFailureError) {
      throw new FeedUnavailableError(feed.name, err.message, { cause: err });
    }
    throw new FeedUnavailableError(feed.name, errorMessage(err), { cause: err });
  }
}

export interface ReadFeedOptions extends HttpOptions {
  onDegraded?: (entry: DegradedEntry) => void;
}

/**
 * Fetch a feed and yield its candidates lazily. Each call refetches,
 * so iterating again restarts from the top of the feed.
 */
export async function* readFeed(
  feed: FeedConfig,
  options: ReadFeedOptions = {}
): AsyncGenerator<EpisodeCandidate, void, undefined> {
  const xml = await fetchFeedXml(feed, options);
  const doc = parseFeedDocument(xml, feed);
  yield* candidatesFrom(doc, feed, options.onDegraded);
}

/**
 * Fetch a published transcript (e.g. from a podcast:transcript tag) and
 * reduce it to plain text. Empty documents count as fetch failures.
 */
export async function fetchTranscriptFromUrl(
  url: string,
  declaredType: string | undefined,
  options: HttpOptions = {}
): Promise<string> {
  const response = await fetchWithRetry(url, "structured-transcript", {
    ...options,
    headers: { Accept: "text/plain, application/x-subrip, text/vtt, application/json, text/html, */*" },
  });

  const body = await response.text();
  if (!body.trim()) {
    throw new FetchFailureError(url, `Empty transcript document at ${url}`, "structured-transcript");
  }

  const contentType = declaredType ?? response.headers.get("content-type") ?? "";
  const text = transcriptToText(body, contentType, url);
  if (!text) {
    throw new FetchFailureError(url, `Transcript at ${url} contained no text`, "structured-transcript");
  }
  return text;
}
