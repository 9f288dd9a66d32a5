/**
 * Publication date parsing for feed entries.
 *
 * Feeds in the wild declare dates as RFC-2822 (RSS pubDate) or ISO-8601
 * (Atom, dc:date). Anything else keeps its raw text and an unknown instant.
 */

import { DateTime } from "luxon";
import type { PublishedDate } from "../types/index.js";

/** Feeds routinely carry a weekday that disagrees with the date; the date wins */
const LEADING_WEEKDAY = /^[A-Za-z]{3,9},\s*/;

function toInstant(dt: DateTime): string | null {
  return dt.isValid ? dt.toJSDate().toISOString() : null;
}

export function parsePublishedDate(raw: string | null | undefined): PublishedDate {
  const text = raw?.trim();
  if (!text) return { raw: null, instant: null };

  // Zone-less ISO values are UTC; RFC-2822 only takes the zones it names
  const instant =
    toInstant(DateTime.fromISO(text, { zone: "utc" })) ??
    toInstant(DateTime.fromRFC2822(text.replace(LEADING_WEEKDAY, ""), { zone: "utc" }));
  return { raw: text, instant };
}

/** Short display date: YYYY-MM-DD when known, else the raw text, else "unknown date" */
export function formatDisplayDate(publishedAt: string | null, publishedRaw: string | null): string {
  if (publishedAt) return publishedAt.slice(0, 10);
  if (publishedRaw) return publishedRaw.slice(0, 20);
  return "unknown date";
}

export function hoursAgo(hours: number, now: Date = new Date()): string {
  return new Date(now.getTime() - hours * 60 * 60 * 1000).toISOString();
}
