/**
 * Transcript text utilities.
 *
 * Turns published transcript documents (plain text, SRT, WebVTT,
 * Podcast 2.0 JSON, HTML) into plain text, and cuts transcripts down
 * to bounded excerpts.
 */

/** Whitespace-token count, the stored word_count */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function stripHtml(html: string): string {
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, " ")
    .replace(/<[^>]*>/g, " ")
    .replace(/&nbsp;/g, " ")
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/\s+/g, " ")
    .trim();
}

/** Drop cue numbers, timing lines and WebVTT headers, keep the spoken text */
export function cleanSubtitleText(raw: string): string {
  return raw
    .split(/\r?\n/)
    .filter((line) => {
      const trimmed = line.trim();
      if (!trimmed) return false;
      if (/^\d+$/.test(trimmed)) return false;
      if (trimmed.includes("-->")) return false;
      if (trimmed.startsWith("WEBVTT")) return false;
      if (trimmed.startsWith("NOTE")) return false;
      return true;
    })
    .map((line) => line.replace(/<[^>]*>/g, ""))
    .join(" ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Podcast 2.0 JSON transcripts: `{ segments: [{ speaker?, body }] }`.
 * Returns null when the document does not have that shape.
 */
export function jsonTranscriptToText(raw: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || !("segments" in parsed)) {
    return null;
  }
  const segments = parsed.segments;
  if (!Array.isArray(segments)) return null;

  const bodies: string[] = [];
  for (const segment of segments) {
    if (typeof segment === "object" && segment !== null && "body" in segment) {
      const body = segment.body;
      if (typeof body === "string" && body.trim()) bodies.push(body.trim());
    }
  }
  return bodies.join(" ").replace(/\s+/g, " ").trim();
}

/** Normalise a fetched transcript document to plain text based on its declared type */
export function transcriptToText(body: string, contentType: string, url: string): string {
  const type = contentType.toLowerCase();
  const path = url.toLowerCase().split("?")[0];

  if (type.includes("json") || path.endsWith(".json")) {
    const text = jsonTranscriptToText(body);
    if (text !== null) return text;
  }
  if (
    type.includes("srt") ||
    type.includes("subrip") ||
    type.includes("vtt") ||
    path.endsWith(".srt") ||
    path.endsWith(".vtt") ||
    body.includes("-->")
  ) {
    return cleanSubtitleText(body);
  }
  if (type.includes("html") || path.endsWith(".html") || /^\s*<(!doctype|html)/i.test(body)) {
    return stripHtml(body);
  }
  return body.trim();
}

/**
 * Hard cut to at most `maxChars` UTF-16 units. A high surrogate left
 * dangling by the cut is dropped so the excerpt stays valid text.
 */
export function truncateExcerpt(text: string, maxChars: number): { excerpt: string; truncated: boolean } {
  if (text.length <= maxChars) return { excerpt: text, truncated: false };
  let excerpt = text.slice(0, Math.max(0, maxChars));
  const last = excerpt.charCodeAt(excerpt.length - 1);
  if (last >= 0xd800 && last <= 0xdbff) excerpt = excerpt.slice(0, -1);
  return { excerpt, truncated: true };
}
