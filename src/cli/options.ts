/**
 * Argument parsers and option resolution shared by the CLI commands.
 */

import { InvalidArgumentError } from "commander";
import { feedNamesOf, loadFeedGroups, selectGroup } from "../config.js";
import type { WindowBasis } from "../types/index.js";

/** Counts, limits and timeouts: non-negative integers only */
export function parseIntArg(value: string): number {
  const n = parseInt(value, 10);
  if (Number.isNaN(n)) throw new InvalidArgumentError(`Expected a number, got "${value}"`);
  if (n < 0) throw new InvalidArgumentError(`Expected zero or more, got ${n}`);
  return n;
}

export function parseBasis(value: string): WindowBasis {
  if (value === "published" || value === "scraped") return value;
  throw new InvalidArgumentError(`Expected "published" or "scraped", got "${value}"`);
}

/**
 * Feed names for a group, or undefined for every feed. A group with no
 * feeds yields an empty list, which matches no episodes.
 */
export function resolveFeedNames(feedsFile: string | undefined, group: string | undefined): string[] | undefined {
  if (!group) return undefined;
  return feedNamesOf(selectGroup(loadFeedGroups(feedsFile), group));
}
