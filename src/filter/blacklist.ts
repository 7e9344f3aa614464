// ---------------------------------------------------------------------------
// Title / tag blacklist filtering.
// ---------------------------------------------------------------------------

import type { BookRecord, SourcePrefs } from "../core/types.js";

export type Blacklist = Pick<SourcePrefs, "titleBlacklist" | "tagBlacklist">;

export interface BlacklistHit {
  titleWords: string[];
  tags: string[];
}

// ASCII punctuation, the same set a title is stripped of before matching.
const PUNCTUATION = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;

/**
 * Split a comma separated option into a set of lowercase entries.
 * Blank entries are dropped, so `""` gives an empty set.
 */
export function parseBlacklist(commaSeparated: string): ReadonlySet<string> {
  return new Set(
    commaSeparated
      .split(",")
      .map((entry) => entry.trim().toLowerCase())
      .filter((entry) => entry.length > 0),
  );
}

/** Lowercased title words, punctuation removed. */
export function titleWords(title: string): string[] {
  return title
    .replace(PUNCTUATION, "")
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0);
}

/**
 * Return the blacklisted title words and tags found on a record, or `null`
 * when the record is clean.
 */
export function isBlacklisted(
  record: Pick<BookRecord, "title" | "tags">,
  blacklist: Blacklist,
): BlacklistHit | null {
  const hit: BlacklistHit = { titleWords: [], tags: [] };

  if (blacklist.titleBlacklist.size > 0) {
    hit.titleWords = [...new Set(titleWords(record.title))].filter((word) =>
      blacklist.titleBlacklist.has(word),
    );
  }

  if (blacklist.tagBlacklist.size > 0) {
    hit.tags = [...new Set([...record.tags].map((tag) => tag.toLowerCase()))].filter(
      (tag) => blacklist.tagBlacklist.has(tag),
    );
  }

  return hit.titleWords.length > 0 || hit.tags.length > 0 ? hit : null;
}
