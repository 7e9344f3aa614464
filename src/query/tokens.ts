// ---------------------------------------------------------------------------
// Default title / author tokenizers and author-name fixing.
//
// Hosts usually supply their own locale-aware versions through
// `TextTokenizers`; these cover the CLI and any host that does not.
// ---------------------------------------------------------------------------

import type { TextTokenizers } from "../core/types.js";

/** Bracketed edition noise such as "(Hardcover)" or "[2019]". */
const EDITION_NOISE =
  /[([{](\d{4}|omnibus|anthology|hardcover|paperback|audiobook|mass\s*market|edition|ed\.)[)\]}]/gi;

/** Characters that separate title words. */
const TITLE_SEPARATORS = /[:,;!@$%^&*(){}.`~"\s[\]/《》「」“”]+/;

const QUOTES = /^['‘’]+|['‘’]+$/g;

/**
 * Split a title into search tokens.  Joiners ("the", "and") and subtitles
 * are kept since the storefront search ranks better with them.
 */
export function getTitleTokens(title: string): string[] {
  return title
    .replace(EDITION_NOISE, " ")
    .split(TITLE_SEPARATORS)
    .map((token) => token.replace(QUOTES, ""))
    .filter((token) => token.length > 0);
}

/**
 * Turn "Last, First" into "First Last".  Names with no comma, or more than
 * one, are only trimmed.
 */
function rotateAuthor(author: string): string {
  const parts = author.split(",");
  if (parts.length !== 2) return author.trim();
  const [last, first] = parts.map((p) => p.trim());
  if (!first) return last;
  return `${first} ${last}`;
}

/** Search tokens for a list of authors.  Bare initials are dropped. */
export function getAuthorTokens(authors: readonly string[]): string[] {
  const tokens: string[] = [];
  for (const author of authors) {
    for (const token of rotateAuthor(author).split(/[\s\-+.:;,]+/)) {
      if (token.length > 1) tokens.push(token);
    }
  }
  return tokens;
}

/** Normalise contributor names scraped from a product page. */
export function fixAuthors(authors: readonly string[]): string[] {
  return authors
    .map((author) => rotateAuthor(author).replace(/\s+/g, " "))
    .filter((author) => author.length > 0);
}

export const defaultTokenizers: TextTokenizers = {
  getTitleTokens,
  getAuthorTokens,
  fixAuthors,
};
