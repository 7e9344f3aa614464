// ---------------------------------------------------------------------------
// Search query and storefront URL construction.
// ---------------------------------------------------------------------------

import type { SearchQuery, TextTokenizers } from "../core/types.js";

export const STOREFRONT_BASE_URL = "https://www.kobo.com/";

/**
 * Build the free-text search string for a book.
 *
 * Leading zeroes are optionally stripped from every title token because the
 * storefront search matches "7" but not "007".  Tokens that end up empty are
 * dropped, so the result never has stray whitespace.
 */
export function buildQuery(
  title: string | null | undefined,
  authors: readonly string[] | null | undefined,
  removeLeadingZeroes: boolean,
  tokenizers: Pick<TextTokenizers, "getTitleTokens" | "getAuthorTokens">,
): SearchQuery {
  const titleTokens = title
    ? tokenizers
        .getTitleTokens(title)
        .map((token) => (removeLeadingZeroes ? token.replace(/^0+/, "") : token))
    : [];

  const authorTokens = authors && authors.length > 0 ? tokenizers.getAuthorTokens(authors) : [];

  return [...titleTokens, ...authorTokens]
    .map((token) => token.trim())
    .filter((token) => token.length > 0)
    .join(" ") as SearchQuery;
}

/** Use an ISBN as-is as the search string. */
export function isbnQuery(isbn: string): SearchQuery {
  return isbn.trim() as SearchQuery;
}

/**
 * Search results URL for one page of a query, e.g.
 * `https://www.kobo.com/us/en/search?query=fourth+wing&fcmedia=Book&pageNumber=1&fclanguages=all`.
 */
export function buildSearchUrl(
  query: SearchQuery,
  pageNumber: number,
  country: string,
  language: string,
): string {
  const params = new URLSearchParams({
    query,
    fcmedia: "Book",
    pageNumber: String(pageNumber),
    fclanguages: language,
  });
  return `${STOREFRONT_BASE_URL}${country}/en/search?${params.toString()}`;
}

/** Product page for a storefront identifier (slug or numeric id). */
export function buildDetailUrl(externalId: string, country: string): string {
  return `${STOREFRONT_BASE_URL}${country}/en/ebook/${encodeURIComponent(externalId.trim())}`;
}
