// ---------------------------------------------------------------------------
// Core types for the Kobo metadata source.
// All other modules import from this file.
// ---------------------------------------------------------------------------

import type { CheerioAPI } from "cheerio";

// ── Branded primitives ──────────────────────────────────────────────────────

/** A validated ISBN-10 string (9 digits + check digit). */
export type ISBN10 = string & { readonly __brand: "ISBN10" };

/** A validated ISBN-13 string (13 digits). */
export type ISBN13 = string & { readonly __brand: "ISBN13" };

/** Either form of a validated ISBN. */
export type ISBN = ISBN10 | ISBN13;

/** Unvalidated ISBN input. */
export type RawISBN = string;

/**
 * A normalized storefront search string.  Built once by the query builder
 * and never modified afterwards.
 */
export type SearchQuery = string & { readonly __brand: "SearchQuery" };

/** A product-detail URL harvested from a search results page. */
export type CandidateUrl = string;

// ── Search targets ──────────────────────────────────────────────────────────

/**
 * Where a lookup starts from.  `identify` walks targets in this order:
 * storefront identifier, then ISBN, then free text.
 */
export type SearchTarget =
  | { kind: "identifier"; id: string }
  | { kind: "isbn"; isbn: ISBN }
  | { kind: "query"; query: SearchQuery };

// ── Fetched pages ───────────────────────────────────────────────────────────

export interface FetchedPage {
  /** Loaded document. */
  $: CheerioAPI;
  requestUrl: string;
  /** URL after redirects. */
  finalUrl: string;
  /** True when the final URL is a search results page. */
  isSearch: boolean;
}

// ── Book records ────────────────────────────────────────────────────────────

export interface BookIdentifiers {
  isbn?: string;
  /** Storefront product slug, e.g. `fourth-wing-1`. */
  kobo?: string;
}

export interface BookRecord {
  title: string;
  authors: string[];
  series?: string;
  /** Kept verbatim; the storefront uses values like "1.5". */
  seriesIndex?: string;
  publisher?: string;
  pubdate?: Date;
  /** ISBN or storefront book id, whichever the page lists. */
  isbn?: string;
  language?: string;
  /** Tags never contain commas. */
  tags: Set<string>;
  /** Synopsis markup, rendered as HTML by the host. */
  comments?: string;
  coverUrl?: string;
  identifiers: BookIdentifiers;
  sourceRelevance: number;
}

// ── Host collaborators ──────────────────────────────────────────────────────

/** Append-only channel owned by the host. */
export interface ResultSink<T> {
  put(item: T): void;
}

/** Raw cover bytes tagged with the name of the source that produced them. */
export type CoverResult = readonly [sourceName: string, cover: Uint8Array];

/**
 * Identifier → cover URL cache.  The host owns the store; writes are
 * last-writer-wins.
 */
export interface CoverUrlCache {
  get(isbn: string): string | null;
  set(isbn: string, coverUrl: string): void;
}

/** Text helpers the host may supply in place of the defaults. */
export interface TextTokenizers {
  getTitleTokens(title: string): string[];
  getAuthorTokens(authors: readonly string[]): string[];
  fixAuthors(authors: readonly string[]): string[];
}

/** What the host knows about the book being looked up. */
export interface LookupRequest {
  title?: string | null;
  authors?: readonly string[] | null;
  identifiers?: Readonly<Record<string, string | undefined>>;
}

export interface LookupOptions {
  /** Per-request timeout. */
  timeoutMs: number;
  /** Checked between candidates, never inside a fetch. */
  signal?: AbortSignal;
}

export type IdentifyStopReason =
  | "exhausted"
  | "search_page"
  | "error"
  | "aborted";

export interface IdentifyOutcome {
  emitted: number;
  rejected: number;
  stoppedBy: IdentifyStopReason;
  error?: Error;
}

// ── Config types ────────────────────────────────────────────────────────────

export interface CoverSize {
  width: number;
  height: number;
}

/** Validated plugin options. */
export interface SourcePrefs {
  country: string;
  language: string;
  numMatches: number;
  titleBlacklist: ReadonlySet<string>;
  tagBlacklist: ReadonlySet<string>;
  removeLeadingZeroes: boolean;
  resizeCover: boolean;
  maximumCoverSize: CoverSize;
}

export interface FetcherConfig {
  /** Attempts in total, including the first one. */
  maxChallengeAttempts: number;
  /** Fixed sleep between challenge attempts. */
  challengeRetryDelayMs: number;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}

export interface AppConfig {
  env: "development" | "production" | "test";
  prefs: SourcePrefs;
  fetcher: FetcherConfig;
  logging: LoggingConfig;
  timeoutMs: number;
}
