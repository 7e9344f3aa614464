// ---------------------------------------------------------------------------
// MetadataSource: identify and cover lookups against the storefront.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type {
  BookRecord,
  CandidateUrl,
  CoverResult,
  CoverUrlCache,
  FetchedPage,
  FetcherConfig,
  IdentifyOutcome,
  IdentifyStopReason,
  LookupOptions,
  LookupRequest,
  ResultSink,
  SearchTarget,
  SourcePrefs,
  TextTokenizers,
} from "../core/types.js";
import { FetchError, MalformedPageError } from "../core/errors.js";
import { DEFAULT_FETCHER_CONFIG } from "../config/config.js";
import { MemoryCoverUrlCache } from "../cache/cover-url-cache.js";
import { checkISBN } from "../domain/isbn/isbn.js";
import { WebFetcher } from "../fetcher/web-fetcher.js";
import { isBlacklisted } from "../filter/blacklist.js";
import { parseDetailPage } from "../parser/detail-page-parser.js";
import {
  buildDetailUrl,
  buildQuery,
  buildSearchUrl,
  isbnQuery,
} from "../query/query-builder.js";
import { defaultTokenizers } from "../query/tokens.js";
import { SearchPaginator } from "../search/search-paginator.js";

// ── Source description ─────────────────────────────────────────────────────

export const SOURCE_INFO = {
  name: "Kobo Metadata",
  description: "Downloads metadata and covers from the Kobo storefront",
  capabilities: ["identify", "cover"],
  touchedFields: [
    "title",
    "authors",
    "comments",
    "publisher",
    "pubdate",
    "languages",
    "series",
    "tags",
  ],
  hasHtmlComments: true,
} as const;

// ── Types ──────────────────────────────────────────────────────────────────

export interface MetadataSourceOptions {
  prefs: SourcePrefs;
  logger: pino.Logger;
  fetcherConfig?: FetcherConfig;
  /** Host-owned cover URL store; an in-memory one is used when omitted. */
  coverCache?: CoverUrlCache;
  tokenizers?: TextTokenizers;
  /** Tag put next to downloaded cover bytes. */
  sourceName?: string;
}

/** `[identifier type, identifier value, URL]` for the host's "open in browser". */
export type BookUrl = readonly [idType: "kobo" | "isbn", id: string, url: string];

type Identifiers = NonNullable<LookupRequest["identifiers"]>;

/**
 * Search targets for a request, in priority order: storefront identifier,
 * then a valid ISBN, then a free-text query built from title and authors.
 */
export function searchTargets(
  request: LookupRequest,
  removeLeadingZeroes: boolean,
  tokenizers: TextTokenizers,
): SearchTarget[] {
  const targets: SearchTarget[] = [];
  const identifiers = request.identifiers ?? {};

  const koboId = identifiers["kobo"]?.trim();
  if (koboId) targets.push({ kind: "identifier", id: koboId });

  const isbn = checkISBN(identifiers["isbn"]);
  if (isbn) targets.push({ kind: "isbn", isbn });

  const query = buildQuery(request.title, request.authors, removeLeadingZeroes, tokenizers);
  if (query) targets.push({ kind: "query", query });

  return targets;
}

// ── MetadataSource ─────────────────────────────────────────────────────────

/**
 * One instance per host plugin.  Lookups are sequential within a call;
 * concurrent calls share the browser session and the cover cache only.
 */
export class MetadataSource {
  readonly sourceName: string;

  private readonly prefs: SourcePrefs;
  private readonly logger: pino.Logger;
  private readonly fetcher: WebFetcher;
  private readonly paginator: SearchPaginator;
  private readonly coverCache: CoverUrlCache;
  private readonly tokenizers: TextTokenizers;

  constructor(options: MetadataSourceOptions) {
    this.prefs = options.prefs;
    this.logger = options.logger.child({ component: "metadata-source" });
    this.fetcher = new WebFetcher(options.fetcherConfig ?? DEFAULT_FETCHER_CONFIG, options.logger);
    this.paginator = new SearchPaginator(this.fetcher, options.logger);
    this.coverCache = options.coverCache ?? new MemoryCoverUrlCache(options.logger);
    this.tokenizers = options.tokenizers ?? defaultTokenizers;
    this.sourceName = options.sourceName ?? SOURCE_INFO.name;
  }

  // ── Public API ───────────────────────────────────────────────────────────

  /**
   * Look up a book and put every matching record on `sink`, best match first.
   *
   * Transport failures, bot challenges and an unexpected search page stop the
   * lookup without throwing; records already put on the sink stay there.
   *
   * @throws SearchConsistencyError when pagination breaks its own contract.
   */
  async identify(
    sink: ResultSink<BookRecord>,
    request: LookupRequest,
    options: LookupOptions,
  ): Promise<IdentifyOutcome> {
    const log = this.logger.child({ operation: "identify" });
    log.info(
      { title: request.title, authors: request.authors, identifiers: request.identifiers },
      "Identifying",
    );

    let emitted = 0;
    let rejected = 0;
    const stop = (stoppedBy: IdentifyStopReason, error?: Error): IdentifyOutcome => {
      log.info({ emitted, rejected, stoppedBy }, "Identify finished");
      return error ? { emitted, rejected, stoppedBy, error } : { emitted, rejected, stoppedBy };
    };

    let candidates: CandidateUrl[];
    try {
      candidates = await this.collectCandidates(request, this.prefs.numMatches, options, log);
    } catch (error: unknown) {
      if (error instanceof FetchError) {
        log.error({ url: error.url, err: error }, "Search failed");
        return stop("error", error);
      }
      throw error;
    }

    for (const [position, url] of candidates.entries()) {
      if (options.signal?.aborted) {
        log.info({ remaining: candidates.length - position }, "Aborted by host");
        return stop("aborted");
      }

      log.info({ url, position }, "Looking up product page");

      let page: FetchedPage;
      try {
        page = await this.fetcher.fetchPage(url, options.timeoutMs);
      } catch (error: unknown) {
        if (error instanceof FetchError) {
          log.error({ url, err: error }, "Could not fetch product page");
          return stop("error", error);
        }
        throw error;
      }

      if (page.isSearch) {
        log.info({ url, finalUrl: page.finalUrl }, "Expected a product page, got search results");
        return stop("search_page");
      }

      let record: BookRecord;
      try {
        record = this.parse(page, log);
      } catch (error: unknown) {
        if (!(error instanceof MalformedPageError)) throw error;
        if (position === 0) {
          log.error({ url, err: error }, "Primary product page is malformed");
          return stop("error", error);
        }
        log.warn({ url, err: error }, "Skipping malformed product page");
        continue;
      }

      const hit = isBlacklisted(record, this.prefs);
      if (hit) {
        rejected++;
        log.info(
          { url, title: record.title, titleWords: hit.titleWords, tags: hit.tags },
          "Rejected by blacklist",
        );
        continue;
      }

      record.sourceRelevance = emitted;
      sink.put(record);
      emitted++;
    }

    return stop("exhausted");
  }

  /**
   * Download one cover and put `[sourceName, bytes]` on `sink`.
   *
   * @returns `false` when no cover could be found or downloaded.
   * @throws SearchConsistencyError when pagination breaks its own contract.
   */
  async getCover(
    sink: ResultSink<CoverResult>,
    request: LookupRequest,
    options: LookupOptions,
  ): Promise<boolean> {
    const log = this.logger.child({ operation: "get-cover" });

    let coverUrl = this.getCachedCoverUrl(request.identifiers ?? {});
    if (!coverUrl) {
      log.info({ identifiers: request.identifiers }, "No cached cover URL, running identify");
      coverUrl = await this.getCoverUrl(request, options);
    }

    if (!coverUrl) {
      log.error(
        { title: request.title, identifiers: request.identifiers },
        "Could not find a cover",
      );
      return false;
    }

    let cover: Uint8Array;
    try {
      cover = await this.fetcher.fetchBytes(coverUrl, options.timeoutMs);
    } catch (error: unknown) {
      if (error instanceof FetchError) {
        log.error({ url: coverUrl, err: error }, "Could not download cover");
        return false;
      }
      throw error;
    }

    log.info({ url: coverUrl, bytes: cover.byteLength }, "Downloaded cover");
    sink.put([this.sourceName, cover]);
    return true;
  }

  /**
   * Find the cover URL of the best match, visiting one product page at most.
   * Parsing that page refreshes the cover cache.
   */
  async getCoverUrl(request: LookupRequest, options: LookupOptions): Promise<string | null> {
    const log = this.logger.child({ operation: "get-cover-url" });

    let url: CandidateUrl | undefined;
    try {
      url = (await this.collectCandidates(request, 1, options, log, true))[0];
    } catch (error: unknown) {
      if (error instanceof FetchError) {
        log.error({ url: error.url, err: error }, "Search failed");
        return null;
      }
      throw error;
    }

    if (!url) {
      log.error({ title: request.title }, "No search results");
      return null;
    }

    try {
      const page = await this.fetcher.fetchPage(url, options.timeoutMs);
      if (page.isSearch) {
        log.info({ url, finalUrl: page.finalUrl }, "Expected a product page, got search results");
        return null;
      }
      return this.parse(page, log).coverUrl ?? null;
    } catch (error: unknown) {
      if (error instanceof FetchError || error instanceof MalformedPageError) {
        log.error({ url, err: error }, "Could not read product page");
        return null;
      }
      throw error;
    }
  }

  getBookUrl(identifiers: Identifiers): BookUrl | null {
    const koboId = identifiers["kobo"]?.trim();
    if (koboId) {
      return ["kobo", koboId, buildDetailUrl(koboId, this.prefs.country)];
    }

    const isbn = identifiers["isbn"]?.trim();
    if (isbn) {
      return [
        "isbn",
        isbn,
        buildSearchUrl(isbnQuery(isbn), 1, this.prefs.country, this.prefs.language),
      ];
    }

    return null;
  }

  getCachedCoverUrl(identifiers: Identifiers): string | null {
    const isbn = identifiers["isbn"]?.trim();
    if (!isbn) return null;
    return this.coverCache.get(isbn);
  }

  // ── Private helpers ──────────────────────────────────────────────────────

  /**
   * Candidate product URLs in target order.  With `firstHitOnly`, targets
   * after the first one that yields a URL are not searched.
   */
  private async collectCandidates(
    request: LookupRequest,
    maxMatches: number,
    options: LookupOptions,
    log: pino.Logger,
    firstHitOnly = false,
  ): Promise<CandidateUrl[]> {
    const { country, language, removeLeadingZeroes } = this.prefs;
    const candidates: CandidateUrl[] = [];

    for (const target of searchTargets(request, removeLeadingZeroes, this.tokenizers)) {
      switch (target.kind) {
        case "identifier":
          candidates.push(buildDetailUrl(target.id, country));
          break;
        case "isbn":
          log.info({ isbn: target.isbn }, "Searching by ISBN");
          candidates.push(
            ...(await this.paginator.collectCandidates(isbnQuery(target.isbn), {
              maxMatches,
              country,
              language,
              timeoutMs: options.timeoutMs,
            })),
          );
          break;
        case "query":
          log.info({ query: target.query }, "Searching by title and authors");
          candidates.push(
            ...(await this.paginator.collectCandidates(target.query, {
              maxMatches,
              country,
              language,
              timeoutMs: options.timeoutMs,
            })),
          );
          break;
      }

      if (firstHitOnly && candidates.length > 0) break;
    }

    log.info({ candidates: candidates.length }, "Collected candidates");
    return candidates;
  }

  private parse(page: FetchedPage, log: pino.Logger): BookRecord {
    const record = parseDetailPage(
      page,
      {
        resizeCover: this.prefs.resizeCover,
        maximumCoverSize: this.prefs.maximumCoverSize,
        fixAuthors: this.tokenizers.fixAuthors,
      },
      log,
    );

    if (record.isbn && record.coverUrl) {
      this.coverCache.set(record.isbn, record.coverUrl);
    }
    return record;
  }
}
