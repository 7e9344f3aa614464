// ---------------------------------------------------------------------------
// SearchPaginator – walks search results pages and collects product URLs.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { CandidateUrl, FetchedPage, SearchQuery } from "../core/types.js";
import { SearchConsistencyError } from "../core/errors.js";
import { buildSearchUrl } from "../query/query-builder.js";
import { detectResultPageFormat, toCandidateUrl } from "./result-page-formats.js";

/** Pages are fetched while the page number stays below this ceiling. */
export const SEARCH_PAGE_CEILING = 4;

/** The part of the fetcher the paginator depends on. */
export interface PageFetcher {
  fetchPage(url: string, timeoutMs: number): Promise<FetchedPage>;
}

export interface CollectOptions {
  maxMatches: number;
  country: string;
  language: string;
  timeoutMs: number;
}

export class SearchPaginator {
  private readonly fetcher: PageFetcher;
  private readonly logger: Logger;

  constructor(fetcher: PageFetcher, logger: Logger) {
    this.fetcher = fetcher;
    this.logger = logger.child({ component: "search-paginator" });
  }

  /**
   * Collect up to `maxMatches` product URLs for a query, in storefront order.
   *
   * When the first page redirects to a product (an exact ISBN hit) that
   * product is the only candidate.  Candidates are not deduplicated.
   *
   * @throws SearchConsistencyError if a follow-up page is not a results page.
   */
  async collectCandidates(query: SearchQuery, options: CollectOptions): Promise<CandidateUrl[]> {
    const { maxMatches, country, language, timeoutMs } = options;

    const firstUrl = buildSearchUrl(query, 1, country, language);
    this.logger.info({ query, url: firstUrl }, "Searching");

    const firstPage = await this.fetcher.fetchPage(firstUrl, timeoutMs);
    if (!firstPage.isSearch) {
      this.logger.info({ query, url: firstPage.finalUrl }, "Search redirected to a product page");
      return [firstPage.finalUrl];
    }

    const candidates = this.extractCandidates(firstPage, 1);

    for (
      let pageNumber = 2;
      candidates.length < maxMatches && pageNumber < SEARCH_PAGE_CEILING;
      pageNumber++
    ) {
      const url = buildSearchUrl(query, pageNumber, country, language);
      const page = await this.fetcher.fetchPage(url, timeoutMs);
      if (!page.isSearch) {
        throw new SearchConsistencyError(url, pageNumber);
      }

      candidates.push(...this.extractCandidates(page, pageNumber));
    }

    return candidates.slice(0, maxMatches);
  }

  private extractCandidates(page: FetchedPage, pageNumber: number): CandidateUrl[] {
    const format = detectResultPageFormat(page.$);
    if (!format) {
      this.logger.info({ url: page.finalUrl, page: pageNumber }, "No search results on page");
      return [];
    }

    const candidates: CandidateUrl[] = [];
    for (const href of format.extractLinks(page.$)) {
      const candidate = toCandidateUrl(href);
      if (candidate) {
        candidates.push(candidate);
      } else {
        this.logger.warn(
          { url: page.finalUrl, page: pageNumber, href },
          "Skipping unparsable result link",
        );
      }
    }
    this.logger.info(
      { url: page.finalUrl, page: pageNumber, format: format.name, results: candidates.length },
      "Parsed search results page",
    );
    return candidates;
  }
}
