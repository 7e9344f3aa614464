// ---------------------------------------------------------------------------
// Tests for SearchPaginator against an in-process page fetcher.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import * as cheerio from "cheerio";
import pino from "pino";

import type { FetchedPage, SearchQuery } from "../../../src/core/types.js";
import { SearchConsistencyError } from "../../../src/core/errors.js";
import { isSearchUrl } from "../../../src/fetcher/web-fetcher.js";
import { buildQuery, buildSearchUrl } from "../../../src/query/query-builder.js";
import { defaultTokenizers } from "../../../src/query/tokens.js";
import {
  SearchPaginator,
  type CollectOptions,
  type PageFetcher,
} from "../../../src/search/search-paginator.js";
import {
  FOURTH_WING_URL,
  emptySearchPage,
  legacyDetailPage,
  legacySearchPage,
  widgetSearchPage,
} from "../../helpers/pages.js";

interface FakeResponse {
  html: string;
  /** Where the request ended up; defaults to the request URL. */
  finalUrl?: string;
}

class FakePageFetcher implements PageFetcher {
  readonly requested: string[] = [];

  constructor(private readonly respond: (pageNumber: number) => FakeResponse) {}

  async fetchPage(url: string): Promise<FetchedPage> {
    this.requested.push(url);
    const pageNumber = Number(new URL(url).searchParams.get("pageNumber"));
    const { html, finalUrl = url } = this.respond(pageNumber);
    return {
      $: cheerio.load(html),
      requestUrl: url,
      finalUrl,
      isSearch: isSearchUrl(finalUrl),
    };
  }
}

const QUERY = buildQuery("Fourth Wing", null, false, defaultTokenizers);
const logger = pino({ level: "silent" });

function options(maxMatches: number): CollectOptions {
  return { maxMatches, country: "us", language: "all", timeoutMs: 5_000 };
}

function ebooks(...slugs: string[]): string[] {
  return slugs.map((slug) => `/us/en/ebook/${slug}`);
}

function collect(fetcher: FakePageFetcher, query: SearchQuery, maxMatches: number) {
  return new SearchPaginator(fetcher, logger).collectCandidates(query, options(maxMatches));
}

describe("SearchPaginator", () => {
  it("stops at the page ceiling with fewer results than requested", async () => {
    const fetcher = new FakePageFetcher((page) => ({
      html:
        page === 2
          ? legacySearchPage(ebooks(`book-${page}a`, `book-${page}b`))
          : widgetSearchPage(ebooks(`book-${page}a`, `book-${page}b`)),
    }));

    const candidates = await collect(fetcher, QUERY, 10);

    expect(candidates).toEqual([
      "https://www.kobo.com/us/en/ebook/book-1a",
      "https://www.kobo.com/us/en/ebook/book-1b",
      "https://www.kobo.com/us/en/ebook/book-2a",
      "https://www.kobo.com/us/en/ebook/book-2b",
      "https://www.kobo.com/us/en/ebook/book-3a",
      "https://www.kobo.com/us/en/ebook/book-3b",
    ]);
    expect(fetcher.requested).toEqual([1, 2, 3].map((n) => buildSearchUrl(QUERY, n, "us", "all")));
  });

  it("returns the product page when the first page redirects to it", async () => {
    const fetcher = new FakePageFetcher(() => ({
      html: legacyDetailPage(),
      finalUrl: FOURTH_WING_URL,
    }));

    expect(await collect(fetcher, QUERY, 5)).toEqual([FOURTH_WING_URL]);
    expect(fetcher.requested).toHaveLength(1);
  });

  it("truncates to the requested number of matches without fetching more pages", async () => {
    const fetcher = new FakePageFetcher(() => ({
      html: widgetSearchPage(ebooks("a", "b", "c")),
    }));

    expect(await collect(fetcher, QUERY, 2)).toEqual([
      "https://www.kobo.com/us/en/ebook/a",
      "https://www.kobo.com/us/en/ebook/b",
    ]);
    expect(fetcher.requested).toHaveLength(1);
  });

  it("keeps only every second widget link", async () => {
    const fetcher = new FakePageFetcher(() => ({ html: widgetSearchPage(ebooks("a")) }));

    expect(await collect(fetcher, QUERY, 1)).toEqual(["https://www.kobo.com/us/en/ebook/a"]);
  });

  it("skips result links that do not parse", async () => {
    const fetcher = new FakePageFetcher(() => ({
      html: legacySearchPage(["http://", ...ebooks("a")]),
    }));

    expect(await collect(fetcher, QUERY, 1)).toEqual(["https://www.kobo.com/us/en/ebook/a"]);
    expect(fetcher.requested).toHaveLength(1);
  });

  it("does not deduplicate candidates", async () => {
    const fetcher = new FakePageFetcher(() => ({ html: legacySearchPage(ebooks("a")) }));

    expect(await collect(fetcher, QUERY, 2)).toEqual([
      "https://www.kobo.com/us/en/ebook/a",
      "https://www.kobo.com/us/en/ebook/a",
    ]);
  });

  it("yields no candidates for empty results pages", async () => {
    const fetcher = new FakePageFetcher(() => ({ html: emptySearchPage() }));

    expect(await collect(fetcher, QUERY, 1)).toEqual([]);
    expect(fetcher.requested).toHaveLength(3);
  });

  it("throws SearchConsistencyError when a later page is not a results page", async () => {
    const fetcher = new FakePageFetcher((page) =>
      page === 1
        ? { html: legacySearchPage(ebooks("a")) }
        : { html: legacyDetailPage(), finalUrl: FOURTH_WING_URL },
    );

    const error = await collect(fetcher, QUERY, 3).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SearchConsistencyError);
    expect(error).toMatchObject({
      pageNumber: 2,
      url: buildSearchUrl(QUERY, 2, "us", "all"),
    });
  });
});
