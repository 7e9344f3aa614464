// ---------------------------------------------------------------------------
// Search results page formats.
//
// The storefront serves two generations of results markup.
//
// Widget (current):
//
//   <div data-testid="search-result-widget">
//     <a data-testid="title" href="https://www.kobo.com/us/en/ebook/...">Title</a>  (mobile layout)
//     <a data-testid="title" href="https://www.kobo.com/us/en/ebook/...">Title</a>  (desktop layout)
//     ...
//   </div>
//
// Legacy:
//
//   <h2 class="title product-field"><a href="https://www.kobo.com/us/en/ebook/...">Title</a></h2>
// ---------------------------------------------------------------------------

import type { CheerioAPI } from "cheerio";

import type { CandidateUrl } from "../core/types.js";
import { STOREFRONT_BASE_URL } from "../query/query-builder.js";

export type ResultPageFormatName = "widget" | "legacy";

export interface ResultPageFormat {
  name: ResultPageFormatName;
  /** Cheap structural check for this markup generation. */
  probe($: CheerioAPI): boolean;
  extractLinks($: CheerioAPI): string[];
}

function hrefs($: CheerioAPI, selector: string): string[] {
  return $(selector)
    .toArray()
    .map((el) => $(el).attr("href"))
    .filter((href): href is string => typeof href === "string" && href.length > 0);
}

const widgetFormat: ResultPageFormat = {
  name: "widget",
  probe: ($) => $("div[data-testid='search-result-widget']").length > 0,
  extractLinks: ($) => {
    const links = $("a[data-testid='title']")
      .toArray()
      .map((el) => $(el).attr("href") ?? "");
    // Each result is rendered twice, once per layout.
    return links.filter((href, index) => index % 2 === 0 && href.length > 0);
  },
};

const legacyFormat: ResultPageFormat = {
  name: "legacy",
  probe: ($) => $("h2.title.product-field").length > 0,
  extractLinks: ($) => hrefs($, "h2.title.product-field > a"),
};

/** Probed in order; the first match wins. */
export const RESULT_PAGE_FORMATS: readonly ResultPageFormat[] = [widgetFormat, legacyFormat];

export function detectResultPageFormat($: CheerioAPI): ResultPageFormat | null {
  return RESULT_PAGE_FORMATS.find((format) => format.probe($)) ?? null;
}

/** Resolve a harvested href against the storefront origin; `null` if it does not parse. */
export function toCandidateUrl(href: string): CandidateUrl | null {
  if (!URL.canParse(href, STOREFRONT_BASE_URL)) return null;
  return new URL(href, STOREFRONT_BASE_URL).toString();
}
