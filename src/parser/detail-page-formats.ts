// ---------------------------------------------------------------------------
// Product detail page formats.
//
// Legacy template (class based):
//
//   <h1 class="title product-field">Fourth Wing</h1>
//   <span class="visible-contributors"><a>Rebecca Yarros</a></span>
//   <span class="series product-field">
//     <span class="sequenced-name-prefix">Book 1 - </span>
//     <span class="product-sequence-field"><a>The Empyrean</a></span>
//   </span>
//   <div class="bookitem-secondary-metadata">
//     <ul>
//       <li>Entangled: Red Tower Books</li>
//       <li>Release Date: <span>May 2, 2023</span></li>
//       <li>ISBN: <span>9781649374042</span></li>
//       <li>Language: <span>English</span></li>
//     </ul>
//   </div>
//   <ul class="category-rankings"><meta property="genre" content="Fantasy"></ul>
//   <div class="synopsis-description"><p>...</p></div>
//   <img class="cover-image" src="//cdn.kobo.com/book-images/.../353/569/90/False/fourth-wing-1.jpg">
//
// Books in a series without an index nest a second
// `span.series.product-field` around the sequence field, so the innermost
// (last) series span is the one read.
//
// Modern template (data-testid hooks):
//
//   <h1 data-testid="product-title">...</h1>
//   <a data-testid="contributor-link">...</a>
//   <span data-testid="series-sequence">Book 1 - </span>
//   <a data-testid="series-name">...</a>
//   <span data-testid="publisher">...</span>
//   <div data-testid="detail-row"><dt>Release Date</dt><dd>...</dd></div>
//   <a data-testid="genre-link">...</a>
//   <div data-testid="synopsis">...</div>
//   <img data-testid="cover-image" src="...">
// ---------------------------------------------------------------------------

import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";

export type DetailPageFormatName = "legacy" | "modern";

/** Which secondary detail a label introduces. */
export type DetailLabel = "releaseDate" | "identifier" | "language";

export interface DetailEntry {
  label: DetailLabel;
  value: string;
}

/** Raw field values as they appear on the page, before normalisation. */
export interface RawDetailFields {
  title: string;
  authors: string[];
  series?: string;
  /** Text such as "Book 1 - ". */
  seriesPrefix?: string;
  publisher?: string;
  details: DetailEntry[];
  genres: string[];
  synopsisHtml?: string;
  coverSrc?: string;
}

export interface DetailPageFormat {
  name: DetailPageFormatName;
  probe($: CheerioAPI): boolean;
  extract($: CheerioAPI): RawDetailFields;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

const LABELS: Record<string, DetailLabel> = {
  "release date": "releaseDate",
  isbn: "identifier",
  "book id": "identifier",
  language: "language",
};

/** Map "Release Date:" and friends to a known label; unknown labels give `null`. */
export function classifyLabel(text: string): DetailLabel | null {
  const key = text.trim().replace(/:$/, "").trim().toLowerCase();
  return LABELS[key] ?? null;
}

/** Text directly inside an element, ignoring its child elements. */
function ownText(node: Cheerio<Element>): string {
  return node.clone().children().remove().end().text().trim();
}

function texts($: CheerioAPI, selector: string): string[] {
  return $(selector)
    .toArray()
    .map((el) => $(el).text().trim())
    .filter((text) => text.length > 0);
}

function optional(text: string | undefined): string | undefined {
  const trimmed = text?.trim();
  return trimmed ? trimmed : undefined;
}

// ── Formats ─────────────────────────────────────────────────────────────────

const legacyFormat: DetailPageFormat = {
  name: "legacy",
  probe: ($) => $("h1.title.product-field").length > 0,
  extract: ($) => {
    const fields: RawDetailFields = {
      title: $("h1.title.product-field").first().text().trim(),
      authors: texts($, "span.visible-contributors > a"),
      details: [],
      genres: $("ul.category-rankings meta[property='genre']")
        .toArray()
        .map((el) => $(el).attr("content") ?? "")
        .filter((genre) => genre.trim().length > 0),
    };

    const series = $("span.series.product-field").last();
    if (series.length > 0) {
      fields.series = optional(
        series.children("span.product-sequence-field").children("a").first().text(),
      );
      fields.seriesPrefix = optional(
        series.children("span.sequenced-name-prefix").first().text(),
      );
    }

    const items = $("div.bookitem-secondary-metadata > ul > li").toArray();
    if (items.length > 0) {
      const first = $(items[0]);
      fields.publisher = optional(ownText(first)) ?? optional(first.text());

      for (const item of items.slice(1)) {
        const li = $(item);
        const label = classifyLabel(ownText(li));
        const value = li.children("span").first().text().trim();
        if (label && value) fields.details.push({ label, value });
      }
    }

    fields.synopsisHtml = optional($("div.synopsis-description").first().html() ?? undefined);
    fields.coverSrc = optional($("img[class*='cover-image']").first().attr("src"));

    return fields;
  },
};

const modernFormat: DetailPageFormat = {
  name: "modern",
  probe: ($) => $("[data-testid='product-title']").length > 0,
  extract: ($) => {
    const fields: RawDetailFields = {
      title: $("[data-testid='product-title']").first().text().trim(),
      authors: texts($, "[data-testid='contributor-link']"),
      series: optional($("[data-testid='series-name']").first().text()),
      seriesPrefix: optional($("[data-testid='series-sequence']").first().text()),
      publisher: optional($("[data-testid='publisher']").first().text()),
      details: [],
      genres: texts($, "[data-testid='genre-link']"),
    };

    $("[data-testid='detail-row']").each((_index, element) => {
      const row = $(element);
      const label = classifyLabel(row.find("dt").first().text());
      const value = row.find("dd").first().text().trim();
      if (label && value) fields.details.push({ label, value });
    });

    fields.synopsisHtml = optional($("[data-testid='synopsis']").first().html() ?? undefined);
    fields.coverSrc = optional($("img[data-testid='cover-image']").first().attr("src"));

    return fields;
  },
};

/** Probed in order; the first match wins. */
export const DETAIL_PAGE_FORMATS: readonly DetailPageFormat[] = [modernFormat, legacyFormat];

export function detectDetailPageFormat($: CheerioAPI): DetailPageFormat | null {
  return DETAIL_PAGE_FORMATS.find((format) => format.probe($)) ?? null;
}
