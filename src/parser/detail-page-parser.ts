// ---------------------------------------------------------------------------
// Product detail page → BookRecord.
// ---------------------------------------------------------------------------

import type { CheerioAPI } from "cheerio";
import type { Logger } from "pino";

import type { BookIdentifiers, BookRecord, TextTokenizers } from "../core/types.js";
import { MalformedPageError } from "../core/errors.js";
import { checkISBN } from "../domain/isbn/isbn.js";
import { deriveCoverUrl, type CoverOptions } from "./cover-url.js";
import { detectDetailPageFormat } from "./detail-page-formats.js";
import { parseReleaseDate } from "./pubdate.js";

export interface ParseOptions extends CoverOptions {
  fixAuthors: TextTokenizers["fixAuthors"];
}

/** Page input: the loaded document and where it was served from. */
export interface DetailPage {
  $: CheerioAPI;
  finalUrl: string;
}

const SERIES_PREFIX = /^Book\s+(.+?)\s+-(?:\s|$)/;
const PRODUCT_SLUG = /\/ebook\/([^/?#]+)/;

/** Series index from "Book 1.5 - ", kept as written. */
export function parseSeriesIndex(prefix: string): string | undefined {
  const match = SERIES_PREFIX.exec(prefix.trim().replace(/\s+/g, " "));
  return match ? match[1] : undefined;
}

/** Tags are stored comma separated by the host, so commas become spaces. */
export function normalizeTag(tag: string): string {
  return tag.replace(/,\s*/g, " ").trim();
}

function productSlug($: CheerioAPI, finalUrl: string): string | undefined {
  const canonical =
    $("link[rel='canonical']").attr("href") ??
    $("meta[property='og:url']").attr("content") ??
    finalUrl;
  const match = PRODUCT_SLUG.exec(canonical);
  if (!match) return undefined;
  try {
    return decodeURIComponent(match[1]);
  } catch (error: unknown) {
    // A stray "%" is not an escape; keep the slug as served.
    if (error instanceof URIError) return match[1];
    throw error;
  }
}

/**
 * Parse a product page into a {@link BookRecord} with relevance 0; the caller
 * assigns the final relevance.  Only the title is mandatory.
 *
 * @throws MalformedPageError when no title can be found.
 */
export function parseDetailPage(
  page: DetailPage,
  options: ParseOptions,
  logger: Logger,
): BookRecord {
  const { $, finalUrl } = page;

  const format = detectDetailPageFormat($);
  if (!format) {
    throw new MalformedPageError(`No product title found on ${finalUrl}`, finalUrl);
  }

  const fields = format.extract($);
  if (!fields.title) {
    throw new MalformedPageError(`Empty product title on ${finalUrl}`, finalUrl);
  }

  const record: BookRecord = {
    title: fields.title,
    authors: options.fixAuthors(fields.authors),
    tags: new Set(fields.genres.map(normalizeTag).filter((tag) => tag.length > 0)),
    identifiers: {},
    sourceRelevance: 0,
  };

  if (fields.series) record.series = fields.series;
  if (fields.seriesPrefix) {
    const seriesIndex = parseSeriesIndex(fields.seriesPrefix);
    if (seriesIndex !== undefined) record.seriesIndex = seriesIndex;
  }
  if (fields.publisher) record.publisher = fields.publisher;

  for (const { label, value } of fields.details) {
    switch (label) {
      case "releaseDate": {
        const pubdate = parseReleaseDate(value);
        if (pubdate) record.pubdate = pubdate;
        else logger.debug({ url: finalUrl, value }, "Unparsable release date");
        break;
      }
      case "identifier":
        record.isbn = value;
        break;
      case "language":
        record.language = value;
        break;
    }
  }

  if (fields.synopsisHtml) record.comments = fields.synopsisHtml;
  if (fields.coverSrc) record.coverUrl = deriveCoverUrl(fields.coverSrc, options);

  const identifiers: BookIdentifiers = {};
  const isbn = checkISBN(record.isbn);
  if (isbn) identifiers.isbn = isbn;
  const slug = productSlug($, finalUrl);
  if (slug) identifiers.kobo = slug;
  record.identifiers = identifiers;

  logger.info(
    {
      url: finalUrl,
      format: format.name,
      title: record.title,
      authors: record.authors,
      series: record.series,
      seriesIndex: record.seriesIndex,
      isbn: record.isbn,
      tags: [...record.tags],
      coverUrl: record.coverUrl,
    },
    "Parsed product page",
  );

  return record;
}
