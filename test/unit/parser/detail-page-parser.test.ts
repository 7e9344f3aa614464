// ---------------------------------------------------------------------------
// Tests for product page parsing across both page templates.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import * as cheerio from "cheerio";
import pino from "pino";

import { MalformedPageError } from "../../../src/core/errors.js";
import {
  normalizeTag,
  parseDetailPage,
  parseSeriesIndex,
  type ParseOptions,
} from "../../../src/parser/detail-page-parser.js";
import {
  classifyLabel,
  detectDetailPageFormat,
} from "../../../src/parser/detail-page-formats.js";
import { fixAuthors } from "../../../src/query/tokens.js";
import {
  FOURTH_WING_COVER,
  FOURTH_WING_URL,
  legacyDetailPage,
  modernDetailPage,
} from "../../helpers/pages.js";

const logger = pino({ level: "silent" });

const OPTIONS: ParseOptions = {
  resizeCover: false,
  maximumCoverSize: { width: 1650, height: 2200 },
  fixAuthors,
};

function parse(html: string, options: ParseOptions = OPTIONS) {
  return parseDetailPage({ $: cheerio.load(html), finalUrl: FOURTH_WING_URL }, options, logger);
}

// ── Helpers ───────────────────────────────────────────────────────────────

describe("parseSeriesIndex", () => {
  it("reads the index from the sequence prefix", () => {
    expect(parseSeriesIndex("Book 1 - ")).toBe("1");
  });

  it("keeps fractional indices as written", () => {
    expect(parseSeriesIndex("Book 1.5 -")).toBe("1.5");
  });

  it("ignores prefixes in another shape", () => {
    expect(parseSeriesIndex("Volume 3")).toBeUndefined();
  });
});

describe("normalizeTag", () => {
  it("replaces commas with spaces", () => {
    expect(normalizeTag("Fantasy, Romance")).toBe("Fantasy Romance");
    expect(normalizeTag("Science Fiction,Fantasy")).toBe("Science Fiction Fantasy");
  });
});

describe("classifyLabel", () => {
  it("maps known labels with or without a colon", () => {
    expect(classifyLabel("Release Date:")).toBe("releaseDate");
    expect(classifyLabel(" ISBN: ")).toBe("identifier");
    expect(classifyLabel("Book ID")).toBe("identifier");
    expect(classifyLabel("Language")).toBe("language");
  });

  it("returns null for other labels", () => {
    expect(classifyLabel("Download options:")).toBeNull();
  });
});

describe("detectDetailPageFormat", () => {
  it("recognises both templates", () => {
    expect(detectDetailPageFormat(cheerio.load(legacyDetailPage()))?.name).toBe("legacy");
    expect(detectDetailPageFormat(cheerio.load(modernDetailPage()))?.name).toBe("modern");
  });

  it("returns null for other pages", () => {
    expect(detectDetailPageFormat(cheerio.load("<p>hello</p>"))).toBeNull();
  });
});

// ── Legacy template ───────────────────────────────────────────────────────

describe("parseDetailPage (legacy template)", () => {
  it("extracts every field", () => {
    const record = parse(legacyDetailPage());

    expect(record.title).toBe("Fourth Wing");
    expect(record.authors).toEqual(["Rebecca Yarros"]);
    expect(record.series).toBe("The Empyrean");
    expect(record.seriesIndex).toBe("1");
    expect(record.publisher).toBe("Entangled: Red Tower Books");
    expect(record.pubdate?.toISOString()).toBe("2023-05-02T00:00:00.000Z");
    expect(record.isbn).toBe("9781761108105");
    expect(record.language).toBe("English");
    expect([...record.tags]).toEqual(["Romance", "Fantasy Romantasy"]);
    expect(record.comments).toBe(
      "<p>Enter the brutal and elite world of a war college for dragon riders.</p>",
    );
    expect(record.coverUrl).toBe(FOURTH_WING_COVER);
    expect(record.identifiers).toEqual({ isbn: "9781761108105", kobo: "fourth-wing-1" });
    expect(record.sourceRelevance).toBe(0);
  });

  it("keeps a fractional series index", () => {
    expect(parse(legacyDetailPage({ seriesPrefix: "Book 1.5 - " })).seriesIndex).toBe("1.5");
  });

  it("reads the nested series span of books without an index", () => {
    const record = parse(
      legacyDetailPage({ nestedSeries: true, series: "Les Damnées de la mer" }),
    );
    expect(record.series).toBe("Les Damnées de la mer");
    expect(record.seriesIndex).toBeUndefined();
  });

  it("resizes the cover when asked", () => {
    const record = parse(legacyDetailPage(), { ...OPTIONS, resizeCover: true });
    expect(record.coverUrl).toBe(
      "https://cdn.kobo.com/book-images/1b2c3d4e/1650/2200/100/fourth-wing-1.jpg",
    );
  });

  it("leaves the date unset when it cannot be parsed", () => {
    expect(parse(legacyDetailPage({ releaseDate: "TBA" })).pubdate).toBeUndefined();
  });

  it("keeps a slug with a stray percent sign as served", () => {
    const record = parse(
      legacyDetailPage({ canonical: "https://www.kobo.com/us/en/ebook/100%-pure" }),
    );
    expect(record.title).toBe("Fourth Wing");
    expect(record.identifiers).toEqual({ isbn: "9781761108105", kobo: "100%-pure" });
  });

  it("decodes an escaped slug", () => {
    const record = parse(
      legacyDetailPage({ canonical: "https://www.kobo.com/us/en/ebook/les-damn%C3%A9es" }),
    );
    expect(record.identifiers.kobo).toBe("les-damnées");
  });

  it("does not set the isbn identifier for an invalid ISBN", () => {
    const record = parse(legacyDetailPage({ isbn: "9781761108106" }));
    expect(record.isbn).toBe("9781761108106");
    expect(record.identifiers).toEqual({ kobo: "fourth-wing-1" });
  });

  it("throws MalformedPageError when there is no title element", () => {
    expect(() => parse("<html><body><p>Not a product</p></body></html>")).toThrow(
      MalformedPageError,
    );
  });

  it("throws MalformedPageError when the title is empty", () => {
    expect(() => parse(legacyDetailPage({ title: "  " }))).toThrow(MalformedPageError);
  });
});

// ── Modern template ───────────────────────────────────────────────────────

describe("parseDetailPage (modern template)", () => {
  it("extracts every field", () => {
    const record = parse(modernDetailPage());

    expect(record.title).toBe("Iron Flame");
    expect(record.authors).toEqual(["Rebecca Yarros"]);
    expect(record.series).toBe("The Empyrean");
    expect(record.seriesIndex).toBe("2");
    expect(record.publisher).toBe("Entangled: Red Tower Books");
    expect(record.pubdate?.toISOString()).toBe("2023-11-07T00:00:00.000Z");
    expect(record.isbn).toBe("5f0c7a2e-iron-flame");
    expect(record.language).toBe("English");
    expect([...record.tags]).toEqual(["Romantasy", "Fantasy Romance"]);
    expect(record.comments).toBe("<p>Everyone expected Violet to die.</p>");
    expect(record.coverUrl).toBe("https://cdn.kobo.com/book-images/9e8d/iron-flame.jpg");
    expect(record.identifiers).toEqual({ kobo: "iron-flame" });
  });
});
