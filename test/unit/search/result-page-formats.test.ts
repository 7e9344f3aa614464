import { describe, it, expect } from "vitest";
import * as cheerio from "cheerio";

import {
  detectResultPageFormat,
  toCandidateUrl,
} from "../../../src/search/result-page-formats.js";
import { emptySearchPage, legacySearchPage, widgetSearchPage } from "../../helpers/pages.js";

describe("detectResultPageFormat", () => {
  it("keeps every second link of the widget template", () => {
    const $ = cheerio.load(widgetSearchPage(["/us/en/ebook/a", "/us/en/ebook/b"]));
    const format = detectResultPageFormat($);
    expect(format?.name).toBe("widget");
    expect(format?.extractLinks($)).toEqual(["/us/en/ebook/a", "/us/en/ebook/b"]);
  });

  it("reads every link of the legacy template", () => {
    const $ = cheerio.load(legacySearchPage(["/us/en/ebook/a", "/us/en/ebook/b"]));
    const format = detectResultPageFormat($);
    expect(format?.name).toBe("legacy");
    expect(format?.extractLinks($)).toEqual(["/us/en/ebook/a", "/us/en/ebook/b"]);
  });

  it("returns null when neither template is present", () => {
    expect(detectResultPageFormat(cheerio.load(emptySearchPage()))).toBeNull();
  });
});

describe("toCandidateUrl", () => {
  it("resolves relative links against the storefront", () => {
    expect(toCandidateUrl("/us/en/ebook/fourth-wing-1")).toBe(
      "https://www.kobo.com/us/en/ebook/fourth-wing-1",
    );
  });

  it("keeps absolute links", () => {
    expect(toCandidateUrl("https://www.kobo.com/au/en/ebook/holly-23")).toBe(
      "https://www.kobo.com/au/en/ebook/holly-23",
    );
  });

  it("returns null for a link that does not parse", () => {
    expect(toCandidateUrl("http://")).toBeNull();
  });
});
