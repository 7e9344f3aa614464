import { describe, it, expect } from "vitest";

import {
  isBlacklisted,
  parseBlacklist,
  titleWords,
  type Blacklist,
} from "../../../src/filter/blacklist.js";

function blacklist(titles: string, tags: string): Blacklist {
  return { titleBlacklist: parseBlacklist(titles), tagBlacklist: parseBlacklist(tags) };
}

describe("parseBlacklist", () => {
  it("trims, lowercases and drops blank entries", () => {
    expect([...parseBlacklist(" Zero, ,Summary ,")]).toEqual(["zero", "summary"]);
  });

  it("gives an empty set for an empty option", () => {
    expect(parseBlacklist("").size).toBe(0);
  });
});

describe("titleWords", () => {
  it("strips punctuation and lowercases", () => {
    expect(titleWords("Fourth Wing: A Novel!")).toEqual(["fourth", "wing", "a", "novel"]);
  });
});

describe("isBlacklisted", () => {
  it("rejects a title containing a blacklisted word", () => {
    const hit = isBlacklisted({ title: "The Zero Hero", tags: new Set() }, blacklist("zero", ""));
    expect(hit).toEqual({ titleWords: ["zero"], tags: [] });
  });

  it("rejects a record with a blacklisted tag regardless of case", () => {
    const hit = isBlacklisted(
      { title: "Fourth Wing", tags: new Set(["Romance", "Action"]) },
      blacklist("", "romance"),
    );
    expect(hit).toEqual({ titleWords: [], tags: ["romance"] });
  });

  it("matches whole words only", () => {
    expect(
      isBlacklisted({ title: "Zeroes and Ones", tags: new Set() }, blacklist("zero", "")),
    ).toBeNull();
  });

  it("joins words split by punctuation before matching", () => {
    expect(
      isBlacklisted({ title: "Zero-Sum Game", tags: new Set() }, blacklist("zero", "")),
    ).toBeNull();
  });

  it("rejects nothing when both lists are empty", () => {
    expect(
      isBlacklisted(
        { title: "The Zero Hero", tags: new Set(["Romance"]) },
        blacklist("", ""),
      ),
    ).toBeNull();
  });
});
