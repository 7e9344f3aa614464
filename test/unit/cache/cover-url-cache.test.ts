import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import pino from "pino";

import { MemoryCoverUrlCache, coverCacheKey } from "../../../src/cache/cover-url-cache.js";

const logger = pino({ level: "silent" });
const COVER = "https://cdn.kobo.com/book-images/abc/fourth-wing-1.jpg";

describe("coverCacheKey", () => {
  it("normalises an ISBN-10 to ISBN-13", () => {
    expect(coverCacheKey("0-306-40615-2")).toBe("9780306406157");
  });

  it("keeps identifiers that are not ISBNs", () => {
    expect(coverCacheKey(" book-id-1 ")).toBe("book-id-1");
  });
});

describe("MemoryCoverUrlCache", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("finds a URL stored under the ISBN-13 when asked with the ISBN-10", () => {
    const cache = new MemoryCoverUrlCache(logger);
    cache.set("9780306406157", COVER);
    expect(cache.get("0306406152")).toBe(COVER);
  });

  it("returns null on a miss", () => {
    expect(new MemoryCoverUrlCache(logger).get("9781761108105")).toBeNull();
  });

  it("keeps the last write", () => {
    const cache = new MemoryCoverUrlCache(logger);
    cache.set("9781761108105", "https://cdn.kobo.com/old.jpg");
    cache.set("9781761108105", COVER);
    expect(cache.get("9781761108105")).toBe(COVER);
  });

  it("expires entries after the configured TTL", () => {
    const cache = new MemoryCoverUrlCache(logger, { ttlMs: 1_000 });
    cache.set("9781761108105", COVER);
    vi.advanceTimersByTime(1_001);
    expect(cache.get("9781761108105")).toBeNull();
  });
});
