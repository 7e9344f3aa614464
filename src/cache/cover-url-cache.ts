// ---------------------------------------------------------------------------
// Default cover URL cache, used when the host does not supply one.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type { CoverUrlCache } from "../core/types.js";
import { toISBN13 } from "../domain/isbn/isbn.js";
import { MemoryCache } from "./memory-cache.js";

export interface CoverUrlCacheOptions {
  maxEntries?: number;
  ttlMs?: number;
}

/** Covers rarely change; a day keeps CLI sessions from refetching. */
const DEFAULT_TTL_MS = 86_400_000;
const DEFAULT_MAX_ENTRIES = 1_000;

/**
 * Keys are normalised to ISBN-13 so a lookup by ISBN-10 finds a URL that was
 * stored under the ISBN-13 the product page lists.  Keys that are not ISBNs
 * (storefront book ids) are stored as given.
 */
export function coverCacheKey(identifier: string): string {
  return toISBN13(identifier) ?? identifier.trim();
}

/**
 * {@link CoverUrlCache} kept in process memory.  Last writer wins.
 */
export class MemoryCoverUrlCache implements CoverUrlCache {
  private readonly cache: MemoryCache<string>;
  private readonly logger: pino.Logger;

  constructor(logger: pino.Logger, options: CoverUrlCacheOptions = {}) {
    this.cache = new MemoryCache<string>({
      maxEntries: options.maxEntries ?? DEFAULT_MAX_ENTRIES,
      defaultTtlMs: options.ttlMs ?? DEFAULT_TTL_MS,
    });
    this.logger = logger.child({ component: "cover-url-cache" });
  }

  get(isbn: string): string | null {
    const key = coverCacheKey(isbn);
    const url = this.cache.get(key);
    this.logger.debug({ key, hit: url !== null }, "cover url lookup");
    return url;
  }

  set(isbn: string, coverUrl: string): void {
    const key = coverCacheKey(isbn);
    this.cache.set(key, coverUrl);
    this.logger.debug({ key, coverUrl }, "cover url cached");
  }
}
