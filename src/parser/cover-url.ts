// ---------------------------------------------------------------------------
// Cover URL derivation.
//
// Product pages show a fixed-size thumbnail:
//   //cdn.kobo.com/book-images/44f0e8b9-3338-4d1c-bd6e-e88e82cb8fad/353/569/90/False/holly-23.jpg
// Dropping the size segment serves the original artwork:
//   https://cdn.kobo.com/book-images/44f0e8b9-3338-4d1c-bd6e-e88e82cb8fad/holly-23.jpg
// and a `<width>/<height>/100/` segment asks the CDN for a resized copy that
// keeps the aspect ratio of the width.
// ---------------------------------------------------------------------------

import type { CoverSize } from "../core/types.js";
import { STOREFRONT_BASE_URL } from "../query/query-builder.js";

const THUMBNAIL_SEGMENT = /\/353\/569\/90\/(?:False|True)\//;

export interface CoverOptions {
  resizeCover: boolean;
  maximumCoverSize: CoverSize;
}

/**
 * Image `src` values are usually scheme-relative; root-relative ones point at
 * the storefront itself.  A `src` that does not parse comes back trimmed and
 * fails when it is downloaded.
 */
export function absoluteCoverUrl(src: string): string {
  const trimmed = src.trim();
  if (trimmed.startsWith("//")) return `https:${trimmed}`;
  if (!URL.canParse(trimmed, STOREFRONT_BASE_URL)) return trimmed;
  return new URL(trimmed, STOREFRONT_BASE_URL).toString();
}

/**
 * Full-size or resized cover URL for a thumbnail `src`.  URLs without the
 * thumbnail segment come back unchanged apart from the scheme.
 */
export function deriveCoverUrl(src: string, options: CoverOptions): string {
  const url = absoluteCoverUrl(src);
  if (!options.resizeCover) {
    return url.replace(THUMBNAIL_SEGMENT, "/");
  }
  const { width, height } = options.maximumCoverSize;
  return url.replace(THUMBNAIL_SEGMENT, `/${width}/${height}/100/`);
}
