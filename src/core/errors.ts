// ---------------------------------------------------------------------------
// Error hierarchy for the Kobo metadata source.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all metadata source errors.
 */
export class MetadataSourceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MetadataSourceError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Fetch errors ────────────────────────────────────────────────────────────

/**
 * Base class for errors raised while retrieving a page from the storefront.
 */
export class FetchError extends MetadataSourceError {
  public readonly url: string;

  constructor(message: string, url: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FetchError";
    this.url = url;
  }
}

/** Transport failure or an unexpected HTTP status. */
export class NetworkError extends FetchError {
  public readonly status: number | null;

  constructor(
    message: string,
    url: string,
    status: number | null = null,
    options?: ErrorOptions,
  ) {
    super(message, url, options);
    this.name = "NetworkError";
    this.status = status;
  }
}

/** The request exceeded the caller's timeout. */
export class TimeoutError extends FetchError {
  public readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number, options?: ErrorOptions) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`, url, options);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** The storefront kept serving its interstitial challenge page. */
export class BotChallengeError extends FetchError {
  public readonly attempts: number;

  constructor(url: string, attempts: number, options?: ErrorOptions) {
    super(
      `Bot challenge for ${url} did not clear after ${attempts} attempts`,
      url,
      options,
    );
    this.name = "BotChallengeError";
    this.attempts = attempts;
  }
}

// ── Parse errors ────────────────────────────────────────────────────────────

/** A product page is missing a field every product page has. */
export class MalformedPageError extends MetadataSourceError {
  public readonly url: string;

  constructor(message: string, url: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MalformedPageError";
    this.url = url;
  }
}

/**
 * A follow-up results page resolved to something other than a results
 * page.  The storefront only redirects on the first page of a query.
 */
export class SearchConsistencyError extends MetadataSourceError {
  public readonly url: string;
  public readonly pageNumber: number;

  constructor(url: string, pageNumber: number, options?: ErrorOptions) {
    super(
      `Search page ${pageNumber} (${url}) did not resolve to a results page`,
      options,
    );
    this.name = "SearchConsistencyError";
    this.url = url;
    this.pageNumber = pageNumber;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends MetadataSourceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
