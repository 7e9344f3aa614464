// ---------------------------------------------------------------------------
// WebFetcher – page retrieval with bot-challenge retries and page
// classification.
// ---------------------------------------------------------------------------

import * as cheerio from "cheerio";
import type { Logger } from "pino";

import type { FetchedPage, FetcherConfig } from "../core/types.js";
import { BotChallengeError, ConfigurationError, NetworkError } from "../core/errors.js";
import { withRetry } from "../orchestrator/retry.js";
import { BrowserSession } from "./browser-session.js";
import { ChallengePageDetected, detectChallenge } from "./challenge.js";

/** Path marker present in every search results URL. */
export const SEARCH_PATH_MARKER = "/search?";

/**
 * Whether a (post-redirect) URL is a search results page.
 */
export function isSearchUrl(url: string): boolean {
  return url.includes(SEARCH_PATH_MARKER);
}

/**
 * Fetches storefront pages through a lazily created {@link BrowserSession}.
 *
 * A response carrying a challenge marker is retried after a fixed sleep; the
 * total number of attempts is capped by `maxChallengeAttempts`, after which
 * the call fails with {@link BotChallengeError}.  Transport errors and
 * timeouts are never retried.
 */
export class WebFetcher {
  private readonly config: FetcherConfig;
  private readonly logger: Logger;
  private session: BrowserSession | null = null;

  constructor(config: FetcherConfig, logger: Logger) {
    if (!Number.isInteger(config.maxChallengeAttempts) || config.maxChallengeAttempts < 1) {
      throw new ConfigurationError(
        `maxChallengeAttempts must be a positive integer, got ${config.maxChallengeAttempts}`,
      );
    }
    if (!Number.isFinite(config.challengeRetryDelayMs) || config.challengeRetryDelayMs < 0) {
      throw new ConfigurationError(
        `challengeRetryDelayMs must be a non-negative number, got ${config.challengeRetryDelayMs}`,
      );
    }
    this.config = config;
    this.logger = logger.child({ component: "web-fetcher" });
  }

  /**
   * Fetch and load a page.  `isSearch` is derived from the final URL since
   * ISBN searches may redirect straight to a product page.
   */
  async fetchPage(url: string, timeoutMs: number): Promise<FetchedPage> {
    const { maxChallengeAttempts, challengeRetryDelayMs } = this.config;

    try {
      return await withRetry(
        async () => {
          const response = await this.getSession().getText(url, timeoutMs);
          const $ = cheerio.load(response.body);

          const marker = detectChallenge($);
          if (marker) throw new ChallengePageDetected(url, marker);

          if (response.status < 200 || response.status >= 300) {
            throw new NetworkError(
              `Request to ${url} failed with HTTP ${response.status}`,
              url,
              response.status,
            );
          }

          return {
            $,
            requestUrl: url,
            finalUrl: response.finalUrl,
            isSearch: isSearchUrl(response.finalUrl),
          };
        },
        {
          maxRetries: maxChallengeAttempts - 1,
          delayMs: challengeRetryDelayMs,
          shouldRetry: (error) => error instanceof ChallengePageDetected,
          onRetry: (error, attempt) =>
            this.logger.info(
              {
                url,
                attempt,
                marker: error instanceof ChallengePageDetected ? error.marker : undefined,
              },
              "Bot challenge served, retrying",
            ),
        },
      );
    } catch (error: unknown) {
      if (error instanceof ChallengePageDetected) {
        this.logger.error({ url, attempts: maxChallengeAttempts }, "Bot challenge did not clear");
        throw new BotChallengeError(url, maxChallengeAttempts, { cause: error });
      }
      throw error;
    }
  }

  /** Fetch raw bytes (cover images) through the same session. */
  async fetchBytes(url: string, timeoutMs: number): Promise<Uint8Array> {
    const response = await this.getSession().getBytes(url, timeoutMs);
    if (response.status < 200 || response.status >= 300) {
      throw new NetworkError(
        `Request to ${url} failed with HTTP ${response.status}`,
        url,
        response.status,
      );
    }
    return response.body;
  }

  private getSession(): BrowserSession {
    if (this.session === null) {
      this.logger.debug("Opening browser session");
      this.session = new BrowserSession(this.logger);
    }
    return this.session;
  }
}
