// ---------------------------------------------------------------------------
// BrowserSession – a long-lived HTTP session that presents itself as a
// desktop browser.
//
// The storefront blocks clients it does not recognise, so every request
// carries the header set Firefox on Windows sends for a top-level
// navigation, and cookies handed out by the bot-mitigation layer are replayed
// on later requests the way a browser would.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import { NetworkError, TimeoutError } from "../core/errors.js";

export interface BrowserIdentity {
  userAgent: string;
  acceptLanguage: string;
}

export const FIREFOX_WINDOWS: BrowserIdentity = {
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:128.0) Gecko/20100101 Firefox/128.0",
  acceptLanguage: "en-US,en;q=0.5",
};

const ACCEPT_DOCUMENT =
  "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8";
const ACCEPT_IMAGE = "image/avif,image/webp,image/png,image/svg+xml,image/*;q=0.8,*/*;q=0.5";

export interface SessionResponse<T> {
  status: number;
  /** URL after redirects. */
  finalUrl: string;
  body: T;
}

type CookieMap = Map<string, string>;

function parseSetCookieInto(jar: CookieMap, setCookie: string): void {
  // "NAME=value; Path=/; Secure; HttpOnly"
  const pair = setCookie.split(";", 1)[0];
  const eq = pair.indexOf("=");
  if (eq <= 0) return;
  const name = pair.slice(0, eq).trim();
  if (!name) return;
  jar.set(name, pair.slice(eq + 1).trim());
}

function isAbort(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

/**
 * One session per metadata source instance.  Apart from the cookie jar it
 * never changes after construction, so concurrent lookups may share it.
 */
export class BrowserSession {
  private readonly identity: BrowserIdentity;
  private readonly logger: Logger;
  /** Cookies per host name. */
  private readonly cookies = new Map<string, CookieMap>();

  constructor(logger: Logger, identity: BrowserIdentity = FIREFOX_WINDOWS) {
    this.identity = identity;
    this.logger = logger.child({ component: "browser-session" });
  }

  /** GET a document and read it as text. */
  async getText(url: string, timeoutMs: number): Promise<SessionResponse<string>> {
    return this.send(url, timeoutMs, ACCEPT_DOCUMENT, (response) => response.text());
  }

  /** GET a binary resource such as a cover image. */
  async getBytes(url: string, timeoutMs: number): Promise<SessionResponse<Uint8Array>> {
    return this.send(url, timeoutMs, ACCEPT_IMAGE, async (response) =>
      new Uint8Array(await response.arrayBuffer()),
    );
  }

  /** Cookie header currently sent to `host`, mainly for diagnostics. */
  cookieHeader(host: string): string {
    const jar = this.cookies.get(host);
    if (!jar) return "";
    return [...jar.entries()].map(([k, v]) => `${k}=${v}`).join("; ");
  }

  // ── Private helpers ─────────────────────────────────────────────────────

  private buildHeaders(host: string, accept: string): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": this.identity.userAgent,
      Accept: accept,
      "Accept-Language": this.identity.acceptLanguage,
      "Upgrade-Insecure-Requests": "1",
      "Sec-Fetch-Dest": accept === ACCEPT_DOCUMENT ? "document" : "image",
      "Sec-Fetch-Mode": accept === ACCEPT_DOCUMENT ? "navigate" : "no-cors",
      "Sec-Fetch-Site": "none",
      "Sec-Fetch-User": "?1",
    };
    const cookie = this.cookieHeader(host);
    if (cookie) headers["Cookie"] = cookie;
    return headers;
  }

  private storeCookies(host: string, headers: Headers): void {
    const setCookies = headers.getSetCookie();
    if (setCookies.length === 0) return;

    let jar = this.cookies.get(host);
    if (!jar) {
      jar = new Map();
      this.cookies.set(host, jar);
    }
    for (const setCookie of setCookies) parseSetCookieInto(jar, setCookie);
  }

  private async send<T>(
    url: string,
    timeoutMs: number,
    accept: string,
    read: (response: Response) => Promise<T>,
  ): Promise<SessionResponse<T>> {
    this.logger.debug({ url }, "GET");

    try {
      const host = new URL(url).host;
      const response = await fetch(url, {
        method: "GET",
        redirect: "follow",
        headers: this.buildHeaders(host, accept),
        signal: AbortSignal.timeout(timeoutMs),
      });

      const finalUrl = response.url || url;
      this.storeCookies(host, response.headers);
      const finalHost = new URL(finalUrl).host;
      if (finalHost !== host) this.storeCookies(finalHost, response.headers);

      const body = await read(response);
      return { status: response.status, finalUrl, body };
    } catch (error: unknown) {
      if (isAbort(error)) {
        throw new TimeoutError(url, timeoutMs, { cause: error });
      }
      const msg = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Network error fetching ${url}: ${msg}`, url, null, {
        cause: error,
      });
    }
  }
}
