// ---------------------------------------------------------------------------
// Interstitial bot-challenge detection.
//
// The storefront sits behind a bot-mitigation layer that sometimes answers
// with a holding page instead of content:
//
//   <title>Just a moment...</title>
//   <div id="challenge-running">...</div>
//   <form id="challenge-form" action="/search?...&__cf_chl_f_tk=..." method="POST">
//   <script src="/cdn-cgi/challenge-platform/h/b/orchestrate/..."></script>
//
// Any one of these markers is enough to treat the page as a challenge.
// ---------------------------------------------------------------------------

import type { CheerioAPI } from "cheerio";

interface ChallengeMarker {
  name: string;
  matches: ($: CheerioAPI) => boolean;
}

const CHALLENGE_TITLES = ["just a moment", "attention required"];

const CHALLENGE_MARKERS: ChallengeMarker[] = [
  {
    name: "challenge-form",
    matches: ($) => $("form#challenge-form").length > 0,
  },
  {
    name: "challenge-running",
    matches: ($) => $("#challenge-running, #cf-challenge-running").length > 0,
  },
  {
    name: "challenge-platform-script",
    matches: ($) => $("script[src*='/cdn-cgi/challenge-platform/']").length > 0,
  },
  {
    name: "challenge-title",
    matches: ($) => {
      const title = $("title").first().text().trim().toLowerCase();
      return CHALLENGE_TITLES.some((prefix) => title.startsWith(prefix));
    },
  },
];

/**
 * Name of the first challenge marker found in the document, or `null` for a
 * regular page.
 */
export function detectChallenge($: CheerioAPI): string | null {
  const hit = CHALLENGE_MARKERS.find((marker) => marker.matches($));
  return hit ? hit.name : null;
}

/**
 * Thrown for a single challenge response so the retry loop can tell it apart
 * from transport failures.  Never leaves the fetcher.
 */
export class ChallengePageDetected extends Error {
  public readonly marker: string;

  constructor(url: string, marker: string) {
    super(`Challenge page (${marker}) served for ${url}`);
    this.name = "ChallengePageDetected";
    this.marker = marker;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
