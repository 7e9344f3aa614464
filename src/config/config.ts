// ---------------------------------------------------------------------------
// Typed configuration.
//
// `parsePrefs` validates the flat option map a host hands to the source.
// `loadConfig` builds the same options from environment variables for the
// CLI and local development.
// ---------------------------------------------------------------------------

import { z } from "zod";

import type { AppConfig, FetcherConfig, SourcePrefs } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";
import { parseBlacklist } from "../filter/blacklist.js";
import { knownCountryCodes } from "./countries.js";

// ── Defaults ────────────────────────────────────────────────────────────────

export const DEFAULT_FETCHER_CONFIG: FetcherConfig = {
  maxChallengeAttempts: 15,
  challengeRetryDelayMs: 1_000,
};

export const DEFAULT_TIMEOUT_MS = 30_000;

// ── Zod schemas ─────────────────────────────────────────────────────────────

/** Host option names are snake_case; the rest of the code uses camelCase. */
export const PrefsSchema = z.object({
  country: z.string().trim().toLowerCase().default("us"),
  language: z
    .string()
    .trim()
    .toLowerCase()
    .regex(/^([a-z]{2}|all)$/, "language must be a 2 letter code or \"all\"")
    .default("all"),
  num_matches: z.coerce.number().int().positive().default(1),
  title_blacklist: z.string().default(""),
  tag_blacklist: z.string().default(""),
  remove_leading_zeroes: z.boolean().default(false),
  resize_cover: z.boolean().default(false),
  maximum_cover_size: z
    .tuple([z.number().int().positive(), z.number().int().positive()])
    .default([1650, 2200]),
});

/** Fetcher and timeout settings read from the environment by `loadConfig`. */
const FetcherEnvSchema = z.object({
  KOBO_CHALLENGE_ATTEMPTS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_FETCHER_CONFIG.maxChallengeAttempts),
  KOBO_CHALLENGE_DELAY_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_FETCHER_CONFIG.challengeRetryDelayMs),
  KOBO_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
}

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Validate host options and convert them to {@link SourcePrefs}.
 *
 * @throws ConfigurationError for unknown countries or malformed values.
 */
export function parsePrefs(
  raw: Record<string, unknown> = {},
  countryCodes: ReadonlySet<string> = knownCountryCodes(),
): SourcePrefs {
  const result = PrefsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid source options: ${formatIssues(result.error)}`);
  }

  const prefs = result.data;
  if (!countryCodes.has(prefs.country)) {
    throw new ConfigurationError(`Unknown storefront country "${prefs.country}"`);
  }

  const [width, height] = prefs.maximum_cover_size;

  return {
    country: prefs.country,
    language: prefs.language,
    numMatches: prefs.num_matches,
    titleBlacklist: parseBlacklist(prefs.title_blacklist),
    tagBlacklist: parseBlacklist(prefs.tag_blacklist),
    removeLeadingZeroes: prefs.remove_leading_zeroes,
    resizeCover: prefs.resize_cover,
    maximumCoverSize: { width, height },
  };
}

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === "true" || value === "1";
}

function envCoverSize(value: string | undefined): [number, number] | undefined {
  if (!value) return undefined;
  const match = /^(\d+)x(\d+)$/.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(
      `KOBO_MAX_COVER_SIZE must look like 1650x2200, got "${value}"`,
    );
  }
  return [parseInt(match[1], 10), parseInt(match[2], 10)];
}

/**
 * Load the configuration from environment variables.
 *
 * Every setting has a default so the CLI runs with zero configuration.
 *
 * @throws ConfigurationError when a variable holds a malformed value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env["NODE_ENV"];
  const appEnv: AppConfig["env"] =
    nodeEnv === "production" || nodeEnv === "test" ? nodeEnv : "development";

  const raw: Record<string, unknown> = {
    country: env["KOBO_COUNTRY"],
    language: env["KOBO_LANGUAGE"],
    num_matches: env["KOBO_NUM_MATCHES"],
    title_blacklist: env["KOBO_TITLE_BLACKLIST"],
    tag_blacklist: env["KOBO_TAG_BLACKLIST"],
    remove_leading_zeroes: envFlag(env["KOBO_REMOVE_LEADING_ZEROES"]),
    resize_cover: envFlag(env["KOBO_RESIZE_COVER"]),
    maximum_cover_size: envCoverSize(env["KOBO_MAX_COVER_SIZE"]),
  };

  const fetcherEnv = FetcherEnvSchema.safeParse({
    KOBO_CHALLENGE_ATTEMPTS: env["KOBO_CHALLENGE_ATTEMPTS"],
    KOBO_CHALLENGE_DELAY_MS: env["KOBO_CHALLENGE_DELAY_MS"],
    KOBO_TIMEOUT_MS: env["KOBO_TIMEOUT_MS"],
  });
  if (!fetcherEnv.success) {
    throw new ConfigurationError(`Invalid environment: ${formatIssues(fetcherEnv.error)}`);
  }
  const { KOBO_CHALLENGE_ATTEMPTS, KOBO_CHALLENGE_DELAY_MS, KOBO_TIMEOUT_MS } = fetcherEnv.data;

  return {
    env: appEnv,
    prefs: parsePrefs(raw),
    fetcher: {
      maxChallengeAttempts: KOBO_CHALLENGE_ATTEMPTS,
      challengeRetryDelayMs: KOBO_CHALLENGE_DELAY_MS,
    },
    logging: {
      level: env["LOG_LEVEL"] ?? "info",
      prettyPrint: appEnv === "development",
      redactSecrets: true,
    },
    timeoutMs: KOBO_TIMEOUT_MS,
  };
}
