// ---------------------------------------------------------------------------
// Storefront country catalogue.
// Reads config/countries.yaml, validates it with Zod, and exposes the list of
// store codes the `country` option may take.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { parse } from "yaml";

import { ConfigurationError } from "../core/errors.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const CountrySchema = z.object({
  code: z.string().regex(/^[a-z]{2}$/, "country code must be two lowercase letters"),
  name: z.string().min(1),
});

export const CountryCatalogueSchema = z.object({
  countries: z.array(CountrySchema).min(1),
});

export type Country = z.infer<typeof CountrySchema>;

// ── File lookup ─────────────────────────────────────────────────────────────

// Sources live in src/config/, compiled output in dist/src/config/.
const CANDIDATE_PATHS = [
  new URL("../../config/countries.yaml", import.meta.url),
  new URL("../../../config/countries.yaml", import.meta.url),
];

function defaultCataloguePath(): string {
  for (const candidate of CANDIDATE_PATHS) {
    const filePath = fileURLToPath(candidate);
    if (fs.existsSync(filePath)) return filePath;
  }
  throw new ConfigurationError("Country catalogue config/countries.yaml not found");
}

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Load and validate the country catalogue.  Duplicate codes are rejected.
 */
export function loadCountryCatalogue(filePath: string = defaultCataloguePath()): Country[] {
  let raw: unknown;
  try {
    raw = parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error: unknown) {
    throw new ConfigurationError(`Could not read country catalogue ${filePath}`, {
      cause: error,
    });
  }

  const result = CountryCatalogueSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid country catalogue ${filePath}: ${issues}`);
  }

  const seen = new Set<string>();
  for (const country of result.data.countries) {
    if (seen.has(country.code)) {
      throw new ConfigurationError(`Duplicate country code "${country.code}" in ${filePath}`);
    }
    seen.add(country.code);
  }

  return result.data.countries;
}

let cachedCodes: ReadonlySet<string> | null = null;

/** Store codes from the default catalogue, read once per process. */
export function knownCountryCodes(): ReadonlySet<string> {
  if (cachedCodes === null) {
    cachedCodes = new Set(loadCountryCatalogue().map((c) => c.code));
  }
  return cachedCodes;
}
