// ---------------------------------------------------------------------------
// ISBN validation and normalisation.
// ---------------------------------------------------------------------------

import type { ISBN, ISBN10, ISBN13, RawISBN } from "../../core/types.js";

// ── Check digits ────────────────────────────────────────────────────────────

/** Check character for the first 9 digits of an ISBN-10: '0'-'9' or 'X'. */
export function isbn10CheckDigit(first9: string): string {
  let sum = 0;
  for (let i = 0; i < 9; i++) {
    sum += (10 - i) * Number(first9[i]);
  }
  const check = (11 - (sum % 11)) % 11;
  return check === 10 ? "X" : String(check);
}

/** Check digit for the first 12 digits of an ISBN-13. */
export function isbn13CheckDigit(first12: string): string {
  let sum = 0;
  for (let i = 0; i < 12; i++) {
    sum += (i % 2 === 0 ? 1 : 3) * Number(first12[i]);
  }
  return String((10 - (sum % 10)) % 10);
}

// ── Validation ──────────────────────────────────────────────────────────────

/** Strip hyphens, spaces, and surrounding whitespace from a raw ISBN string. */
export function stripFormatting(raw: string): string {
  return raw.trim().replace(/[\s-]/g, "");
}

export function validateISBN10(raw: RawISBN): ISBN10 | null {
  const stripped = stripFormatting(raw).toUpperCase();
  if (!/^\d{9}[\dX]$/.test(stripped)) return null;
  if (isbn10CheckDigit(stripped.slice(0, 9)) !== stripped[9]) return null;
  return stripped as ISBN10;
}

export function validateISBN13(raw: RawISBN): ISBN13 | null {
  const stripped = stripFormatting(raw);
  if (!/^\d{13}$/.test(stripped)) return null;
  if (isbn13CheckDigit(stripped.slice(0, 12)) !== stripped[12]) return null;
  return stripped as ISBN13;
}

/**
 * Validate either form.  Returns the cleaned ISBN, or `null` for anything
 * that is not a well-formed ISBN (including missing input).
 */
export function checkISBN(raw: RawISBN | null | undefined): ISBN | null {
  if (!raw) return null;
  return validateISBN13(raw) ?? validateISBN10(raw);
}

// ── Normalisation ───────────────────────────────────────────────────────────

/**
 * Canonical ISBN-13 for any valid input, `null` otherwise.
 */
export function toISBN13(raw: RawISBN): ISBN13 | null {
  const isbn13 = validateISBN13(raw);
  if (isbn13) return isbn13;

  const isbn10 = validateISBN10(raw);
  if (!isbn10) return null;

  const prefix12 = "978" + isbn10.slice(0, 9);
  return (prefix12 + isbn13CheckDigit(prefix12)) as ISBN13;
}
