import { parseArgs } from "node:util";

import type { LookupRequest } from "../../core/types.js";
import { ConfigurationError } from "../../core/errors.js";

export interface LookupCliOptions {
  request: LookupRequest;
  /** Write the cover here instead of identifying. */
  coverPath: string | null;
  timeoutMs: number | null;
}

export const USAGE = `Usage: kobo-lookup [--title <title>] [--author <name>]... [--isbn <isbn>] [--kobo-id <slug>]
                   [--cover <file>] [--timeout <ms>]`;

export function parseCliArgs(argv: string[]): LookupCliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      title: { type: "string" },
      author: { type: "string", multiple: true },
      isbn: { type: "string" },
      "kobo-id": { type: "string" },
      cover: { type: "string" },
      timeout: { type: "string" },
    },
    strict: true,
  });

  const identifiers: Record<string, string> = {};
  if (values.isbn) identifiers["isbn"] = values.isbn;
  if (values["kobo-id"]) identifiers["kobo"] = values["kobo-id"];

  const request: LookupRequest = {
    title: values.title ?? null,
    authors: values.author ?? [],
    identifiers,
  };

  if (!request.title && request.authors?.length === 0 && Object.keys(identifiers).length === 0) {
    throw new ConfigurationError(`Nothing to look up.\n${USAGE}`);
  }

  let timeoutMs: number | null = null;
  if (values.timeout !== undefined) {
    timeoutMs = parseInt(values.timeout, 10);
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError(`--timeout must be a positive number of milliseconds`);
    }
  }

  return { request, coverPath: values.cover ?? null, timeoutMs };
}
