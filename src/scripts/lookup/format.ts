import type { BookRecord } from "../../core/types.js";

/** JSON-friendly view of a record: sets become arrays, dates ISO dates. */
export function toJsonRecord(record: BookRecord): Record<string, unknown> {
  return {
    ...record,
    pubdate: record.pubdate?.toISOString().slice(0, 10),
    tags: [...record.tags].sort(),
  };
}

export function formatRecord(record: BookRecord): string {
  return JSON.stringify(toJsonRecord(record));
}
