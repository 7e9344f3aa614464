#!/usr/bin/env node
// ---------------------------------------------------------------------------
// kobo-lookup: look a book up from the command line.
//
//   kobo-lookup --isbn 9781761108105
//   kobo-lookup --title "Fourth Wing" --author "Rebecca Yarros"
//   kobo-lookup --isbn 9781761108105 --cover cover.jpg
//
// Records are printed to stdout as JSON lines; logs go to stderr.
// ---------------------------------------------------------------------------

import { writeFile } from "node:fs/promises";

import type { BookRecord, CoverResult } from "../../core/types.js";
import { buildApp } from "../../app.js";
import { parseCliArgs } from "./args.js";
import { formatRecord } from "./format.js";

async function main(): Promise<void> {
  const opts = parseCliArgs(process.argv.slice(2));
  const { config, source } = buildApp();

  const controller = new AbortController();
  const onSignal = () => {
    console.error("\nInterrupted. Finishing current page...");
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const lookup = {
    timeoutMs: opts.timeoutMs ?? config.timeoutMs,
    signal: controller.signal,
  };

  try {
    if (opts.coverPath) {
      const covers: CoverResult[] = [];
      const found = await source.getCover({ put: (cover) => covers.push(cover) }, opts.request, lookup);
      const cover = covers[0];
      if (!found || !cover) {
        console.error("No cover found.");
        process.exitCode = 1;
        return;
      }
      await writeFile(opts.coverPath, cover[1]);
      console.error(`Wrote ${cover[1].byteLength} bytes to ${opts.coverPath}`);
      return;
    }

    const sink = { put: (record: BookRecord) => console.log(formatRecord(record)) };
    const outcome = await source.identify(sink, opts.request, lookup);
    if (outcome.emitted === 0) {
      console.error(`No matches (${outcome.stoppedBy}).`);
      process.exitCode = 1;
    }
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
