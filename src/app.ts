// ---------------------------------------------------------------------------
// Application bootstrap shared by the CLI and embedding hosts.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type { AppConfig } from "./core/types.js";
import { loadConfig } from "./config/config.js";
import { createLogger } from "./logging/logger.js";
import { MetadataSource } from "./orchestrator/metadata-source.js";

export interface AppContext {
  config: AppConfig;
  logger: pino.Logger;
  source: MetadataSource;
}

/**
 * Wire a {@link MetadataSource} from environment configuration.
 *
 * @throws ConfigurationError when the environment holds invalid options.
 */
export function buildApp(config: AppConfig = loadConfig()): AppContext {
  const logger = createLogger(config.logging);

  logger.info(
    {
      env: config.env,
      country: config.prefs.country,
      language: config.prefs.language,
      numMatches: config.prefs.numMatches,
      resizeCover: config.prefs.resizeCover,
    },
    "Metadata source configured",
  );

  const source = new MetadataSource({
    prefs: config.prefs,
    fetcherConfig: config.fetcher,
    logger,
  });

  return { config, logger, source };
}
