// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

/** Re-export pino's Logger type for convenience. */
export type Logger = pino.Logger;

/** Cookie and auth headers never reach the log output. */
const SECRET_PATHS: string[] = [
  "headers.cookie",
  "headers.Cookie",
  "*.headers.cookie",
  "*.headers.Cookie",
  "req.headers.authorization",
];

/**
 * Create a configured pino logger instance.
 *
 * Hosts that already run pino pass their own logger to the source instead;
 * this factory backs the CLI and local development.
 */
export function createLogger(config: LoggingConfig): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "kobo-metadata-source",
      version: process.env["APP_VERSION"] ?? "dev",
    },
    ...(config.redactSecrets
      ? {
          redact: {
            paths: SECRET_PATHS,
            censor: "[REDACTED]",
          },
        }
      : {}),
  };

  if (config.prettyPrint) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  // stderr keeps stdout free for CLI output.
  return pino(baseOptions, pino.destination(2));
}
