// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import os from "node:os";
import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

/** Paths that should be redacted from log output to avoid leaking secrets. */
const SECRET_PATHS: string[] = [
  "*.password",
  "req.headers.authorization",
];

/**
 * Create a configured pino logger instance.
 *
 * - JSON output (pino default) with ISO timestamps
 * - Secret redaction on sensitive key paths
 * - Base fields: `service`, `version`, `environment` and `hostname`
 * - Optional pretty-print via `pino-pretty` transport for development
 */
export function createLogger(config: LoggingConfig): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "resilient-core",
      version: config.version,
      environment: config.environment,
      hostname: os.hostname(),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
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
          ignore: "pid",
        },
      },
    });
  }

  return pino(baseOptions);
}
