/**
 * logger.ts — Shared pino logger for all backend modules
 *
 * A single pino instance is created at startup and exported here.
 * Every module should import `logger` and call `.child({ module: "<name>" })`
 * to create a scoped logger that includes the module name in every entry.
 *
 * Log level:
 *   • WCL_LOG_LEVEL env var — overrides everything (e.g. "debug", "trace")
 *   • NODE_ENV === "production" → "info"    (NDJSON, no pretty-print)
 *   • NODE_ENV === "test"       → "silent"  (no transport worker)
 *   • otherwise                → "debug"   (pino-pretty, colorised)
 */

import pino from "pino";

const isProd = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";

export const logLevel =
  process.env.WCL_LOG_LEVEL ?? (isProd ? "info" : isTest ? "silent" : "debug");

/** True when log output should go through the pino-pretty transport. */
export const prettyLogs = !isProd && !isTest;

export const logger = pino(
  prettyLogs
    ? {
        level: logLevel,
        transport: {
          target:  "pino-pretty",
          options: { colorize: true },
        },
      }
    : { level: logLevel }
);
