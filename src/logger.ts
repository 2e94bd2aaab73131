/**
 * logger.ts — Shared pino logger for every pipeline module
 *
 * Modules take `logger.child({ module: "<name>" })` so each entry carries
 * the stage it came from.
 *
 * Logs go to stderr; stdout is reserved for the progress report.
 *
 * Log level:
 *   • GOG_DOSBOX_LOG_LEVEL env var — overrides everything (e.g. "debug", "trace")
 *   • NODE_ENV === "test"       → "silent"
 *   • otherwise                 → "warn"
 *
 * Format:
 *   • NODE_ENV === "production" → NDJSON
 *   • otherwise                 → pino-pretty, colorised
 */

import pino from "pino";

const isProd = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";
const level  = process.env.GOG_DOSBOX_LOG_LEVEL ?? (isTest ? "silent" : "warn");

export const logger =
  isProd || isTest
    ? pino({ level }, pino.destination(2))
    : pino({
        level,
        transport: {
          target:  "pino-pretty",
          options: { colorize: true, destination: 2 },
        },
      });
