/**
 * logger.ts: Structured logging for the data layer.
 *
 * Built on pino.
 *
 * Configuration (see config.ts):
 *   LAZYLIST_LOG_LEVEL : Minimum log level (default: "info", dev: "debug", test: "silent")
 *   LAZYLIST_LOG_PRETTY: Force pretty-print (auto-detected from NODE_ENV)
 *   LAZYLIST_DEBUG     : "true" sets level to "debug"
 *
 * Usage:
 *   import { log } from "./logger.js";
 *   log.cache.debug({ key: 7 }, "bounded:getByKey hit");
 *   log.api.warn({ err }, "request failed");
 *
 * Subsystem loggers:
 *   log.cache, log.api, log.view, log.root
 */

import pino from "pino";
import type { Logger } from "pino";
import { resolveLogLevel, resolveLogPretty } from "./config.js";

// ─── Configuration ──────────────────────────────────────────────

/** Build pino transport configuration */
function resolveTransport(): pino.TransportSingleOptions | undefined {
  if (!resolveLogPretty()) return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname",
    },
  };
}

// ─── Root Logger ────────────────────────────────────────────────

const transport = resolveTransport();

export const rootLogger: Logger = pino({
  level: resolveLogLevel(),
  ...(transport ? { transport } : {}),
  base: { service: "lazylist-data" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

// ─── Subsystem Child Loggers ────────────────────────────────────

/**
 * Subsystem loggers: each adds a `subsystem` field to every log line.
 *
 * Usage: log.cache.info("cache cleared")
 *   → { level: 30, subsystem: "cache", msg: "cache cleared", ... }
 */
export const log = {
  /** Bounded and paged caches */
  cache: rootLogger.child({ subsystem: "cache" }),
  /** HTTP Fetch Port */
  api: rootLogger.child({ subsystem: "api" }),
  /** View state machines */
  view: rootLogger.child({ subsystem: "view" }),
  /** Root logger (for one-off use) */
  root: rootLogger,
};

export type { Logger };
