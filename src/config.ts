/**
 * config.ts: Unified configuration resolution for the data layer.
 *
 * Single source of truth for every tunable. Priority chain:
 *   1. Environment variable
 *   2. Default
 *
 * Rules:
 * - No `process.env` reads outside this file
 * - Config object is fully typed
 * - Unparseable numeric values fall back to the default instead of NaN
 */

// ─── Configuration Interface ────────────────────────────────────

export interface DataLayerConfig {
  // ── System ──────────────────────────────────────────────────
  /** Node environment (production, development, test) */
  nodeEnv: string;
  /** Whether running in test mode */
  isTest: boolean;
  /** Whether running in development mode */
  isDev: boolean;

  // ── Remote source ───────────────────────────────────────────
  /** Base URL of the remote JSON source (no trailing slash) */
  apiBaseUrl: string;
  /** Records per page for the paged list (default: 20) */
  pageSize: number;
  /** Declared total of the paged photo collection (default: 5000) */
  photoCapacity: number;

  // ── Logging ─────────────────────────────────────────────────
  /** Log level (silent, debug, info, warn, error) */
  logLevel: string;
  /** Whether to use pretty-printed logs */
  logPretty: boolean;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_API_BASE_URL = "https://jsonplaceholder.typicode.com";
export const DEFAULT_PAGE_SIZE = 20;
export const DEFAULT_PHOTO_CAPACITY = 5000;

// ─── Resolution Helpers ─────────────────────────────────────────

interface RuntimeMode {
  nodeEnv: string;
  isTest: boolean;
  isDev: boolean;
}

export function resolveMode(env: Env = process.env): RuntimeMode {
  const nodeEnv = env.NODE_ENV || "development";
  const isTest = nodeEnv === "test" || env.VITEST === "true";
  const isDev = nodeEnv !== "production" && !isTest;
  return { nodeEnv, isTest, isDev };
}

/**
 * Resolve log level from environment.
 * Exported separately because the logger initializes at module scope.
 */
export function resolveLogLevel(env: Env = process.env): string {
  if (env.LAZYLIST_LOG_LEVEL) {
    return env.LAZYLIST_LOG_LEVEL;
  }
  const debugEnv = (env.LAZYLIST_DEBUG || "").trim().toLowerCase();
  if (debugEnv && debugEnv !== "false" && debugEnv !== "0") {
    return "debug";
  }
  const { isTest, isDev } = resolveMode(env);
  if (isTest) return "silent";
  if (isDev) return "debug";
  return "info";
}

/** Resolve whether to pretty-print logs. */
export function resolveLogPretty(env: Env = process.env): boolean {
  const { isTest, isDev } = resolveMode(env);
  if (isTest) return false;
  return (
    env.LAZYLIST_LOG_PRETTY === "true" ||
    (env.LAZYLIST_LOG_PRETTY !== "false" && isDev)
  );
}

/** Parse a positive integer, falling back when absent or malformed. */
function positiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const value = Number(raw.trim());
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

// ─── Main Resolution Function ───────────────────────────────────

/**
 * Resolve the complete data-layer configuration.
 *
 * @param env - Environment map (defaults to `process.env`)
 */
export function resolveConfig(env: Env = process.env): DataLayerConfig {
  const mode = resolveMode(env);
  return {
    ...mode,
    apiBaseUrl: trimTrailingSlash(env.LAZYLIST_API_BASE_URL || DEFAULT_API_BASE_URL),
    pageSize: positiveInt(env.LAZYLIST_PAGE_SIZE, DEFAULT_PAGE_SIZE),
    photoCapacity: positiveInt(env.LAZYLIST_PHOTO_CAPACITY, DEFAULT_PHOTO_CAPACITY),
    logLevel: resolveLogLevel(env),
    logPretty: resolveLogPretty(env),
  };
}
