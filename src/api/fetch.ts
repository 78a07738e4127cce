/**
 * apiFetch: Typed fetch wrapper for the remote JSON source.
 *
 * - GET by default, JSON accept header on every request
 * - Body validated against a zod schema, never cast
 * - Transport failure        → NetworkError
 * - 404                      → NotFoundError
 * - 5xx                      → ServerError with a sanitized message
 * - Other non-2xx            → ServerError carrying the status
 * - Unreadable/invalid body  → ServerError("Malformed response")
 */

import type { ZodTypeAny, output } from "zod";
import { NetworkError, NotFoundError, ServerError } from "./errors.js";
import { log } from "../logger.js";

// ─── Helpers ────────────────────────────────────────────────

/** Accepted filter value types for query-string construction. */
type QsValue = string | number | boolean | undefined | null;

/** Build a query string from a filter object, omitting undefined/null/empty values. */
export function qs(params: { [key: string]: QsValue }): string {
  const sp = new URLSearchParams();
  for (const [k, v] of Object.entries(params)) {
    if (v != null && v !== "") sp.set(k, String(v));
  }
  const s = sp.toString();
  return s ? `?${s}` : "";
}

/** URI-encode a path segment. */
export function pathEncode(value: string | number): string {
  return encodeURIComponent(String(value));
}

// ─── Core Fetch ─────────────────────────────────────────────

const DEFAULT_HEADERS: Record<string, string> = {
  Accept: "application/json",
};

export interface ApiFetchOptions {
  /** Extra request options; headers are merged over the defaults. */
  init?: RequestInit;
  /** Message for a 404, e.g. "User 7 not found". */
  notFoundMessage?: string;
  /** Key reported on the NotFoundError for a 404. */
  key?: number;
}

/**
 * Fetch `url` and validate the JSON body against `schema`.
 *
 * @throws NetworkError | NotFoundError | ServerError
 */
export async function apiFetch<S extends ZodTypeAny>(
  url: string,
  schema: S,
  opts: ApiFetchOptions = {},
): Promise<output<S>> {
  const headers = new Headers(DEFAULT_HEADERS);
  new Headers(opts.init?.headers).forEach((value, name) => headers.set(name, value));

  let res: Response;
  try {
    res = await fetch(url, { ...opts.init, headers });
  } catch (err) {
    log.api.warn({ url, err }, "fetch:transport-failure");
    const detail = err instanceof Error ? err.message : String(err);
    throw new NetworkError(detail || "Network unavailable", { cause: err });
  }

  if (!res.ok) {
    log.api.warn({ url, status: res.status }, "fetch:http-failure");
    if (res.status === 404) {
      throw new NotFoundError(opts.notFoundMessage ?? "Resource not found", opts.key);
    }
    if (res.status >= 500) {
      throw new ServerError("Server error, please try again", res.status);
    }
    throw new ServerError(res.statusText || "Request failed", res.status);
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    throw new ServerError("Malformed response", res.status, { cause: err });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    log.api.warn({ url, issues: parsed.error.issues.length }, "fetch:schema-mismatch");
    throw new ServerError("Malformed response", res.status, { cause: parsed.error });
  }
  log.api.debug({ url, status: res.status }, "fetch:ok");
  return parsed.data;
}
