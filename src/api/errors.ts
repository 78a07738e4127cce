/**
 * errors.ts: Error taxonomy for the data layer.
 *
 *   InvalidArgumentError  caller misuse (e.g. zero page size), never retried
 *   NotFoundError         requested key absent at the source
 *   NetworkError          transport failed before a response arrived
 *   ServerError           the source answered with a failure or an unreadable body
 *
 * Facades let these propagate; view models turn them into an error state
 * with the text from describeError().
 */

export const ErrorCode = {
  INVALID_ARGUMENT: "INVALID_ARGUMENT",
  NOT_FOUND: "NOT_FOUND",
  NETWORK_ERROR: "NETWORK_ERROR",
  SERVER_ERROR: "SERVER_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ─── Base ───────────────────────────────────────────────────

export abstract class DataAccessError extends Error {
  abstract readonly code: ErrorCodeValue;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/** Failure reported by a Fetch Port. */
export abstract class FetchError extends DataAccessError {}

// ─── Concrete Errors ────────────────────────────────────────

export class NetworkError extends FetchError {
  readonly code = ErrorCode.NETWORK_ERROR;

  constructor(message = "Network unavailable", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ServerError extends FetchError {
  readonly code = ErrorCode.SERVER_ERROR;
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class NotFoundError extends FetchError {
  readonly code = ErrorCode.NOT_FOUND;
  readonly key?: number;

  constructor(message: string, key?: number) {
    super(message);
    this.key = key;
  }
}

export class InvalidArgumentError extends DataAccessError {
  readonly code = ErrorCode.INVALID_ARGUMENT;

  constructor(message: string) {
    super(message);
  }
}

// ─── Guards ─────────────────────────────────────────────────

export function isFetchError(err: unknown): err is FetchError {
  return err instanceof FetchError;
}

/** Throw InvalidArgumentError unless `value` is an integer ≥ `min`. */
export function assertInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidArgumentError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}

// ─── Presentation ───────────────────────────────────────────

/** Human-readable text for an error state. Never throws. */
export function describeError(err: unknown): string {
  if (err instanceof NetworkError) return `Network error: ${err.message}`;
  if (err instanceof ServerError) {
    return err.status !== undefined
      ? `Server error (${err.status}): ${err.message}`
      : `Server error: ${err.message}`;
  }
  if (err instanceof NotFoundError) return err.message;
  if (err instanceof InvalidArgumentError) return `Invalid argument: ${err.message}`;
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string" && err.length > 0) return err;
  return "Unknown error";
}
