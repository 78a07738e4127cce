/**
 * bounded-cache.ts: Load-everything-once cache for small datasets.
 *
 * Strategy:
 *   getAll    HIT  → cached collection, no fetch
 *             MISS → fetchAll(), store, return (failure resets to absent)
 *   getByKey  key index → cached collection scan → fetchByKey()
 *             first tier that answers is memoized in the key index
 *   invalidate       → drop collection + key index, no fetch
 *
 * No single-flight: concurrent misses each hit the Fetch Port. A fetch that
 * started before invalidate() still resolves for its caller, but its result
 * is not written back (epoch check).
 */

import type { KeyedRecord } from "../api/records.js";
import { InvalidArgumentError } from "../api/errors.js";
import { createCacheMetrics, type CacheMetrics } from "./cache-metrics.js";
import { log } from "../logger.js";

// ─── Ports ──────────────────────────────────────────────────

/** Remote source for a bounded dataset. Fails with FetchError subclasses. */
export interface BoundedFetchPort<R extends KeyedRecord> {
  fetchAll(): Promise<readonly R[]>;
  /** Rejects with NotFoundError when the source has no such key. */
  fetchByKey(key: number): Promise<R>;
}

/** What a bounded view model depends on. */
export interface BoundedDataSource<R extends KeyedRecord> {
  getAll(): Promise<readonly R[]>;
  getByKey(key: number): Promise<R>;
  invalidate(): void;
}

export interface BoundedCacheOptions {
  /** Dataset label used in log lines. */
  name?: string;
}

// ─── Cache ──────────────────────────────────────────────────

export class BoundedCache<R extends KeyedRecord> implements BoundedDataSource<R> {
  private collection: readonly R[] | undefined;
  private readonly byKey = new Map<number, R>();
  private epoch = 0;
  private readonly stats = createCacheMetrics();
  private readonly name: string;

  constructor(
    private readonly port: BoundedFetchPort<R>,
    opts: BoundedCacheOptions = {},
  ) {
    this.name = opts.name ?? "bounded";
  }

  /** Whether the full collection is currently held. */
  get isPopulated(): boolean {
    return this.collection !== undefined;
  }

  async getAll(): Promise<readonly R[]> {
    if (this.collection !== undefined) {
      this.stats.recordHit();
      log.cache.debug({ dataset: this.name, size: this.collection.length }, "getAll:hit");
      return this.collection;
    }

    this.stats.recordMiss();
    this.stats.recordFetch();
    const epoch = this.epoch;

    let fetched: readonly R[];
    try {
      fetched = await this.port.fetchAll();
    } catch (err) {
      this.stats.recordFailure();
      // Never serve a partial or stale collection after a failed full fetch
      if (epoch === this.epoch) this.collection = undefined;
      log.cache.warn({ dataset: this.name, err }, "getAll:fetch-failed");
      throw err;
    }

    const records = Object.freeze([...fetched]);
    if (epoch === this.epoch) {
      this.collection = records;
      log.cache.debug({ dataset: this.name, size: records.length }, "getAll:stored");
    } else {
      log.cache.debug({ dataset: this.name }, "getAll:discarded-after-invalidate");
    }
    return records;
  }

  async getByKey(key: number): Promise<R> {
    if (!Number.isSafeInteger(key)) {
      throw new InvalidArgumentError(`key must be an integer, got ${key}`);
    }

    const memo = this.byKey.get(key);
    if (memo !== undefined) {
      this.stats.recordHit();
      return memo;
    }

    const listed = this.collection?.find((r) => r.id === key);
    if (listed !== undefined) {
      this.stats.recordHit();
      this.byKey.set(key, listed);
      return listed;
    }

    this.stats.recordMiss();
    this.stats.recordFetch();
    const epoch = this.epoch;

    let record: R;
    try {
      record = await this.port.fetchByKey(key);
    } catch (err) {
      this.stats.recordFailure();
      log.cache.debug({ dataset: this.name, key, err }, "getByKey:fetch-failed");
      throw err;
    }

    if (epoch === this.epoch) this.byKey.set(key, record);
    return record;
  }

  invalidate(): void {
    this.epoch++;
    this.collection = undefined;
    this.byKey.clear();
    log.cache.debug({ dataset: this.name }, "invalidate");
  }

  metrics(): CacheMetrics {
    return this.stats.snapshot();
  }
}
