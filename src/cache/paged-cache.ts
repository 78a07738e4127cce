/**
 * paged-cache.ts: Incremental cache for datasets fetched page by page.
 *
 * The cache only ever grows contiguously from offset 0: a miss always
 * fetches the next `pageSize` records after what is already held, whatever
 * page index was asked for. Re-requesting a page that is fully cached
 * (re-render, back-navigation) costs no fetch. Once the whole capacity is
 * held, any page not fully cached comes back empty.
 *
 *   hasMore ⇔ totalLoaded < capacity
 *
 * Capacity starts at the declared total. The source is trusted only up to
 * that total: records past it are dropped, and a short page pins the
 * capacity to what was actually loaded. clearCache() restores the declared
 * total.
 */

import type { KeyedRecord } from "../api/records.js";
import { assertInteger } from "../api/errors.js";
import { createCacheMetrics, type CacheMetrics } from "./cache-metrics.js";
import { log } from "../logger.js";

// ─── Ports ──────────────────────────────────────────────────

/**
 * Remote source for a paged dataset. Returns fewer than `limit` records only
 * at the end of the collection. Fails with FetchError subclasses.
 */
export interface PagedFetchPort<R extends KeyedRecord> {
  fetchPage(start: number, limit: number): Promise<readonly R[]>;
}

/** What a paged view model depends on. */
export interface PagedDataSource<R extends KeyedRecord> {
  getPage(pageIndex: number, pageSize: number): Promise<readonly R[]>;
  readonly hasMore: boolean;
  readonly totalLoaded: number;
  clearCache(): void;
}

export interface PagedCacheOptions {
  /** Declared total number of records at the source. */
  capacity: number;
  /** Dataset label used in log lines. */
  name?: string;
}

// ─── Cache ──────────────────────────────────────────────────

export class PagedCache<R extends KeyedRecord> implements PagedDataSource<R> {
  private readonly records: R[] = [];
  private readonly declaredCapacity: number;
  private capacity: number;
  private epoch = 0;
  private readonly stats = createCacheMetrics();
  private readonly name: string;

  constructor(
    private readonly port: PagedFetchPort<R>,
    opts: PagedCacheOptions,
  ) {
    assertInteger("capacity", opts.capacity, 0);
    this.declaredCapacity = opts.capacity;
    this.capacity = opts.capacity;
    this.name = opts.name ?? "paged";
  }

  get hasMore(): boolean {
    return this.records.length < this.capacity;
  }

  get totalLoaded(): number {
    return this.records.length;
  }

  /** Current capacity bound (may be below the declared total after a short page). */
  get totalCapacity(): number {
    return this.capacity;
  }

  async getPage(pageIndex: number, pageSize: number): Promise<readonly R[]> {
    assertInteger("pageSize", pageSize, 1);
    assertInteger("pageIndex", pageIndex, 0);

    const start = pageIndex * pageSize;
    const end = start + pageSize;

    if (this.records.length >= end) {
      this.stats.recordHit();
      log.cache.debug({ dataset: this.name, pageIndex, pageSize }, "getPage:hit");
      return this.records.slice(start, end);
    }

    // Exhausted, or asking past the end: nothing left to hand out
    if (!this.hasMore || start >= this.capacity) {
      log.cache.debug({ dataset: this.name, pageIndex, pageSize }, "getPage:exhausted");
      return [];
    }

    this.stats.recordMiss();
    return this.fetchNext(pageSize);
  }

  clearCache(): void {
    this.epoch++;
    this.records.length = 0;
    this.capacity = this.declaredCapacity;
    log.cache.debug({ dataset: this.name }, "clearCache");
  }

  metrics(): CacheMetrics {
    return this.stats.snapshot();
  }

  // ─── Internals ────────────────────────────────────────────

  /** Fetch `pageSize` records at the current end of the cache and append them. */
  private async fetchNext(pageSize: number): Promise<readonly R[]> {
    const offset = this.records.length;
    const epoch = this.epoch;
    this.stats.recordFetch();

    let fetched: readonly R[];
    try {
      fetched = await this.port.fetchPage(offset, pageSize);
    } catch (err) {
      this.stats.recordFailure();
      log.cache.warn({ dataset: this.name, offset, pageSize, err }, "getPage:fetch-failed");
      throw err;
    }

    // The source may not answer more than asked, nor past the capacity
    const room = Math.max(0, Math.min(pageSize, this.capacity - offset));
    const page = fetched.slice(0, room);

    if (epoch !== this.epoch || offset !== this.records.length) {
      // Cleared, or another page landed first: appending would break contiguity
      log.cache.debug({ dataset: this.name, offset }, "getPage:discarded");
      return page;
    }

    this.records.push(...page);
    if (fetched.length < pageSize && this.records.length < this.capacity) {
      log.cache.info(
        { dataset: this.name, declared: this.declaredCapacity, loaded: this.records.length },
        "getPage:source-ended-early",
      );
      this.capacity = this.records.length;
    }
    log.cache.debug({ dataset: this.name, offset, received: page.length }, "getPage:appended");
    return page;
  }
}
