/**
 * cache/index.ts: Barrel export for the cache layer.
 */

export { BoundedCache } from "./bounded-cache.js";
export type { BoundedCacheOptions, BoundedDataSource, BoundedFetchPort } from "./bounded-cache.js";

export { PagedCache } from "./paged-cache.js";
export type { PagedCacheOptions, PagedDataSource, PagedFetchPort } from "./paged-cache.js";

export { createCacheMetrics } from "./cache-metrics.js";
export type { CacheMetrics, CacheMetricsRecorder } from "./cache-metrics.js";
