/**
 * cache-metrics.ts: Performance counters for one cache instance.
 *
 * Each cache owns its own counters; nothing is shared between instances.
 */

export interface CacheMetrics {
  hits: number;
  misses: number;
  /** Fetch Port calls issued (successful or not). */
  fetches: number;
  /** Fetch Port calls that failed. */
  failures: number;
  total: number;
  hitRate: number;        // 0.0–1.0
}

export interface CacheMetricsRecorder {
  recordHit(): void;
  recordMiss(): void;
  recordFetch(): void;
  recordFailure(): void;
  snapshot(): CacheMetrics;
  reset(): void;
}

export function createCacheMetrics(): CacheMetricsRecorder {
  let hits = 0;
  let misses = 0;
  let fetches = 0;
  let failures = 0;

  return {
    recordHit() {
      hits++;
    },
    recordMiss() {
      misses++;
    },
    recordFetch() {
      fetches++;
    },
    recordFailure() {
      failures++;
    },
    snapshot() {
      const total = hits + misses;
      return {
        hits,
        misses,
        fetches,
        failures,
        total,
        hitRate: total > 0 ? hits / total : 0,
      };
    },
    reset() {
      hits = 0;
      misses = 0;
      fetches = 0;
      failures = 0;
    },
  };
}
