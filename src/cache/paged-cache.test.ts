/**
 * paged-cache.test.ts: Incremental cache: contiguous growth, page hits,
 * exhaustion, capacity inference, reset.
 */

import { describe, it, expect } from "vitest";
import { PagedCache } from "./paged-cache.js";
import { InvalidArgumentError, NetworkError } from "../api/errors.js";
import { deferred, fakePhotoPort, makePhotos } from "../testing/fixtures.js";
import type { Photo } from "../api/records.js";

const ids = (photos: readonly Photo[]) => photos.map((p) => p.id);

describe("PagedCache.getPage", () => {
  it("fetches the first page from offset 0", async () => {
    const port = fakePhotoPort(100);
    const cache = new PagedCache(port, { capacity: 100 });

    const page = await cache.getPage(0, 20);

    expect(ids(page)).toEqual(ids(makePhotos(20)));
    expect(port.fetchPage).toHaveBeenCalledWith(0, 20);
    expect(cache.totalLoaded).toBe(20);
    expect(cache.hasMore).toBe(true);
  });

  it("serves previously seen pages without fetching", async () => {
    const port = fakePhotoPort(100);
    const cache = new PagedCache(port, { capacity: 100 });

    await cache.getPage(0, 20);
    await cache.getPage(1, 20);
    const again = await cache.getPage(0, 20);
    await cache.getPage(1, 20);

    expect(again[0]?.id).toBe(1);
    expect(again).toHaveLength(20);
    expect(port.fetchPage).toHaveBeenCalledTimes(2);
    expect(cache.metrics()).toMatchObject({ hits: 2, misses: 2, fetches: 2 });
  });

  it("grows contiguously from the cache length, not from the requested start", async () => {
    const port = fakePhotoPort(100);
    const cache = new PagedCache(port, { capacity: 100 });

    await cache.getPage(0, 10);
    const page = await cache.getPage(4, 10);

    expect(port.fetchPage).toHaveBeenLastCalledWith(10, 10);
    expect(page[0]?.id).toBe(11);
    expect(cache.totalLoaded).toBe(20);
  });

  it("returns a final partial page, then empty pages, for C=45 and p=20", async () => {
    const port = fakePhotoPort(45);
    const cache = new PagedCache(port, { capacity: 45 });

    expect(await cache.getPage(0, 20)).toHaveLength(20);
    expect(cache.hasMore).toBe(true);
    expect(await cache.getPage(1, 20)).toHaveLength(20);
    expect(cache.hasMore).toBe(true);

    const last = await cache.getPage(2, 20);
    expect(ids(last)).toEqual([41, 42, 43, 44, 45]);
    expect(cache.totalLoaded).toBe(45);
    expect(cache.hasMore).toBe(false);

    expect(await cache.getPage(3, 20)).toEqual([]);
    expect(await cache.getPage(4, 20)).toEqual([]);
    expect(port.fetchPage).toHaveBeenCalledTimes(3);
  });

  it("returns empty for the final partial page once the dataset is fully held", async () => {
    const port = fakePhotoPort(45);
    const cache = new PagedCache(port, { capacity: 45 });

    for (let i = 0; i < 3; i++) await cache.getPage(i, 20);

    expect(await cache.getPage(2, 20)).toEqual([]);
    expect(ids(await cache.getPage(1, 20))).toEqual(ids(makePhotos(40)).slice(20));
    expect(port.fetchPage).toHaveBeenCalledTimes(3);
  });

  it("returns empty for a start beyond capacity without fetching", async () => {
    const port = fakePhotoPort(45);
    const cache = new PagedCache(port, { capacity: 45 });

    expect(await cache.getPage(10, 20)).toEqual([]);
    expect(port.fetchPage).not.toHaveBeenCalled();
  });

  it("rejects a zero page size", async () => {
    const port = fakePhotoPort(45);
    const cache = new PagedCache(port, { capacity: 45 });

    await expect(cache.getPage(0, 0)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(cache.getPage(-1, 20)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(cache.getPage(0, 2.5)).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(port.fetchPage).not.toHaveBeenCalled();
  });

  it("keeps the loaded prefix when a fetch fails", async () => {
    const port = fakePhotoPort(100);
    const cache = new PagedCache(port, { capacity: 100 });

    await cache.getPage(0, 20);
    port.fetchPage.mockRejectedValueOnce(new NetworkError("offline"));

    await expect(cache.getPage(1, 20)).rejects.toBeInstanceOf(NetworkError);
    expect(cache.totalLoaded).toBe(20);
    expect(cache.metrics().failures).toBe(1);

    await cache.getPage(1, 20);
    expect(port.fetchPage).toHaveBeenLastCalledWith(20, 20);
    expect(cache.totalLoaded).toBe(40);
  });
});

describe("PagedCache capacity", () => {
  it("pins capacity to the loaded length when the source ends early", async () => {
    const port = fakePhotoPort(30);
    const cache = new PagedCache(port, { capacity: 100 });

    await cache.getPage(0, 20);
    await cache.getPage(1, 20);

    expect(cache.totalLoaded).toBe(30);
    expect(cache.totalCapacity).toBe(30);
    expect(cache.hasMore).toBe(false);
    expect(await cache.getPage(2, 20)).toEqual([]);
    expect(port.fetchPage).toHaveBeenCalledTimes(2);
  });

  it("drops records beyond the declared capacity", async () => {
    const port = fakePhotoPort(100);
    const cache = new PagedCache(port, { capacity: 25 });

    await cache.getPage(0, 20);
    const second = await cache.getPage(1, 20);

    expect(ids(second)).toEqual([21, 22, 23, 24, 25]);
    expect(cache.totalLoaded).toBe(25);
    expect(cache.hasMore).toBe(false);
  });

  it("rejects a negative capacity", () => {
    expect(() => new PagedCache(fakePhotoPort(1), { capacity: -1 })).toThrow(InvalidArgumentError);
  });
});

describe("PagedCache.clearCache", () => {
  it("empties the cache and restores the declared capacity", async () => {
    const port = fakePhotoPort(30);
    const cache = new PagedCache(port, { capacity: 100 });

    await cache.getPage(0, 20);
    await cache.getPage(1, 20);
    cache.clearCache();

    expect(cache.totalLoaded).toBe(0);
    expect(cache.totalCapacity).toBe(100);
    expect(cache.hasMore).toBe(true);

    await cache.getPage(0, 20);
    expect(port.fetchPage).toHaveBeenLastCalledWith(0, 20);
    expect(port.fetchPage).toHaveBeenCalledTimes(3);
  });

  it("does not append a page whose fetch started before the reset", async () => {
    const port = fakePhotoPort(100);
    const pending = deferred<readonly Photo[]>();
    port.fetchPage.mockReturnValueOnce(pending.promise);
    const cache = new PagedCache(port, { capacity: 100 });

    const inflight = cache.getPage(0, 20);
    cache.clearCache();
    pending.resolve(makePhotos(20));

    expect(await inflight).toHaveLength(20);
    expect(cache.totalLoaded).toBe(0);
  });

  it("appends only the first of two overlapping fetches for the same offset", async () => {
    const port = fakePhotoPort(100);
    const cache = new PagedCache(port, { capacity: 100 });

    await Promise.all([cache.getPage(0, 20), cache.getPage(0, 20)]);

    expect(port.fetchPage).toHaveBeenCalledTimes(2);
    expect(cache.totalLoaded).toBe(20);
  });
});
