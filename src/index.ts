/**
 * lazylist-data: bounded and paged in-memory caches behind observable
 * view state machines.
 *
 * Usage:
 *   import { createDataLayer } from "lazylist-data";
 *   const data = createDataLayer();
 *   const photos = data.photoList();
 *   photos.subscribe((state) => render(state, photos.records));
 *   await photos.loadInitial();
 */

import { resolveConfig, type DataLayerConfig } from "./config.js";
import { createPlaceholderApi, type PlaceholderApi } from "./api/placeholder-api.js";
import type { Photo, User } from "./api/records.js";
import { BoundedCache } from "./cache/bounded-cache.js";
import { PagedCache } from "./cache/paged-cache.js";
import { DetailViewModel } from "./view/detail-view-model.js";
import { createUserListViewModel, type ListViewModel } from "./view/list-view-model.js";
import { PagedListViewModel } from "./view/paged-list-view-model.js";
import { log } from "./logger.js";

export * from "./api/index.js";
export * from "./cache/index.js";
export * from "./view/index.js";
export { resolveConfig } from "./config.js";
export type { DataLayerConfig, Env } from "./config.js";
export { log, rootLogger } from "./logger.js";

export interface DataLayer {
  config: DataLayerConfig;
  users: BoundedCache<User>;
  userList(): ListViewModel<User>;
  userDetail(): DetailViewModel<User>;
  photoList(): PagedListViewModel<Photo>;
}

/**
 * Wire the shared user cache and hand out view models over it. Each photo
 * list gets a paged cache of its own, since a paged cache tracks a single
 * scroll position. Pass `api` to substitute the HTTP ports (tests,
 * fixtures, other sources).
 */
export function createDataLayer(
  config: DataLayerConfig = resolveConfig(),
  api: PlaceholderApi = createPlaceholderApi({ baseUrl: config.apiBaseUrl }),
): DataLayer {
  const users = new BoundedCache<User>(api.users, { name: "users" });

  log.root.debug(
    { baseUrl: config.apiBaseUrl, pageSize: config.pageSize, photoCapacity: config.photoCapacity },
    "data layer ready",
  );

  return {
    config,
    users,
    userList: () => createUserListViewModel(users),
    userDetail: () => new DetailViewModel<User>(users),
    photoList: () =>
      new PagedListViewModel<Photo>({
        source: new PagedCache<Photo>(api.photos, { capacity: config.photoCapacity, name: "photos" }),
        pageSize: config.pageSize,
      }),
  };
}
