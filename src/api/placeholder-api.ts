/**
 * HTTP Fetch Ports for a JSONPlaceholder-style source.
 *
 *   users   GET {base}/users, GET {base}/users/{id}
 *   photos  GET {base}/photos?_start={start}&_limit={limit}
 */

import type { BoundedFetchPort } from "../cache/bounded-cache.js";
import type { PagedFetchPort } from "../cache/paged-cache.js";
import { apiFetch, pathEncode, qs } from "./fetch.js";
import { PhotoListSchema, UserListSchema, UserSchema, type Photo, type User } from "./records.js";

export interface PlaceholderApi {
  users: BoundedFetchPort<User>;
  photos: PagedFetchPort<Photo>;
}

export interface PlaceholderApiOptions {
  /** Base URL without trailing slash. */
  baseUrl: string;
  /** Extra request options applied to every call. */
  init?: RequestInit;
}

export function createPlaceholderApi(opts: PlaceholderApiOptions): PlaceholderApi {
  const { baseUrl, init } = opts;

  return {
    users: {
      fetchAll: () => apiFetch(`${baseUrl}/users`, UserListSchema, { init }),
      fetchByKey: (id) =>
        apiFetch(`${baseUrl}/users/${pathEncode(id)}`, UserSchema, {
          init,
          key: id,
          notFoundMessage: `User ${id} not found`,
        }),
    },
    photos: {
      fetchPage: (start, limit) =>
        apiFetch(`${baseUrl}/photos${qs({ _start: start, _limit: limit })}`, PhotoListSchema, { init }),
    },
  };
}
