/**
 * API barrel: errors, the typed fetch wrapper, record schemas and the
 * HTTP Fetch Ports.
 */

export {
  DataAccessError,
  ErrorCode,
  FetchError,
  InvalidArgumentError,
  NetworkError,
  NotFoundError,
  ServerError,
  assertInteger,
  describeError,
  isFetchError,
} from "./errors.js";
export type { ErrorCodeValue } from "./errors.js";
export { apiFetch, pathEncode, qs } from "./fetch.js";
export type { ApiFetchOptions } from "./fetch.js";
export {
  PhotoListSchema,
  PhotoSchema,
  UserListSchema,
  UserSchema,
  sameRecord,
  withChanges,
} from "./records.js";
export type { KeyedRecord, Photo, User } from "./records.js";
export { createPlaceholderApi } from "./placeholder-api.js";
export type { PlaceholderApi, PlaceholderApiOptions } from "./placeholder-api.js";
