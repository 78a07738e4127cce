/**
 * Shared test fixtures: in-process stand-ins for the Fetch Ports.
 */

import { vi } from "vitest";
import type { Photo, User } from "../api/records.js";
import { NotFoundError } from "../api/errors.js";

export const JOHN: User = { id: 1, name: "John Doe", email: "john@example.com" };
export const JANE: User = { id: 2, name: "Jane Smith", email: "jane@example.com" };
export const BOB: User = { id: 3, name: "Bob Johnson", email: "bob@example.com", phone: "555-0100" };

export function makePhoto(id: number): Photo {
  return {
    albumId: Math.floor((id - 1) / 50) + 1,
    id,
    title: `photo ${id}`,
    url: `https://img.test/${id}.png`,
    thumbnailUrl: `https://img.test/${id}-thumb.png`,
  };
}

/** Records 1..count, in key order. */
export function makePhotos(count: number): Photo[] {
  return Array.from({ length: count }, (_, i) => makePhoto(i + 1));
}

/** Paged port over `total` photos; answers like a real offset/limit endpoint. */
export function fakePhotoPort(total: number) {
  const all = makePhotos(total);
  return {
    fetchPage: vi.fn(async (start: number, limit: number): Promise<readonly Photo[]> =>
      all.slice(start, start + limit),
    ),
  };
}

/** Bounded port over a fixed user list. */
export function fakeUserPort(users: readonly User[] = [JOHN, JANE]) {
  return {
    fetchAll: vi.fn(async (): Promise<readonly User[]> => users),
    fetchByKey: vi.fn(async (key: number): Promise<User> => {
      const found = users.find((u) => u.id === key);
      if (found === undefined) throw new NotFoundError(`User ${key} not found`, key);
      return found;
    }),
  };
}

/** A promise whose settlement the test controls. */
export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
