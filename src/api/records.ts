/**
 * Record shapes served by the remote source.
 *
 * Every record carries a unique integer `id` (its key); the other fields are
 * payload the caches pass through untouched. Parsed records are frozen so no
 * layer can mutate them in place; updates produce a new value.
 */

import { z } from "zod";

/** Minimum contract the caches rely on. */
export interface KeyedRecord {
  readonly id: number;
}

// ─── Schemas ────────────────────────────────────────────────

export const UserSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    email: z.string(),
    phone: z.string().optional(),
  })
  .transform((user) => Object.freeze(user));

export const PhotoSchema = z
  .object({
    albumId: z.number().int(),
    id: z.number().int(),
    title: z.string(),
    url: z.string(),
    thumbnailUrl: z.string(),
  })
  .transform((photo) => Object.freeze(photo));

export const UserListSchema = z.array(UserSchema);
export const PhotoListSchema = z.array(PhotoSchema);

export type User = z.output<typeof UserSchema>;
export type Photo = z.output<typeof PhotoSchema>;

// ─── Helpers ────────────────────────────────────────────────

/** Structural equality over own enumerable fields. */
export function sameRecord<R extends KeyedRecord>(a: R, b: R): boolean {
  if (a === b) return true;
  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every((k) => Object.is(Reflect.get(a, k), Reflect.get(b, k)));
}

/** Return a new record with `patch` applied; the original is untouched. */
export function withChanges<R extends KeyedRecord>(record: R, patch: Partial<R>): Readonly<R> {
  return Object.freeze({ ...record, ...patch });
}
