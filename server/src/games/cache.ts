import { DuplicateKeyError } from '../util/errors';
import type { StoredGameT } from './schemas';

/**
 * Immutable snapshot of every known game for one account.
 * Records keep the order they were stored in.
 */
export type Cache = {
  readonly records: readonly StoredGameT[];
  readonly ids: ReadonlySet<string>;
};

export const EMPTY_CACHE: Cache = Object.freeze({ records: Object.freeze([]), ids: new Set<string>() });

export function hasGame(cache: Cache, gameId: string): boolean {
  return cache.ids.has(gameId);
}

/**
 * Returns a new snapshot with `records` appended. The input snapshot is left untouched.
 * Throws DuplicateKeyError when a game ID is already present or repeated in the batch.
 */
export function appendRecords(cache: Cache, records: readonly StoredGameT[]): Cache {
  if (records.length === 0) return cache;
  const ids = new Set(cache.ids);
  for (const r of records) {
    if (ids.has(r.gameId)) throw new DuplicateKeyError(r.gameId);
    ids.add(r.gameId);
  }
  return Object.freeze({ records: Object.freeze([...cache.records, ...records]), ids });
}

export function cacheFrom(records: readonly StoredGameT[]): Cache {
  return appendRecords(EMPTY_CACHE, records);
}
