import { nanoid } from 'nanoid';
import { hasGame, type Cache } from '../games/cache';
import type { RemoteGameSource } from '../games/remoteSource';
import type { GameRecordT } from '../games/schemas';
import type { RecordStore } from '../games/store';
import { nullLogger, type Logger } from '../services/logger';
import { AuthError, errorMessage, MalformedRecordError, skipReasonOf, type SkipReason } from '../util/errors';

export type SkippedGame = {
  gameId: string;
  reason: SkipReason;
  message: string;
};

export type SyncReport = {
  syncId: string;
  full: boolean;
  alreadyCached: number;
  newlyFetched: number;
  skipped: SkippedGame[];
};

export type SyncOptions = {
  cache: Cache;
  store: RecordStore;
  source: RemoteGameSource;
  /** How many of the most recent games to look at. Ignored by a full resync. */
  fetchWindow: number;
  /** Walk the whole remote history instead of the recent window. */
  full?: boolean;
  /** Detail requests in flight at once. */
  concurrency?: number;
  signal?: AbortSignal;
  logger?: Logger;
};

export type SyncResult = {
  cache: Cache;
  report: SyncReport;
};

function dedupe(ids: readonly string[]): string[] {
  return Array.from(new Set(ids));
}

/**
 * Brings `cache` up to date with the remote source.
 *
 * Only games missing from the cache are fetched. A failed fetch is reported as
 * skipped and the others carry on; whatever succeeded is persisted in a single
 * append once every attempted fetch has settled. An AuthError (or any error
 * outside the per-game taxonomy) stops new fetches, persists what was already
 * fetched, then propagates.
 */
export async function syncGames(opts: SyncOptions): Promise<SyncResult> {
  const { cache, store, source, signal } = opts;
  const full = opts.full ?? false;
  const concurrency = Math.max(1, Math.floor(opts.concurrency ?? 4));
  const syncId = nanoid(10);
  const log = (opts.logger ?? nullLogger).child({ module: 'Sync', syncId });

  const listed = dedupe(
    full ? await source.listAllGameIds(signal) : (await source.listRecentGameIds(opts.fetchWindow, signal)).slice(0, opts.fetchWindow),
  );
  const missing = listed.filter((id) => !hasGame(cache, id));
  const alreadyCached = listed.length - missing.length;
  log.info({ full, listed: listed.length, missing: missing.length }, '[Sync] Starting');

  const fetched: Array<GameRecordT | null> = new Array(missing.length).fill(null);
  const skipped: Array<SkippedGame | null> = new Array(missing.length).fill(null);
  let fatal: unknown = null;
  let next = 0;

  const skip = (i: number, reason: SkipReason, message: string) => {
    skipped[i] = { gameId: missing[i], reason, message };
    log.warn({ gameId: missing[i], reason }, `[Sync] Skipped game: ${message}`);
  };

  const worker = async () => {
    while (next < missing.length && fatal === null) {
      const i = next++;
      const gameId = missing[i];
      if (signal?.aborted) {
        skip(i, 'aborted', 'sync aborted before fetch');
        continue;
      }
      try {
        const record = await source.fetchGameDetail(gameId, signal);
        if (record.gameId !== gameId) {
          throw new MalformedRecordError(gameId, `source returned game ${record.gameId}`);
        }
        fetched[i] = record;
      } catch (err) {
        if (err instanceof AuthError) {
          fatal ??= err;
          continue;
        }
        if (signal?.aborted) {
          skip(i, 'aborted', errorMessage(err));
          continue;
        }
        const reason = skipReasonOf(err);
        if (reason === null) {
          fatal ??= err;
          continue;
        }
        skip(i, reason, errorMessage(err));
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, missing.length) }, () => worker()));

  const batch = fetched.filter((r): r is GameRecordT => r !== null);
  const nextCache = batch.length > 0 ? await store.appendAndPersist(cache, batch) : cache;

  if (fatal !== null) {
    log.error({ err: fatal, persisted: batch.length }, '[Sync] Aborted by fatal error');
    throw fatal;
  }

  const report: SyncReport = {
    syncId,
    full,
    alreadyCached,
    newlyFetched: batch.length,
    skipped: skipped.filter((s): s is SkippedGame => s !== null),
  };
  log.info(
    { alreadyCached, newlyFetched: report.newlyFetched, skipped: report.skipped.length },
    '[Sync] Finished',
  );
  return { cache: nextCache, report };
}
