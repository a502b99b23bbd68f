import type { GameRecordT } from './schemas';

/**
 * Where game history comes from. Implementations bound every call with their
 * own timeout and report failures through the errors in util/errors:
 * NotFoundError, RemoteTimeoutError, MalformedRecordError, RemoteSourceError
 * for a single game, AuthError when the session is no longer valid.
 */
export interface RemoteGameSource {
  /** Up to `limit` game IDs, newest first. May return fewer. */
  listRecentGameIds(limit: number, signal?: AbortSignal): Promise<string[]>;
  /** Every game ID the source still knows about, newest first. */
  listAllGameIds(signal?: AbortSignal): Promise<string[]>;
  fetchGameDetail(gameId: string, signal?: AbortSignal): Promise<GameRecordT>;
}
