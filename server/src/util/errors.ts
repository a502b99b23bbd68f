/**
 * Error taxonomy shared by the store, the sync engine and the derivation pipeline.
 *
 * Store-level and auth-level errors propagate to the caller. Per-record errors
 * (not found, timeout, malformed, remote failure) are contained and reported.
 */

export type ErrorCode =
  | 'E_STORE_CORRUPT'
  | 'E_DUPLICATE_KEY'
  | 'E_AUTH'
  | 'E_NOT_FOUND'
  | 'E_TIMEOUT'
  | 'E_REMOTE'
  | 'E_MALFORMED';

export class LedgerError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerError';
    this.code = code;
  }
}

/** The durable file exists but cannot be read back as a game collection. */
export class StoreCorruptError extends LedgerError {
  public readonly file: string;

  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super('E_STORE_CORRUPT', `${file}: ${message}`, options);
    this.name = 'StoreCorruptError';
    this.file = file;
  }
}

export class DuplicateKeyError extends LedgerError {
  public readonly gameId: string;

  constructor(gameId: string) {
    super('E_DUPLICATE_KEY', `Game ${gameId} is already stored`);
    this.name = 'DuplicateKeyError';
    this.gameId = gameId;
  }
}

export class AuthError extends LedgerError {
  constructor(message = 'Session token rejected by the game server') {
    super('E_AUTH', message);
    this.name = 'AuthError';
  }
}

export class NotFoundError extends LedgerError {
  public readonly gameId: string;

  constructor(gameId: string) {
    super('E_NOT_FOUND', `Game ${gameId} no longer resolves`);
    this.name = 'NotFoundError';
    this.gameId = gameId;
  }
}

export class RemoteTimeoutError extends LedgerError {
  constructor(url: string, timeoutMs: number) {
    super('E_TIMEOUT', `Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'RemoteTimeoutError';
  }
}

export class RemoteSourceError extends LedgerError {
  public readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('E_REMOTE', message, options);
    this.name = 'RemoteSourceError';
    this.status = status;
  }
}

export class MalformedRecordError extends LedgerError {
  public readonly gameId: string | null;

  constructor(gameId: string | null, message: string) {
    super('E_MALFORMED', gameId ? `Game ${gameId}: ${message}` : message);
    this.name = 'MalformedRecordError';
    this.gameId = gameId;
  }
}

export type SkipReason = 'not_found' | 'timeout' | 'malformed' | 'remote_error' | 'aborted';

/**
 * Reason under which a failed fetch is reported, or null when the error must
 * propagate instead of being skipped.
 */
export function skipReasonOf(err: unknown): SkipReason | null {
  if (err instanceof NotFoundError) return 'not_found';
  if (err instanceof RemoteTimeoutError) return 'timeout';
  if (err instanceof MalformedRecordError) return 'malformed';
  if (err instanceof RemoteSourceError) return 'remote_error';
  return null;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
