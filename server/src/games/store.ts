import { promises as fs } from 'fs';
import * as path from 'path';
import { nanoid } from 'nanoid';
import { DuplicateKeyError, StoreCorruptError } from '../util/errors';
import { nullLogger, type Logger } from '../services/logger';
import { appendRecords, cacheFrom, EMPTY_CACHE, type Cache } from './cache';
import { StoredGame, type StoredGameT } from './schemas';

export interface RecordStore {
  /** Reads every stored game. Throws StoreCorruptError when the file exists but cannot be read back. */
  load(): Promise<Cache>;
  /**
   * Appends `records` to `cache` and durably writes the whole collection.
   * Resolves with the new snapshot; `cache` itself is not modified.
   */
  appendAndPersist(cache: Cache, records: readonly StoredGameT[]): Promise<Cache>;
}

const USER_ID = /^[A-Za-z0-9_-]{1,64}$/;

export function isValidUserId(userId: string): boolean {
  return USER_ID.test(userId);
}

export function recordsPath(dataDir: string, userId: string): string {
  if (!isValidUserId(userId)) throw new Error(`Invalid user id: ${userId}`);
  return path.join(path.resolve(dataDir), userId, 'games.json');
}

function isMissingFile(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) return false;
  return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}

/**
 * Stores the games of one account as a JSON array.
 * Writes go to a temporary sibling that is renamed over the target, so a crash
 * leaves either the previous file or the complete new one.
 */
export class FileRecordStore implements RecordStore {
  private readonly log: Logger;

  constructor(
    public readonly file: string,
    logger: Logger = nullLogger,
  ) {
    this.log = logger.child({ module: 'RecordStore' });
  }

  async load(): Promise<Cache> {
    let raw: string;
    try {
      raw = await fs.readFile(this.file, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        this.log.debug({ file: this.file }, '[RecordStore] No store yet, starting empty');
        return EMPTY_CACHE;
      }
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new StoreCorruptError(this.file, 'not valid JSON', { cause: err });
    }
    if (!Array.isArray(data)) throw new StoreCorruptError(this.file, 'expected an array of games');

    const records: StoredGameT[] = [];
    for (const [i, item] of data.entries()) {
      const parsed = StoredGame.safeParse(item);
      if (!parsed.success) {
        throw new StoreCorruptError(this.file, `entry ${i} has no usable gameId`, { cause: parsed.error });
      }
      records.push(parsed.data);
    }

    try {
      const cache = cacheFrom(records);
      this.log.info({ file: this.file, games: cache.records.length }, '[RecordStore] Loaded games');
      return cache;
    } catch (err) {
      if (err instanceof DuplicateKeyError) {
        throw new StoreCorruptError(this.file, `game ${err.gameId} is stored twice`, { cause: err });
      }
      throw err;
    }
  }

  async appendAndPersist(cache: Cache, records: readonly StoredGameT[]): Promise<Cache> {
    if (records.length === 0) return cache;
    const next = appendRecords(cache, records);
    await this.writeAtomic(next.records);
    this.log.info(
      { file: this.file, added: records.length, total: next.records.length },
      '[RecordStore] Persisted games',
    );
    return next;
  }

  private async writeAtomic(records: readonly StoredGameT[]): Promise<void> {
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    const tmp = `${this.file}.${nanoid(8)}.tmp`;
    try {
      await fs.writeFile(tmp, JSON.stringify(records, null, 2), 'utf8');
      await fs.rename(tmp, this.file);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }
}

export function recordStoreFor(dataDir: string, userId: string, logger?: Logger): FileRecordStore {
  return new FileRecordStore(recordsPath(dataDir, userId), logger);
}
