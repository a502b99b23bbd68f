import { z } from 'zod';
import type { RemoteGameSource } from '../games/remoteSource';
import type { GameRecordT } from '../games/schemas';
import { nullLogger, type Logger } from '../services/logger';
import {
  AuthError,
  errorMessage,
  LedgerError,
  NotFoundError,
  RemoteSourceError,
  RemoteTimeoutError,
} from '../util/errors';
import { duelToRecord } from './duelToRecord';

const FEED_URL = 'https://www.geoguessr.com/api/v4/feed/private';
const DUELS_URL = 'https://game-server.geoguessr.com/api/duels';

const FeedPage = z
  .object({
    entries: z
      .array(
        z
          .object({
            time: z.string().nullish(),
            payload: z.string().nullish(),
            user: z.object({ id: z.string(), nick: z.string().nullish() }).passthrough().nullish(),
          })
          .passthrough(),
      )
      .default([]),
    paginationToken: z.string().nullish(),
  })
  .passthrough();

type FeedPageT = z.infer<typeof FeedPage>;
type FeedEntryT = FeedPageT['entries'][number];

const DuelPayload = z
  .object({ gameId: z.string(), gameMode: z.literal('Duels'), competitiveGameMode: z.unknown() })
  .passthrough()
  .refine((p) => p.competitiveGameMode !== undefined);

function duelIdOf(payload: unknown): string | null {
  const parsed = DuelPayload.safeParse(payload);
  return parsed.success ? parsed.data.gameId : null;
}

/**
 * Competitive duel IDs in feed order. A payload is either a single activity or
 * a list of grouped activities each carrying its own payload.
 */
export function extractDuelIds(entries: FeedEntryT[]): string[] {
  const ids: string[] = [];
  for (const entry of entries) {
    if (!entry.payload) continue;
    let payload: unknown;
    try {
      payload = JSON.parse(entry.payload);
    } catch {
      continue;
    }
    if (Array.isArray(payload)) {
      for (const item of payload) {
        if (typeof item === 'object' && item !== null && 'payload' in item) {
          const id = duelIdOf(item.payload);
          if (id) ids.push(id);
        }
      }
    } else {
      const id = duelIdOf(payload);
      if (id) ids.push(id);
    }
  }
  return ids;
}

export type GeoguessrSourceOptions = {
  ncfaToken: string;
  timeoutMs: number;
  /** Full listings stop at feed entries older than this. */
  stopDate: Date;
  logger?: Logger;
  fetchImpl?: typeof fetch;
};

export type PlayerInfo = { id: string; nick: string | null };

export class GeoguessrSource implements RemoteGameSource {
  private readonly log: Logger;
  private readonly fetchImpl: typeof fetch;
  private player: Promise<PlayerInfo> | null = null;

  constructor(private readonly opts: GeoguessrSourceOptions) {
    this.log = (opts.logger ?? nullLogger).child({ module: 'Geoguessr' });
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  /** The account behind the session token, read from the first feed entry. */
  playerInfo(signal?: AbortSignal): Promise<PlayerInfo> {
    if (!this.player) {
      this.player = this.feedPage(null, signal).then((page) => {
        const user = page.entries[0]?.user;
        if (!user) throw new AuthError('No feed entries, the session token may be invalid');
        return { id: user.id, nick: user.nick ?? null };
      });
      this.player.catch(() => {
        this.player = null;
      });
    }
    return this.player;
  }

  async listRecentGameIds(limit: number, signal?: AbortSignal): Promise<string[]> {
    return this.collectIds({ limit, stopDate: null }, signal);
  }

  async listAllGameIds(signal?: AbortSignal): Promise<string[]> {
    return this.collectIds({ limit: null, stopDate: this.opts.stopDate }, signal);
  }

  async fetchGameDetail(gameId: string, signal?: AbortSignal): Promise<GameRecordT> {
    const { id } = await this.playerInfo(signal);
    const raw = await this.getJson(`${DUELS_URL}/${encodeURIComponent(gameId)}`, signal, gameId);
    return duelToRecord(raw, id);
  }

  private async collectIds(
    bounds: { limit: number | null; stopDate: Date | null },
    signal?: AbortSignal,
  ): Promise<string[]> {
    const seen = new Set<string>();
    let token: string | null = null;
    let pages = 0;

    for (;;) {
      const page = await this.feedPage(token, signal);
      pages++;
      if (page.entries.length === 0) break;

      for (const id of extractDuelIds(page.entries)) seen.add(id);
      if (bounds.limit !== null && seen.size >= bounds.limit) break;

      if (bounds.stopDate) {
        const first = page.entries[0]?.time;
        const t = first ? Date.parse(first) : NaN;
        if (!Number.isNaN(t) && t < bounds.stopDate.getTime()) break;
      }

      token = page.paginationToken ?? null;
      if (!token) break;
    }

    const ids = Array.from(seen);
    this.log.debug({ pages, ids: ids.length }, '[Geoguessr] Listed duel ids');
    return bounds.limit !== null ? ids.slice(0, bounds.limit) : ids;
  }

  private async feedPage(token: string | null, signal?: AbortSignal): Promise<FeedPageT> {
    const url = token ? `${FEED_URL}?paginationToken=${encodeURIComponent(token)}` : FEED_URL;
    const parsed = FeedPage.safeParse(await this.getJson(url, signal, null));
    if (!parsed.success) throw new RemoteSourceError('Unexpected feed payload');
    return parsed.data;
  }

  private async getJson(url: string, signal: AbortSignal | undefined, gameId: string | null): Promise<unknown> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.opts.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const res = await this.fetchImpl(url, {
        signal: controller.signal,
        headers: {
          Accept: 'application/json',
          Cookie: `_ncfa=${this.opts.ncfaToken}`,
        },
      });
      if (res.status === 401 || res.status === 403) throw new AuthError();
      if (res.status === 404 && gameId) throw new NotFoundError(gameId);
      if (!res.ok) throw new RemoteSourceError(`GET ${url} failed: ${res.status}`, res.status);
      return await res.json();
    } catch (err) {
      if (timedOut) throw new RemoteTimeoutError(url, this.opts.timeoutMs);
      if (err instanceof LedgerError || signal?.aborted) throw err;
      throw new RemoteSourceError(`GET ${url} failed: ${errorMessage(err)}`, null, { cause: err });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
