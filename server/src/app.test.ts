import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildApp, type AppOptions } from './app';
import { SyncRegistry } from './jobs/registry';
import { nullLogger } from './services/logger';
import { FakeRemoteSource, makeGame } from './test/factories';
import { AuthError } from './util/errors';

describe('HTTP routes', () => {
  let dataDir: string;
  let source: FakeRemoteSource;
  let tokens: string[];
  let app: FastifyInstance;

  async function start(over: Partial<AppOptions> = {}) {
    app = await buildApp({
      dataDir,
      fetchWindow: 50,
      concurrency: 1,
      minCountrySamples: 5,
      sourceFor: (token) => {
        tokens.push(token);
        return source;
      },
      logger: nullLogger,
      logLevel: false,
      ...over,
    });
    return app;
  }

  const sync = (query = 'userId=alice', headers: Record<string, string> = { 'x-ncfa-token': 'test-secret' }) =>
    app.inject({ method: 'POST', url: `/sync?${query}`, headers });

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'duel-ledger-app-'));
    tokens = [];
    source = new FakeRemoteSource([
      makeGame({ gameId: 'g2', startedAt: '2024-01-02T10:00:00Z', result: 'win', opponent: { playerId: 'p2' } }),
      makeGame({ gameId: 'g1', startedAt: '2024-01-01T10:00:00Z', result: 'loss', opponent: { playerId: 'p1' } }),
    ]);
  });

  afterEach(async () => {
    await app.close();
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('answers health checks', async () => {
    await start();
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
  });

  it('syncs, then serves the stored games and their statistics', async () => {
    await start();

    const first = await sync();
    expect(first.statusCode).toBe(200);
    expect(first.json()).toMatchObject({
      userId: 'alice',
      full: false,
      alreadyCached: 0,
      newlyFetched: 2,
      skipped: [],
      total: 2,
    });
    expect(tokens).toEqual(['test-secret']);

    const second = await sync();
    expect(second.json()).toMatchObject({ alreadyCached: 2, newlyFetched: 0, total: 2 });

    const games = await app.inject({ method: 'GET', url: '/games?userId=alice' });
    expect(games.json()).toEqual({ userId: 'alice', total: 2, gameIds: ['g2', 'g1'] });

    const stats = await app.inject({ method: 'GET', url: '/stats?userId=alice' });
    expect(stats.statusCode).toBe(200);
    expect(stats.json()).toMatchObject({
      userId: 'alice',
      sample: { records: 2, games: 2 },
      overview: { games: 2, wins: 1, losses: 1 },
    });

    await expect(fs.access(path.join(dataDir, 'alice', 'games.json'))).resolves.toBeUndefined();
  });

  it('falls back to the configured token', async () => {
    await start({ defaultToken: 'test-default' });
    const res = await sync('userId=alice', {});
    expect(res.statusCode).toBe(200);
    expect(tokens).toEqual(['test-default']);
  });

  it('requires a session token', async () => {
    await start();
    const res = await sync('userId=alice', {});
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'Missing session token' });
  });

  it('rejects user ids that are not plain names', async () => {
    await start();
    const res = await sync('userId=..%2Fetc');
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: 'Invalid query' });
  });

  it('answers 401 when the session is rejected', async () => {
    source.failures.set('g2', new AuthError());
    await start();
    const res = await sync();
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({
      error: 'Session rejected',
      code: 'E_AUTH',
      message: 'Session token rejected by the game server',
    });
  });

  it('refuses to start a second sync for the same account', async () => {
    const registry = new SyncRegistry();
    registry.begin('alice', false);
    await start({ registry });

    const res = await sync();
    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: 'Sync already running', userId: 'alice' });
    expect(tokens).toEqual([]);
  });

  it('reports a full resync', async () => {
    await start();
    const res = await sync('userId=alice&full=true');
    expect(res.json()).toMatchObject({ full: true, newlyFetched: 2 });
  });

  it('answers 404 for statistics before the first sync', async () => {
    await start();
    const res = await app.inject({ method: 'GET', url: '/stats?userId=nobody' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ error: 'No games found' });
  });

  it('applies the head-to-head threshold from the query', async () => {
    await start();
    await sync();
    const res = await app.inject({ method: 'GET', url: '/stats?userId=alice&minGames=2' });
    expect(res.json()).toMatchObject({ headToHead: [] });

    const bad = await app.inject({ method: 'GET', url: '/stats?userId=alice&minSamples=0' });
    expect(bad.statusCode).toBe(400);
  });

  it('reports an unreadable store', async () => {
    await fs.mkdir(path.join(dataDir, 'alice'), { recursive: true });
    await fs.writeFile(path.join(dataDir, 'alice', 'games.json'), 'not json', 'utf8');
    await start();

    const res = await app.inject({ method: 'GET', url: '/games?userId=alice' });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toMatchObject({ error: 'Game store unreadable', code: 'E_STORE_CORRUPT' });
  });
});
