import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { SyncRegistry } from './jobs/registry';
import type { RouteDeps } from './routes/deps';
import statsRoutes from './routes/stats';
import syncRoutes from './routes/sync';

export type AppOptions = Omit<RouteDeps, 'registry'> & {
  registry?: SyncRegistry;
  /** Fastify request logging; off in tests. */
  logLevel?: string | false;
};

export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const { logLevel = 'info', registry = new SyncRegistry(), ...rest } = opts;
  const deps: RouteDeps = { ...rest, registry };

  const app = Fastify({ logger: logLevel === false ? false : { level: logLevel, name: 'duel-ledger-http' } });

  await app.register(cors, {
    origin: true,
  });

  app.get('/health', async () => {
    return { ok: true } as const;
  });

  await app.register(syncRoutes, deps);
  await app.register(statsRoutes, deps);

  return app;
}
