import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { isValidUserId, recordStoreFor } from '../games/store';
import { syncGames } from '../sync/engine';
import { sendFailure, type RouteDeps } from './deps';

const SyncQuery = z.object({
  userId: z.string().refine(isValidUserId, 'userId must be 1-64 letters, digits, _ or -'),
  window: z.coerce.number().int().min(1).max(5000).optional(),
  full: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => v === 'true' || v === '1'),
});

export default async function syncRoutes(app: FastifyInstance, deps: RouteDeps) {
  /**
   * POST /sync?userId=xxx[&window=N][&full=true]
   *
   * Fetches games missing from the user's store. The session token comes from
   * the x-ncfa-token header, else the configured default.
   */
  app.post('/sync', async (req, reply) => {
    const parse = SyncQuery.safeParse(req.query);
    if (!parse.success) return reply.code(400).send({ error: 'Invalid query', details: parse.error.flatten() });
    const { userId, window, full } = parse.data;

    const header = req.headers['x-ncfa-token'];
    const token = (typeof header === 'string' && header.trim()) || deps.defaultToken;
    if (!token) return reply.code(400).send({ error: 'Missing session token' });

    const job = deps.registry.begin(userId, full);
    if (!job) return reply.code(409).send({ error: 'Sync already running', userId });

    try {
      const store = recordStoreFor(deps.dataDir, userId, deps.logger);
      const cache = await store.load();
      const result = await syncGames({
        cache,
        store,
        source: deps.sourceFor(token),
        fetchWindow: window ?? deps.fetchWindow,
        full,
        concurrency: deps.concurrency,
        logger: deps.logger,
      });
      return reply.send({ userId, ...result.report, total: result.cache.records.length });
    } catch (err) {
      req.log.error({ err, userId }, '[Sync] Failed');
      return sendFailure(reply, err);
    } finally {
      deps.registry.end(job);
    }
  });
}
