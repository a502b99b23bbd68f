import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { deriveStatistics } from '../analysis';
import { isValidUserId, recordStoreFor } from '../games/store';
import { sendFailure, type RouteDeps } from './deps';

const UserQuery = z.object({
  userId: z.string().refine(isValidUserId, 'userId must be 1-64 letters, digits, _ or -'),
});

const StatsQuery = UserQuery.extend({
  minSamples: z.coerce.number().int().min(1).max(1000).optional(),
  minGames: z.coerce.number().int().min(1).max(1000).optional().default(1),
});

export default async function statsRoutes(app: FastifyInstance, deps: RouteDeps) {
  /**
   * GET /stats?userId=xxx
   *
   * Statistics over every cached game, with the omitted count alongside.
   */
  app.get('/stats', async (req, reply) => {
    const parse = StatsQuery.safeParse(req.query);
    if (!parse.success) {
      return reply.code(400).send({ error: 'Invalid query parameters', details: parse.error.flatten() });
    }
    const { userId, minSamples, minGames } = parse.data;

    try {
      const cache = await recordStoreFor(deps.dataDir, userId, deps.logger).load();
      if (cache.records.length === 0) {
        return reply.code(404).send({
          error: 'No games found',
          message: `No game data found for user ${userId}. Please sync games first.`,
        });
      }

      const startTime = Date.now();
      const stats = deriveStatistics(cache, {
        minCountrySamples: minSamples ?? deps.minCountrySamples,
        minHeadToHeadGames: minGames,
        logger: deps.logger,
      });
      req.log.info(`[Stats] Derived statistics over ${stats.sample.games} games in ${Date.now() - startTime}ms`);
      return reply.send({ userId, ...stats });
    } catch (err) {
      req.log.error({ err, userId }, '[Stats] Failed');
      return sendFailure(reply, err);
    }
  });

  /**
   * GET /games?userId=xxx
   *
   * IDs of the cached games in store order.
   */
  app.get('/games', async (req, reply) => {
    const parse = UserQuery.safeParse(req.query);
    if (!parse.success) return reply.code(400).send({ error: 'Invalid query', details: parse.error.flatten() });
    const { userId } = parse.data;

    try {
      const cache = await recordStoreFor(deps.dataDir, userId, deps.logger).load();
      return reply.send({ userId, total: cache.records.length, gameIds: cache.records.map((r) => r.gameId) });
    } catch (err) {
      req.log.error({ err, userId }, '[Games] Failed');
      return sendFailure(reply, err);
    }
  });
}
