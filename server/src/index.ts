import 'dotenv/config';
import { buildApp } from './app';
import { GeoguessrSource } from './ingest/geoguessr';
import { env } from './services/env';
import { logger } from './services/logger';

async function main() {
  const app = await buildApp({
    dataDir: env.DATA_DIR,
    defaultToken: env.GEOGUESSR_NCFA_TOKEN,
    fetchWindow: env.SYNC_FETCH_WINDOW,
    concurrency: env.SYNC_CONCURRENCY,
    minCountrySamples: env.COUNTRY_MIN_SAMPLES,
    sourceFor: (token) =>
      new GeoguessrSource({
        ncfaToken: token,
        timeoutMs: env.FETCH_TIMEOUT_MS,
        stopDate: new Date(env.FEED_STOP_DATE),
        logger,
      }),
    logger,
    logLevel: env.LOG_LEVEL,
  });

  try {
    await app.listen({ port: env.PORT, host: '0.0.0.0' });
    app.log.info(`Server listening on http://localhost:${env.PORT}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Server failed to start');
  process.exit(1);
});
