import 'dotenv/config';
import { deriveStatistics } from '../analysis';
import { recordStoreFor } from '../games/store';
import { GeoguessrSource } from '../ingest/geoguessr';
import { env } from '../services/env';
import { logger } from '../services/logger';
import { syncGames } from '../sync/engine';

function usage(): never {
  console.error('Usage: npm run sync -- <userId> [--full] [--window N]');
  process.exit(2);
}

function parseArgs(argv: string[]): { userId: string; full: boolean; window: number } {
  const [userId, ...rest] = argv;
  if (!userId || userId.startsWith('--')) usage();
  let full = false;
  let window = env.SYNC_FETCH_WINDOW;
  for (let i = 0; i < rest.length; i++) {
    if (rest[i] === '--full') full = true;
    else if (rest[i] === '--window') {
      window = parseInt(rest[++i] ?? '', 10);
      if (!Number.isInteger(window) || window <= 0) usage();
    } else usage();
  }
  return { userId, full, window };
}

async function runSync(userId: string, full: boolean, window: number): Promise<void> {
  const token = env.GEOGUESSR_NCFA_TOKEN;
  if (!token) throw new Error('GEOGUESSR_NCFA_TOKEN is not set');

  const store = recordStoreFor(env.DATA_DIR, userId, logger);
  const cache = await store.load();
  const source = new GeoguessrSource({
    ncfaToken: token,
    timeoutMs: env.FETCH_TIMEOUT_MS,
    stopDate: new Date(env.FEED_STOP_DATE),
    logger,
  });

  const { cache: updated, report } = await syncGames({
    cache,
    store,
    source,
    fetchWindow: window,
    full,
    concurrency: env.SYNC_CONCURRENCY,
    logger,
  });

  console.log(`Already cached: ${report.alreadyCached}`);
  console.log(`Newly fetched:  ${report.newlyFetched}`);
  console.log(`Skipped:        ${report.skipped.length}`);
  for (const s of report.skipped) console.log(`  - ${s.gameId} (${s.reason}): ${s.message}`);

  const stats = deriveStatistics(updated, { minCountrySamples: env.COUNTRY_MIN_SAMPLES, logger });
  const pct = (v: number | null) => (v === null ? 'n/a' : `${(v * 100).toFixed(1)}%`);
  console.log(`Games: ${stats.sample.games} (omitted ${stats.omitted.count})`);
  console.log(`Win rate: ${pct(stats.overview.winRate)}, round win rate: ${pct(stats.overview.roundWinRate)}`);
  if (stats.streaks.current) {
    console.log(`Current streak: ${stats.streaks.current.outcome} x${stats.streaks.current.length}`);
  }
}

const { userId, full, window } = parseArgs(process.argv.slice(2));

runSync(userId, full, window)
  .then(() => {
    process.exit(0);
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, 'Sync failed');
    process.exit(1);
  });
