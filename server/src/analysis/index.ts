/**
 * Statistics derivation
 *
 * Pure function of the cached games: the same cache always yields the same
 * statistics. Invalid records are excluded and counted, never fatal.
 */

import type { Cache } from '../games/cache';
import type { Logger } from '../services/logger';
import {
  buildActivityByMonth,
  buildByMode,
  buildByRoundNumber,
  buildCountryMastery,
  buildHeadToHead,
  buildOpponentNationalities,
  buildOverview,
  buildRatingProgression,
  type CountryStats,
  type HeadToHead,
  type ModeStats,
  type MonthStats,
  type NationalityStats,
  type Overview,
  type RatingProgression,
  type RoundNumberStats,
} from './aggregate';
import { buildFacts, type CountryResolver, type OmittedGame } from './facts';
import { computeStreaks, type StreakStats } from './streaks';

export type DeriveOptions = {
  countryResolver?: CountryResolver;
  /** Countries with fewer rounds are flagged low-confidence. */
  minCountrySamples?: number;
  /** Opponents met fewer times are left out of head-to-head. */
  minHeadToHeadGames?: number;
  logger?: Logger;
};

export type Statistics = {
  /** Records in the cache and how many of them made it into the statistics. */
  sample: { records: number; games: number };
  omitted: { count: number; games: OmittedGame[] };
  overview: Overview;
  ratingProgression: RatingProgression;
  streaks: StreakStats;
  countries: CountryStats[];
  opponentNationalities: NationalityStats[];
  headToHead: HeadToHead[];
  byRound: RoundNumberStats[];
  byMode: ModeStats[];
  activityByMonth: MonthStats[];
};

export const DEFAULT_MIN_COUNTRY_SAMPLES = 5;

export function deriveStatistics(cache: Cache, options: DeriveOptions = {}): Statistics {
  const { games, omitted } = buildFacts(cache.records, options.countryResolver);

  if (omitted.length > 0) {
    options.logger?.warn(
      { omitted: omitted.length, records: cache.records.length },
      `[Derive] Excluded ${omitted.length} malformed game(s)`,
    );
  }

  return {
    sample: { records: cache.records.length, games: games.length },
    omitted: { count: omitted.length, games: omitted },
    overview: buildOverview(games),
    ratingProgression: buildRatingProgression(games),
    streaks: computeStreaks(games),
    countries: buildCountryMastery(games, options.minCountrySamples ?? DEFAULT_MIN_COUNTRY_SAMPLES),
    opponentNationalities: buildOpponentNationalities(games),
    headToHead: buildHeadToHead(games, options.minHeadToHeadGames ?? 1),
    byRound: buildByRoundNumber(games),
    byMode: buildByMode(games),
    activityByMonth: buildActivityByMonth(games),
  };
}
