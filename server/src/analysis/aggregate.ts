import { countryName } from '../util/countries';
import { UNKNOWN_COUNTRY, type GameFact, type RoundFact } from './facts';

export type GameTally = {
  games: number;
  wins: number;
  losses: number;
  draws: number;
  undecided: number;
  /** wins / decided games, null without a decided game. */
  winRate: number | null;
};

export type RoundTally = {
  rounds: number;
  won: number;
  lost: number;
  drawn: number;
  /** won / (won + lost); drawn rounds stay out of the denominator. */
  winRate: number | null;
  avgPlayerScore: number | null;
  avgOpponentScore: number | null;
  avgScoreDiff: number | null;
  avgDistanceKm: number | null;
};

export type Overview = {
  games: number;
  wins: number;
  losses: number;
  draws: number;
  undecided: number;
  winRate: number | null;
  rounds: number;
  roundsWon: number;
  roundsLost: number;
  roundsDrawn: number;
  roundWinRate: number | null;
  avgPlayerScore: number | null;
  avgDistanceKm: number | null;
  currentRating: number | null;
};

export type RatingPoint = {
  gameId: string;
  startedAt: string;
  ratingBefore: number;
  ratingAfter: number;
  delta: number;
  opponentRating: number | null;
};

export type RatingProgression = {
  sampleCount: number;
  series: RatingPoint[];
  totalDelta: number;
  peak: { rating: number; gameId: string } | null;
  current: number | null;
};

export type CountryStats = RoundTally & { country: string; name: string; lowConfidence: boolean };
export type RoundNumberStats = RoundTally & { roundNumber: number };
export type ModeStats = GameTally & { mode: GameFact['mode'] };
export type MonthStats = GameTally & { month: string };

/** Round averages reported next to the game tallies of a group of games. */
export type RoundAverages = {
  rounds: number;
  roundWinRate: number | null;
  avgPlayerScore: number | null;
  avgOpponentScore: number | null;
  avgDistanceKm: number | null;
};

export type NationalityStats = GameTally &
  RoundAverages & {
    nationality: string;
    name: string;
  };

export type HeadToHead = GameTally &
  RoundAverages & {
    key: string;
    /** 'approximate' when games were matched on name and nationality only. */
    identity: 'stable' | 'approximate';
    opponentId: string | null;
    name: string | null;
    nationality: string | null;
    /** UTC ISO timestamp of the latest game. */
    lastPlayedAt: string;
  };

function ratio(num: number, den: number): number | null {
  return den > 0 ? num / den : null;
}

function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

function byKey<T, K extends string | number>(items: readonly T[], key: (item: T) => K): Map<K, T[]> {
  const out = new Map<K, T[]>();
  for (const it of items) {
    const k = key(it);
    const bucket = out.get(k);
    if (bucket) bucket.push(it);
    else out.set(k, [it]);
  }
  return out;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function tallyGames(games: readonly GameFact[]): GameTally {
  const t = { games: games.length, wins: 0, losses: 0, draws: 0, undecided: 0 };
  for (const g of games) {
    if (g.outcome === 'Win') t.wins++;
    else if (g.outcome === 'Loss') t.losses++;
    else if (g.outcome === 'Draw') t.draws++;
    else t.undecided++;
  }
  return { ...t, winRate: ratio(t.wins, t.wins + t.losses + t.draws) };
}

export function tallyRounds(rounds: readonly RoundFact[]): RoundTally {
  let won = 0;
  let lost = 0;
  let drawn = 0;
  for (const r of rounds) {
    if (r.result === 'won') won++;
    else if (r.result === 'lost') lost++;
    else drawn++;
  }
  const distances = rounds.flatMap((r) => (r.playerDistanceKm === null ? [] : [r.playerDistanceKm]));
  return {
    rounds: rounds.length,
    won,
    lost,
    drawn,
    winRate: ratio(won, won + lost),
    avgPlayerScore: mean(rounds.map((r) => r.playerScore)),
    avgOpponentScore: mean(rounds.map((r) => r.opponentScore)),
    avgScoreDiff: mean(rounds.map((r) => r.scoreDiff)),
    avgDistanceKm: mean(distances),
  };
}

function roundAverages(games: readonly GameFact[]): RoundAverages {
  const t = tallyRounds(games.flatMap((g) => g.rounds));
  return {
    rounds: t.rounds,
    roundWinRate: t.winRate,
    avgPlayerScore: t.avgPlayerScore,
    avgOpponentScore: t.avgOpponentScore,
    avgDistanceKm: t.avgDistanceKm,
  };
}

export function buildOverview(games: readonly GameFact[]): Overview {
  const g = tallyGames(games);
  const r = tallyRounds(games.flatMap((x) => x.rounds));
  let currentRating: number | null = null;
  for (const x of games) {
    if (x.ratingAfter !== null) currentRating = x.ratingAfter;
  }
  return {
    games: g.games,
    wins: g.wins,
    losses: g.losses,
    draws: g.draws,
    undecided: g.undecided,
    winRate: g.winRate,
    rounds: r.rounds,
    roundsWon: r.won,
    roundsLost: r.lost,
    roundsDrawn: r.drawn,
    roundWinRate: r.winRate,
    avgPlayerScore: r.avgPlayerScore,
    avgDistanceKm: r.avgDistanceKm,
    currentRating,
  };
}

/** Rating change per game, oldest first. Unrated games are left out of the series only. */
export function buildRatingProgression(games: readonly GameFact[]): RatingProgression {
  const series: RatingPoint[] = [];
  for (const g of games) {
    if (g.ratingBefore === null || g.ratingAfter === null || g.ratingDelta === null) continue;
    series.push({
      gameId: g.gameId,
      startedAt: g.startedAt,
      ratingBefore: g.ratingBefore,
      ratingAfter: g.ratingAfter,
      delta: g.ratingDelta,
      opponentRating: g.opponentRating,
    });
  }

  let peak: RatingProgression['peak'] = null;
  for (const p of series) {
    if (!peak || p.ratingAfter >= peak.rating) peak = { rating: p.ratingAfter, gameId: p.gameId };
  }

  return {
    sampleCount: series.length,
    series,
    totalDelta: series.reduce((s, p) => s + p.delta, 0),
    peak,
    current: series.length > 0 ? series[series.length - 1].ratingAfter : null,
  };
}

/**
 * Round performance per country of the location. Every round lands in exactly
 * one bucket; thin buckets are flagged rather than dropped.
 */
export function buildCountryMastery(games: readonly GameFact[], minSamples: number): CountryStats[] {
  const groups = byKey(
    games.flatMap((g) => g.rounds),
    (r) => r.country,
  );
  return Array.from(groups.entries())
    .map(([country, rounds]) => {
      const tally = tallyRounds(rounds);
      return {
        country,
        name: country === UNKNOWN_COUNTRY ? 'Unknown' : countryName(country),
        ...tally,
        lowConfidence: tally.rounds < minSamples,
      };
    })
    .sort((a, b) => b.rounds - a.rounds || compareStrings(a.country, b.country));
}

export function buildByRoundNumber(games: readonly GameFact[]): RoundNumberStats[] {
  const groups = byKey(
    games.flatMap((g) => g.rounds),
    (r) => r.roundIndex,
  );
  return Array.from(groups.entries())
    .map(([roundIndex, rounds]) => ({ roundNumber: roundIndex + 1, ...tallyRounds(rounds) }))
    .sort((a, b) => a.roundNumber - b.roundNumber);
}

export function buildByMode(games: readonly GameFact[]): ModeStats[] {
  return Array.from(byKey(games, (g) => g.mode).entries())
    .map(([mode, list]) => ({ mode, ...tallyGames(list) }))
    .sort((a, b) => b.games - a.games || compareStrings(a.mode, b.mode));
}

export function buildOpponentNationalities(games: readonly GameFact[]): NationalityStats[] {
  return Array.from(byKey(games, (g) => g.opponent.nationality ?? UNKNOWN_COUNTRY).entries())
    .map(([nationality, list]) => ({
      nationality,
      name: nationality === UNKNOWN_COUNTRY ? 'Unknown' : countryName(nationality),
      ...tallyGames(list),
      ...roundAverages(list),
    }))
    .sort((a, b) => b.games - a.games || compareStrings(a.nationality, b.nationality));
}

export function opponentKey(opponent: GameFact['opponent']): { key: string; identity: HeadToHead['identity'] } {
  if (opponent.playerId) return { key: `id:${opponent.playerId}`, identity: 'stable' };
  return {
    key: `name:${opponent.name ?? '?'}|${opponent.nationality ?? '?'}`,
    identity: 'approximate',
  };
}

/** Games grouped by opponent; expects `games` oldest first. */
export function buildHeadToHead(games: readonly GameFact[], minGames: number): HeadToHead[] {
  const groups = byKey(games, (g) => opponentKey(g.opponent).key);
  const out: HeadToHead[] = [];

  for (const [key, list] of groups) {
    if (list.length < minGames) continue;
    let name: string | null = null;
    let nationality: string | null = null;
    for (const g of list) {
      name = g.opponent.name ?? name;
      nationality = g.opponent.nationality ?? nationality;
    }
    const last = list[list.length - 1];
    out.push({
      key,
      identity: opponentKey(last.opponent).identity,
      opponentId: last.opponent.playerId,
      name,
      nationality,
      ...tallyGames(list),
      ...roundAverages(list),
      lastPlayedAt: new Date(last.startedAtMs).toISOString(),
    });
  }

  return out.sort(
    (a, b) =>
      b.games - a.games ||
      compareStrings(b.lastPlayedAt, a.lastPlayedAt) ||
      compareStrings(a.key, b.key),
  );
}

/** Calendar months in UTC, oldest first. */
export function buildActivityByMonth(games: readonly GameFact[]): MonthStats[] {
  return Array.from(byKey(games, (g) => new Date(g.startedAtMs).toISOString().slice(0, 7)).entries())
    .map(([month, list]) => ({ month, ...tallyGames(list) }))
    .sort((a, b) => compareStrings(a.month, b.month));
}
