import { GameRecord, type GameRecordT, type LatLngT, type OpponentT, type RoundRecordT, type StoredGameT } from '../games/schemas';
import { MalformedRecordError } from '../util/errors';
import { haversineKm } from '../util/geo';

export type Outcome = 'Win' | 'Loss' | 'Draw';
export type RoundResult = 'won' | 'lost' | 'draw';

/** Country lookup for rounds whose location carries no country code. */
export type CountryResolver = (location: LatLngT) => string | null;

export const UNKNOWN_COUNTRY = 'unknown';

export type RoundFact = {
  gameId: string;
  roundIndex: number;
  result: RoundResult;
  country: string;
  playerScore: number;
  opponentScore: number;
  scoreDiff: number;
  playerDistanceKm: number | null;
  timedOut: boolean;
};

export type GameFact = {
  gameId: string;
  startedAt: string;
  startedAtMs: number;
  mode: GameRecordT['mode'];
  mapName: string | null;
  opponent: OpponentT;
  /** null while neither side is eliminated and no draw was declared. */
  outcome: Outcome | null;
  ratingBefore: number | null;
  ratingAfter: number | null;
  ratingDelta: number | null;
  opponentRating: number | null;
  /** Same outcome as the previous decided game (wins and losses only). */
  isStreakContinuation: boolean;
  rounds: RoundFact[];
};

export type OmittedGame = { gameId: string; reason: string };

/**
 * Duels are decided by elimination, not by score: whoever still has health
 * when the other reaches 0 wins. Both sides at 0 cannot happen.
 */
export function classifyOutcome(playerHealth: readonly number[], opponentHealth: readonly number[], isDraw: boolean): Outcome | null {
  const mine = playerHealth[playerHealth.length - 1];
  const theirs = opponentHealth[opponentHealth.length - 1];
  if (mine === undefined || theirs === undefined) return null;
  if (mine <= 0 && theirs <= 0) throw new MalformedRecordError(null, 'both sides eliminated');
  if (theirs <= 0) return 'Win';
  if (mine <= 0) return 'Loss';
  return isDraw ? 'Draw' : null;
}

function roundDistance(r: RoundRecordT): number | null {
  if (r.playerDistanceKm !== null) return r.playerDistanceKm;
  if (r.playerGuess && r.actualLocation) return haversineKm(r.playerGuess, r.actualLocation);
  return null;
}

function opponentDistance(r: RoundRecordT): number | null {
  if (r.opponentDistanceKm !== null) return r.opponentDistanceKm;
  if (r.opponentGuess && r.actualLocation) return haversineKm(r.opponentGuess, r.actualLocation);
  return null;
}

/** Higher score wins the round; equal scores go to the closer guess, else it is a draw. */
export function classifyRound(r: RoundRecordT): RoundResult {
  if (r.playerScore > r.opponentScore) return 'won';
  if (r.playerScore < r.opponentScore) return 'lost';
  const mine = r.playerTimedOut ? null : roundDistance(r);
  const theirs = opponentDistance(r);
  if (mine === null || theirs === null || mine === theirs) return 'draw';
  return mine < theirs ? 'won' : 'lost';
}

export function countryOfRound(r: RoundRecordT, resolver?: CountryResolver): string {
  const loc = r.actualLocation;
  if (!loc) return UNKNOWN_COUNTRY;
  const code = loc.countryCode ?? resolver?.(loc) ?? null;
  return code ? code.toLowerCase() : UNKNOWN_COUNTRY;
}

function toGameFact(g: GameRecordT, resolver?: CountryResolver): GameFact {
  let outcome: Outcome | null;
  try {
    outcome = classifyOutcome(g.playerHealth, g.opponentHealth, g.isDraw);
  } catch (err) {
    if (err instanceof MalformedRecordError) throw new MalformedRecordError(g.gameId, err.message);
    throw err;
  }

  const rounds = g.rounds.map((r): RoundFact => ({
    gameId: g.gameId,
    roundIndex: r.roundIndex,
    result: classifyRound(r),
    country: countryOfRound(r, resolver),
    playerScore: r.playerScore,
    opponentScore: r.opponentScore,
    scoreDiff: r.playerScore - r.opponentScore,
    playerDistanceKm: r.playerTimedOut ? null : roundDistance(r),
    timedOut: r.playerTimedOut,
  }));

  return {
    gameId: g.gameId,
    startedAt: g.startedAt,
    startedAtMs: Date.parse(g.startedAt),
    mode: g.mode,
    mapName: g.mapName,
    opponent: g.opponent,
    outcome,
    ratingBefore: g.ratingBefore,
    ratingAfter: g.ratingAfter,
    ratingDelta: g.ratingBefore !== null && g.ratingAfter !== null ? g.ratingAfter - g.ratingBefore : null,
    opponentRating: g.opponentRating,
    isStreakContinuation: false,
    rounds,
  };
}

/**
 * Validates every stored record and flattens the valid ones into facts, oldest
 * game first. Records that fail validation are returned in `omitted`.
 */
export function buildFacts(
  records: readonly StoredGameT[],
  resolver?: CountryResolver,
): { games: GameFact[]; omitted: OmittedGame[] } {
  const games: GameFact[] = [];
  const omitted: OmittedGame[] = [];

  for (const record of records) {
    const parsed = GameRecord.safeParse(record);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      omitted.push({ gameId: record.gameId, reason: `${where}${issue?.message ?? 'invalid record'}` });
      continue;
    }
    try {
      games.push(toGameFact(parsed.data, resolver));
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;
      omitted.push({ gameId: record.gameId, reason: err.message });
    }
  }

  games.sort((a, b) => a.startedAtMs - b.startedAtMs || (a.gameId < b.gameId ? -1 : a.gameId > b.gameId ? 1 : 0));

  let previous: Outcome | null = null;
  for (const g of games) {
    if (g.outcome === null) continue;
    g.isStreakContinuation = g.outcome !== 'Draw' && g.outcome === previous;
    previous = g.outcome;
  }

  return { games, omitted };
}
