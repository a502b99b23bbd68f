import { z } from 'zod';
import { GameRecord, type GameModeT, type GameRecordT, type LatLngT, type RoundRecordT } from '../games/schemas';
import { MalformedRecordError } from '../util/errors';
import { normalizeCountryCode } from '../util/countries';
import { haversineKm } from '../util/geo';

const RawGuess = z
  .object({
    roundNumber: z.number(),
    lat: z.number().optional(),
    lng: z.number().optional(),
    distance: z.number().nullish(),
    score: z.number().nullish(),
  })
  .passthrough();

const RawProgress = z
  .object({
    ratingBefore: z.number().nullish(),
    ratingAfter: z.number().nullish(),
  })
  .passthrough();

const RawPlayer = z
  .object({
    playerId: z.string(),
    nick: z.string().nullish(),
    countryCode: z.string().nullish(),
    rating: z.number().nullish(),
    guesses: z.array(RawGuess).default([]),
    progressChange: z
      .object({
        competitiveProgress: RawProgress.nullish(),
        rankedSystemProgress: RawProgress.nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const RawTeam = z
  .object({
    id: z.string().optional(),
    health: z.number(),
    players: z.array(RawPlayer).min(1),
    roundResults: z
      .array(z.object({ roundNumber: z.number(), healthAfter: z.number() }).passthrough())
      .default([]),
  })
  .passthrough();

const RawDuel = z
  .object({
    gameId: z.string().min(1),
    teams: z.array(RawTeam),
    rounds: z
      .array(
        z
          .object({
            roundNumber: z.number(),
            panorama: z
              .object({ lat: z.number(), lng: z.number(), countryCode: z.string().nullish() })
              .passthrough()
              .nullish(),
            damageMultiplier: z.number().nullish(),
            startTime: z.string().nullish(),
          })
          .passthrough(),
      )
      .default([]),
    currentRoundNumber: z.number().optional(),
    options: z
      .object({
        map: z.object({ name: z.string().nullish() }).passthrough().nullish(),
        competitiveGameMode: z.string().nullish(),
        movementOptions: z
          .object({
            forbidMoving: z.boolean().optional(),
            forbidZooming: z.boolean().optional(),
            forbidRotating: z.boolean().optional(),
          })
          .passthrough()
          .nullish(),
      })
      .passthrough()
      .default({}),
    result: z.object({ isDraw: z.boolean().optional() }).passthrough().nullish(),
  })
  .passthrough();

type RawTeamT = z.infer<typeof RawTeam>;
type RawPlayerT = z.infer<typeof RawPlayer>;
type RawGuessT = z.infer<typeof RawGuess>;

export function classifyMode(
  competitiveGameMode: string | null | undefined,
  movement: { moving: boolean; zooming: boolean; rotating: boolean } | null,
): GameModeT {
  const m = (competitiveGameMode ?? '').toLowerCase();
  if (m.includes('nmpz')) return 'NMPZ';
  if (m.includes('nomove')) return 'NoMove';
  if (m.includes('standard')) return 'Moving';
  if (!movement) return 'Other';
  if (!movement.moving && !movement.zooming && !movement.rotating) return 'NMPZ';
  if (!movement.moving) return 'NoMove';
  return 'Moving';
}

/**
 * Rating after the game is taken from the first of the competitive and ranked
 * system progress that carries one, then the plain rating when it is non-zero
 * (0 means placement).
 */
function extractRatings(player: RawPlayerT): { before: number | null; after: number | null } {
  const change = player.progressChange;
  const progress =
    [change?.competitiveProgress, change?.rankedSystemProgress].find(
      (p) => p !== null && p !== undefined && p.ratingAfter !== null && p.ratingAfter !== undefined,
    ) ?? null;
  const before = progress?.ratingBefore ?? null;
  let after = progress?.ratingAfter ?? null;
  if (after === null && player.rating) after = player.rating;
  return { before, after };
}

function guessFor(player: RawPlayerT, roundNumber: number): RawGuessT | null {
  return player.guesses.find((g) => g.roundNumber === roundNumber) ?? null;
}

function guessLocation(g: RawGuessT | null): LatLngT | null {
  if (!g || g.lat === undefined || g.lng === undefined) return null;
  return { lat: g.lat, lng: g.lng };
}

function distanceKm(g: RawGuessT | null, guess: LatLngT | null, actual: LatLngT | null): number | null {
  if (g?.distance !== undefined && g.distance !== null) return g.distance / 1000;
  if (guess && actual) return haversineKm(guess, actual);
  return null;
}

/**
 * Health after each played round. Without per-round results every round
 * carries the final health.
 */
function healthSequence(team: RawTeamT, roundNumbers: number[]): number[] {
  const byRound = new Map(team.roundResults.map((r) => [r.roundNumber, r.healthAfter]));
  let last: number | null = null;
  return roundNumbers.map((n) => {
    const h = byRound.get(n) ?? last ?? team.health;
    last = h;
    return Math.max(0, Math.round(h));
  });
}

/**
 * Turns a raw duel from the game server into a GameRecord seen from `playerId`.
 * Throws MalformedRecordError when the payload cannot be normalized.
 */
export function duelToRecord(raw: unknown, playerId: string): GameRecordT {
  const parsedDuel = RawDuel.safeParse(raw);
  if (!parsedDuel.success) {
    const id = typeof raw === 'object' && raw !== null && 'gameId' in raw && typeof raw.gameId === 'string' ? raw.gameId : null;
    throw new MalformedRecordError(id, `unexpected duel payload: ${parsedDuel.error.issues[0]?.message ?? 'invalid'}`);
  }
  const duel = parsedDuel.data;
  if (duel.teams.length < 2) throw new MalformedRecordError(duel.gameId, 'fewer than two teams');

  const myIdx = duel.teams.findIndex((t) => t.players.some((p) => p.playerId === playerId));
  if (myIdx < 0) throw new MalformedRecordError(duel.gameId, `player ${playerId} did not take part`);
  const myTeam = duel.teams[myIdx];
  const oppTeam = duel.teams[myIdx === 0 ? 1 : 0];
  const me = myTeam.players.find((p) => p.playerId === playerId) ?? myTeam.players[0];
  const opp = oppTeam.players[0];

  const played = duel.rounds.slice(0, duel.currentRoundNumber ?? duel.rounds.length);
  const startedAt = played[0]?.startTime;
  if (!startedAt) throw new MalformedRecordError(duel.gameId, 'no round start time');

  const mo = duel.options.movementOptions;
  const movement = mo
    ? { moving: !mo.forbidMoving, zooming: !mo.forbidZooming, rotating: !mo.forbidRotating }
    : null;

  const rounds: RoundRecordT[] = played.map((r, i) => {
    const pano = r.panorama ?? null;
    const actual = pano ? { lat: pano.lat, lng: pano.lng } : null;
    const myGuess = guessFor(me, r.roundNumber);
    const oppGuess = guessFor(opp, r.roundNumber);
    const myLoc = guessLocation(myGuess);
    const oppLoc = guessLocation(oppGuess);
    return {
      roundIndex: i,
      playerScore: Math.max(0, Math.round(myGuess?.score ?? 0)),
      opponentScore: Math.max(0, Math.round(oppGuess?.score ?? 0)),
      playerTimedOut: myLoc === null,
      playerGuess: myLoc,
      opponentGuess: oppLoc,
      actualLocation: pano ? { lat: pano.lat, lng: pano.lng, countryCode: normalizeCountryCode(pano.countryCode) } : null,
      playerDistanceKm: myLoc ? distanceKm(myGuess, myLoc, actual) : null,
      opponentDistanceKm: oppLoc ? distanceKm(oppGuess, oppLoc, actual) : null,
      damageMultiplier: r.damageMultiplier ?? null,
    };
  });

  const roundNumbers = played.map((r) => r.roundNumber);
  const mine = extractRatings(me);

  const candidate = {
    gameId: duel.gameId,
    mode: classifyMode(duel.options.competitiveGameMode, movement),
    startedAt,
    mapName: duel.options.map?.name ?? null,
    movement: movement ?? { moving: true, zooming: true, rotating: true },
    playerHealth: healthSequence(myTeam, roundNumbers),
    opponentHealth: healthSequence(oppTeam, roundNumbers),
    rounds,
    ratingBefore: mine.before,
    ratingAfter: mine.after,
    opponentRating: extractRatings(opp).after,
    opponent: {
      playerId: opp.playerId,
      name: opp.nick ?? null,
      nationality: normalizeCountryCode(opp.countryCode),
    },
    isDraw: duel.result?.isDraw ?? false,
  };

  const parsed = GameRecord.safeParse(candidate);
  if (!parsed.success) {
    throw new MalformedRecordError(duel.gameId, parsed.error.issues[0]?.message ?? 'invalid game record');
  }
  return parsed.data;
}
