import { z } from 'zod';

export const LatLng = z.object({
  lat: z.number(),
  lng: z.number(),
});

export const ActualLocation = LatLng.extend({
  countryCode: z.string().nullable().default(null),
});

export const GameMode = z.enum(['Moving', 'NoMove', 'NMPZ', 'Other']);

export const RoundRecord = z
  .object({
    roundIndex: z.number().int().min(0),
    playerScore: z.number().int().min(0),
    opponentScore: z.number().int().min(0),
    playerTimedOut: z.boolean().default(false),
    playerGuess: LatLng.nullable().default(null),
    opponentGuess: LatLng.nullable().default(null),
    actualLocation: ActualLocation.nullable().default(null),
    playerDistanceKm: z.number().min(0).nullable().default(null),
    opponentDistanceKm: z.number().min(0).nullable().default(null),
    damageMultiplier: z.number().nullable().default(null),
  })
  .passthrough();

export const Opponent = z
  .object({
    playerId: z.string().nullable().default(null),
    name: z.string().nullable().default(null),
    nationality: z.string().nullable().default(null),
  })
  .passthrough();

export const GameRecord = z
  .object({
    gameId: z.string().min(1),
    mode: GameMode,
    startedAt: z.string().datetime({ offset: true }),
    mapName: z.string().nullable().default(null),
    movement: z
      .object({ moving: z.boolean(), zooming: z.boolean(), rotating: z.boolean() })
      .default({ moving: true, zooming: true, rotating: true }),
    playerHealth: z.array(z.number().int().min(0)),
    opponentHealth: z.array(z.number().int().min(0)),
    rounds: z.array(RoundRecord).min(1),
    ratingBefore: z.number().nullable().default(null),
    ratingAfter: z.number().nullable().default(null),
    opponentRating: z.number().nullable().default(null),
    opponent: Opponent,
    isDraw: z.boolean().default(false),
  })
  .passthrough()
  .superRefine((g, ctx) => {
    if (g.playerHealth.length !== g.rounds.length || g.opponentHealth.length !== g.rounds.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `health sequences (${g.playerHealth.length}/${g.opponentHealth.length}) do not match ${g.rounds.length} rounds`,
        path: ['rounds'],
      });
    }
    g.rounds.forEach((r, i) => {
      if (r.roundIndex !== i) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `round at position ${i} has roundIndex ${r.roundIndex}`,
          path: ['rounds', i, 'roundIndex'],
        });
      }
    });
    for (const [key, side] of [
      ['playerHealth', 'player'],
      ['opponentHealth', 'opponent'],
    ] as const) {
      const health = g[key];
      for (let i = 1; i < health.length; i++) {
        if (health[i] > health[i - 1]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `${side} health increases after round ${i - 1}`,
            path: [key, i],
          });
          break;
        }
      }
    }
  });

/**
 * Shape the durable store accepts: anything keyed by a game ID. Full validation
 * happens in the derivation pipeline.
 */
export const StoredGame = z.object({ gameId: z.string().min(1) }).passthrough();

export type LatLngT = z.infer<typeof LatLng>;
export type GameModeT = z.infer<typeof GameMode>;
export type RoundRecordT = z.infer<typeof RoundRecord>;
export type OpponentT = z.infer<typeof Opponent>;
export type GameRecordT = z.infer<typeof GameRecord>;
export type StoredGameT = z.infer<typeof StoredGame>;
