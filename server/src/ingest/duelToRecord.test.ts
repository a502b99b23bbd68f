import { describe, expect, it } from 'vitest';
import { MalformedRecordError } from '../util/errors';
import { classifyMode, duelToRecord } from './duelToRecord';

type Json = Record<string, unknown>;

function me(over: Json = {}): Json {
  return {
    playerId: 'me',
    nick: 'Me',
    countryCode: 'SE',
    guesses: [
      { roundNumber: 1, lat: 48.8, lng: 2.3, distance: 12000, score: 4500 },
      { roundNumber: 2, lat: 52.5, lng: 13.4, distance: 0, score: 5000 },
    ],
    progressChange: { competitiveProgress: { ratingBefore: 900, ratingAfter: 912 } },
    ...over,
  };
}

function them(over: Json = {}): Json {
  return {
    playerId: 'them',
    nick: 'Them',
    countryCode: 'DE',
    guesses: [{ roundNumber: 1, lat: 45.7, lng: 4.8, distance: 300000, score: 3000 }],
    ...over,
  };
}

function teams(mine: Json = me(), theirs: Json = them()): Json[] {
  return [
    {
      id: 't1',
      health: 6000,
      players: [mine],
      roundResults: [
        { roundNumber: 1, healthAfter: 6000 },
        { roundNumber: 2, healthAfter: 6000 },
      ],
    },
    {
      id: 't2',
      health: 0,
      players: [theirs],
      roundResults: [
        { roundNumber: 1, healthAfter: 4500 },
        { roundNumber: 2, healthAfter: 0 },
      ],
    },
  ];
}

function rawDuel(over: Json = {}): Json {
  return {
    gameId: 'duel-1',
    currentRoundNumber: 2,
    teams: teams(),
    rounds: [
      {
        roundNumber: 1,
        panorama: { lat: 48.85, lng: 2.35, countryCode: 'FR' },
        damageMultiplier: 1,
        startTime: '2024-05-01T18:00:00.000Z',
      },
      {
        roundNumber: 2,
        panorama: { lat: 52.5, lng: 13.4, countryCode: 'DE' },
        damageMultiplier: 1.5,
        startTime: '2024-05-01T18:02:00.000Z',
      },
      { roundNumber: 3, panorama: { lat: 0, lng: 0 }, startTime: null },
    ],
    options: {
      map: { name: 'A Diverse World' },
      competitiveGameMode: 'StandardDuels',
      movementOptions: { forbidMoving: false, forbidZooming: false, forbidRotating: false },
    },
    result: { isDraw: false },
    ...over,
  };
}

describe('duelToRecord', () => {
  it('normalizes a duel from the player side', () => {
    expect(duelToRecord(rawDuel(), 'me')).toEqual({
      gameId: 'duel-1',
      mode: 'Moving',
      startedAt: '2024-05-01T18:00:00.000Z',
      mapName: 'A Diverse World',
      movement: { moving: true, zooming: true, rotating: true },
      playerHealth: [6000, 6000],
      opponentHealth: [4500, 0],
      rounds: [
        {
          roundIndex: 0,
          playerScore: 4500,
          opponentScore: 3000,
          playerTimedOut: false,
          playerGuess: { lat: 48.8, lng: 2.3 },
          opponentGuess: { lat: 45.7, lng: 4.8 },
          actualLocation: { lat: 48.85, lng: 2.35, countryCode: 'fr' },
          playerDistanceKm: 12,
          opponentDistanceKm: 300,
          damageMultiplier: 1,
        },
        {
          roundIndex: 1,
          playerScore: 5000,
          opponentScore: 0,
          playerTimedOut: false,
          playerGuess: { lat: 52.5, lng: 13.4 },
          opponentGuess: null,
          actualLocation: { lat: 52.5, lng: 13.4, countryCode: 'de' },
          playerDistanceKm: 0,
          opponentDistanceKm: null,
          damageMultiplier: 1.5,
        },
      ],
      ratingBefore: 900,
      ratingAfter: 912,
      opponentRating: null,
      opponent: { playerId: 'them', name: 'Them', nationality: 'de' },
      isDraw: false,
    });
  });

  it('can be read from the other side', () => {
    const record = duelToRecord(rawDuel(), 'them');
    expect(record.playerHealth).toEqual([4500, 0]);
    expect(record.opponentHealth).toEqual([6000, 6000]);
    expect(record.opponent).toEqual({ playerId: 'me', name: 'Me', nationality: 'se' });
    expect(record.ratingBefore).toBeNull();
    expect(record.ratingAfter).toBeNull();
    expect(record.opponentRating).toBe(912);
    expect(record.rounds[1]).toMatchObject({ playerTimedOut: true, playerGuess: null, playerDistanceKm: null, playerScore: 0 });
  });

  it('falls back through the rating sources', () => {
    const ranked = rawDuel({
      teams: teams(me({ progressChange: { rankedSystemProgress: { ratingBefore: 1200, ratingAfter: 1190 } } })),
    });
    expect(duelToRecord(ranked, 'me')).toMatchObject({ ratingBefore: 1200, ratingAfter: 1190 });

    const emptyCompetitive = rawDuel({
      teams: teams(
        me({
          progressChange: {
            competitiveProgress: { ratingBefore: null, ratingAfter: null },
            rankedSystemProgress: { ratingBefore: 1200, ratingAfter: 1190 },
          },
        }),
      ),
    });
    expect(duelToRecord(emptyCompetitive, 'me')).toMatchObject({ ratingBefore: 1200, ratingAfter: 1190 });

    const plain = rawDuel({ teams: teams(me({ progressChange: null, rating: 1100 })) });
    expect(duelToRecord(plain, 'me')).toMatchObject({ ratingBefore: null, ratingAfter: 1100 });

    const placement = rawDuel({
      teams: teams(me({ progressChange: { competitiveProgress: { ratingAfter: null } }, rating: 0 })),
    });
    expect(duelToRecord(placement, 'me')).toMatchObject({ ratingBefore: null, ratingAfter: null });
  });

  it('records the opponent rating', () => {
    const rated = rawDuel({ teams: teams(me(), them({ rating: 1300 })) });
    expect(duelToRecord(rated, 'me').opponentRating).toBe(1300);

    const progressed = rawDuel({
      teams: teams(me(), them({ rating: 1300, progressChange: { competitiveProgress: { ratingAfter: 1310 } } })),
    });
    expect(duelToRecord(progressed, 'me').opponentRating).toBe(1310);
  });

  it('computes the distance from coordinates when the server did not send one', () => {
    const guesses = [
      { roundNumber: 1, lat: 48.85, lng: 2.35, score: 5000 },
      { roundNumber: 2, lat: 52.5, lng: 13.4, score: 5000 },
    ];
    const record = duelToRecord(rawDuel({ teams: teams(me({ guesses })) }), 'me');
    expect(record.rounds[0].playerDistanceKm).toBe(0);
  });

  it('repeats the final health when per-round results are missing', () => {
    const [mine, theirs] = teams();
    const record = duelToRecord(
      rawDuel({ teams: [{ ...mine, roundResults: [] }, { ...theirs, roundResults: [] }] }),
      'me',
    );
    expect(record.playerHealth).toEqual([6000, 6000]);
    expect(record.opponentHealth).toEqual([0, 0]);
  });

  it('rejects payloads it cannot normalize', () => {
    expect(() => duelToRecord(rawDuel({ teams: teams().slice(0, 1) }), 'me')).toThrow(
      new MalformedRecordError('duel-1', 'fewer than two teams'),
    );
    expect(() => duelToRecord(rawDuel(), 'nobody')).toThrow('Game duel-1: player nobody did not take part');
    expect(() => duelToRecord(rawDuel({ rounds: [] }), 'me')).toThrow('Game duel-1: no round start time');
    expect(() => duelToRecord('not a duel', 'me')).toThrow(MalformedRecordError);
  });
});

describe('classifyMode', () => {
  const free = { moving: true, zooming: true, rotating: true };

  it.each([
    ['NmpzDuels', free, 'NMPZ'],
    ['NoMoveDuels', free, 'NoMove'],
    ['StandardDuels', null, 'Moving'],
    [null, { moving: false, zooming: false, rotating: false }, 'NMPZ'],
    [null, { moving: false, zooming: true, rotating: true }, 'NoMove'],
    [null, free, 'Moving'],
    [undefined, null, 'Other'],
  ] as const)('classifies %s with %o as %s', (competitive, movement, expected) => {
    expect(classifyMode(competitive, movement)).toBe(expected);
  });
});
