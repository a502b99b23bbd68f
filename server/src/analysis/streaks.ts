import type { GameFact, Outcome } from './facts';

export type Streak = {
  outcome: 'Win' | 'Loss';
  length: number;
  fromGameId: string;
  toGameId: string;
  from: string;
  to: string;
};

export type StreakStats = {
  /** Decided games the runs were computed over. */
  sampleCount: number;
  current: Streak | null;
  longest: Streak | null;
  longestWin: number;
  longestLoss: number;
};

type Run = { outcome: Outcome; games: Pick<GameFact, 'gameId' | 'startedAt'>[] };

function toStreak(run: Run): Streak | null {
  if (run.outcome === 'Draw') return null;
  const first = run.games[0];
  const last = run.games[run.games.length - 1];
  return {
    outcome: run.outcome,
    length: run.games.length,
    fromGameId: first.gameId,
    toGameId: last.gameId,
    from: first.startedAt,
    to: last.startedAt,
  };
}

/**
 * Maximal runs of equal outcomes over chronologically ordered games.
 * Undecided games are ignored; a draw ends a run without starting a streak.
 * Equal-length longest runs resolve to the most recent one.
 */
export function computeStreaks(games: readonly Pick<GameFact, 'gameId' | 'startedAt' | 'outcome'>[]): StreakStats {
  const runs: Run[] = [];
  let sampleCount = 0;

  for (const g of games) {
    if (g.outcome === null) continue;
    sampleCount++;
    const tail = runs[runs.length - 1];
    if (tail && tail.outcome === g.outcome) tail.games.push(g);
    else runs.push({ outcome: g.outcome, games: [g] });
  }

  let longest: Streak | null = null;
  let longestWin = 0;
  let longestLoss = 0;
  for (const run of runs) {
    const streak = toStreak(run);
    if (!streak) continue;
    if (streak.outcome === 'Win') longestWin = Math.max(longestWin, streak.length);
    else longestLoss = Math.max(longestLoss, streak.length);
    if (!longest || streak.length >= longest.length) longest = streak;
  }

  const lastRun = runs[runs.length - 1];
  return {
    sampleCount,
    current: lastRun ? toStreak(lastRun) : null,
    longest,
    longestWin,
    longestLoss,
  };
}
