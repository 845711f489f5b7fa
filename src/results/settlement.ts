import type { Fixture, FinalScore } from '../types/fixture.js';
import type { Pick } from '../types/pick.js';
import { gradeMarket } from './grader.js';

/**
 * Move a PENDING pick to its terminal status. Already settled picks are
 * returned unchanged, so settlement happens exactly once.
 */
export function settlePick(pick: Pick, score: FinalScore, settledAt: Date = new Date()): Pick {
  if (pick.status !== 'PENDING') return pick;

  const { result, reason } = pick.best
    ? gradeMarket(pick.best.market, score)
    : { result: 'PUSH' as const, reason: 'No recommendation' };

  return { ...pick, status: result, reason, settledAt: settledAt.toISOString() };
}

/** Final score of a fixture, or null while it is not finished. */
export function finalScoreOf(fixture: Fixture): FinalScore | null {
  if (fixture.status !== 'finished' || !fixture.score) return null;
  return fixture.score;
}

export interface SettlementBatch {
  picks: Pick[];
  settled: number;
}

/** Settle every pending pick whose fixture has a final score. */
export function settleFinished(
  picks: readonly Pick[],
  fixtures: readonly Fixture[],
  settledAt: Date = new Date(),
): SettlementBatch {
  const scores = new Map<string, FinalScore>();
  for (const f of fixtures) {
    const score = finalScoreOf(f);
    if (score) scores.set(f.id, score);
  }

  let settled = 0;
  const out = picks.map((pick) => {
    const score = scores.get(pick.fixtureId);
    if (!score || pick.status !== 'PENDING') return pick;
    settled++;
    return settlePick(pick, score, settledAt);
  });

  return { picks: out, settled };
}
