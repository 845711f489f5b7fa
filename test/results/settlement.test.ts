import { describe, it, expect } from 'vitest';
import { finalScoreOf, settleFinished, settlePick } from '../../src/results/settlement.js';
import { fixture, pick } from '../helpers/builders.js';

const SETTLED_AT = new Date('2026-03-21T18:00:00Z');

describe('settlePick', () => {
  it('grades the recommended market', () => {
    const settled = settlePick(pick(), { home: 0, away: 2 }, SETTLED_AT);
    expect(settled.status).toBe('LOSS');
    expect(settled.reason).toBe('0-2');
    expect(settled.settledAt).toBe('2026-03-21T18:00:00.000Z');
  });

  it('keeps the stored model output', () => {
    const before = pick();
    const settled = settlePick(before, { home: 1, away: 1 }, SETTLED_AT);
    expect(settled.status).toBe('WIN');
    expect(settled.probs).toEqual(before.probs);
    expect(settled.candidates).toEqual(before.candidates);
  });

  it('pushes a pick without a recommendation', () => {
    const settled = settlePick(pick({ candidates: [], best: null }), { home: 1, away: 0 }, SETTLED_AT);
    expect(settled.status).toBe('PUSH');
    expect(settled.reason).toBe('No recommendation');
  });

  it('leaves a settled pick untouched', () => {
    const done = pick({ status: 'WIN', reason: '2-0', settledAt: '2026-03-21T17:00:00.000Z' });
    expect(settlePick(done, { home: 0, away: 3 }, SETTLED_AT)).toBe(done);
  });
});

describe('finalScoreOf', () => {
  it('returns the score of a finished fixture only', () => {
    expect(finalScoreOf(fixture({ status: 'finished', score: { home: 2, away: 2 } }))).toEqual({ home: 2, away: 2 });
    expect(finalScoreOf(fixture({ status: 'live', score: { home: 1, away: 0 } }))).toBeNull();
    expect(finalScoreOf(fixture({ status: 'finished', score: null }))).toBeNull();
  });
});

describe('settleFinished', () => {
  it('settles pending picks with a final score', () => {
    const picks = [
      pick({ fixtureId: 'a' }),
      pick({ fixtureId: 'b' }),
      pick({ fixtureId: 'c' }),
      pick({ fixtureId: 'd', status: 'LOSS', reason: '0-1', settledAt: '2026-03-20T18:00:00.000Z' }),
    ];
    const fixtures = [
      fixture({ id: 'a', status: 'finished', score: { home: 3, away: 1 } }),
      fixture({ id: 'b', status: 'live', score: null }),
      fixture({ id: 'c', status: 'finished', score: null }),
      fixture({ id: 'd', status: 'finished', score: { home: 2, away: 0 } }),
    ];

    const batch = settleFinished(picks, fixtures, SETTLED_AT);
    expect(batch.settled).toBe(1);
    expect(batch.picks.map((p) => p.status)).toEqual(['WIN', 'PENDING', 'PENDING', 'LOSS']);
    expect(batch.picks[3]).toBe(picks[3]);
  });
});
