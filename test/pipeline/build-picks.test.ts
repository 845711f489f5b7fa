import { describe, it, expect } from 'vitest';
import { buildPick, estimateFixtureRates, refreshPicks, type RateInputs } from '../../src/pipeline/build-picks.js';
import { buildEngineConfig, DEFAULT_ENGINE_CONFIG } from '../../src/model/engine-config.js';
import { buildStrengthSnapshot } from '../../src/model/team-strength.js';
import { selectBestCandidate } from '../../src/picks/selector.js';
import { fixture, match, pick, record } from '../helpers/builders.js';

const NOW = new Date('2026-03-20T09:00:00Z');

// baselines: home (2 + 1) / 2 = 1.5, away (1 + 1) / 2 = 1
const HISTORY = [...match('A', 'B', 2, 1, '2026-03-10T15:00:00Z'), ...match('B', 'A', 1, 1, '2026-03-14T15:00:00Z')];

const aggregate: RateInputs = {
  model: 'aggregate',
  snapshot: buildStrengthSnapshot(HISTORY, {
    asOf: NOW,
    daysBack: 30,
    fallbackBaselines: DEFAULT_ENGINE_CONFIG.fallbackBaselines,
  }),
};

describe('estimateFixtureRates', () => {
  it('uses team strengths when both sides are known', () => {
    const rates = estimateFixtureRates(fixture({ homeTeam: 'A', awayTeam: 'B' }), aggregate, DEFAULT_ENGINE_CONFIG, NOW);
    expect(rates.source).toBe('strength');
    expect(rates.home).toBeCloseTo(8 / 3, 10);
    expect(rates.away).toBeCloseTo(1, 10);
  });

  it('falls back to the league baselines for unknown teams', () => {
    const rates = estimateFixtureRates(fixture(), aggregate, DEFAULT_ENGINE_CONFIG, NOW);
    expect(rates).toEqual({ home: 1.5, away: 1, source: 'baseline' });
  });

  it('reads venue form within the lookback window in the split model', () => {
    const split: RateInputs = {
      model: 'split',
      histories: new Map([
        [
          'H',
          [
            record('H', 'X', 'home', 2, 0, '2026-03-10T15:00:00Z'),
            record('H', 'Z', 'home', 5, 0, '2026-01-01T15:00:00Z'),
          ],
        ],
        ['V', [record('V', 'Y', 'away', 1, 3, '2026-03-11T15:00:00Z')]],
      ]),
    };
    const rates = estimateFixtureRates(
      fixture({ homeTeam: 'H', awayTeam: 'V' }),
      split,
      buildEngineConfig({ model: 'split' }),
      NOW,
    );
    expect(rates.source).toBe('form');
    expect(rates.home).toBeCloseTo(2.2375, 10);
    expect(rates.away).toBeCloseTo(0.6625, 10);
  });
});

describe('buildPick', () => {
  it('produces a pending pick with consistent output', () => {
    const p = buildPick(fixture({ homeTeam: 'A', awayTeam: 'B' }), aggregate, DEFAULT_ENGINE_CONFIG, NOW);
    expect(p.status).toBe('PENDING');
    expect(p.computedAt).toBe('2026-03-20T09:00:00.000Z');
    expect(p.probs['1x']).toBe(p.probs.home + p.probs.draw);
    expect(p.candidates.every((c) => c.prob >= 0.5)).toBe(true);
    expect(p.best).toEqual(selectBestCandidate(p.candidates, DEFAULT_ENGINE_CONFIG));
  });

  it('is idempotent for the same inputs', () => {
    const f = fixture({ homeTeam: 'A', awayTeam: 'B' });
    expect(buildPick(f, aggregate, DEFAULT_ENGINE_CONFIG, NOW)).toEqual(
      buildPick(f, aggregate, DEFAULT_ENGINE_CONFIG, NOW),
    );
  });

  it('recommends home or draw for a lopsided override', () => {
    const p = buildPick(fixture({ overrides: { home: 4.5, away: 0.1 } }), aggregate, DEFAULT_ENGINE_CONFIG, NOW);
    expect(p.rateSource).toBe('override');
    expect(p.lambdaHome).toBe(4.5);
    expect(p.best?.market).toBe('1x');
  });

  it('has no recommendation when no market clears the threshold', () => {
    const strict = buildEngineConfig({ minProb: 1 });
    const p = buildPick(fixture(), aggregate, strict, NOW);
    expect(p.candidates).toEqual([]);
    expect(p.best).toBeNull();
  });
});

describe('refreshPicks', () => {
  const fixtures = [
    fixture({ id: 'f-sched', status: 'scheduled', kickoff: '2026-03-21T15:00:00Z' }),
    fixture({ id: 'f-live', status: 'live', kickoff: '2026-03-20T08:00:00Z' }),
    fixture({ id: 'f-fin', status: 'finished', score: { home: 3, away: 0 }, kickoff: '2026-03-19T15:00:00Z' }),
    fixture({ id: 'f-noprior', status: 'finished', score: { home: 1, away: 0 }, kickoff: '2026-03-19T17:00:00Z' }),
    fixture({ id: 'f-done', status: 'finished', score: { home: 0, away: 1 }, kickoff: '2026-03-18T15:00:00Z' }),
  ];
  const existing = [
    pick({ fixtureId: 'f-live' }),
    pick({ fixtureId: 'f-fin' }),
    pick({ fixtureId: 'f-done', status: 'LOSS', reason: '0-1', settledAt: '2026-03-18T17:00:00.000Z' }),
    pick({ fixtureId: 'f-gone' }),
  ];

  it('rebuilds scheduled fixtures and settles finished ones once', () => {
    const outcome = refreshPicks(fixtures, existing, aggregate, DEFAULT_ENGINE_CONFIG, NOW);

    expect(outcome.picks.map((p) => p.fixtureId)).toEqual(['f-done', 'f-fin', 'f-live', 'f-sched', 'f-gone']);
    expect(outcome.built.map((p) => p.fixtureId)).toEqual(['f-sched']);
    expect(outcome.settled).toHaveLength(1);
    expect(outcome.settled[0]).toMatchObject({
      fixtureId: 'f-fin',
      status: 'WIN',
      reason: '3-0',
      settledAt: '2026-03-20T09:00:00.000Z',
    });
  });

  it('keeps live and already settled picks as they are', () => {
    const outcome = refreshPicks(fixtures, existing, aggregate, DEFAULT_ENGINE_CONFIG, NOW);
    expect(outcome.picks[0]).toBe(existing[2]);
    expect(outcome.picks[2]).toBe(existing[0]);
  });

  it('gives the same result when repeated with the same inputs', () => {
    expect(refreshPicks(fixtures, existing, aggregate, DEFAULT_ENGINE_CONFIG, NOW)).toEqual(
      refreshPicks(fixtures, existing, aggregate, DEFAULT_ENGINE_CONFIG, NOW),
    );
  });
});
