import { describe, it, expect } from 'vitest';
import {
  buildStrengthSnapshot,
  collectMatches,
  computeLeagueBaselines,
  computeTeamStrengths,
  computeVenueForm,
  recentForTeam,
  selectWindow,
} from '../../src/model/team-strength.js';
import { match, record } from '../helpers/builders.js';

const FALLBACK = { home: 1.5, away: 1.2 };

// A 2-1 B, B 0-0 A, A 3-1 C (only A's side reported)
const RECORDS = [
  ...match('A', 'B', 2, 1, '2026-03-01T15:00:00Z'),
  ...match('B', 'A', 0, 0, '2026-03-08T15:00:00Z'),
  record('A', 'C', 'home', 3, 1, '2026-03-15T15:00:00Z'),
];

describe('collectMatches', () => {
  it('keeps a match reported by both sides once', () => {
    const matches = collectMatches(RECORDS);
    expect(matches).toHaveLength(3);
    expect(matches[0]).toEqual({
      homeTeam: 'A',
      awayTeam: 'B',
      homeGoals: 2,
      awayGoals: 1,
      date: '2026-03-01T15:00:00Z',
    });
  });

  it('skips records with missing goals', () => {
    const withBad = [...RECORDS, record('D', 'E', 'home', null, 1, '2026-03-10T15:00:00Z')];
    expect(collectMatches(withBad)).toHaveLength(3);
  });
});

describe('computeLeagueBaselines', () => {
  it('averages home and away goals per distinct match', () => {
    const b = computeLeagueBaselines(RECORDS, FALLBACK);
    expect(b.matches).toBe(3);
    expect(b.avgHomeGoals).toBeCloseTo(5 / 3, 12);
    expect(b.avgAwayGoals).toBeCloseTo(2 / 3, 12);
  });

  it('falls back when there is nothing to average', () => {
    expect(computeLeagueBaselines([], FALLBACK)).toEqual({ avgHomeGoals: 1.5, avgAwayGoals: 1.2, matches: 0 });
  });
});

describe('computeTeamStrengths', () => {
  const baselines = computeLeagueBaselines(RECORDS, FALLBACK);
  const strengths = computeTeamStrengths(RECORDS, baselines);

  it('computes multipliers relative to the baselines', () => {
    const a = strengths.get('A');
    expect(a?.homeGames).toBe(2);
    expect(a?.awayGames).toBe(1);
    expect(a?.attackHome).toBeCloseTo(1.5, 10);
    expect(a?.defenseHome).toBeCloseTo(1.5, 10);
    expect(a?.attackAway).toBe(0);

    const b = strengths.get('B');
    expect(b?.attackAway).toBeCloseTo(1.5, 10);
    expect(b?.defenseAway).toBeCloseTo(1.2, 10);
  });

  it('leaves out teams without both a home and an away match', () => {
    expect(strengths.has('C')).toBe(false);
  });

  it('uses a neutral multiplier against a zero baseline', () => {
    const goalless = match('X', 'Y', 0, 0, '2026-03-01T15:00:00Z').concat(
      match('Y', 'X', 0, 0, '2026-03-08T15:00:00Z'),
    );
    const s = computeTeamStrengths(goalless, computeLeagueBaselines(goalless, FALLBACK));
    expect(s.get('X')?.attackHome).toBe(1);
    expect(s.get('X')?.defenseAway).toBe(1);
  });
});

describe('selectWindow', () => {
  it('keeps records in (asOf - daysBack, asOf]', () => {
    const records = [
      record('A', 'B', 'home', 1, 0, '2026-03-08T15:00:00Z'),
      record('A', 'C', 'home', 2, 0, '2026-03-15T15:00:00Z'),
      record('A', 'D', 'home', 3, 0, '2026-03-21T15:00:00Z'),
    ];
    const window = selectWindow(records, { asOf: new Date('2026-03-20T00:00:00Z'), daysBack: 10 });
    expect(window.map((r) => r.opponent)).toEqual(['C']);
  });
});

describe('recentForTeam', () => {
  it('returns the newest records first up to the limit', () => {
    const recent = recentForTeam(RECORDS, 'A', 2);
    expect(recent.map((r) => r.date)).toEqual(['2026-03-15T15:00:00Z', '2026-03-08T15:00:00Z']);
  });
});

describe('computeVenueForm', () => {
  it('weights matches by their position in the full history', () => {
    const form = computeVenueForm(RECORDS, 'A', 'home');
    expect(form.n).toBe(2);
    // 3-1 at weight 1.5, the away 0-0 takes 1.35, 2-1 at weight 1.25
    expect(form.goalsForAvg).toBeCloseTo(7 / 2.75, 10);
    expect(form.goalsAgainstAvg).toBeCloseTo(1, 10);
  });

  it('lets a newer away match push the home sample down the weight schedule', () => {
    const records = [
      record('T', 'U', 'away', 0, 0, '2026-03-15T15:00:00Z'),
      record('T', 'V', 'home', 3, 0, '2026-03-08T15:00:00Z'),
      record('T', 'W', 'home', 1, 0, '2026-03-01T15:00:00Z'),
    ];
    const form = computeVenueForm(records, 'T', 'home');
    expect(form.n).toBe(2);
    // (3 * 1.35 + 1 * 1.25) / (1.35 + 1.25)
    expect(form.goalsForAvg).toBeCloseTo(5.3 / 2.6, 10);
    expect(form.goalsAgainstAvg).toBe(0);
  });

  it('reports n = 0 without records at the venue', () => {
    expect(computeVenueForm(RECORDS, 'C', 'home')).toEqual({ goalsForAvg: 0, goalsAgainstAvg: 0, n: 0 });
  });
});

describe('buildStrengthSnapshot', () => {
  it('derives baselines from the window only', () => {
    const snapshot = buildStrengthSnapshot(RECORDS, {
      asOf: new Date('2026-03-20T00:00:00Z'),
      daysBack: 10,
      fallbackBaselines: FALLBACK,
    });
    expect(snapshot.baselines).toEqual({ avgHomeGoals: 3, avgAwayGoals: 1, matches: 1 });
    expect(snapshot.strengths.size).toBe(0);
  });
});
