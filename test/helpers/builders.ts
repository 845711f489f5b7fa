import type { Fixture, TeamMatchRecord, Venue } from '../../src/types/fixture.js';
import type { MarketProbabilities } from '../../src/types/market.js';
import type { Pick } from '../../src/types/pick.js';

export function record(
  team: string,
  opponent: string,
  venue: Venue,
  goalsFor: number | null,
  goalsAgainst: number | null,
  date: string,
): TeamMatchRecord {
  return { team, opponent, venue, goalsFor, goalsAgainst, date };
}

/** Both sides' records of one finished match. */
export function match(home: string, away: string, hg: number, ag: number, date: string): TeamMatchRecord[] {
  return [record(home, away, 'home', hg, ag, date), record(away, home, 'away', ag, hg, date)];
}

export function fixture(overrides: Partial<Fixture> = {}): Fixture {
  return {
    id: 'fx-1',
    league: 'PL',
    homeTeam: 'Home FC',
    awayTeam: 'Away FC',
    homeTeamId: 1,
    awayTeamId: 2,
    kickoff: '2026-03-21T15:00:00Z',
    status: 'scheduled',
    score: null,
    ...overrides,
  };
}

export const FLAT_PROBS: MarketProbabilities = {
  home: 0.45,
  draw: 0.27,
  away: 0.28,
  '1x': 0.72,
  x2: 0.55,
  '12': 0.73,
  over_15: 0.72,
  over_25: 0.48,
  under_25: 0.52,
  btts_yes: 0.5,
  btts_no: 0.5,
};

export function pick(overrides: Partial<Pick> = {}): Pick {
  return {
    fixtureId: 'fx-1',
    league: 'PL',
    homeTeam: 'Home FC',
    awayTeam: 'Away FC',
    kickoff: '2026-03-21T15:00:00Z',
    lambdaHome: 1.5,
    lambdaAway: 1.2,
    rateSource: 'baseline',
    probs: FLAT_PROBS,
    candidates: [{ market: '1x', label: '1X', prob: 0.72, fair: 1.39 }],
    best: { market: '1x', label: '1X', prob: 0.72, fair: 1.39 },
    status: 'PENDING',
    reason: null,
    computedAt: '2026-03-20T09:00:00.000Z',
    settledAt: null,
    ...overrides,
  };
}
