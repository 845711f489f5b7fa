export type FixtureStatus = 'scheduled' | 'live' | 'finished';
export type Venue = 'home' | 'away';

export interface FinalScore {
  home: number;
  away: number;
}

/** Direct goal-rate inputs supplied with a fixture (e.g. an external xG feed). */
export interface GoalRateOverrides {
  home?: number;
  away?: number;
}

export interface Fixture {
  id: string;
  league: string;
  homeTeam: string;
  awayTeam: string;
  /** Data-provider team ids, used to look up recent form */
  homeTeamId: number | null;
  awayTeamId: number | null;
  /** ISO timestamp, e.g. '2026-03-14T15:00:00Z' */
  kickoff: string;
  status: FixtureStatus;
  score: FinalScore | null;
  overrides?: GoalRateOverrides;
}

/**
 * One finished match seen from a single team's side.
 * Goal counts are null when the source record is incomplete.
 */
export interface TeamMatchRecord {
  readonly team: string;
  readonly opponent: string;
  readonly venue: Venue;
  readonly goalsFor: number | null;
  readonly goalsAgainst: number | null;
  /** ISO date or timestamp */
  readonly date: string;
}

/** A finished match folded from one or two team-perspective records. */
export interface FinishedMatch {
  homeTeam: string;
  awayTeam: string;
  homeGoals: number;
  awayGoals: number;
  date: string;
}
