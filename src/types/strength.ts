export interface LeagueBaselines {
  avgHomeGoals: number;
  avgAwayGoals: number;
  /** Number of distinct matches the averages were computed from */
  matches: number;
}

export interface TeamStrength {
  attackHome: number;
  defenseHome: number;
  attackAway: number;
  defenseAway: number;
  homeScoredAvg: number;
  homeConcededAvg: number;
  awayScoredAvg: number;
  awayConcededAvg: number;
  homeGames: number;
  awayGames: number;
}

/** Recency-weighted averages of a team's matches at one venue. */
export interface VenueForm {
  goalsForAvg: number;
  goalsAgainstAvg: number;
  n: number;
}

export type RateSource = 'strength' | 'form' | 'override' | 'baseline';

export interface GoalRateEstimate {
  home: number;
  away: number;
  source: RateSource;
}
