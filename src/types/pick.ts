import type { Candidate, MarketProbabilities } from './market.js';
import type { RateSource } from './strength.js';

export type Outcome = 'WIN' | 'LOSS' | 'PUSH';
export type PickStatus = 'PENDING' | Outcome;

export interface Pick {
  fixtureId: string;
  league: string;
  homeTeam: string;
  awayTeam: string;
  kickoff: string;
  lambdaHome: number;
  lambdaAway: number;
  rateSource: RateSource;
  probs: MarketProbabilities;
  candidates: Candidate[];
  best: Candidate | null;
  status: PickStatus;
  /** Settlement justification, e.g. 'Total 2 (<=2)' */
  reason: string | null;
  computedAt: string;
  settledAt: string | null;
}

export interface Evaluation {
  result: Outcome;
  reason: string;
}
