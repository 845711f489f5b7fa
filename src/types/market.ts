export type MarketKey =
  | 'home'
  | 'draw'
  | 'away'
  | '1x'
  | 'x2'
  | '12'
  | 'over_15'
  | 'over_25'
  | 'under_25'
  | 'btts_yes'
  | 'btts_no';

export type ParsedMarket = MarketKey | 'unsupported';

export type MarketProbabilities = Record<MarketKey, number>;

export interface Candidate {
  market: MarketKey;
  /** Display label, e.g. 'Over 2.5' */
  label: string;
  /** Rounded to 4 decimals */
  prob: number;
  /** 1 / prob rounded to 2 decimals; absent when prob is 0 */
  fair?: number;
}
