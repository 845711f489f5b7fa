import type { GoalRateOverrides, TeamMatchRecord } from '../types/fixture.js';
import type { GoalRateEstimate, LeagueBaselines, RateSource, TeamStrength } from '../types/strength.js';
import type { EngineConfig } from './engine-config.js';
import { computeVenueForm } from './team-strength.js';

export type RateBand = Pick<EngineConfig, 'lambdaMin' | 'lambdaMax'>;

/** Clamp into the band; NaN and non-positive values land on the lower edge. */
export function clampRate(x: number, band: RateBand): number {
  if (Number.isNaN(x)) return band.lambdaMin;
  return Math.max(band.lambdaMin, Math.min(band.lambdaMax, x));
}

function validOverride(x: number | undefined): x is number {
  return x !== undefined && Number.isFinite(x) && x > 0;
}

function finalize(
  home: number,
  away: number,
  source: RateSource,
  overrides: GoalRateOverrides | undefined,
  band: RateBand,
): GoalRateEstimate {
  const oh = overrides?.home;
  const oa = overrides?.away;
  const overridden = validOverride(oh) || validOverride(oa);
  return {
    home: clampRate(validOverride(oh) ? oh : home, band),
    away: clampRate(validOverride(oa) ? oa : away, band),
    source: overridden ? 'override' : source,
  };
}

export interface GoalRateInput {
  homeTeam: string;
  awayTeam: string;
  baselines: LeagueBaselines;
  strengths: ReadonlyMap<string, TeamStrength>;
  overrides?: GoalRateOverrides;
}

/**
 * λ_home = avgHome × attackHome(home) × defenseAway(away)
 * λ_away = avgAway × attackAway(away) × defenseHome(home)
 *
 * Without a strength record for either side the league baselines are used as is.
 */
export function estimateGoalRates(input: GoalRateInput, band: RateBand): GoalRateEstimate {
  const { avgHomeGoals, avgAwayGoals } = input.baselines;
  const home = input.strengths.get(input.homeTeam);
  const away = input.strengths.get(input.awayTeam);

  if (!home || !away) {
    return finalize(avgHomeGoals, avgAwayGoals, 'baseline', input.overrides, band);
  }

  const lambdaHome = avgHomeGoals * home.attackHome * away.defenseAway;
  const lambdaAway = avgAwayGoals * away.attackAway * home.defenseHome;
  return finalize(lambdaHome, lambdaAway, 'strength', input.overrides, band);
}

export interface SplitRateInput {
  homeTeam: string;
  awayTeam: string;
  /** Recent matches of the home team (any venue) */
  homeHistory: readonly TeamMatchRecord[];
  /** Recent matches of the away team (any venue) */
  awayHistory: readonly TeamMatchRecord[];
  overrides?: GoalRateOverrides;
}

export type SplitRateConfig = RateBand & Pick<EngineConfig, 'defaultRates' | 'formBlend'>;

/**
 * Home side's form at home against the away side's form away, each
 * recency-weighted, then blended with the default rates.
 */
export function estimateSplitRates(input: SplitRateInput, config: SplitRateConfig): GoalRateEstimate {
  const { defaultRates, formBlend } = config;
  const homeForm = computeVenueForm(input.homeHistory, input.homeTeam, 'home');
  const awayForm = computeVenueForm(input.awayHistory, input.awayTeam, 'away');

  if (homeForm.n === 0 || awayForm.n === 0) {
    return finalize(defaultRates.home, defaultRates.away, 'baseline', input.overrides, config);
  }

  const rawHome = (homeForm.goalsForAvg + awayForm.goalsAgainstAvg) / 2;
  const rawAway = (awayForm.goalsForAvg + homeForm.goalsAgainstAvg) / 2;

  const lambdaHome = rawHome * formBlend + defaultRates.home * (1 - formBlend);
  const lambdaAway = rawAway * formBlend + defaultRates.away * (1 - formBlend);
  return finalize(lambdaHome, lambdaAway, 'form', input.overrides, config);
}
