import type { EngineConfig } from '../model/engine-config.js';
import { estimateGoalRates, estimateSplitRates } from '../model/goal-rate.js';
import { marketProbabilities } from '../model/poisson.js';
import { recentForTeam, selectWindow, type StrengthSnapshot } from '../model/team-strength.js';
import { buildCandidates } from '../picks/candidates.js';
import { selectBestCandidate } from '../picks/selector.js';
import { finalScoreOf, settlePick } from '../results/settlement.js';
import type { Fixture, TeamMatchRecord } from '../types/fixture.js';
import type { Pick } from '../types/pick.js';
import type { GoalRateEstimate } from '../types/strength.js';

/** What the configured goal-rate model needs for one refresh cycle. */
export type RateInputs =
  | { model: 'aggregate'; snapshot: StrengthSnapshot }
  | { model: 'split'; histories: ReadonlyMap<string, readonly TeamMatchRecord[]> };

export function estimateFixtureRates(
  fixture: Fixture,
  inputs: RateInputs,
  config: EngineConfig,
  asOf: Date,
): GoalRateEstimate {
  if (inputs.model === 'aggregate') {
    return estimateGoalRates(
      {
        homeTeam: fixture.homeTeam,
        awayTeam: fixture.awayTeam,
        baselines: inputs.snapshot.baselines,
        strengths: inputs.snapshot.strengths,
        overrides: fixture.overrides,
      },
      config,
    );
  }

  const recent = (team: string) =>
    recentForTeam(
      selectWindow(inputs.histories.get(team) ?? [], { asOf, daysBack: config.formDaysBack }),
      team,
      config.formLimit,
    );

  return estimateSplitRates(
    {
      homeTeam: fixture.homeTeam,
      awayTeam: fixture.awayTeam,
      homeHistory: recent(fixture.homeTeam),
      awayHistory: recent(fixture.awayTeam),
      overrides: fixture.overrides,
    },
    config,
  );
}

/** Full prediction for one fixture: rates, market probabilities, candidates, best market. */
export function buildPick(
  fixture: Fixture,
  inputs: RateInputs,
  config: EngineConfig,
  computedAt: Date = new Date(),
): Pick {
  const rates = estimateFixtureRates(fixture, inputs, config, computedAt);
  const probs = marketProbabilities(rates.home, rates.away, config.maxGoals);
  const candidates = buildCandidates(probs, config);
  const best = selectBestCandidate(candidates, config);

  return {
    fixtureId: fixture.id,
    league: fixture.league,
    homeTeam: fixture.homeTeam,
    awayTeam: fixture.awayTeam,
    kickoff: fixture.kickoff,
    lambdaHome: rates.home,
    lambdaAway: rates.away,
    rateSource: rates.source,
    probs,
    candidates,
    best,
    status: 'PENDING',
    reason: null,
    computedAt: computedAt.toISOString(),
    settledAt: null,
  };
}

export interface RefreshOutcome {
  /** Every pick after the cycle, fixtures in kickoff order first */
  picks: Pick[];
  /** Picks computed in this cycle */
  built: Pick[];
  /** Picks that moved from PENDING to a terminal status in this cycle */
  settled: Pick[];
}

function byKickoff(a: Fixture, b: Fixture): number {
  return Date.parse(a.kickoff) - Date.parse(b.kickoff);
}

/**
 * One refresh cycle over a league's fixtures.
 *
 * Scheduled fixtures get a freshly computed pick. Live and finished
 * fixtures keep the probabilities of their existing pick; finished ones
 * are settled once. Existing picks for fixtures no longer listed are
 * carried over unchanged.
 */
export function refreshPicks(
  fixtures: readonly Fixture[],
  existing: readonly Pick[],
  inputs: RateInputs,
  config: EngineConfig,
  now: Date = new Date(),
): RefreshOutcome {
  const previous = new Map(existing.map((p) => [p.fixtureId, p]));
  const seen = new Set<string>();
  const picks: Pick[] = [];
  const built: Pick[] = [];
  const settled: Pick[] = [];

  for (const fixture of [...fixtures].sort(byKickoff)) {
    seen.add(fixture.id);
    const prior = previous.get(fixture.id);

    if (fixture.status === 'scheduled') {
      const pick = buildPick(fixture, inputs, config, now);
      picks.push(pick);
      built.push(pick);
      continue;
    }
    if (!prior) continue;

    const score = finalScoreOf(fixture);
    if (score && prior.status === 'PENDING') {
      const pick = settlePick(prior, score, now);
      picks.push(pick);
      settled.push(pick);
    } else {
      picks.push(prior);
    }
  }

  for (const pick of existing) {
    if (!seen.has(pick.fixtureId)) picks.push(pick);
  }

  return { picks, built, settled };
}
