import { sql } from './pool.js';
import { marketLabel, parseMarket } from '../picks/markets.js';
import type { SummaryRow } from '../results/summary.js';
import type { Fixture } from '../types/fixture.js';
import type { Candidate, MarketProbabilities } from '../types/market.js';
import type { Pick, PickStatus } from '../types/pick.js';
import type { RateSource } from '../types/strength.js';

interface PickRow {
  fixture_id: string;
  league: string;
  home_team: string;
  away_team: string;
  kickoff: Date;
  lambda_home: number;
  lambda_away: number;
  rate_source: RateSource;
  probs: MarketProbabilities;
  candidates: Candidate[];
  best_market: string | null;
  best_prob: number | null;
  best_fair: number | null;
  status: PickStatus;
  reason: string | null;
  computed_at: Date;
  settled_at: Date | null;
}

function toPick(row: PickRow): Pick {
  const market = parseMarket(row.best_market);
  let best: Candidate | null = null;
  if (market !== 'unsupported' && row.best_prob !== null) {
    best = { market, label: marketLabel(market), prob: row.best_prob };
    if (row.best_fair !== null) best.fair = row.best_fair;
  }

  return {
    fixtureId: row.fixture_id,
    league: row.league,
    homeTeam: row.home_team,
    awayTeam: row.away_team,
    kickoff: row.kickoff.toISOString(),
    lambdaHome: row.lambda_home,
    lambdaAway: row.lambda_away,
    rateSource: row.rate_source,
    probs: row.probs,
    candidates: row.candidates,
    best,
    status: row.status,
    reason: row.reason,
    computedAt: row.computed_at.toISOString(),
    settledAt: row.settled_at ? row.settled_at.toISOString() : null,
  };
}

export async function upsertFixture(f: Fixture): Promise<void> {
  await sql`
    INSERT INTO fixtures (
      id, league, home_team, away_team, home_team_id, away_team_id,
      kickoff, status, home_goals, away_goals
    )
    VALUES (
      ${f.id}, ${f.league}, ${f.homeTeam}, ${f.awayTeam}, ${f.homeTeamId}, ${f.awayTeamId},
      ${f.kickoff}, ${f.status}, ${f.score?.home ?? null}, ${f.score?.away ?? null}
    )
    ON CONFLICT (id) DO UPDATE SET
      kickoff = EXCLUDED.kickoff,
      status = EXCLUDED.status,
      home_goals = EXCLUDED.home_goals,
      away_goals = EXCLUDED.away_goals,
      updated_at = NOW()
  `;
}

/**
 * Insert or recompute a pending pick. A pick that has already been
 * settled is never overwritten.
 */
export async function upsertPendingPick(p: Pick): Promise<boolean> {
  const result = await sql`
    INSERT INTO picks (
      fixture_id, league, home_team, away_team, kickoff,
      lambda_home, lambda_away, rate_source, probs, candidates,
      best_market, best_prob, best_fair, status, computed_at
    )
    VALUES (
      ${p.fixtureId}, ${p.league}, ${p.homeTeam}, ${p.awayTeam}, ${p.kickoff},
      ${p.lambdaHome}, ${p.lambdaAway}, ${p.rateSource},
      ${JSON.stringify(p.probs)}::jsonb, ${JSON.stringify(p.candidates)}::jsonb,
      ${p.best?.market ?? null}, ${p.best?.prob ?? null}, ${p.best?.fair ?? null},
      'PENDING', ${p.computedAt}
    )
    ON CONFLICT (fixture_id) DO UPDATE SET
      kickoff = EXCLUDED.kickoff,
      lambda_home = EXCLUDED.lambda_home,
      lambda_away = EXCLUDED.lambda_away,
      rate_source = EXCLUDED.rate_source,
      probs = EXCLUDED.probs,
      candidates = EXCLUDED.candidates,
      best_market = EXCLUDED.best_market,
      best_prob = EXCLUDED.best_prob,
      best_fair = EXCLUDED.best_fair,
      computed_at = EXCLUDED.computed_at
    WHERE picks.status = 'PENDING'
  `;
  return result.count > 0;
}

/** PENDING → terminal, once. Returns false when the pick was already settled. */
export async function updatePickSettlement(p: Pick): Promise<boolean> {
  if (p.status === 'PENDING') return false;
  const result = await sql`
    UPDATE picks
    SET status = ${p.status}, reason = ${p.reason}, settled_at = ${p.settledAt}
    WHERE fixture_id = ${p.fixtureId} AND status = 'PENDING'
  `;
  return result.count > 0;
}

export async function getPicks(league: string, limit: number = 200): Promise<Pick[]> {
  const rows = await sql<PickRow[]>`
    SELECT * FROM picks
    WHERE league = ${league}
    ORDER BY kickoff DESC
    LIMIT ${limit}
  `;
  return rows.map(toPick);
}

/** Pending picks whose fixture already has a final score stored. */
export async function getSettleablePicks(league: string): Promise<{ pick: Pick; home: number; away: number }[]> {
  const rows = await sql<(PickRow & { home_goals: number; away_goals: number })[]>`
    SELECT p.*, f.home_goals, f.away_goals
    FROM picks p
    JOIN fixtures f ON f.id = p.fixture_id
    WHERE p.league = ${league}
      AND p.status = 'PENDING'
      AND f.status = 'finished'
      AND f.home_goals IS NOT NULL
      AND f.away_goals IS NOT NULL
  `;
  return rows.map((r) => ({ pick: toPick(r), home: r.home_goals, away: r.away_goals }));
}

export async function getSummaryRows(league?: string): Promise<SummaryRow[]> {
  return sql<SummaryRow[]>`
    SELECT status, best_fair AS fair, best_prob AS prob
    FROM picks
    WHERE 1=1
      ${league ? sql`AND league = ${league}` : sql``}
  `;
}
