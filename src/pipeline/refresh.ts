import type { EngineConfig } from '../model/engine-config.js';
import { buildStrengthSnapshot } from '../model/team-strength.js';
import { settlePick } from '../results/settlement.js';
import type { DateRange } from '../results/football-data.js';
import type { Fixture, TeamMatchRecord } from '../types/fixture.js';
import type { Pick } from '../types/pick.js';
import { addDays } from '../utils/date.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { refreshPicks, type RateInputs } from './build-picks.js';

export interface FixtureSource {
  getFixtures(league: string, range: DateRange): Promise<Fixture[]>;
  getLeagueHistory(league: string, range: DateRange): Promise<TeamMatchRecord[]>;
  getTeamHistory(teamId: number, range: DateRange, limit: number): Promise<TeamMatchRecord[]>;
}

export interface PickStore {
  upsertFixture(fixture: Fixture): Promise<void>;
  getPicks(league: string): Promise<Pick[]>;
  upsertPendingPick(pick: Pick): Promise<boolean>;
  updatePickSettlement(pick: Pick): Promise<boolean>;
  getSettleablePicks(league: string): Promise<{ pick: Pick; home: number; away: number }[]>;
}

export interface RefreshDeps {
  source: FixtureSource;
  store: PickStore;
  engine: EngineConfig;
  /** Days ahead to look for scheduled fixtures */
  upcomingDays: number;
  /** Days back to look for results of already predicted fixtures */
  resultsDaysBack?: number;
  now?: Date;
  log?: Logger;
}

export interface LeagueRefreshSummary {
  league: string;
  fixtures: number;
  built: number;
  settled: number;
}

async function loadRateInputs(
  league: string,
  fixtures: readonly Fixture[],
  deps: RefreshDeps,
  now: Date,
  log: Logger,
): Promise<RateInputs> {
  const { engine, source } = deps;
  const range = { from: addDays(now, -engine.formDaysBack), to: now };

  if (engine.model === 'aggregate') {
    const history = await source.getLeagueHistory(league, range);
    const snapshot = buildStrengthSnapshot(history, {
      asOf: now,
      daysBack: engine.formDaysBack,
      fallbackBaselines: engine.fallbackBaselines,
    });
    log.info(
      { matches: snapshot.baselines.matches, teams: snapshot.strengths.size },
      'League strength snapshot built',
    );
    return { model: 'aggregate', snapshot };
  }

  const teams = new Map<string, number>();
  for (const f of fixtures) {
    if (f.status !== 'scheduled') continue;
    if (f.homeTeamId !== null) teams.set(f.homeTeam, f.homeTeamId);
    if (f.awayTeamId !== null) teams.set(f.awayTeam, f.awayTeamId);
  }

  const histories = new Map<string, readonly TeamMatchRecord[]>();
  for (const [team, teamId] of teams) {
    try {
      histories.set(team, await source.getTeamHistory(teamId, range, engine.formLimit));
    } catch (err) {
      // The team falls back to the default rates
      log.warn({ err, team, teamId }, 'Team history fetch failed');
    }
  }
  log.info({ teams: teams.size, loaded: histories.size }, 'Team histories loaded');
  return { model: 'split', histories };
}

/**
 * Fetch fixtures, recompute pending picks, settle finished ones and
 * persist the changes for one league.
 */
export async function refreshLeague(league: string, deps: RefreshDeps): Promise<LeagueRefreshSummary> {
  const now = deps.now ?? new Date();
  const log = (deps.log ?? rootLogger).child({ league });
  const { source, store, engine } = deps;

  const fixtures = await source.getFixtures(league, {
    from: addDays(now, -(deps.resultsDaysBack ?? 5)),
    to: addDays(now, deps.upcomingDays),
  });
  for (const f of fixtures) await store.upsertFixture(f);

  const inputs = await loadRateInputs(league, fixtures, deps, now, log);
  const existing = await store.getPicks(league);
  const outcome = refreshPicks(fixtures, existing, inputs, engine, now);

  for (const pick of outcome.built) await store.upsertPendingPick(pick);
  for (const pick of outcome.settled) await store.updatePickSettlement(pick);

  const summary = {
    league,
    fixtures: fixtures.length,
    built: outcome.built.length,
    settled: outcome.settled.length,
  };
  log.info(summary, 'League refreshed');
  return summary;
}

export interface SettleDeps {
  store: PickStore;
  now?: Date;
  log?: Logger;
}

/** Settle stored pending picks whose fixture already has a final score. */
export async function settleLeague(league: string, deps: SettleDeps): Promise<number> {
  const now = deps.now ?? new Date();
  const log = (deps.log ?? rootLogger).child({ league });

  let settled = 0;
  for (const { pick, home, away } of await deps.store.getSettleablePicks(league)) {
    const result = settlePick(pick, { home, away }, now);
    if (await deps.store.updatePickSettlement(result)) settled++;
  }

  if (settled) log.info({ settled }, 'Pending picks settled');
  return settled;
}

/** Refresh every league; one league failing does not stop the others. */
export async function refreshAll(leagues: readonly string[], deps: RefreshDeps): Promise<LeagueRefreshSummary[]> {
  const log = deps.log ?? rootLogger;
  const out: LeagueRefreshSummary[] = [];

  for (const league of leagues) {
    try {
      out.push(await refreshLeague(league, deps));
    } catch (err) {
      log.error({ err, league }, 'League refresh failed');
    }
  }
  return out;
}
