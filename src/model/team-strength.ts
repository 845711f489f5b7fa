import type { FinishedMatch, TeamMatchRecord, Venue } from '../types/fixture.js';
import type { LeagueBaselines, TeamStrength, VenueForm } from '../types/strength.js';
import { DAY_MS } from '../utils/date.js';

/** Most recent match first; positions past the end weigh 1.0. */
export const RECENCY_WEIGHTS: readonly number[] = [1.5, 1.35, 1.25, 1.15, 1.1, 1.05, 1.0, 1.0, 1.0, 1.0];

type CompleteRecord = TeamMatchRecord & { readonly goalsFor: number; readonly goalsAgainst: number };

function isGoalCount(n: number | null): n is number {
  return n !== null && Number.isInteger(n) && n >= 0;
}

/** Goal counts present and non-negative, date parseable. */
export function isCompleteRecord(r: TeamMatchRecord): r is CompleteRecord {
  return isGoalCount(r.goalsFor) && isGoalCount(r.goalsAgainst) && !Number.isNaN(Date.parse(r.date));
}

function newestFirst(a: TeamMatchRecord, b: TeamMatchRecord): number {
  return Date.parse(b.date) - Date.parse(a.date);
}

export interface WindowOptions {
  asOf: Date;
  daysBack: number;
}

/** Records dated within (asOf - daysBack, asOf]. Incomplete records are dropped. */
export function selectWindow(records: readonly TeamMatchRecord[], opts: WindowOptions): CompleteRecord[] {
  const end = opts.asOf.getTime();
  const start = end - opts.daysBack * DAY_MS;
  return records.filter((r): r is CompleteRecord => {
    if (!isCompleteRecord(r)) return false;
    const t = Date.parse(r.date);
    return t > start && t <= end;
  });
}

/** The team's `limit` most recent complete records, newest first. */
export function recentForTeam(
  records: readonly TeamMatchRecord[],
  team: string,
  limit: number,
): CompleteRecord[] {
  return records
    .filter((r): r is CompleteRecord => r.team === team && isCompleteRecord(r))
    .sort(newestFirst)
    .slice(0, limit);
}

/**
 * Fold team-perspective records into distinct matches. A match reported
 * by both sides is kept once (first occurrence wins).
 */
export function collectMatches(records: readonly TeamMatchRecord[]): FinishedMatch[] {
  const seen = new Map<string, FinishedMatch>();

  for (const r of records) {
    if (!isCompleteRecord(r)) continue;
    const match: FinishedMatch =
      r.venue === 'home'
        ? { homeTeam: r.team, awayTeam: r.opponent, homeGoals: r.goalsFor, awayGoals: r.goalsAgainst, date: r.date }
        : { homeTeam: r.opponent, awayTeam: r.team, homeGoals: r.goalsAgainst, awayGoals: r.goalsFor, date: r.date };

    const key = `${match.homeTeam}|${match.awayTeam}|${match.date.slice(0, 10)}`;
    if (!seen.has(key)) seen.set(key, match);
  }

  return [...seen.values()];
}

export function computeLeagueBaselines(
  records: readonly TeamMatchRecord[],
  fallback: { home: number; away: number },
): LeagueBaselines {
  const matches = collectMatches(records);
  if (!matches.length) {
    return { avgHomeGoals: fallback.home, avgAwayGoals: fallback.away, matches: 0 };
  }

  let home = 0;
  let away = 0;
  for (const m of matches) {
    home += m.homeGoals;
    away += m.awayGoals;
  }
  return { avgHomeGoals: home / matches.length, avgAwayGoals: away / matches.length, matches: matches.length };
}

interface VenueTotals {
  homeScored: number;
  homeConceded: number;
  homeGames: number;
  awayScored: number;
  awayConceded: number;
  awayGames: number;
}

function ratio(value: number, base: number): number {
  return base > 0 ? value / base : 1.0;
}

/**
 * Attack/defense multipliers per team relative to the league baselines.
 * Teams without at least one home and one away match are left out.
 */
export function computeTeamStrengths(
  records: readonly TeamMatchRecord[],
  baselines: LeagueBaselines,
): Map<string, TeamStrength> {
  const totals = new Map<string, VenueTotals>();
  const totalsFor = (team: string): VenueTotals => {
    let t = totals.get(team);
    if (!t) {
      t = { homeScored: 0, homeConceded: 0, homeGames: 0, awayScored: 0, awayConceded: 0, awayGames: 0 };
      totals.set(team, t);
    }
    return t;
  };

  for (const m of collectMatches(records)) {
    const home = totalsFor(m.homeTeam);
    home.homeScored += m.homeGoals;
    home.homeConceded += m.awayGoals;
    home.homeGames++;

    const away = totalsFor(m.awayTeam);
    away.awayScored += m.awayGoals;
    away.awayConceded += m.homeGoals;
    away.awayGames++;
  }

  const { avgHomeGoals, avgAwayGoals } = baselines;
  const strengths = new Map<string, TeamStrength>();

  for (const [team, t] of totals) {
    if (t.homeGames === 0 || t.awayGames === 0) continue;

    const homeScoredAvg = t.homeScored / t.homeGames;
    const homeConcededAvg = t.homeConceded / t.homeGames;
    const awayScoredAvg = t.awayScored / t.awayGames;
    const awayConcededAvg = t.awayConceded / t.awayGames;

    strengths.set(team, {
      attackHome: ratio(homeScoredAvg, avgHomeGoals),
      defenseHome: ratio(homeConcededAvg, avgAwayGoals),
      attackAway: ratio(awayScoredAvg, avgAwayGoals),
      defenseAway: ratio(awayConcededAvg, avgHomeGoals),
      homeScoredAvg,
      homeConcededAvg,
      awayScoredAvg,
      awayConcededAvg,
      homeGames: t.homeGames,
      awayGames: t.awayGames,
    });
  }

  return strengths;
}

/**
 * Recency-weighted goals for/against of one team at one venue.
 * Weights follow the team's position in its full newest-first history,
 * so an away match still uses up a weight slot of the home sample.
 * n = 0 when the team has no complete record there.
 */
export function computeVenueForm(
  records: readonly TeamMatchRecord[],
  team: string,
  venue: Venue,
  weights: readonly number[] = RECENCY_WEIGHTS,
): VenueForm {
  const history = records
    .filter((r): r is CompleteRecord => r.team === team && isCompleteRecord(r))
    .sort(newestFirst);

  let gf = 0;
  let ga = 0;
  let wsum = 0;
  let n = 0;
  history.forEach((r, i) => {
    if (r.venue !== venue) return;
    const w = weights[i] ?? 1.0;
    gf += r.goalsFor * w;
    ga += r.goalsAgainst * w;
    wsum += w;
    n++;
  });

  if (n === 0 || wsum === 0) return { goalsForAvg: 0, goalsAgainstAvg: 0, n: 0 };
  return { goalsForAvg: gf / wsum, goalsAgainstAvg: ga / wsum, n };
}

export interface StrengthSnapshot {
  baselines: LeagueBaselines;
  strengths: ReadonlyMap<string, TeamStrength>;
}

/** Baselines and multipliers for one refresh cycle. */
export function buildStrengthSnapshot(
  records: readonly TeamMatchRecord[],
  opts: WindowOptions & { fallbackBaselines: { home: number; away: number } },
): StrengthSnapshot {
  const window = selectWindow(records, opts);
  const baselines = computeLeagueBaselines(window, opts.fallbackBaselines);
  return { baselines, strengths: computeTeamStrengths(window, baselines) };
}
