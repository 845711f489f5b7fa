import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { acquireRateLimit } from '../compliance/rate-limiter.js';
import type { Fixture, FixtureStatus, TeamMatchRecord } from '../types/fixture.js';
import { isoDate } from '../utils/date.js';
import { logger } from '../utils/logger.js';

const teamSchema = z.object({
  id: z.number().nullish(),
  name: z.string().nullish(),
});

const matchSchema = z.object({
  id: z.number(),
  utcDate: z.string(),
  status: z.string(),
  homeTeam: teamSchema,
  awayTeam: teamSchema,
  score: z
    .object({
      fullTime: z
        .object({ home: z.number().nullish(), away: z.number().nullish() })
        .nullish(),
    })
    .nullish(),
});

const matchesResponseSchema = z.object({
  matches: z.array(z.unknown()).default([]),
});

export type FootballDataMatch = z.infer<typeof matchSchema>;

export class FootballDataError extends Error {
  readonly status: number;
  readonly path: string;

  constructor(status: number, path: string, body: string) {
    super(`football-data ${path} responded ${status}: ${body.slice(0, 200)}`);
    this.name = 'FootballDataError';
    this.status = status;
    this.path = path;
  }
}

export function mapStatus(status: string): FixtureStatus | null {
  switch (status) {
    case 'SCHEDULED':
    case 'TIMED':
      return 'scheduled';
    case 'IN_PLAY':
    case 'PAUSED':
      return 'live';
    case 'FINISHED':
    case 'AWARDED':
      return 'finished';
    default:
      // POSTPONED, SUSPENDED, CANCELLED
      return null;
  }
}

function goals(m: FootballDataMatch): { home: number | null; away: number | null } {
  const ft = m.score?.fullTime;
  return { home: ft?.home ?? null, away: ft?.away ?? null };
}

export function toFixture(m: FootballDataMatch, league: string): Fixture | null {
  const status = mapStatus(m.status);
  const homeTeam = m.homeTeam.name;
  const awayTeam = m.awayTeam.name;
  if (!status || !homeTeam || !awayTeam) return null;

  const { home, away } = goals(m);
  return {
    id: String(m.id),
    league,
    homeTeam,
    awayTeam,
    homeTeamId: m.homeTeam.id ?? null,
    awayTeamId: m.awayTeam.id ?? null,
    kickoff: m.utcDate,
    status,
    score: status === 'finished' && home !== null && away !== null ? { home, away } : null,
  };
}

/**
 * Both teams' view of a finished match. Missing full-time goals are kept
 * as null and skipped later by the strength estimator.
 */
export function toTeamRecords(m: FootballDataMatch): TeamMatchRecord[] {
  const homeTeam = m.homeTeam.name;
  const awayTeam = m.awayTeam.name;
  if (mapStatus(m.status) !== 'finished' || !homeTeam || !awayTeam) return [];

  const { home, away } = goals(m);
  return [
    { team: homeTeam, opponent: awayTeam, venue: 'home', goalsFor: home, goalsAgainst: away, date: m.utcDate },
    { team: awayTeam, opponent: homeTeam, venue: 'away', goalsFor: away, goalsAgainst: home, date: m.utcDate },
  ];
}

/** Parse a /matches payload, dropping entries that do not fit the schema. */
export function parseMatches(payload: unknown): FootballDataMatch[] {
  const parsed = matchesResponseSchema.safeParse(payload);
  if (!parsed.success) return [];

  const out: FootballDataMatch[] = [];
  for (const raw of parsed.data.matches) {
    const m = matchSchema.safeParse(raw);
    if (m.success) out.push(m.data);
    else logger.debug({ issues: m.error.issues.length }, 'Skipping malformed football-data match');
  }
  return out;
}

export interface DateRange {
  from: Date;
  to: Date;
}

export interface FootballDataClientOptions {
  baseUrl: string;
  apiKey?: string;
  /** Minimum spacing between requests to the same host */
  minDelayMs?: number;
  dispatcher?: Dispatcher;
}

export class FootballDataClient {
  private readonly baseUrl: string;
  private readonly host: string;

  constructor(private readonly opts: FootballDataClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.host = new URL(this.baseUrl).host;
  }

  private async get(path: string, query: Record<string, string | number>): Promise<FootballDataMatch[]> {
    await acquireRateLimit(this.host, this.opts.minDelayMs ?? 0);

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.opts.apiKey) headers['X-Auth-Token'] = this.opts.apiKey;

    const { statusCode, body } = await request(`${this.baseUrl}${path}`, {
      method: 'GET',
      headers,
      query,
      headersTimeout: 15000,
      bodyTimeout: 30000,
      dispatcher: this.opts.dispatcher,
    });

    if (statusCode !== 200) {
      throw new FootballDataError(statusCode, path, await body.text());
    }
    return parseMatches(await body.json());
  }

  async getCompetitionMatches(league: string, status: string, range: DateRange): Promise<FootballDataMatch[]> {
    return this.get(`/v4/competitions/${encodeURIComponent(league)}/matches`, {
      status,
      dateFrom: isoDate(range.from),
      dateTo: isoDate(range.to),
    });
  }

  async getTeamMatches(teamId: number, range: DateRange, limit: number): Promise<FootballDataMatch[]> {
    return this.get(`/v4/teams/${teamId}/matches`, {
      status: 'FINISHED',
      dateFrom: isoDate(range.from),
      dateTo: isoDate(range.to),
      limit,
    });
  }

  /** Scheduled, live and recently finished fixtures of a competition. */
  async getFixtures(league: string, range: DateRange): Promise<Fixture[]> {
    const matches = await this.getCompetitionMatches(league, 'SCHEDULED,TIMED,IN_PLAY,PAUSED,FINISHED', range);
    return matches.flatMap((m) => toFixture(m, league) ?? []);
  }

  /** Finished matches of a competition as team-perspective records. */
  async getLeagueHistory(league: string, range: DateRange): Promise<TeamMatchRecord[]> {
    const matches = await this.getCompetitionMatches(league, 'FINISHED', range);
    return matches.flatMap(toTeamRecords);
  }

  /** A team's recent finished matches, from that team's side only. */
  async getTeamHistory(teamId: number, range: DateRange, limit: number): Promise<TeamMatchRecord[]> {
    const matches = await this.getTeamMatches(teamId, range, limit);
    return matches.flatMap((m) => {
      const [home, away] = toTeamRecords(m);
      if (m.homeTeam.id === teamId) return home ? [home] : [];
      if (m.awayTeam.id === teamId) return away ? [away] : [];
      return [];
    });
  }
}
