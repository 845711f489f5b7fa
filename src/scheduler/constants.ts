export const QUEUE_NAMES = {
  PICKS: 'picks-queue',
} as const;

export const JOB_NAMES = {
  REFRESH_LEAGUE: 'refresh-league',
  SETTLE_LEAGUE: 'settle-league',
} as const;

export interface LeagueJobData {
  league: string;
}
