import { config, engineConfig } from '../config.js';
import {
  getPicks,
  getSettleablePicks,
  updatePickSettlement,
  upsertFixture,
  upsertPendingPick,
} from '../db/queries.js';
import { FootballDataClient } from '../results/football-data.js';
import type { PickStore, RefreshDeps } from './refresh.js';

export const pickStore: PickStore = {
  upsertFixture,
  getPicks,
  upsertPendingPick,
  updatePickSettlement,
  getSettleablePicks,
};

/** Production wiring: football-data.org over undici, Postgres for storage. */
export function createRefreshDeps(): RefreshDeps {
  return {
    source: new FootballDataClient({
      baseUrl: config.FOOTBALL_DATA_BASE_URL,
      apiKey: config.FOOTBALL_DATA_API_KEY,
      minDelayMs: config.FOOTBALL_DATA_MIN_DELAY_MS,
    }),
    store: pickStore,
    engine: engineConfig,
    upcomingDays: config.UPCOMING_DAYS,
  };
}
