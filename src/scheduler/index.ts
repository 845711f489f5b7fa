import { picksQueue } from './queues.js';
import { JOB_NAMES } from './constants.js';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';

/**
 * Sets up BullMQ repeatable job schedulers per league: a pick refresh
 * and a more frequent settlement pass.
 * Uses upsertJobScheduler so restarts are idempotent.
 */
export async function startScheduler(): Promise<void> {
  for (const league of config.LEAGUES) {
    await picksQueue.upsertJobScheduler(
      `refresh:${league}`,
      { pattern: config.REFRESH_CRON },
      { name: JOB_NAMES.REFRESH_LEAGUE, data: { league } },
    );

    await picksQueue.upsertJobScheduler(
      `settle:${league}`,
      { pattern: config.SETTLE_CRON },
      { name: JOB_NAMES.SETTLE_LEAGUE, data: { league } },
    );

    logger.info(
      { league, refresh: config.REFRESH_CRON, settle: config.SETTLE_CRON },
      'Registered league schedulers',
    );
  }

  logger.info(`Scheduler initialized with ${config.LEAGUES.length} leagues`);
}
