import { Worker, type Job } from 'bullmq';
import { connection } from '../scheduler/queues.js';
import { JOB_NAMES, QUEUE_NAMES, type LeagueJobData } from '../scheduler/constants.js';
import { createRefreshDeps } from '../pipeline/deps.js';
import { refreshLeague, settleLeague } from '../pipeline/refresh.js';
import { logger } from '../utils/logger.js';

export function createPicksWorker() {
  const deps = createRefreshDeps();

  const worker = new Worker<LeagueJobData>(
    QUEUE_NAMES.PICKS,
    async (job: Job<LeagueJobData>) => {
      const { league } = job.data;
      const log = logger.child({ job: job.id, name: job.name, league });

      switch (job.name) {
        case JOB_NAMES.REFRESH_LEAGUE:
          return refreshLeague(league, { ...deps, log });
        case JOB_NAMES.SETTLE_LEAGUE:
          return { settled: await settleLeague(league, { store: deps.store, log }) };
        default:
          log.warn('Unknown job name, skipping');
          return null;
      }
    },
    // One at a time: the football-data free tier is rate limited
    { connection, concurrency: 1 },
  );

  worker.on('failed', (job, err) => {
    logger.error({ job: job?.id, league: job?.data.league, err: err.message }, 'Picks job failed');
  });

  return worker;
}
