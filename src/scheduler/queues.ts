import { Queue } from 'bullmq';
import { config } from '../config.js';
import { QUEUE_NAMES, type LeagueJobData } from './constants.js';

export const connection = { host: config.REDIS_HOST, port: config.REDIS_PORT };

export const picksQueue = new Queue<LeagueJobData>(QUEUE_NAMES.PICKS, {
  connection,
  defaultJobOptions: {
    attempts: 3,
    backoff: { type: 'exponential', delay: 30000 },
    removeOnComplete: { count: 1000 },
    removeOnFail: { count: 5000 },
  },
});
