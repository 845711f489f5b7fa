/**
 * Manually enqueue a refresh (or settle) job for one league.
 * Usage: npx tsx scripts/trigger-refresh.ts [league] [refresh|settle]
 * Default: PL refresh
 */
import { Queue } from 'bullmq';
import { config } from '../src/config.js';
import { QUEUE_NAMES, JOB_NAMES } from '../src/scheduler/constants.js';

const league = process.argv[2] || 'PL';
const kind = process.argv[3] || 'refresh';

if (kind !== 'refresh' && kind !== 'settle') {
  console.error(`Unknown job kind "${kind}", expected refresh or settle`);
  process.exit(1);
}

const picksQueue = new Queue(QUEUE_NAMES.PICKS, {
  connection: { host: config.REDIS_HOST, port: config.REDIS_PORT },
});

const name = kind === 'refresh' ? JOB_NAMES.REFRESH_LEAGUE : JOB_NAMES.SETTLE_LEAGUE;
const job = await picksQueue.add(name, { league });

console.log(`Enqueued ${name} job: ${job.id}`);
console.log(`  league: ${league}`);
console.log(`\nWatch logs in the running app process.`);

await picksQueue.close();
