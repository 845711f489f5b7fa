/**
 * Check BullMQ queue status.
 * Usage: npx tsx scripts/check-queues.ts
 */
import { Queue } from 'bullmq';
import { config } from '../src/config.js';
import { QUEUE_NAMES } from '../src/scheduler/constants.js';

const connection = { host: config.REDIS_HOST, port: config.REDIS_PORT };
const queue = new Queue(QUEUE_NAMES.PICKS, { connection });

const counts = await queue.getJobCounts();
console.log(`\n=== Queue: ${QUEUE_NAMES.PICKS} ===`);
console.log(`  waiting: ${counts.waiting}, active: ${counts.active}, completed: ${counts.completed}, failed: ${counts.failed}, delayed: ${counts.delayed}`);

for (const job of await queue.getFailed(0, 5)) {
  console.log(`  FAILED [${job.id}] ${job.name}: ${job.failedReason}`);
}
for (const job of await queue.getCompleted(0, 5)) {
  console.log(`  COMPLETED [${job.id}] ${job.name}: ${JSON.stringify(job.returnvalue).slice(0, 200)}`);
}

await queue.close();
