import { createServer } from './api/server.js';
import { startScheduler } from './scheduler/index.js';
import { picksQueue } from './scheduler/queues.js';
import { createPicksWorker } from './workers/picks-worker.js';
import { sql } from './db/pool.js';
import { config, engineConfig } from './config.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  logger.info({ model: engineConfig.model, leagues: config.LEAGUES }, 'Starting poisson-picks...');

  // Start scheduler (registers cron jobs)
  await startScheduler();

  const picksWorker = createPicksWorker();
  logger.info('Worker started: picks-worker');

  // Start API server
  const server = await createServer();
  await server.listen({ port: config.PORT, host: '0.0.0.0' });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await server.close();
    await picksWorker.close();
    await picksQueue.close();
    await sql.end();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
  logger.fatal(err, 'Failed to start');
  process.exit(1);
});
