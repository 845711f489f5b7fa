import Fastify from 'fastify';
import { config } from '../config.js';
import { healthRoutes } from './routes/health.js';
import { picksRoutes } from './routes/picks.js';

export async function createServer() {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      ...(config.NODE_ENV === 'development'
        ? { transport: { target: 'pino-pretty', options: { colorize: true } } }
        : {}),
    },
  });

  await app.register(healthRoutes);
  await app.register(picksRoutes, { prefix: '/picks' });

  return app;
}
