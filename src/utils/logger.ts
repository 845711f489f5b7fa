import { pino } from 'pino';
import { config } from '../config.js';

export const logger = pino({
  name: 'poisson-picks',
  level: config.LOG_LEVEL,
  ...(config.NODE_ENV === 'development'
    ? { transport: { target: 'pino-pretty', options: { colorize: true } } }
    : {}),
});

export type { Logger } from 'pino';
