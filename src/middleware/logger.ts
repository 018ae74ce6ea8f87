import { pino } from 'pino';
import { config } from '../utils/config.js';

export const logger = pino({
  name: 'message-decoder',
  level: config.LOG_LEVEL,
});

export type Logger = typeof logger;
