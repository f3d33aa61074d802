import pino from 'pino';
import { env } from './env';

export const log = pino({
  name: 'companion-voice',
  level: env.LOG_LEVEL ?? (env.NODE_ENV === 'test' ? 'silent' : 'info'),
  base: null,
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof log;
