/**
 * Server logger. Pretty-printed outside production, silent under test.
 */

import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test';

const rootLogger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : 'info'),
  transport: process.env.NODE_ENV !== 'production' && !isTest
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss' } }
    : undefined,
  base: { service: 'campaign-crew-api' },
});

export function createLogger(name: string): pino.Logger {
  return rootLogger.child({ component: name });
}
