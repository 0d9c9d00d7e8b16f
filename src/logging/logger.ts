import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type { Logger };

/** Structured JSON logger to stdout. Level from LOG_LEVEL, default info. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: 'prwgate',
    level: process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  });
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
