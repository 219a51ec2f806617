/**
 * Logging configuration using Pino.
 * Logs go to stderr so piped results on stdout stay clean.
 */

import pino, { type Logger } from 'pino';
import { LogLevelSchema, type LogLevel } from '../config.js';

export type { Logger } from 'pino';

/**
 * Build a logger at the given level, pretty-printed when stderr is a terminal.
 */
export function createLogger(level: LogLevel): Logger {
  const pinoLevel = level.toLowerCase();

  if (process.stderr.isTTY && process.env.NODE_ENV !== 'production') {
    return pino({
      level: pinoLevel,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino({ level: pinoLevel }, pino.destination(2));
}

/**
 * Global logger instance configured from LOG_LEVEL.
 */
export const logger = createLogger(LogLevelSchema.catch('WARN').parse(process.env.LOG_LEVEL));
