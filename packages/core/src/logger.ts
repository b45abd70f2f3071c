/**
 * pino logger factory.
 *
 * One root logger per process, context through child loggers
 * (getLogger('service')). Logs go to stderr: stdout belongs to the menu.
 * Before initLogger is called, getLogger hands out a silent logger.
 */

import pino from 'pino';
import type { DestinationStream, Level, Logger } from 'pino';

export type LogLevel = Level | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent',
];

export interface LoggerConfig {
  level: LogLevel;
  /** Defaults to stderr */
  destination?: DestinationStream;
}

let rootLogger: Logger | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function createLogger(config: LoggerConfig): Logger {
  return pino(
    {
      level: config.level,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    config.destination ?? pino.destination(2),
  );
}

/** Initialize the root logger. Call once at startup. */
export function initLogger(config: LoggerConfig): Logger {
  rootLogger = createLogger(config);
  return rootLogger;
}

/** Child logger bound to a subsystem name. */
export function getLogger(subsystem: string): Logger {
  if (!rootLogger) {
    return pino({ level: 'silent' }).child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
