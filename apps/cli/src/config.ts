/**
 * CLI configuration: command-line options first, then environment.
 */

import { InvalidArgumentError } from 'commander';
import { isLogLevel, LOG_LEVELS } from '@todo-console/core';
import type { LogLevel } from '@todo-console/core';

export interface CliConfig {
  logLevel: LogLevel;
  color: boolean;
}

export interface CliOptions {
  logLevel?: LogLevel;
  color?: boolean;
}

const DEFAULT_LOG_LEVEL: LogLevel = 'silent';

/** commander argParser for --log-level */
export function parseLogLevel(value: string): LogLevel {
  const level = value.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

export function resolveConfig(opts: CliOptions, env: NodeJS.ProcessEnv = process.env): CliConfig {
  const envLevel = env['TODO_LOG_LEVEL'];
  const logLevel = opts.logLevel ?? (envLevel ? parseLogLevel(envLevel) : DEFAULT_LOG_LEVEL);

  // NO_COLOR counts when present and non-empty (https://no-color.org)
  const noColorEnv = Boolean(env['NO_COLOR']);
  const color = opts.color !== false && !noColorEnv;

  return { logLevel, color };
}
