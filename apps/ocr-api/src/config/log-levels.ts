import type { LogLevel } from '@nestjs/common';
import type { LogLevelName } from './configuration.interface';

const ORDER: readonly LogLevelName[] = ['error', 'warn', 'info', 'debug', 'verbose'];

/** Nest calls the "info" level "log" */
const NEST_LEVEL: Record<LogLevelName, LogLevel> = {
  error: 'error',
  warn: 'warn',
  info: 'log',
  debug: 'debug',
  verbose: 'verbose',
};

/**
 * Expands a single threshold into the set of Nest levels to enable,
 * e.g. "warn" → ['fatal', 'error', 'warn']. Debug mode raises the
 * threshold to at least "debug".
 */
export function resolveLogLevels(level: LogLevelName, debug = false): LogLevel[] {
  const threshold = Math.max(ORDER.indexOf(level), debug ? ORDER.indexOf('debug') : 0);
  const enabled = ORDER.slice(0, threshold + 1).map((name) => NEST_LEVEL[name]);
  return ['fatal', ...enabled];
}
