/* eslint-disable no-console */
// src/utils/logger.ts
import type { Logger, LogLevel } from '@/types/logger';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console-backed logger with level filtering.
 * `scope` is prefixed to every line, e.g. `[Research team]`.
 */
export function createDefaultLogger(
  level: LogLevel = 'info',
  scope?: string
): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = scope != null && scope !== '' ? `[${scope}] ` : '';
  const enabled = (l: LogLevel): boolean => LEVEL_ORDER[l] >= threshold;

  return {
    debug: (message, ...meta) => {
      if (enabled('debug')) console.debug(prefix + message, ...meta);
    },
    info: (message, ...meta) => {
      if (enabled('info')) console.info(prefix + message, ...meta);
    },
    warn: (message, ...meta) => {
      if (enabled('warn')) console.warn(prefix + message, ...meta);
    },
    error: (message, ...meta) => {
      if (enabled('error')) console.error(prefix + message, ...meta);
    },
  };
}

/** Derives a scoped logger that shares the parent's sink */
export function childLogger(parent: Logger, scope: string): Logger {
  const prefix = `[${scope}] `;
  return {
    debug: (message, ...meta) => parent.debug(prefix + message, ...meta),
    info: (message, ...meta) => parent.info(prefix + message, ...meta),
    warn: (message, ...meta) => parent.warn(prefix + message, ...meta),
    error: (message, ...meta) => parent.error(prefix + message, ...meta),
  };
}

export const silentLogger: Logger = createDefaultLogger('silent');
