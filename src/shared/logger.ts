import { LOG_LEVELS } from './constants';
import type { LogLevel } from './types';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(tag: string, level: LogLevel = 'info'): Logger {
  const enabled = (at: LogLevel) => rank(at) >= rank(level);
  const prefix = `[${tag}]`;

  return {
    debug: (message) => {
      if (enabled('debug')) console.debug(prefix, message);
    },
    info: (message) => {
      if (enabled('info')) console.warn(prefix, message);
    },
    warn: (message) => {
      if (enabled('warn')) console.warn(prefix, message);
    },
    error: (message, err) => {
      if (!enabled('error')) return;
      if (err === undefined) console.error(prefix, message);
      else console.error(prefix, message, err);
    },
  };
}

export const silentLogger: Logger = createLogger('', 'silent');
