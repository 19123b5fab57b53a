// ./utils/logger.ts
import { config } from 'dotenv';
config(); // Ensure .env variables are loaded

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

// Interface for the logger object
export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

const levels: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levels, value);
}

/**
 * Resolves a LOG_LEVEL value, falling back to `info` for anything unrecognised.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const level = (value || 'info').toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

export function createLogger(level: LogLevel): Logger {
  const currentLevel = levels[level];

  const log = (messageLevel: LogLevel, ...args: unknown[]): void => {
    if (levels[messageLevel] <= currentLevel) {
      const timestamp = new Date().toISOString();
      console[messageLevel](`[${timestamp}] [${messageLevel.toUpperCase()}]`, ...args);
    }
  };

  return {
    error: (...args: unknown[]) => log('error', ...args),
    warn: (...args: unknown[]) => log('warn', ...args),
    info: (...args: unknown[]) => log('info', ...args),
    debug: (...args: unknown[]) => log('debug', ...args),
  };
}

export const logger: Logger = createLogger(parseLogLevel(process.env.LOG_LEVEL));

export default logger;
