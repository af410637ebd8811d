// ./utils/logger.ts
import { config } from 'dotenv';
config(); // Ensure .env variables are loaded

type LogLevel = 'error' | 'warn' | 'info' | 'debug';

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
 * Builds a console logger that drops messages above `level`.
 * Unknown level names fall back to `info`.
 */
export function createLogger(level: string = 'info'): Logger {
  const normalized = level.toLowerCase();
  const currentLevel = isLogLevel(normalized) ? levels[normalized] : levels.info;

  const log = (msgLevel: LogLevel, ...args: unknown[]): void => {
    if (levels[msgLevel] <= currentLevel) {
      const timestamp = new Date().toISOString();
      console[msgLevel](`[${timestamp}] [${msgLevel.toUpperCase()}]`, ...args);
    }
  };

  return {
    error: (...args: unknown[]) => log('error', ...args),
    warn: (...args: unknown[]) => log('warn', ...args),
    info: (...args: unknown[]) => log('info', ...args),
    debug: (...args: unknown[]) => log('debug', ...args),
  };
}

export const logger: Logger = createLogger(process.env.LOG_LEVEL || 'info');

export default logger;
