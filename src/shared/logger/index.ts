import { LOG_CONFIG } from '../constants/index.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_RANK, value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env[LOG_CONFIG.LEVEL_ENV_VAR]?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : LOG_CONFIG.DEFAULT_LEVEL;
}

let currentLevel: LogLevel = initialLevel();

/** Set the minimum level written by every logger. */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];
}

/**
 * Create a scoped logger. Messages are prefixed with `[scope]` and written
 * through the matching `console` method; the context object, when given, is
 * passed as a second argument.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  const write = (level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void => {
    if (!enabled(level)) return;
    const line = `${prefix} ${message}`;
    if (context) {
      console[level](line, context);
    } else {
      console[level](line);
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}
