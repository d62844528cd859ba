/**
 * Logger Utility
 *
 * Contextual logging with consistent formatting and an environment-aware
 * threshold. Output goes to stderr so it never mixes with console menu output.
 */

import { resolveLogLevel } from './config';
import type { LogLevelName } from '../types';

enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

let configuredLevel: LogLevelName | undefined;

/**
 * Pins the threshold for every logger. Without a value the threshold is
 * derived from LOG_LEVEL / NODE_ENV at each call.
 */
export function setLogLevel(level?: LogLevelName): void {
  configuredLevel = level;
}

function getCurrentLogLevel(): LogLevel {
  return LEVELS_BY_NAME[configuredLevel ?? resolveLogLevel()];
}

/**
 * Format log entry with timestamp and context
 */
export function formatLogEntry(
  levelName: string,
  message: string,
  context?: string,
  timestamp: string = new Date().toISOString()
): string {
  const contextStr = context ? `[${context}] ` : '';
  return `${timestamp} ${levelName} ${contextStr}${message}`;
}

function log(level: LogLevel, message: string, meta?: Record<string, unknown>, context?: string): void {
  if (level < getCurrentLogLevel()) {
    return;
  }

  const formattedMessage = formatLogEntry(LOG_LEVEL_NAMES[level], message, context);

  if (meta) {
    console.error(formattedMessage, meta);
  } else {
    console.error(formattedMessage);
  }
}

// ============================================================================
// PUBLIC API
// ============================================================================

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: Error | unknown, meta?: Record<string, unknown>): void;
}

/**
 * Create a contextual logger
 */
export function createLogger(context: string): Logger {
  return {
    debug: (message: string, meta?: Record<string, unknown>) =>
      log(LogLevel.DEBUG, message, meta, context),
    info: (message: string, meta?: Record<string, unknown>) =>
      log(LogLevel.INFO, message, meta, context),
    warn: (message: string, meta?: Record<string, unknown>) =>
      log(LogLevel.WARN, message, meta, context),
    error: (message: string, error?: Error | unknown, meta?: Record<string, unknown>) => {
      const errorMeta = error instanceof Error
        ? { ...meta, error: error.message, stack: error.stack }
        : { ...meta, error };
      log(LogLevel.ERROR, message, errorMeta, context);
    },
  };
}
