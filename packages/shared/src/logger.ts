/**
 * Structured logger on pino.
 *
 * Every package logs through a child of one base logger:
 * import { createLogger } from '@epo/shared';
 */

import { pino } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? 'info';
}

const baseLogger = pino({
  level: levelFromEnv(),
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
});

/** Primitive values a log record may carry */
type LogPrimitive = string | number | boolean | null | undefined;

export type LogData = Record<string, LogPrimitive | LogPrimitive[]>;

export interface Logger {
  debug: (message: string, data?: LogData) => void;
  info: (message: string, data?: LogData) => void;
  warn: (message: string, data?: LogData) => void;
  error: (message: string, data?: LogData) => void;
}

export interface LoggerConfig {
  level?: LogLevel;
}

export function createLogger(service: string, config?: LoggerConfig): Logger {
  const logger = baseLogger.child({ service });

  if (config?.level) {
    logger.level = config.level;
  }

  return {
    debug: (message, data) => (data ? logger.debug(data, message) : logger.debug(message)),
    info: (message, data) => (data ? logger.info(data, message) : logger.info(message)),
    warn: (message, data) => (data ? logger.warn(data, message) : logger.warn(message)),
    error: (message, data) => (data ? logger.error(data, message) : logger.error(message)),
  };
}
