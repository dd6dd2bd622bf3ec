/**
 * Structured logging utility with log levels
 *
 * Usage:
 *   import { createLogger } from '@/lib/logger';
 *   const log = createLogger('WindowGeometry');
 *   log.debug('Details here', { data });
 *   log.info('Operation complete');
 *   log.warn('Something unexpected');
 *   log.error('Failed', error);
 */

import { config } from './config';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LoggerConfig {
  level: LogLevel;
  prefix: string;
}

// Shared by every child so that setLogLevel() reaches loggers created at import time
const rootLevel = { current: parseLogLevel(config.logLevel) };

export function parseLogLevel(value: string): LogLevel {
  switch (value.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return LogLevel.WARN;
  }
}

export class Logger {
  private config: Omit<LoggerConfig, 'level'> & { level?: LogLevel };

  constructor(config?: Partial<LoggerConfig>) {
    this.config = {
      prefix: '',
      ...config,
    };
  }

  private get level(): LogLevel {
    return this.config.level ?? rootLevel.current;
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  private formatMessage(message: string): string {
    return this.config.prefix ? `[${this.config.prefix}] ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.DEBUG)) {
      console.log(this.formatMessage(message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.INFO)) {
      console.info(this.formatMessage(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.WARN)) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.ERROR)) {
      console.error(this.formatMessage(message), ...args);
    }
  }

  /**
   * Create a child logger with a specific prefix
   */
  child(prefix: string): Logger {
    return new Logger({
      ...this.config,
      prefix: this.config.prefix ? `${this.config.prefix}:${prefix}` : prefix,
    });
  }
}

// Root logger instance
const logger = new Logger();

/**
 * Factory for creating module-specific loggers
 *
 * @example
 * const log = createLogger('TransitionPlanner');
 * log.debug('Built transition', transition.name);
 */
export function createLogger(module: string): Logger {
  return logger.child(module);
}

/**
 * Set the level of every logger that has not pinned its own
 */
export function setLogLevel(level: LogLevel): void {
  rootLevel.current = level;
}

export function getLogLevel(): LogLevel {
  return rootLevel.current;
}
