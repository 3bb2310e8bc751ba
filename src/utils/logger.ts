/**
 * Logger for the Kinematic Tree Loader
 *
 * Supports different log levels and timing operations.
 */

import { DEFAULT_CONFIG } from '../constants/config';
import type { LogLevelName } from '../schemas';

/**
 * Log Levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Logger Options Interface
 */
export interface LoggerOptions {
  level?: LogLevel;
  timestamp?: boolean;
  duration?: boolean;
  prefix?: string;
  /** Output sink, `console.log` unless given */
  sink?: (message: string, ...details: unknown[]) => void;
}

/**
 * Logger Context Interface
 */
export interface LoggerContext {
  operation?: string | undefined;
  stage?: string | undefined;
  filePath?: string | undefined;
  duration?: number | undefined;
  [key: string]: unknown;
}

/**
 * Internal Logger Class
 */
export class Logger {
  private options: Required<LoggerOptions>;
  private startTimes: Map<string, number> = new Map();

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level || LogLevel.INFO,
      timestamp: options.timestamp ?? true,
      duration: options.duration ?? true,
      prefix: options.prefix || DEFAULT_CONFIG.LOGGER_PREFIX,
      sink: options.sink || ((message, ...details) => console.log(message, ...details)),
    };
  }

  /**
   * Format timestamp
   */
  private formatTimestamp(): string {
    if (!this.options.timestamp) return '';
    return new Date().toISOString().substring(11, 23);
  }

  /**
   * Get colors for terminal output
   */
  private getColor(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '\x1b[90m'; // Gray
      case LogLevel.INFO:
        return '\x1b[36m'; // Cyan
      case LogLevel.WARN:
        return '\x1b[33m'; // Yellow
      case LogLevel.ERROR:
        return '\x1b[31m'; // Red
    }
  }

  /**
   * Check if should log based on level
   */
  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.options.level);
  }

  /**
   * Base log method
   */
  private log(level: LogLevel, message: string, context?: LoggerContext): void {
    if (!this.isLevelEnabled(level)) return;

    const timestamp = this.formatTimestamp();
    const color = this.getColor(level);
    const reset = '\x1b[0m';
    const prefix = `${this.options.prefix} [${level.toUpperCase()}]`;
    const timeStr = timestamp ? ` @ ${timestamp}` : '';

    const logMessage = `${color}${prefix}${timeStr} ${message}${reset}`;

    if (context) {
      this.options.sink(logMessage, context);
    } else {
      this.options.sink(logMessage);
    }
  }

  debug(message: string, context?: LoggerContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  /**
   * Start timing an operation
   */
  startTiming(operation: string): void {
    this.startTimes.set(operation, Date.now());
    this.debug(`Starting operation: ${operation}`, { operation });
  }

  /**
   * End timing an operation
   */
  endTiming(operation: string, context?: LoggerContext): void {
    const startTime = this.startTimes.get(operation);
    if (startTime !== undefined) {
      this.startTimes.delete(operation);
      const duration = this.options.duration ? Date.now() - startTime : undefined;
      this.info(`Completed operation: ${operation}`, {
        operation,
        duration,
        ...context
      });
    }
  }

  /**
   * Run a synchronous operation with timing
   */
  withTiming<T>(operation: string, fn: () => T, context?: LoggerContext): T {
    this.startTiming(operation);
    try {
      const result = fn();
      this.endTiming(operation, { ...context, success: true });
      return result;
    } catch (error) {
      this.endTiming(operation, { ...context, success: false, error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  }

  /**
   * Log pipeline stage
   */
  logStage(stage: string, context?: LoggerContext): void {
    this.debug(`Parsing stage: ${stage}`, {
      stage,
      ...context
    });
  }

  /**
   * Log configuration
   */
  logConfig(config: Record<string, unknown>, context?: LoggerContext): void {
    this.debug('Configuration loaded', {
      config,
      ...context
    });
  }

  /**
   * Log error with context
   */
  logError(error: Error, context?: LoggerContext): void {
    this.error(`Error occurred: ${error.message}`, {
      error: error.message,
      stack: error.stack,
      ...context
    });
  }
}

/**
 * Create logger with custom options
 */
export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * Map a configured level name to a `LogLevel`.
 */
export function toLogLevel(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

/**
 * Logger factory for specific operations
 */
export const LoggerFactory = {
  /**
   * Create logger for document parsing
   */
  forParsing(level: LogLevel = LogLevel.WARN): Logger {
    return createLogger({
      level,
      timestamp: true,
      duration: true,
      prefix: `${DEFAULT_CONFIG.LOGGER_PREFIX}-Parser`
    });
  },
};
