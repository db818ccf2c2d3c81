/**
 * Structured logging utility with log levels
 *
 * Usage:
 *   import { createLogger } from '@/lib/logger';
 *   const log = createLogger('CanvasResolver');
 *   log.debug('Resolved canvas', { width, height });
 *   log.warn('Canvas derived from layer bounds');
 *
 * The level comes from SCENECAST_LOG_LEVEL (debug, info, warn, error, silent).
 * Without it, development runs log everything and other runs only warnings.
 */

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

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  return LEVEL_NAMES[value.trim().toLowerCase()];
}

function defaultLevel(): LogLevel {
  const fromEnv = parseLogLevel(process.env.SCENECAST_LOG_LEVEL);
  if (fromEnv !== undefined) return fromEnv;
  return process.env.NODE_ENV === 'development' ? LogLevel.DEBUG : LogLevel.WARN;
}

export class Logger {
  private config: LoggerConfig;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = {
      level: defaultLevel(),
      prefix: '',
      ...config,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.config.level;
  }

  private formatMessage(message: string): string {
    return this.config.prefix ? `[${this.config.prefix}] ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.ERROR)) {
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

  /**
   * Set the log level at runtime
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }
}

// Root logger instance
const logger = new Logger();

/**
 * Factory for creating module-specific loggers
 *
 * @example
 * const log = createLogger('EngineRunner');
 * log.info('ffmpeg exited', { exitCode });
 */
export function createLogger(module: string): Logger {
  return logger.child(module);
}
