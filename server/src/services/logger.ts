/**
 * Logger service - structured console logging with configurable level and timezone
 */
import { config } from '../config/index';

/**
 * Log level severity ordering
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Parses log level string to enum value
 */
export function parseLogLevel(level: string): LogLevel {
  const normalized = level.toUpperCase();
  switch (normalized) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Formats timestamp in the given timezone
 */
function getTimestamp(timeZone: string): string {
  const options: Intl.DateTimeFormatOptions = {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  };
  const formatter = new Intl.DateTimeFormat('en-CA', options);
  return formatter.format(new Date()).replace(',', '');
}

/**
 * Errors lose their fields under JSON.stringify, so flatten them first
 */
function serializeData(data: unknown): string {
  if (data instanceof Error) {
    return data.stack ?? `${data.name}: ${data.message}`;
  }
  return JSON.stringify(data, null, 2);
}

export interface LoggerOptions {
  level?: string;
  timezone?: string;
}

/**
 * Provides structured logging with configurable log levels
 */
export class LoggerService {
  private readonly logLevel: LogLevel;
  private readonly timezone: string;

  constructor(options: LoggerOptions = {}) {
    this.logLevel = parseLogLevel(options.level ?? config.logging.logLevel);
    this.timezone = options.timezone ?? config.logging.timezone;
  }

  get level(): LogLevel {
    return this.logLevel;
  }

  /**
   * Formats log message with timestamp and level
   */
  formatLogMessage(level: string, message: string, data?: unknown): string {
    const baseMsg = `[${getTimestamp(this.timezone)}] [${level}] ${message}`;
    if (data !== undefined) {
      return `${baseMsg}\n${serializeData(data)}`;
    }
    return baseMsg;
  }

  /**
   * Logs debug-level message (most verbose)
   */
  debug(message: string, data?: unknown): void {
    if (this.logLevel <= LogLevel.DEBUG) {
      console.log(this.formatLogMessage('DEBUG', message, data));
    }
  }

  /**
   * Logs info-level message (general information)
   */
  info(message: string, data?: unknown): void {
    if (this.logLevel <= LogLevel.INFO) {
      console.log(this.formatLogMessage('INFO', message, data));
    }
  }

  /**
   * Logs warning-level message
   */
  warn(message: string, data?: unknown): void {
    if (this.logLevel <= LogLevel.WARN) {
      console.warn(this.formatLogMessage('WARN', message, data));
    }
  }

  /**
   * Logs error-level message
   */
  error(message: string, error?: unknown): void {
    if (this.logLevel <= LogLevel.ERROR) {
      console.error(this.formatLogMessage('ERROR', message, error));
    }
  }
}
