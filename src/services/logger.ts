/**
 * Structured JSON Logger
 *
 * Provides structured logging with correlation IDs for request tracing.
 * Uses Winston for transport management (Console, plus rotated files when LOG_DIR is set).
 */

import path from 'path';
import { randomUUID } from 'crypto';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  pretty: boolean;
  silent: boolean;
  logDir: string | null;
}

function initialLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level === 'debug' || level === 'warn' || level === 'error' ? level : 'info';
}

let config: LoggerConfig = {
  level: initialLevel(),
  pretty: process.env.NODE_ENV === 'development',
  silent: process.env.LOG_SILENT === 'true',
  logDir: null,
};

function consoleTransport(pretty: boolean): winston.transport {
  return new winston.transports.Console({
    format: pretty
      ? winston.format.combine(winston.format.colorize(), winston.format.simple())
      : winston.format.json(),
  });
}

/**
 * Winston Logger Instance
 */
const winstonLogger = winston.createLogger({
  level: config.level,
  silent: config.silent,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
});

let activeConsole = consoleTransport(config.pretty);
winstonLogger.add(activeConsole);

/**
 * Configure the logger. Adding a log directory attaches a daily-rotated file transport.
 */
export function configureLogger(newConfig: Partial<LoggerConfig>): void {
  const previous = config;
  config = { ...config, ...newConfig };
  winstonLogger.level = config.level;
  winstonLogger.silent = config.silent;

  if (config.pretty !== previous.pretty) {
    winstonLogger.remove(activeConsole);
    activeConsole = consoleTransport(config.pretty);
    winstonLogger.add(activeConsole);
  }

  if (config.logDir && config.logDir !== previous.logDir) {
    winstonLogger.add(new DailyRotateFile({
      filename: path.join(config.logDir, 'application-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '20m',
      maxFiles: '14d',
    }));
  }
}

/**
 * Attach an extra transport; returns a function that detaches it
 */
export function attachLogTransport(transport: winston.transport): () => void {
  winstonLogger.add(transport);
  return () => {
    winstonLogger.remove(transport);
  };
}

/**
 * Generate a new correlation ID
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Logger class for request-scoped logging
 */
export class Logger {
  private correlationId: string;
  private context: Record<string, unknown>;

  constructor(correlationId?: string, context: Record<string, unknown> = {}) {
    this.correlationId = correlationId || generateCorrelationId();
    this.context = context;
  }

  getCorrelationId(): string {
    return this.correlationId;
  }

  /**
   * Create a child logger with the same correlation ID
   */
  child(context: Record<string, unknown> = {}): Logger {
    return new Logger(this.correlationId, { ...this.context, ...context });
  }

  private log(level: LogLevel, message: string, extra: Record<string, unknown> = {}): void {
    winstonLogger.log({
      level,
      message,
      correlationId: this.correlationId,
      ...this.context,
      ...extra,
    });
  }

  debug(message: string, extra: Record<string, unknown> = {}): void {
    this.log('debug', message, extra);
  }

  info(message: string, extra: Record<string, unknown> = {}): void {
    this.log('info', message, extra);
  }

  warn(message: string, extra: Record<string, unknown> = {}): void {
    this.log('warn', message, extra);
  }

  error(message: string, extra: Record<string, unknown> = {}): void {
    this.log('error', message, extra);
  }

  /**
   * Log a request start
   */
  logRequestStart(method: string, path: string, extra: Record<string, unknown> = {}): void {
    this.info('Request started', {
      method,
      path,
      ...extra,
    });
  }

  /**
   * Log a request completion
   */
  logRequestEnd(
    method: string,
    path: string,
    statusCode: number,
    durationMs: number,
    extra: Record<string, unknown> = {}
  ): void {
    const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';

    this.log(level, 'Request completed', {
      method,
      path,
      statusCode,
      durationMs,
      ...extra,
    });
  }
}

/**
 * Create a new logger instance
 */
export function createLogger(correlationId?: string, context: Record<string, unknown> = {}): Logger {
  return new Logger(correlationId, context);
}

/**
 * Format an unknown thrown value for a log field
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Default logger instance (for non-request-scoped logging)
 */
export const defaultLogger = new Logger('system');
