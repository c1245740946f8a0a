/**
 * Structured JSON Logger
 *
 * Provides structured logging with correlation IDs for request tracing.
 * Uses Winston for transport management (Console, plus rotating files when
 * a log directory is configured).
 */

import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import winston from 'winston';
import 'winston-daily-rotate-file';

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/**
 * Structured log entry
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  correlationId: string;
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  pretty: boolean;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_PRIORITY, value);
}

const envLevel = process.env.LOG_LEVEL;

let config: LoggerConfig = {
  level: isLogLevel(envLevel) ? envLevel : 'info',
  pretty: process.env.NODE_ENV === 'development',
};

const winstonLogger = winston.createLogger({
  level: config.level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: config.pretty
        ? winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          )
        : winston.format.json(),
    }),
  ],
});

let fileLoggingDir: string | null = null;

/**
 * Configure the logger
 */
export function configureLogger(newConfig: Partial<LoggerConfig>): void {
  config = { ...config, ...newConfig };
  winstonLogger.level = config.level;
}

/**
 * Add a daily rotating file transport under the given directory
 */
export function enableFileLogging(logDir: string): void {
  if (fileLoggingDir === logDir) {
    return;
  }
  fs.mkdirSync(logDir, { recursive: true });
  winstonLogger.add(new winston.transports.DailyRotateFile({
    filename: path.join(logDir, 'gateway-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '20m',
    maxFiles: '14d',
  }));
  fileLoggingDir = logDir;
}

let captureEnabled = false;
let capturedLogs: LogEntry[] = [];

/**
 * Record every emitted entry in memory (tests inspect them)
 */
export function enableLogCapture(): void {
  captureEnabled = true;
}

export function disableLogCapture(): void {
  captureEnabled = false;
  capturedLogs = [];
}

export function getCapturedLogs(): LogEntry[] {
  return [...capturedLogs];
}

export function clearCapturedLogs(): void {
  capturedLogs = [];
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

  private log(level: LogLevel, message: string, extra: Record<string, unknown> = {}): void {
    if (captureEnabled && LEVEL_PRIORITY[level] <= LEVEL_PRIORITY[config.level]) {
      capturedLogs.push({
        ...this.context,
        ...extra,
        timestamp: new Date().toISOString(),
        level,
        message,
        correlationId: this.correlationId,
      });
    }

    winstonLogger.log({
      ...this.context,
      ...extra,
      level,
      message,
      correlationId: this.correlationId,
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
  logRequestStart(method: string, path: string): void {
    this.info('Request started', { method, path });
  }

  /**
   * Log a request completion
   */
  logRequestEnd(
    method: string,
    path: string,
    statusCode: number,
    durationMs: number
  ): void {
    const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';

    this.log(level, 'Request completed', {
      method,
      path,
      statusCode,
      durationMs,
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
 * Default logger instance (for non-request-scoped logging)
 */
export const defaultLogger = new Logger('system');
