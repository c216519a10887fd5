/**
 * Logger Module
 *
 * Provides leveled logging with Winston, supporting:
 * - Colored, padded console output on stderr
 * - Optional rotating JSON log files (when LOG_DIR is set)
 * - A per-run correlation ID
 * - Service-specific loggers with operation timing
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { randomUUID } from 'crypto';
import { LOG_LEVELS, LogLevelSchema, type LogLevel } from '../config/schema.js';

const LOG_LEVEL_WIDTH = 7;

let currentLevel: LogLevel = LogLevelSchema.catch('info').parse(process.env.LOG_LEVEL);

winston.addColors({
  error: 'bold red',
  warn: 'bold yellow',
  success: 'bold green',
  info: 'bold blue',
  debug: 'gray',
});

// Log rotation configuration
export const LOG_ROTATION_CONFIG = {
  // Maximum size of a single log file before rotation
  maxSize: process.env.LOG_MAX_SIZE || '10m',
  // Maximum number of days to keep logs (delete older)
  maxDays: process.env.LOG_MAX_DAYS || '14d',
  // Compress rotated files
  compress: true,
};

/**
 * Format log entry as structured JSON
 */
const jsonFormat = winston.format.printf((info) => {
  const { level, message, timestamp, correlationId, service, operation, duration, ...meta } = info;

  const logEntry: Record<string, unknown> = {
    timestamp,
    level: level.toUpperCase(),
    message,
  };

  if (correlationId) logEntry.correlationId = correlationId;
  if (service) logEntry.service = service;
  if (operation) logEntry.operation = operation;
  if (duration !== undefined) logEntry.durationMs = duration;

  if (Object.keys(meta).length > 0) {
    logEntry.meta = meta;
  }

  return JSON.stringify(logEntry);
});

/**
 * Pads the level name before colorize wraps it in escape codes
 */
const padLevel = winston.format((info) => {
  info.level = info.level.padEnd(LOG_LEVEL_WIDTH);
  return info;
});

/**
 * Human-readable format for stderr: `<level> <message>`
 */
const humanFormat = winston.format.printf((info) => {
  const { level, message, stack } = info;

  let output = `${level} ${String(message)}`;

  if (typeof stack === 'string' && currentLevel === 'debug') {
    output += `\n${stack}`;
  }

  return output;
});

const consoleTransport = new winston.transports.Console({
  stderrLevels: Object.keys(LOG_LEVELS),
  format: winston.format.combine(padLevel(), winston.format.colorize(), humanFormat),
});

// Create the main logger
export const logger = winston.createLogger({
  levels: LOG_LEVELS,
  level: currentLevel,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true })
  ),
  transports: [consoleTransport],
});

let fileTransports: DailyRotateFile[] = [];

export interface LoggerOptions {
  level?: LogLevel;
  /** Directory for rotating JSON log files; files are only written when set */
  logDir?: string;
}

/**
 * Apply settings to the shared logger.
 * Called once by the CLI after settings are loaded.
 */
export function configureLogger(options: LoggerOptions): void {
  if (options.level) {
    currentLevel = options.level;
    logger.level = options.level;
  }

  for (const transport of fileTransports) {
    logger.remove(transport);
  }
  fileTransports = [];

  if (!options.logDir) return;

  const logsDir = path.resolve(options.logDir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  const fileFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    jsonFormat
  );

  fileTransports = [
    new DailyRotateFile({
      filename: path.join(logsDir, 'units-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxSize: LOG_ROTATION_CONFIG.maxSize,
      maxFiles: LOG_ROTATION_CONFIG.maxDays,
      zippedArchive: LOG_ROTATION_CONFIG.compress,
      format: fileFormat,
    }),
    new DailyRotateFile({
      filename: path.join(logsDir, 'units-error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: LOG_ROTATION_CONFIG.maxSize,
      maxFiles: '7d', // Keep error logs for 7 days
      zippedArchive: LOG_ROTATION_CONFIG.compress,
      format: fileFormat,
    }),
  ];

  for (const transport of fileTransports) {
    logger.add(transport);
  }

  logger.debug('File logging enabled', { service: 'logger', logsDir });
}

/**
 * Current level of the shared logger
 */
export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Correlation ID shared by every entry of one CLI run
 */
let currentCorrelationId: string | null = null;

/**
 * Generate a new correlation ID
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Set the current correlation ID for the execution context
 */
export function setCorrelationId(id: string): void {
  currentCorrelationId = id;
}

/**
 * Get the current correlation ID
 */
export function getCorrelationId(): string | null {
  return currentCorrelationId;
}

/**
 * Clear the current correlation ID
 */
export function clearCorrelationId(): void {
  currentCorrelationId = null;
}

/**
 * Service logger interface - returned by createServiceLogger
 */
export interface ServiceLogger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  success: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  startOperation: (
    operation: string,
    meta?: Record<string, unknown>
  ) => {
    success: (message?: string, resultMeta?: Record<string, unknown>) => void;
    failure: (error: Error | string, resultMeta?: Record<string, unknown>) => void;
  };
}

/**
 * Create a child logger with specific context (service name, correlation ID)
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    logger.log(level, message, {
      service: serviceName,
      correlationId: getCorrelationId(),
      ...meta,
    });
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    success: (message, meta) => write('success', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    /**
     * Log the start of an operation and return a function to log completion
     */
    startOperation: (operation, meta) => {
      const startTime = Date.now();
      write('debug', `Starting ${operation}`, { operation, ...meta });

      return {
        success: (message, resultMeta) => {
          write('debug', message || `Completed ${operation}`, {
            operation,
            duration: Date.now() - startTime,
            status: 'success',
            ...resultMeta,
          });
        },
        failure: (error, resultMeta) => {
          const errorMessage = error instanceof Error ? error.message : error;
          write('debug', `Failed ${operation}: ${errorMessage}`, {
            operation,
            duration: Date.now() - startTime,
            status: 'failure',
            error: errorMessage,
            stack: error instanceof Error ? error.stack : undefined,
            ...resultMeta,
          });
        },
      };
    },
  };
}

export default logger;
