import winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import { v4 as uuidv4 } from 'uuid';

/**
 * Logger interface for structured logging
 */
export interface Logger {
  error: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Generates a short per-run trace identifier
 * @returns First eight characters of a v4 UUID
 */
export function createTraceId(): string {
  return uuidv4().slice(0, 8);
}

/**
 * Creates a Winston logger instance with structured logging
 * @param serviceName - Name of the service/module using the logger
 * @param traceId - Optional per-run trace ID used to correlate retries and skips
 * @param level - Optional level; falls back to LOG_LEVEL, then 'info'
 * @param extraTransports - Appended after the console and file transports
 * @returns Logger instance
 */
export function createLogger(
  serviceName: string,
  traceId?: string,
  level?: LogLevel,
  extraTransports: winston.transport[] = []
): Logger {
  const logFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  );

  // Ensure logs directory exists
  const logsDir = path.join(process.cwd(), 'logs');
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  const dateStr = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
  const logFilePath = path.join(logsDir, `${serviceName}-${dateStr}.log`);

  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf((info: winston.Logform.TransformableInfo) => {
          const { timestamp, level: lvl, message, ...meta } = info;
          const metaStr = Object.keys(meta).length
            ? JSON.stringify(meta)
            : '';
          return `${timestamp} [${lvl}] ${message} ${metaStr}`;
        })
      ),
    }),
    new winston.transports.File({
      filename: logFilePath,
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 7,
      format: logFormat,
    }),
    new winston.transports.File({
      filename: path.join(logsDir, `${serviceName}-errors-${dateStr}.log`),
      level: 'error',
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 30,
      format: logFormat,
    }),
    ...extraTransports,
  ];

  const logger = winston.createLogger({
    level: level || process.env.LOG_LEVEL || 'info',
    format: logFormat,
    defaultMeta: {
      service: serviceName,
      ...(traceId && { traceId }),
    },
    transports,
  });

  return {
    error: (message: string, meta?: Record<string, unknown>) => {
      logger.error(message, meta);
    },
    warn: (message: string, meta?: Record<string, unknown>) => {
      logger.warn(message, meta);
    },
    info: (message: string, meta?: Record<string, unknown>) => {
      logger.info(message, meta);
    },
    debug: (message: string, meta?: Record<string, unknown>) => {
      logger.debug(message, meta);
    },
  };
}
