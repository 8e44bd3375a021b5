/**
 * Logging for the extractor and its CLI.
 *
 * All console output goes to stderr; stdout carries only extracted rows.
 * File logs rotate daily and are written only when LOG_FILE=true.
 */

import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export interface LogContext {
  file?: string;
  jobIndex?: number;
  worksheet?: string;
  sink?: string;
  [key: string]: unknown;
}

interface LoggerSettings {
  level: string;
  console: boolean;
  file: boolean;
  silent: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

function readSettings(env: NodeJS.ProcessEnv): LoggerSettings {
  return {
    level: env.LOG_LEVEL || (env.NODE_ENV === 'production' ? 'info' : 'debug'),
    console: env.LOG_CONSOLE !== 'false',
    file: env.LOG_FILE === 'true' && env.NODE_ENV !== 'test',
    silent: env.LOG_SILENT === 'true',
    logDir: env.LOG_DIR || path.join(process.cwd(), 'logs'),
    maxFiles: env.LOG_MAX_FILES || '14d',
    maxSize: env.LOG_MAX_SIZE || '20m',
  };
}

const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const readableFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, namespace, service: _service, ...meta }) => {
    const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `[${String(timestamp)}] ${level} ${String(namespace)}: ${String(message)}${details}`;
  })
);

function buildTransports(settings: LoggerSettings): winston.transport[] {
  const transports: winston.transport[] = [];

  if (settings.console) {
    transports.push(
      new winston.transports.Console({
        format: process.env.NODE_ENV === 'production' ? jsonFormat : readableFormat,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (settings.file) {
    fs.mkdirSync(settings.logDir, { recursive: true });
    const rotation = {
      datePattern: 'YYYY-MM-DD',
      format: jsonFormat,
      maxSize: settings.maxSize,
      maxFiles: settings.maxFiles,
      zippedArchive: true,
    };
    transports.push(
      new DailyRotateFile({ ...rotation, filename: path.join(settings.logDir, 'error-%DATE%.log'), level: 'error' }),
      new DailyRotateFile({ ...rotation, filename: path.join(settings.logDir, 'fio-metrics-%DATE%.log') })
    );
  }

  return transports;
}

const settings = readSettings(process.env);

const winstonLogger = winston.createLogger({
  level: settings.level,
  format: jsonFormat,
  defaultMeta: { service: 'fio-metrics' },
  transports: buildTransports(settings),
  silent: settings.silent,
  exitOnError: false,
});

/**
 * Tags every entry with the package it came from
 */
class Logger {
  constructor(private readonly namespace: string) {}

  error(message: string, error?: unknown, context?: LogContext): void {
    const meta = { namespace: this.namespace, ...context };
    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...meta,
        error: { message: error.message, stack: error.stack, name: error.name },
      });
    } else if (error !== undefined) {
      winstonLogger.error(message, { ...meta, error });
    } else {
      winstonLogger.error(message, meta);
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, { namespace: this.namespace, ...context });
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, { namespace: this.namespace, ...context });
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, { namespace: this.namespace, ...context });
  }
}

export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

export const logger = new Logger('fio-metrics');

export { Logger, winstonLogger };
