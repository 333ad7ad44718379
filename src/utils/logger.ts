import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { settings } from '../config/settings';
import { requestIdStore } from '../middlewares/requestId';

// ─── Log Directory ──────────────────────────────────────────────────
const LOG_DIR = path.resolve(process.cwd(), settings.logging.dir);

// ─── Custom Log Levels (add 'http' between info and debug) ──────────
const levels: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

const withRequestId = winston.format((info) => {
  const requestId = requestIdStore.getStore();
  if (requestId) info.requestId = requestId;
  return info;
});

// ─── Shared Format ──────────────────────────────────────────────────
const baseFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  withRequestId(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

// ─── Console Format (colorized for dev) ─────────────────────────────
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  withRequestId(),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, requestId, ...meta }) => {
    const rid = requestId ? ` [${String(requestId)}]` : '';
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${rid}: ${String(message)}${metaStr}`;
  })
);

// ─── Rotation Options (shared defaults) ─────────────────────────────
const rotateDefaults = {
  dirname: LOG_DIR,
  datePattern: 'YYYY-MM-DD',
  maxSize: '20m',
  maxFiles: '14d',
  zippedArchive: true,
};

// ─── Build Transports Array ─────────────────────────────────────────
const transports: winston.transport[] = [
  new winston.transports.Console({ format: consoleFormat }),
];

if (settings.logging.files) {
  transports.push(
    new DailyRotateFile({
      ...rotateDefaults,
      filename: 'combined-%DATE%.log',
      level: 'debug',
    }),
    new DailyRotateFile({
      ...rotateDefaults,
      filename: 'error-%DATE%.log',
      level: 'error',
    }),
    // Only entries that are exactly level 'http'
    new DailyRotateFile({
      ...rotateDefaults,
      filename: 'http-%DATE%.log',
      level: 'http',
      format: winston.format.combine(
        winston.format((info) => (info.level === 'http' ? info : false))(),
        baseFormat
      ),
    })
  );
}

// ─── Create Winston Logger ──────────────────────────────────────────
const winstonLogger = winston.createLogger({
  levels,
  level: settings.logging.level,
  format: baseFormat,
  transports,
  silent: settings.logging.silent,
  exitOnError: false,
});

export type LogContext = Record<string, unknown>;

// ─── Logger Wrapper ─────────────────────────────────────────────────
class Logger {
  info(message: string, context: LogContext = {}) {
    winstonLogger.info(message, context);
  }

  warn(message: string, context: LogContext = {}) {
    winstonLogger.warn(message, context);
  }

  error(message: string, context: LogContext = {}) {
    winstonLogger.error(message, context);
  }

  debug(message: string, context: LogContext = {}) {
    winstonLogger.debug(message, context);
  }

  /** Dedicated HTTP-level log for request/response traffic */
  http(message: string, context: LogContext = {}) {
    winstonLogger.log('http', message, context);
  }
}

export const logger = new Logger();

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
