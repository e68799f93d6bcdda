import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { join } from 'path';

const isTest = process.env.NODE_ENV === 'test';
const level = process.env.LOG_LEVEL || 'debug';

// Custom format for console output
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, context, ...meta }) => {
    const contextStr = context ? `[${String(context)}]` : '';
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `${String(timestamp)} ${level} ${contextStr} ${String(message)} ${metaStr}`;
  }),
);

// Custom format for file output (JSON)
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

function createFileTransport(filename: string, fileLevel: string, maxFiles: string): DailyRotateFile {
  return new DailyRotateFile({
    dirname: join(process.cwd(), 'logs'),
    filename,
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '20m',
    maxFiles,
    format: fileFormat,
    level: fileLevel,
  });
}

const consoleTransport = new winston.transports.Console({
  format: consoleFormat,
  level,
  silent: isTest,
});

export const winstonLogger = winston.createLogger({
  level,
  // Jest runs must not leave rotating file handles open
  transports: isTest
    ? [consoleTransport]
    : [
        consoleTransport,
        createFileTransport('monitor-%DATE%.log', 'debug', '14d'), // Keep logs for 14 days
        createFileTransport('monitor-error-%DATE%.log', 'error', '30d'), // Keep error logs for 30 days
      ],
  exitOnError: false,
});

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug';
