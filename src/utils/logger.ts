import path from 'path';
import winston from 'winston';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const isLogLevel = (value: string | undefined): value is LogLevel =>
  LOG_LEVELS.some(level => level === value);

// Validated again by loadConfig; bootstrap applies the configured level.
const envLevel = process.env.LOG_LEVEL;
const LOG_LEVEL: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
const LOG_DIR = process.env.LOG_DIR || 'logs';
const IS_TEST = process.env.NODE_ENV === 'test';

// 10 MB per file, 5 rotated files
const LOG_MAX_SIZE_BYTES = 10 * 1024 * 1024;
const LOG_MAX_FILES = 5;

const transports: winston.transport[] = [
  new winston.transports.Console({
    silent: IS_TEST,
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

if (!IS_TEST) {
  transports.push(
    new winston.transports.File({
      filename: path.join(LOG_DIR, 'error.log'),
      level: 'error',
      maxsize: LOG_MAX_SIZE_BYTES,
      maxFiles: LOG_MAX_FILES,
    }),
    new winston.transports.File({
      filename: path.join(LOG_DIR, 'combined.log'),
      maxsize: LOG_MAX_SIZE_BYTES,
      maxFiles: LOG_MAX_FILES,
    }),
  );
}

const logger = winston.createLogger({
  level: LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports,
});

export default logger;
