import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type LevelName = 'error' | 'warn' | 'info' | 'debug';

// Color definitions for different log levels
const levelColors: Record<LevelName, typeof chalk.red> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  debug: chalk.cyan,
};

const levelIcons: Record<LevelName, string> = {
  error: '❌',
  warn: '⚠️ ',
  info: 'ℹ️ ',
  debug: '🔍',
};

function isLevelName(level: string): level is LevelName {
  return level in levelColors;
}

// Custom colorized format for console output
const colorizedFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const color = isLevelName(level) ? levelColors[level] : chalk.white;
  const icon = isLevelName(level) ? levelIcons[level] : '📝';

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = color(`[${level.toUpperCase()}]`);

  // Include stack trace for errors
  return typeof stack === 'string'
    ? `${timestampStr} ${icon} ${levelStr} ${String(message)}\n${chalk.red(stack)}`
    : `${timestampStr} ${icon} ${levelStr} ${String(message)}`;
});

// Simple format for file output (no colors)
const fileFormat = printf(({ level, message, timestamp: ts, stack }) => {
  return `${String(ts)} [${level.toUpperCase()}]: ${typeof stack === 'string' ? stack : String(message)}`;
});

// Standard output is reserved for the run report
const consoleLevels = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true })),
  defaultMeta: { service: 'ledger-payment-matcher' },
  transports: [
    new winston.transports.Console({
      stderrLevels: consoleLevels,
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        colorizedFormat
      ),
    }),
  ],
});

if (env.LOG_FILE && env.NODE_ENV !== 'test') {
  logger.add(
    new winston.transports.File({
      filename: env.LOG_FILE,
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        fileFormat
      ),
    })
  );
}

export default logger;
