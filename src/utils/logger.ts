/**
 * Logger Configuration
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { ENV } from './constants';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack }) => {
    if (stack) {
      return `${timestamp} [${level.toUpperCase()}]: ${message}\n${stack}`;
    }
    return `${timestamp} [${level.toUpperCase()}]: ${message}`;
  })
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp }) => {
    return `${timestamp} ${level}: ${message}`;
  })
);

// Every level goes to stderr; stdout carries only reports and tokens
const consoleTransport = new winston.transports.Console({
  format: consoleFormat,
  stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'warn',
  format: logFormat,
  silent: process.env.NODE_ENV === 'test',
  transports: [consoleTransport],
});

export type Verbosity = 'debug' | 'info' | 'warn' | 'error';

export interface VerbosityFlags {
  debug?: boolean;
  info?: boolean;
  verbose?: boolean;
}

/**
 * Resolve the console level from CLI flags; LOG_LEVEL wins when no flag is set
 */
export function resolveVerbosity(flags: VerbosityFlags): Verbosity {
  if (flags.debug) return 'debug';
  if (flags.info || flags.verbose) return 'info';

  const fromEnv = process.env.LOG_LEVEL;
  if (fromEnv === 'debug' || fromEnv === 'info' || fromEnv === 'warn' || fromEnv === 'error') {
    return fromEnv;
  }
  return 'warn';
}

export function setLogLevel(level: Verbosity): void {
  logger.level = level;
}

/**
 * Add rotating file transports when a log directory is configured
 */
export function enableFileLogging(logDir: string | undefined = process.env[ENV.LOG_DIR]): void {
  if (!logDir) return;

  const existing = logger.transports.find(
    (t) => t instanceof winston.transports.File
  );
  if (existing) return;

  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
      level: 'debug',
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    })
  );
}
