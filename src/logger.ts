import winston from 'winston';
import type { LogLevel } from './config';

let logger: winston.Logger | null = null;
let configuredLevel: LogLevel = 'warn';

function createLogger(): winston.Logger {
  return winston.createLogger({
    level: configuredLevel === 'silent' ? 'error' : configuredLevel,
    silent: configuredLevel === 'silent',
    format: winston.format.combine(
      winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss',
      }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, stack }) => {
        const prefix = `[${timestamp}] [jsonpack] [${level.toUpperCase()}]`;
        if (stack) {
          return `${prefix} ${message}\n${stack}`;
        }
        return `${prefix} ${message}`;
      })
    ),
    transports: [
      // stdout carries conversion output, so every level goes to stderr
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
      }),
    ],
    exitOnError: false,
  });
}

function getLogger(): winston.Logger {
  if (!logger) {
    logger = createLogger();
  }
  return logger;
}

type Meta = Record<string, unknown>;

export const log = {
  error: (message: string, meta?: Meta) => getLogger().error(message, meta),
  warn: (message: string, meta?: Meta) => getLogger().warn(message, meta),
  info: (message: string, meta?: Meta) => getLogger().info(message, meta),
  verbose: (message: string, meta?: Meta) => getLogger().verbose(message, meta),
  debug: (message: string, meta?: Meta) => getLogger().debug(message, meta),
  silly: (message: string, meta?: Meta) => getLogger().silly(message, meta),
};

/**
 * Set the level for the logger created on next use.
 */
export function configureLogger(logLevel: LogLevel): void {
  configuredLevel = logLevel;
  logger = null;
}

export function resetLogger(): void {
  configuredLevel = 'warn';
  logger = null;
}
