/**
 * Application logger
 *
 * JSON lines with timestamps on the console. Modules take a child logger
 * tagged with their scope.
 */

import winston from 'winston';

export type Logger = winston.Logger;

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [new winston.transports.Console()],
});

export function createLogger(scope: string): Logger {
  return logger.child({ scope });
}

export function setLogLevel(level: string): void {
  logger.level = level;
}
