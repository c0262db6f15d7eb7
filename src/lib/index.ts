/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { logger, createLogger, setLogLevel } from './logger.js';
export type { Logger } from './logger.js';
export { createSerialQueue } from './serial-queue.js';
export type { SerialQueue } from './serial-queue.js';
