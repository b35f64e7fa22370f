/**
 * @fileoverview Módulo índice que centraliza las utilidades reexportadas.
 * @module utils
 *
 * Se puede usar este barrel o la ruta directa de cada módulo.
 */

export {
  logger,
  log,
  configureLogger,
  createScopedLogger,
  getLogFilePath,
  getLogDirectory,
  cleanOldLogs,
  formatObject,
} from './logger';
export type { LogLevel, ConfigureLoggerOptions, ScopedLogger } from './logger';

export * from './fileHelpers';
export * from './validation';
export * from './errors';

export * as schemas from './schemas';
export { RateLimiter, createThrottle, delay } from './rateLimiter';
export type { RateLimiterStats } from './rateLimiter';
