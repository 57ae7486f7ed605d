/**
 * Logging Module
 * @module logging
 */

export {
  createLogger,
  createModuleLogger,
  getLogger,
  initLogger,
  resetLogger,
  resolveLoggerConfig,
  withLogging,
  type LogContext,
  type LoggerConfig,
  type DomainLogMethods,
  type StructuredLogger,
} from './logger.js';
