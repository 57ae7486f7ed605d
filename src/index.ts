/**
 * stubwire
 * @module stubwire
 *
 * Programmable HTTP mock server: mount rules that match requests, answer
 * with canned responses and verify how often each rule was called.
 */

export * from './server/index.js';
export * from './mocks/index.js';
export * from './matchers/index.js';
export * from './types/index.js';
export * from './errors/index.js';
export * from './config/index.js';
export {
  createLogger,
  createModuleLogger,
  getLogger,
  initLogger,
  resetLogger,
  type LogContext,
  type StructuredLogger,
} from './logging/index.js';
export { ok, err, isOk, type Ok, type Err, type Result } from './utils/result.js';
