/**
 * Configuration Module
 * @module config
 */

export {
  ServerConfigSchema,
  DEFAULT_HOST,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  DEFAULT_BODY_LIMIT,
  type ServerConfig,
  type ServerConfigInput,
  type BindOptions,
} from './schema.js';

export {
  EnvironmentConfigSource,
  ObjectConfigSource,
  loadConfig,
  resolveServerConfig,
  validateConfig,
  type ConfigSource,
  type ConfigValues,
} from './loader.js';
