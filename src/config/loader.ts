/**
 * Configuration Loader
 * @module config/loader
 *
 * Multi-source configuration resolution with validation.
 * Sources are merged by priority (lowest first, highest overrides)
 * and the merged result is validated against ServerConfigSchema.
 */

import type { ZodIssue } from 'zod';
import { ConfigValidationError, type ConfigIssue } from '../errors/index.js';
import { ServerConfigSchema, type ServerConfig } from './schema.js';

/**
 * Unvalidated configuration values produced by a source
 */
export type ConfigValues = Record<string, unknown>;

// ============================================================================
// Configuration Source Interface
// ============================================================================

/**
 * Configuration source interface
 */
export interface ConfigSource {
  /** Unique name for the source */
  name: string;
  /** Priority level (higher = overrides lower) */
  priority: number;
  /** Load configuration from this source */
  load(): ConfigValues;
}

// ============================================================================
// Environment Variable Configuration Source
// ============================================================================

/**
 * Environment variable configuration source.
 * Numbers are passed through as strings and coerced by the schema.
 */
export class EnvironmentConfigSource implements ConfigSource {
  public readonly name = 'environment';
  public readonly priority = 10;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  load(): ConfigValues {
    const env = this.env;

    return filterUndefined({
      host: env.MOCK_SERVER_HOST,
      port: env.MOCK_SERVER_PORT,
      recordRequests: parseBoolean(env.MOCK_SERVER_RECORD_REQUESTS),
      shutdownTimeoutMs: env.MOCK_SERVER_SHUTDOWN_TIMEOUT_MS,
      bodyLimit: env.MOCK_SERVER_BODY_LIMIT,
    });
  }
}

// ============================================================================
// Object Configuration Source
// ============================================================================

/**
 * In-memory configuration source (constructor options, start() arguments)
 */
export class ObjectConfigSource implements ConfigSource {
  constructor(
    public readonly name: string,
    public readonly priority: number,
    private readonly values: object
  ) {}

  load(): ConfigValues {
    return filterUndefined({ ...this.values });
  }
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Merge all sources by priority and validate the result
 *
 * @throws ConfigValidationError when the merged values fail the schema
 */
export function loadConfig(sources: readonly ConfigSource[]): ServerConfig {
  const merged: ConfigValues = {};

  for (const source of [...sources].sort((a, b) => a.priority - b.priority)) {
    Object.assign(merged, source.load());
  }

  return validateConfig(merged);
}

/**
 * Resolve server configuration from defaults, the environment and explicit options
 */
export function resolveServerConfig(
  options: Partial<ServerConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  return loadConfig([
    new EnvironmentConfigSource(env),
    new ObjectConfigSource('options', 20, options),
  ]);
}

/**
 * Validate raw configuration values
 */
export function validateConfig(values: ConfigValues): ServerConfig {
  const result = ServerConfigSchema.safeParse(values);

  if (!result.success) {
    throw new ConfigValidationError(result.error.issues.map(toConfigIssue));
  }

  return result.data;
}

// ============================================================================
// Helpers
// ============================================================================

function toConfigIssue(issue: ZodIssue): ConfigIssue {
  return {
    path: issue.path.join('.'),
    message: issue.message,
  };
}

/**
 * 'true'/'1' and 'false'/'0' become booleans; anything else is left for the schema to reject
 */
function parseBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
}

function filterUndefined(obj: ConfigValues): ConfigValues {
  const result: ConfigValues = {};

  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}
