/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for validating mock server configuration.
 */

import { z } from 'zod';

// ============================================================================
// Server Configuration
// ============================================================================

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;
export const DEFAULT_BODY_LIMIT = 10 * 1024 * 1024;

/**
 * Server configuration schema
 */
export const ServerConfigSchema = z.object({
  /** Host to bind to */
  host: z.string().min(1).default(DEFAULT_HOST),
  /** Port to listen on; 0 lets the operating system pick a free port */
  port: z.coerce.number().int().min(0).max(65535).default(0),
  /** Append every received request to the request log */
  recordRequests: z.boolean().default(true),
  /** Upper bound on the graceful drain before remaining connections are closed */
  shutdownTimeoutMs: z.coerce.number().int().min(0).default(DEFAULT_SHUTDOWN_TIMEOUT_MS),
  /** Maximum accepted request body size in bytes */
  bodyLimit: z.coerce.number().int().min(1).default(DEFAULT_BODY_LIMIT),
}).strict();

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Partial configuration accepted from any source before validation
 */
export type ServerConfigInput = z.input<typeof ServerConfigSchema>;

/**
 * Address binding subset accepted by start()
 */
export type BindOptions = Partial<Pick<ServerConfig, 'host' | 'port'>>;
