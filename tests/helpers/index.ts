/**
 * Test Helpers
 * @module tests/helpers
 */

import { vi } from 'vitest';
import type { StructuredLogger } from '../../src/logging/index.js';
import { createLogger } from '../../src/logging/index.js';
import type { HeaderInit } from '../../src/types/headers.js';
import { createRecordedRequest, type RecordedRequest } from '../../src/types/request.js';

// ============================================================================
// Request Factory
// ============================================================================

export interface TestRequestOverrides {
  method?: string;
  url?: string;
  headers?: HeaderInit;
  body?: string | Uint8Array;
  sequence?: number;
}

/**
 * Build a RecordedRequest, GET / by default
 */
export function buildRequest(overrides: TestRequestOverrides = {}): RecordedRequest {
  return createRecordedRequest({
    method: overrides.method ?? 'GET',
    url: overrides.url ?? '/',
    headers: overrides.headers,
    body: overrides.body,
    sequence: overrides.sequence,
  });
}

export function jsonRequest(url: string, payload: unknown, method = 'POST'): RecordedRequest {
  return buildRequest({
    method,
    url,
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(payload),
  });
}

// ============================================================================
// Logger
// ============================================================================

/**
 * Silent logger whose domain methods are spies. `child()` hands back the same
 * logger so components a server builds with child loggers report to these spies.
 */
export function createSpyLogger(): StructuredLogger {
  const logger = createLogger('test');
  vi.spyOn(logger, 'child').mockReturnValue(logger);
  vi.spyOn(logger, 'matcherFailed');
  vi.spyOn(logger, 'ruleMounted');
  vi.spyOn(logger, 'ruleUnmounted');
  vi.spyOn(logger, 'transportError');
  return logger;
}
