/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the mock server.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * Lifecycle error codes (server state machine, binding)
 */
export const LifecycleErrorCodes = {
  BIND_ERROR: 'BIND_ERROR',
  ALREADY_STOPPED: 'ALREADY_STOPPED',
  INVALID_STATE: 'INVALID_STATE',
} as const;

export type LifecycleErrorCode = typeof LifecycleErrorCodes[keyof typeof LifecycleErrorCodes];

/**
 * Matching and verification error codes
 */
export const MockErrorCodes = {
  MATCH_EVALUATION_ERROR: 'MATCH_EVALUATION_ERROR',
  EXPECTATION_VIOLATION: 'EXPECTATION_VIOLATION',
  VERIFICATION_FAILED: 'VERIFICATION_FAILED',
  INVALID_EXPECTATION: 'INVALID_EXPECTATION',
  INVALID_RESPONSE: 'INVALID_RESPONSE',
} as const;

export type MockErrorCode = typeof MockErrorCodes[keyof typeof MockErrorCodes];

/**
 * Configuration and transport error codes
 */
export const GeneralErrorCodes = {
  CONFIG_VALIDATION_ERROR: 'CONFIG_VALIDATION_ERROR',
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
} as const;

export type GeneralErrorCode = typeof GeneralErrorCodes[keyof typeof GeneralErrorCodes];

// ============================================================================
// Combined Codes
// ============================================================================

export const ErrorCodes = {
  ...LifecycleErrorCodes,
  ...MockErrorCodes,
  ...GeneralErrorCodes,
} as const;

export type ErrorCode = LifecycleErrorCode | MockErrorCode | GeneralErrorCode;

/**
 * Check if a string is a known error code
 */
export function isErrorCode(value: string): value is ErrorCode {
  return Object.values(ErrorCodes).some((code) => code === value);
}
