/**
 * Domain Error Classes
 * @module errors/domain
 *
 * Errors raised by the mock server: matching, expectation verification,
 * lifecycle transitions and configuration.
 */

import { BaseError, type ErrorContext } from './base.js';
import { GeneralErrorCodes, LifecycleErrorCodes, MockErrorCodes } from './codes.js';

// ============================================================================
// Shared Types
// ============================================================================

/**
 * Inclusive call-count range. `max` is `Infinity` when unbounded.
 */
export interface CountRange {
  readonly min: number;
  readonly max: number;
}

/**
 * Render a count range as `[min, max]`
 */
export function formatCountRange(range: CountRange): string {
  const upper = Number.isFinite(range.max) ? String(range.max) : 'unbounded';
  return `[${range.min}, ${upper}]`;
}

// ============================================================================
// Matching Errors
// ============================================================================

/**
 * A matcher threw while inspecting a request.
 * Only ever used to log the failure; selection treats it as a non-match.
 */
export class MatchEvaluationError extends BaseError {
  public readonly ruleId: string;
  public readonly matcher: string;

  constructor(ruleId: string, matcher: string, cause: Error, context: ErrorContext = {}) {
    super(
      `Matcher "${matcher}" of rule ${ruleId} failed: ${cause.message}`,
      MockErrorCodes.MATCH_EVALUATION_ERROR,
      { ...context, cause, details: { ruleId, matcher } }
    );
    this.name = 'MatchEvaluationError';
    this.ruleId = ruleId;
    this.matcher = matcher;
  }
}

// ============================================================================
// Verification Errors
// ============================================================================

/**
 * Data carried by an expectation violation
 */
export interface ViolationDetails {
  ruleId: string;
  ruleName?: string;
  description: string;
  expected: CountRange;
  observed: number;
}

/**
 * A rule's observed call count fell outside its expected range
 */
export class ExpectationViolation extends BaseError {
  public readonly ruleId: string;
  public readonly ruleName: string | undefined;
  public readonly description: string;
  public readonly expected: CountRange;
  public readonly observed: number;

  constructor(violation: ViolationDetails, context: ErrorContext = {}) {
    const label = violation.ruleName ? `"${violation.ruleName}" (${violation.ruleId})` : violation.ruleId;
    super(
      `Rule ${label} expected ${formatCountRange(violation.expected)} calls but received ${violation.observed}: ${violation.description}`,
      MockErrorCodes.EXPECTATION_VIOLATION,
      {
        ...context,
        details: {
          ruleId: violation.ruleId,
          ruleName: violation.ruleName,
          expected: { min: violation.expected.min, max: Number.isFinite(violation.expected.max) ? violation.expected.max : null },
          observed: violation.observed,
        },
      }
    );
    this.name = 'ExpectationViolation';
    this.ruleId = violation.ruleId;
    this.ruleName = violation.ruleName;
    this.description = violation.description;
    this.expected = { min: violation.expected.min, max: violation.expected.max };
    this.observed = violation.observed;
  }
}

/**
 * One or more rules failed verification
 */
export class VerificationError extends BaseError {
  public readonly violations: readonly ExpectationViolation[];

  constructor(violations: readonly ExpectationViolation[], context: ErrorContext = {}) {
    const lines = violations.map((violation, index) => `  ${index + 1}. ${violation.message}`);
    super(
      `Verification failed for ${violations.length} rule${violations.length === 1 ? '' : 's'}:\n${lines.join('\n')}`,
      MockErrorCodes.VERIFICATION_FAILED,
      { ...context, details: { violationCount: violations.length } }
    );
    this.name = 'VerificationError';
    this.violations = [...violations];
  }
}

/**
 * Expectation range was malformed (negative, fractional, min above max)
 */
export class InvalidExpectationError extends BaseError {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[], context: ErrorContext = {}) {
    super(
      `Invalid expectation: ${issues.join('; ')}`,
      MockErrorCodes.INVALID_EXPECTATION,
      { ...context, details: { issues } },
      false
    );
    this.name = 'InvalidExpectationError';
    this.issues = [...issues];
  }
}

/**
 * Response template was given an unusable value
 */
export class InvalidResponseError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, MockErrorCodes.INVALID_RESPONSE, context, false);
    this.name = 'InvalidResponseError';
  }
}

// ============================================================================
// Lifecycle Errors
// ============================================================================

/**
 * The requested address could not be bound
 */
export class BindError extends BaseError {
  public readonly host: string;
  public readonly port: number;

  constructor(host: string, port: number, cause: Error, context: ErrorContext = {}) {
    super(
      `Failed to bind ${host}:${port}: ${cause.message}`,
      LifecycleErrorCodes.BIND_ERROR,
      { ...context, cause, details: { host, port } }
    );
    this.name = 'BindError';
    this.host = host;
    this.port = port;
  }
}

/**
 * stop() was called on a server that is already stopped
 */
export class AlreadyStoppedError extends BaseError {
  constructor(context: ErrorContext = {}) {
    super('Mock server is already stopped', LifecycleErrorCodes.ALREADY_STOPPED, context);
    this.name = 'AlreadyStoppedError';
  }
}

/**
 * An operation is not allowed in the server's current state
 */
export class InvalidStateError extends BaseError {
  public readonly state: string;
  public readonly operation: string;

  constructor(operation: string, state: string, context: ErrorContext = {}) {
    super(
      `Cannot ${operation} while the mock server is ${state}`,
      LifecycleErrorCodes.INVALID_STATE,
      { ...context, operation, details: { state } },
      false
    );
    this.name = 'InvalidStateError';
    this.state = state;
    this.operation = operation;
  }
}

// ============================================================================
// Transport Errors
// ============================================================================

/**
 * A request could not be read off the wire. `statusCode` is what the client
 * is answered with.
 */
export class TransportError extends BaseError {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number, context: ErrorContext = {}) {
    super(message, GeneralErrorCodes.TRANSPORT_ERROR, { ...context, details: { ...context.details, statusCode } });
    this.name = 'TransportError';
    this.statusCode = statusCode;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Single configuration validation issue
 */
export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Configuration failed schema validation
 */
export class ConfigValidationError extends BaseError {
  public readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[], context: ErrorContext = {}) {
    const formatted = issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`);
    super(
      `Invalid mock server configuration: ${formatted.join('; ')}`,
      GeneralErrorCodes.CONFIG_VALIDATION_ERROR,
      { ...context, details: { issues } },
      false
    );
    this.name = 'ConfigValidationError';
    this.issues = [...issues];
  }
}
