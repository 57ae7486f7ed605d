/**
 * Error Handling Module
 * @module errors
 *
 * @example
 * ```typescript
 * import { VerificationError, isBaseError } from './errors/index.js';
 *
 * try {
 *   await server.stop();
 * } catch (error) {
 *   if (error instanceof VerificationError) {
 *     for (const violation of error.violations) {
 *       console.error(violation.message);
 *     }
 *   }
 * }
 * ```
 */

export {
  LifecycleErrorCodes,
  MockErrorCodes,
  GeneralErrorCodes,
  ErrorCodes,
  isErrorCode,
  type ErrorCode,
  type LifecycleErrorCode,
  type MockErrorCode,
  type GeneralErrorCode,
} from './codes.js';

export {
  BaseError,
  isBaseError,
  isOperationalError,
  hasErrorCode,
  toError,
  getErrorMessage,
  type ErrorContext,
  type ErrorJSON,
} from './base.js';

export {
  MatchEvaluationError,
  ExpectationViolation,
  VerificationError,
  InvalidExpectationError,
  InvalidResponseError,
  BindError,
  AlreadyStoppedError,
  InvalidStateError,
  TransportError,
  ConfigValidationError,
  formatCountRange,
  type CountRange,
  type ViolationDetails,
  type ConfigIssue,
} from './domain.js';
