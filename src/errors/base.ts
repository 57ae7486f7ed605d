/**
 * Base Error Class
 * @module errors/base
 *
 * Every error thrown by stubwire carries a stable code, the moment it was
 * raised and an optional cause. Callers branch on `code`, not on message text.
 */

import type { ErrorCode } from './codes.js';

export interface ErrorContext {
  /** Lower-level failure this error wraps */
  cause?: Error;
  /** Structured data copied into `toJSON()` */
  details?: Record<string, unknown>;
  /** Defaults to construction time */
  timestamp?: Date;
  /** Server or rule operation in progress, e.g. `stop` or `listen` */
  operation?: string;
}

/** Shape written to logs and `JSON.stringify` */
export interface ErrorJSON {
  name: string;
  code: ErrorCode;
  message: string;
  timestamp: string;
  operation?: string;
  details?: Record<string, unknown>;
}

export abstract class BaseError extends Error {
  readonly code: ErrorCode;
  readonly timestamp: Date;
  readonly context: ErrorContext;
  /**
   * False for misuse of the API (bad state transitions, invalid arguments).
   * True for outcomes a test may expect, like a miscount or a taken port.
   */
  readonly isOperational: boolean;

  protected constructor(message: string, code: ErrorCode, context: ErrorContext = {}, isOperational = true) {
    super(message, context.cause ? { cause: context.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
    this.timestamp = context.timestamp ?? new Date();
    this.isOperational = isOperational;
    Error.captureStackTrace(this, new.target);
  }

  toJSON(): ErrorJSON {
    const { operation, details } = this.context;
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      ...(operation !== undefined && { operation }),
      ...(details !== undefined && { details }),
    };
  }

  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }

  /** This error followed by each `cause`, outermost first */
  causes(): Error[] {
    const chain: Error[] = [this];
    let link: unknown = this.cause;
    while (link instanceof Error) {
      chain.push(link);
      link = link.cause;
    }
    return chain;
  }

  /** Innermost error of the cause chain */
  rootCause(): Error {
    const chain = this.causes();
    return chain[chain.length - 1] ?? this;
  }
}

export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

export function isOperationalError(error: unknown): boolean {
  return isBaseError(error) && error.isOperational;
}

export function hasErrorCode(error: unknown, code: ErrorCode): error is BaseError {
  return isBaseError(error) && error.code === code;
}

/** Wrap a thrown non-Error value so it can travel as a cause */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : String(error);
}
