/**
 * Matcher capability
 * @module matchers/types
 */

import type { RecordedRequest } from '../types/request.js';

/**
 * A predicate over an incoming request.
 *
 * Implementations read request fields only. A matcher may throw while
 * inspecting a request (a body that is not JSON, say); the mount table
 * treats that as "does not match".
 */
export interface Matcher {
  matches(request: RecordedRequest): boolean;
  /** Human-readable description used in verification reports */
  describe(): string;
}

/**
 * Build a matcher from a predicate and a description
 */
export function matching(
  predicate: (request: RecordedRequest) => boolean,
  description = 'custom matcher'
): Matcher {
  return {
    matches: predicate,
    describe: () => description,
  };
}

/**
 * Describe a list of AND-combined matchers
 */
export function describeAll(matchers: readonly Matcher[]): string {
  if (matchers.length === 0) {
    return 'any request';
  }
  return matchers.map((matcher) => matcher.describe()).join(' AND ');
}
