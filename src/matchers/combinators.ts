/**
 * Logical combinators over matchers
 * @module matchers/combinators
 */

import { describeAll, type Matcher } from './types.js';

/**
 * Every matcher matches. An empty list matches everything.
 */
export function allOf(...matchers: Matcher[]): Matcher {
  const members = [...matchers];
  return {
    matches: (request) => members.every((matcher) => matcher.matches(request)),
    describe: () => `(${describeAll(members)})`,
  };
}

/**
 * At least one matcher matches. An empty list matches nothing.
 */
export function anyOf(...matchers: Matcher[]): Matcher {
  const members = [...matchers];
  return {
    matches: (request) => members.some((matcher) => matcher.matches(request)),
    describe: () => `(${members.map((matcher) => matcher.describe()).join(' OR ')})`,
  };
}

export function not(matcher: Matcher): Matcher {
  return {
    matches: (request) => !matcher.matches(request),
    describe: () => `NOT ${matcher.describe()}`,
  };
}
