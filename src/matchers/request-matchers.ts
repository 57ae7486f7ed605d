/**
 * Method, path and query matchers
 * @module matchers/request-matchers
 */

import { matching, type Matcher } from './types.js';

export function anyRequest(): Matcher {
  return matching(() => true, 'any request');
}

/**
 * Method equals `expected`, compared case-insensitively
 */
export function method(expected: string): Matcher {
  const normalized = expected.toUpperCase();
  return matching((request) => request.method === normalized, `method == ${normalized}`);
}

/**
 * Path equals `expected` exactly (query string excluded)
 */
export function path(expected: string): Matcher {
  return matching((request) => request.path === expected, `path == ${expected}`);
}

export function pathRegex(pattern: RegExp): Matcher {
  // A global or sticky regex keeps lastIndex between calls
  const regex = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  return matching((request) => regex.test(request.path), `path =~ ${regex}`);
}

export function pathPrefix(prefix: string): Matcher {
  return matching((request) => request.path.startsWith(prefix), `path starts with ${prefix}`);
}

/**
 * Some value of query parameter `name` equals `value`
 */
export function queryParam(name: string, value: string): Matcher {
  return matching(
    (request) => Object.hasOwn(request.query, name) && request.query[name].includes(value),
    `query ${name} == ${value}`
  );
}

export function queryParamExists(name: string): Matcher {
  return matching((request) => Object.hasOwn(request.query, name), `query ${name} present`);
}

export function queryParamMissing(name: string): Matcher {
  return matching((request) => !Object.hasOwn(request.query, name), `query ${name} missing`);
}
