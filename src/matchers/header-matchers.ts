/**
 * Header matchers
 * @module matchers/header-matchers
 *
 * Header names compare case-insensitively; values compare exactly.
 */

import { matching, type Matcher } from './types.js';

/**
 * Some value of header `name` equals `value`
 */
export function header(name: string, value: string): Matcher {
  return matching(
    (request) => request.headers.getAll(name).includes(value),
    `header ${name.toLowerCase()} == ${value}`
  );
}

/**
 * Header `name` carries exactly `values`, in order
 */
export function headers(name: string, values: readonly string[]): Matcher {
  return matching((request) => {
    const actual = request.headers.getAll(name);
    return actual.length === values.length && actual.every((value, index) => value === values[index]);
  }, `header ${name.toLowerCase()} == [${values.join(', ')}]`);
}

export function headerExists(name: string): Matcher {
  return matching((request) => request.headers.has(name), `header ${name.toLowerCase()} present`);
}

export function headerMissing(name: string): Matcher {
  return matching((request) => !request.headers.has(name), `header ${name.toLowerCase()} missing`);
}

/**
 * Some value of header `name` matches `pattern`
 */
export function headerRegex(name: string, pattern: RegExp): Matcher {
  const regex = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  return matching(
    (request) => request.headers.getAll(name).some((value) => regex.test(value)),
    `header ${name.toLowerCase()} =~ ${regex}`
  );
}

export function bearerToken(token: string): Matcher {
  return matching(
    (request) => request.headers.getAll('authorization').includes(`Bearer ${token}`),
    'bearer token'
  );
}

export function basicAuth(username: string, password: string): Matcher {
  const expected = `Basic ${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`;
  return matching(
    (request) => request.headers.getAll('authorization').includes(expected),
    `basic auth for ${username}`
  );
}
