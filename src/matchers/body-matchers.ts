/**
 * Body matchers
 * @module matchers/body-matchers
 *
 * JSON matchers parse the body on every evaluation and throw when it is
 * not valid JSON; selection treats the throw as a non-match.
 */

import { isDeepStrictEqual } from 'node:util';
import type { ZodTypeAny } from 'zod';
import { readBodyJson, readBodyText } from '../types/request.js';
import { matching, type Matcher } from './types.js';

const DESCRIPTION_LIMIT = 60;

function preview(value: string): string {
  return value.length > DESCRIPTION_LIMIT ? `${value.slice(0, DESCRIPTION_LIMIT)}...` : value;
}

/**
 * Body decoded as UTF-8 equals `expected`
 */
export function bodyString(expected: string): Matcher {
  return matching((request) => readBodyText(request) === expected, `body == "${preview(expected)}"`);
}

export function bodyContains(fragment: string): Matcher {
  return matching(
    (request) => readBodyText(request).includes(fragment),
    `body contains "${preview(fragment)}"`
  );
}

/**
 * Raw body bytes equal `expected`
 */
export function bodyBytes(expected: Uint8Array): Matcher {
  const copy = Buffer.from(expected);
  return matching((request) => request.body.equals(copy), `body == <${copy.length} bytes>`);
}

/**
 * Body parses as JSON deep-equal to `expected`
 */
export function bodyJson(expected: unknown): Matcher {
  const normalized: unknown = JSON.parse(JSON.stringify(expected));
  return matching(
    (request) => isDeepStrictEqual(readBodyJson(request), normalized),
    `json body == ${preview(JSON.stringify(normalized))}`
  );
}

/**
 * Body parses as JSON and contains `expected` as a subset:
 * objects may carry extra keys, arrays and scalars must match exactly.
 */
export function bodyPartialJson(expected: unknown): Matcher {
  const normalized: unknown = JSON.parse(JSON.stringify(expected));
  return matching(
    (request) => containsJson(readBodyJson(request), normalized),
    `json body contains ${preview(JSON.stringify(normalized))}`
  );
}

/**
 * Body parses as JSON and satisfies the zod schema
 */
export function bodyMatchesSchema(schema: ZodTypeAny, description = 'schema'): Matcher {
  return matching(
    (request) => schema.safeParse(readBodyJson(request)).success,
    `json body matches ${description}`
  );
}

// ============================================================================
// Helpers
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structural subset check between two JSON values
 */
export function containsJson(actual: unknown, expected: unknown): boolean {
  if (isPlainObject(expected)) {
    if (!isPlainObject(actual)) {
      return false;
    }
    return Object.entries(expected).every(
      ([key, value]) => Object.hasOwn(actual, key) && containsJson(actual[key], value)
    );
  }
  return isDeepStrictEqual(actual, expected);
}
