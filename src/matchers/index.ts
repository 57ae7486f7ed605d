/**
 * Matchers Module
 * @module matchers
 *
 * @example
 * ```typescript
 * import { method, path, header, bodyPartialJson } from './matchers/index.js';
 *
 * Mock.given(method('POST'))
 *   .and(path('/orders'))
 *   .and(header('content-type', 'application/json'))
 *   .and(bodyPartialJson({ sku: 'test-sku' }))
 *   .respondWith(ResponseTemplate.withStatus(201));
 * ```
 */

export { matching, describeAll, type Matcher } from './types.js';

export {
  anyRequest,
  method,
  path,
  pathRegex,
  pathPrefix,
  queryParam,
  queryParamExists,
  queryParamMissing,
} from './request-matchers.js';

export {
  header,
  headers,
  headerExists,
  headerMissing,
  headerRegex,
  bearerToken,
  basicAuth,
} from './header-matchers.js';

export {
  bodyString,
  bodyContains,
  bodyBytes,
  bodyJson,
  bodyPartialJson,
  bodyMatchesSchema,
  containsJson,
} from './body-matchers.js';

export { allOf, anyOf, not } from './combinators.js';
