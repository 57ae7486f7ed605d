/**
 * Shared Types
 * @module types
 */

export { HeaderMap, type HeaderInit } from './headers.js';

export {
  createRecordedRequest,
  parseRequestTarget,
  readBodyText,
  readBodyJson,
  type QueryParams,
  type RecordedRequest,
  type RecordedRequestInit,
} from './request.js';

export {
  makeBrandedFactory,
  createRuleId,
  type Brand,
  type RuleId,
  type RuleScope,
} from './utility.js';
