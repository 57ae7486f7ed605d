/**
 * Rule Definitions
 * @module mocks
 */

export { Mock, type MockDefinition } from './mock.js';
export { Expectation, type ExpectationInput } from './expectation.js';
export { ResponseTemplate } from './response-template.js';
