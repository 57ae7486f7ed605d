/**
 * Rule builder
 * @module mocks/mock
 */

import { InvalidExpectationError } from '../errors/index.js';
import { anyRequest } from '../matchers/request-matchers.js';
import { describeAll, type Matcher } from '../matchers/types.js';
import { Expectation, type ExpectationInput } from './expectation.js';
import { ResponseTemplate } from './response-template.js';

/**
 * Frozen snapshot of a rule, taken at mount time
 */
export interface MockDefinition {
  readonly matchers: readonly Matcher[];
  readonly response: ResponseTemplate;
  readonly expectation: Expectation;
  readonly name?: string;
  /** Stop answering after this many matches */
  readonly matchLimit?: number;
}

/**
 * Fluent builder for a rule: matchers, canned response, call-count expectation.
 *
 * @example
 * ```typescript
 * const mock = Mock.given(method('GET'))
 *   .and(path('/health'))
 *   .respondWith(ResponseTemplate.ok().bodyString('up'))
 *   .expect(1)
 *   .named('health probe');
 *
 * server.mount(mock);
 * ```
 */
export class Mock {
  private readonly matchers: Matcher[];
  private response: ResponseTemplate = ResponseTemplate.ok();
  private expectation: Expectation = Expectation.unconstrained();
  private name: string | undefined;
  private matchLimit: number | undefined;

  private constructor(matchers: readonly Matcher[]) {
    this.matchers = [...matchers];
  }

  /**
   * Start a rule from one or more matchers. With none, the rule matches
   * every request.
   */
  static given(...matchers: Matcher[]): Mock {
    return new Mock(matchers.length > 0 ? matchers : [anyRequest()]);
  }

  /** Add a matcher; all matchers must hold for the rule to match */
  and(matcher: Matcher): this {
    this.matchers.push(matcher);
    return this;
  }

  respondWith(response: ResponseTemplate): this {
    this.response = response;
    return this;
  }

  /**
   * Set the expected call count
   *
   * @throws InvalidExpectationError
   */
  expect(expectation: ExpectationInput): this {
    this.expectation = Expectation.from(expectation);
    return this;
  }

  named(name: string): this {
    this.name = name;
    return this;
  }

  /**
   * Answer at most `times` requests; further requests fall through to
   * older rules or the default response
   */
  upToNTimes(times: number): this {
    if (!Number.isInteger(times) || times < 1) {
      throw new InvalidExpectationError([`match limit must be a positive integer, got ${times}`]);
    }
    this.matchLimit = times;
    return this;
  }

  describe(): string {
    return describeAll(this.matchers);
  }

  toDefinition(): MockDefinition {
    return Object.freeze({
      matchers: Object.freeze([...this.matchers]),
      response: this.response,
      expectation: this.expectation,
      ...(this.name !== undefined && { name: this.name }),
      ...(this.matchLimit !== undefined && { matchLimit: this.matchLimit }),
    });
  }
}
