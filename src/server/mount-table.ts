/**
 * Mount Table
 * @module server/mount-table
 *
 * Ordered set of active rules. Selection walks the table newest-first, so
 * the most recently mounted matching rule answers a request.
 */

import { v4 as uuidv4 } from 'uuid';
import { MatchEvaluationError, getErrorMessage, toError } from '../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import { describeAll, type Matcher } from '../matchers/types.js';
import type { Expectation } from '../mocks/expectation.js';
import type { MockDefinition } from '../mocks/mock.js';
import type { ResponseTemplate } from '../mocks/response-template.js';
import type { RecordedRequest } from '../types/request.js';
import { createRuleId, type RuleId, type RuleScope } from '../types/utility.js';

// ============================================================================
// Rule
// ============================================================================

/**
 * A mounted rule. Its call counter only ever grows, and only through
 * {@link MountTable.claim}.
 */
export class Rule {
  readonly id: RuleId;
  readonly scope: RuleScope;
  readonly matchers: readonly Matcher[];
  readonly response: ResponseTemplate;
  readonly expectation: Expectation;
  readonly name: string | undefined;
  readonly matchLimit: number | undefined;
  /** Position in mount order across the table's lifetime */
  readonly mountSequence: number;
  readonly mountedAt: Date;

  #callCount = 0;
  readonly #answered: number[] = [];

  constructor(definition: MockDefinition, scope: RuleScope, mountSequence: number) {
    this.id = createRuleId(uuidv4());
    this.scope = scope;
    this.matchers = definition.matchers;
    this.response = definition.response;
    this.expectation = definition.expectation;
    this.name = definition.name;
    this.matchLimit = definition.matchLimit;
    this.mountSequence = mountSequence;
    this.mountedAt = new Date();
  }

  get callCount(): number {
    return this.#callCount;
  }

  /** True once the rule has answered as many requests as its match limit */
  get exhausted(): boolean {
    return this.matchLimit !== undefined && this.#callCount >= this.matchLimit;
  }

  /** Sequence numbers of the requests this rule answered */
  get answeredSequences(): readonly number[] {
    return [...this.#answered];
  }

  describe(): string {
    return describeAll(this.matchers);
  }

  /** @internal */
  recordCall(request: RecordedRequest): void {
    this.#callCount += 1;
    this.#answered.push(request.sequence);
  }
}

// ============================================================================
// Mount Table
// ============================================================================

export class MountTable {
  private readonly entries: Rule[] = [];
  private mounted = 0;
  private readonly logger: StructuredLogger;

  constructor(logger: StructuredLogger = createModuleLogger('mount-table')) {
    this.logger = logger;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Register a rule at the end of the table
   */
  mount(definition: MockDefinition, scope: RuleScope = 'global'): Rule {
    this.mounted += 1;
    const rule = new Rule(definition, scope, this.mounted);
    this.entries.push(rule);
    this.logger.ruleMounted(rule.id, scope, rule.describe());
    return rule;
  }

  /**
   * Remove a rule. Unknown ids are ignored.
   */
  unmount(id: RuleId): Rule | undefined {
    const index = this.entries.findIndex((rule) => rule.id === id);
    if (index === -1) {
      return undefined;
    }
    const [rule] = this.entries.splice(index, 1);
    if (rule) {
      this.logger.ruleUnmounted(rule.id, rule.callCount);
    }
    return rule;
  }

  get(id: RuleId): Rule | undefined {
    return this.entries.find((rule) => rule.id === id);
  }

  /** Snapshot of the mounted rules in mount order */
  rules(): Rule[] {
    return [...this.entries];
  }

  /**
   * Id of the most recently mounted rule whose matchers all hold, skipping
   * rules that reached their match limit
   */
  select(request: RecordedRequest): RuleId | undefined {
    return this.find(request)?.id;
  }

  /**
   * Select and count in one synchronous step
   */
  claim(request: RecordedRequest): Rule | undefined {
    const rule = this.find(request);
    rule?.recordCall(request);
    return rule;
  }

  /**
   * Unmount every rule
   */
  clear(): Rule[] {
    const removed = this.entries.splice(0, this.entries.length);
    for (const rule of removed) {
      this.logger.ruleUnmounted(rule.id, rule.callCount);
    }
    return removed;
  }

  private find(request: RecordedRequest): Rule | undefined {
    for (let index = this.entries.length - 1; index >= 0; index -= 1) {
      const rule = this.entries[index];
      if (rule && !rule.exhausted && this.evaluate(rule, request)) {
        return rule;
      }
    }
    return undefined;
  }

  private evaluate(rule: Rule, request: RecordedRequest): boolean {
    for (const matcher of rule.matchers) {
      try {
        if (!matcher.matches(request)) {
          return false;
        }
      } catch (error) {
        this.logger.matcherFailed(rule.id, new MatchEvaluationError(rule.id, describeSafely(matcher), toError(error)));
        return false;
      }
    }
    return true;
  }
}

/** A custom matcher's describe() can throw too; that must not escape selection */
function describeSafely(matcher: Matcher): string {
  try {
    return matcher.describe();
  } catch (error) {
    return `<describe failed: ${getErrorMessage(error)}>`;
  }
}
