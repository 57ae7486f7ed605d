/**
 * Expectation Verification
 * @module server/verification
 *
 * Compares each rule's observed call count with its expected range.
 */

import { ExpectationViolation, VerificationError, formatCountRange, type CountRange } from '../errors/index.js';
import type { RuleId, RuleScope } from '../types/utility.js';
import { err, isOk, ok, type Result } from '../utils/result.js';
import type { Rule } from './mount-table.js';

/**
 * A rule that met its expectation
 */
export interface RuleVerification {
  ruleId: RuleId;
  ruleName: string | undefined;
  description: string;
  scope: RuleScope;
  expected: CountRange;
  observed: number;
}

export type VerificationOutcome = Result<RuleVerification, ExpectationViolation>;

/**
 * Verify a single rule against its expectation
 */
export function verifyRule(rule: Rule): VerificationOutcome {
  const observed = rule.callCount;
  const expected: CountRange = { min: rule.expectation.min, max: rule.expectation.max };

  if (rule.expectation.isSatisfiedBy(observed)) {
    return ok({
      ruleId: rule.id,
      ruleName: rule.name,
      description: rule.describe(),
      scope: rule.scope,
      expected,
      observed,
    });
  }

  return err(
    new ExpectationViolation(
      {
        ruleId: rule.id,
        ruleName: rule.name,
        description: rule.describe(),
        expected,
        observed,
      },
      { operation: 'verify' }
    )
  );
}

/**
 * Outcome of verifying a set of rules, in mount order. Not fail-fast:
 * every rule is checked.
 */
export class VerificationReport {
  readonly outcomes: readonly VerificationOutcome[];

  constructor(outcomes: readonly VerificationOutcome[]) {
    this.outcomes = [...outcomes];
  }

  static of(rules: readonly Rule[]): VerificationReport {
    return new VerificationReport(rules.map(verifyRule));
  }

  get satisfied(): boolean {
    return this.violations.length === 0;
  }

  get verified(): RuleVerification[] {
    return this.outcomes.flatMap((outcome) => (outcome.ok ? [outcome.value] : []));
  }

  get violations(): ExpectationViolation[] {
    return this.outcomes.flatMap((outcome) => (outcome.ok ? [] : [outcome.error]));
  }

  /**
   * @throws VerificationError holding every violation
   */
  assertSatisfied(): this {
    const violations = this.violations;
    if (violations.length > 0) {
      throw new VerificationError(violations);
    }
    return this;
  }

  summary(): string {
    if (this.outcomes.length === 0) {
      return 'No rules to verify';
    }
    const lines = this.outcomes.map((outcome) =>
      isOk(outcome)
        ? `  ok    ${label(outcome.value.ruleId, outcome.value.ruleName)} ${outcome.value.observed} in ${formatCountRange(outcome.value.expected)}`
        : `  FAIL  ${outcome.error.message}`
    );
    const failed = this.violations.length;
    return [`${this.outcomes.length - failed}/${this.outcomes.length} rules satisfied`, ...lines].join('\n');
  }
}

function label(ruleId: string, ruleName: string | undefined): string {
  return ruleName ? `"${ruleName}" (${ruleId})` : ruleId;
}
