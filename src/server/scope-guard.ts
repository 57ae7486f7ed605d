/**
 * Scope Guard
 * @module server/scope-guard
 */

import type { ExpectationViolation } from '../errors/index.js';
import type { RecordedRequest } from '../types/request.js';
import type { RuleId } from '../types/utility.js';
import type { MountTable, Rule } from './mount-table.js';
import type { RequestLog } from './request-log.js';
import { verifyRule, type RuleVerification, type VerificationOutcome } from './verification.js';

/**
 * Handle on a scoped rule. Releasing it unmounts the rule and verifies that
 * rule alone; the outcome is computed once and replayed on later calls.
 *
 * @example
 * ```typescript
 * const guard = server.mountScoped(Mock.given(path('/token')).expect(1));
 * await client.refresh();
 * guard.release(); // throws ExpectationViolation unless called exactly once
 * ```
 */
export class ScopeGuard {
  private outcome: VerificationOutcome | undefined;

  constructor(
    private readonly rule: Rule,
    private readonly table: MountTable,
    private readonly log: RequestLog
  ) {}

  get ruleId(): RuleId {
    return this.rule.id;
  }

  get callCount(): number {
    return this.rule.callCount;
  }

  get released(): boolean {
    return this.outcome !== undefined;
  }

  /**
   * Requests this rule answered, oldest first. Empty when the server does
   * not record requests.
   */
  receivedRequests(): RecordedRequest[] {
    return this.log.bySequence(this.rule.answeredSequences);
  }

  /**
   * Unmount and verify, returning the outcome instead of throwing
   */
  settle(): VerificationOutcome {
    if (this.outcome === undefined) {
      this.table.unmount(this.rule.id);
      this.outcome = verifyRule(this.rule);
    }
    return this.outcome;
  }

  /**
   * Unmount and verify
   *
   * @throws ExpectationViolation when the call count is out of range
   */
  release(): RuleVerification {
    const outcome = this.settle();
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }

  /** The violation, if the guard was released and failed */
  violation(): ExpectationViolation | undefined {
    return this.outcome && !this.outcome.ok ? this.outcome.error : undefined;
  }
}
