/**
 * Prism - Policy Engine
 *
 * Evaluates a request against an ordered rule list. The first rule that
 * matches and does not exempt the caller's role decides the outcome.
 */

import logger from '../utils/logger.js';
import { DEFAULT_POLICY_RULES } from './rules.js';
import type { PolicyDecision, PolicyRequest, PolicyRule } from './types.js';

export const DEFAULT_ROLE = 'analyst';

const ALLOW_RATIONALE = 'Request complies with all policies.';

export class PolicyEngine {
  private readonly rules: readonly PolicyRule[];

  constructor(rules: readonly PolicyRule[] = DEFAULT_POLICY_RULES) {
    this.rules = rules;
  }

  /**
   * Evaluate a request
   */
  evaluate(request: PolicyRequest): PolicyDecision {
    const role = request.userAttributes.role ?? DEFAULT_ROLE;

    for (const rule of this.rules) {
      if (!rule.match(request)) continue;

      if (rule.exemptRoles.includes(role)) {
        logger.debug('Policy rule matched but role is exempt', { ruleId: rule.id, role });
        continue;
      }

      const decision = this.decide(rule);
      logger.debug('Policy rule fired', { ruleId: rule.id, role, decision: decision.decision });
      return decision;
    }

    const allow: PolicyDecision = {
      decision: 'ALLOW',
      constraints: Object.freeze({}),
      rationale: ALLOW_RATIONALE,
    };
    return Object.freeze(allow);
  }

  /**
   * Rules in evaluation order
   */
  getRules(): readonly PolicyRule[] {
    return this.rules;
  }

  private decide(rule: PolicyRule): PolicyDecision {
    const { outcome } = rule;
    const decision: PolicyDecision =
      outcome.action === 'DENY'
        ? { decision: 'DENY', constraints: Object.freeze({}), rationale: rule.rationale, ruleId: rule.id }
        : {
            decision: 'ALLOW_WITH_CONSTRAINTS',
            constraints: Object.freeze({ ...outcome.constraints }),
            rationale: rule.rationale,
            ruleId: rule.id,
          };
    return Object.freeze(decision);
  }
}
