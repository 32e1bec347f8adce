/**
 * Prism - Policy Module
 */

export { PolicyEngine, DEFAULT_ROLE } from './engine.js';
export {
  createDefaultPolicyRules,
  DEFAULT_POLICY_RULES,
  DEFAULT_PRIVILEGED_ROLES,
  type DefaultPolicyOptions,
} from './rules.js';
export type {
  Sensitivity,
  RequestedField,
  PolicyRequest,
  PolicyDecision,
  PolicyDecisionType,
  PolicyConstraints,
  PolicyOutcome,
  PolicyRule,
} from './types.js';
