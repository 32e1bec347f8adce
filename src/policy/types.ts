/**
 * Prism - Policy Types
 *
 * Request/decision model for the access-control rules evaluated before any
 * SQL is generated.
 */

export type Sensitivity = 'HIGH' | 'MEDIUM' | 'LOW';

export interface RequestedField {
  field: string;
  sensitivity: Sensitivity;
}

export interface PolicyRequest {
  userAttributes: {
    role?: string;
  };
  fieldsRequested: RequestedField[];
  privacy: {
    minGroupSize?: number;
  };
}

export type PolicyDecisionType = 'ALLOW' | 'ALLOW_WITH_CONSTRAINTS' | 'DENY';

export interface PolicyConstraints {
  minGroupSize?: number;
}

export interface PolicyDecision {
  readonly decision: PolicyDecisionType;
  readonly constraints: Readonly<PolicyConstraints>;
  readonly rationale: string;
  /** Rule that produced the outcome; absent on a plain ALLOW */
  readonly ruleId?: string;
}

export type PolicyOutcome =
  | { action: 'DENY' }
  | { action: 'ALLOW_WITH_CONSTRAINTS'; constraints: PolicyConstraints };

export interface PolicyRule {
  id: string;
  description: string;
  match: (request: PolicyRequest) => boolean;
  /** Roles this rule does not apply to; evaluation moves on to the next rule */
  exemptRoles: readonly string[];
  outcome: PolicyOutcome;
  rationale: string;
}
