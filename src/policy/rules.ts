/**
 * Prism - Default Policy Rules
 */

import { DEFAULT_MIN_GROUP_SIZE } from '../dsl/types.js';
import type { PolicyRule } from './types.js';

export interface DefaultPolicyOptions {
  /** Smallest group size a result may expose */
  minGroupSize?: number;
  /** Roles allowed to read HIGH sensitivity fields */
  privilegedRoles?: string[];
}

export const DEFAULT_PRIVILEGED_ROLES: readonly string[] = ['compliance_officer', 'admin'];

/**
 * Build the default rule list. Order matters: a HIGH sensitivity request is
 * denied before the group-size rule gets a chance to constrain it.
 */
export function createDefaultPolicyRules(options: DefaultPolicyOptions = {}): readonly PolicyRule[] {
  const minGroupSize = options.minGroupSize ?? DEFAULT_MIN_GROUP_SIZE;
  const privilegedRoles = options.privilegedRoles ?? DEFAULT_PRIVILEGED_ROLES;

  return Object.freeze([
    {
      id: 'deny_narrative_fields',
      description: 'Narrative / free-text fields are HIGH sensitivity and denied for most roles.',
      match: (request) => request.fieldsRequested.some((f) => f.sensitivity.toUpperCase() === 'HIGH'),
      exemptRoles: [...privilegedRoles],
      outcome: { action: 'DENY' },
      rationale: `High-sensitivity narrative fields are restricted. Only ${privilegedRoles.join(' or ')} roles may access them.`,
    },
    {
      id: 'min_aggregation',
      description: 'Enforce minimum group size for privacy.',
      match: (request) => (request.privacy.minGroupSize ?? DEFAULT_MIN_GROUP_SIZE) < minGroupSize,
      exemptRoles: [],
      outcome: { action: 'ALLOW_WITH_CONSTRAINTS', constraints: { minGroupSize } },
      rationale: `Minimum group size of ${minGroupSize} enforced for privacy.`,
    },
  ] satisfies PolicyRule[]);
}

export const DEFAULT_POLICY_RULES: readonly PolicyRule[] = createDefaultPolicyRules();
