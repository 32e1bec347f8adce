/**
 * Prism - Result Explanation
 */

import type { Plan } from '../dsl/types.js';
import type { PolicyDecision } from '../policy/types.js';

/**
 * Plain-language summary of a successful run
 */
export function buildExplanation(plan: Plan, rowCount: number, outlierCount: number, policy: PolicyDecision): string {
  const { timeRange } = plan;
  const parts = [
    `Produced a ${plan.intent} for metric(s) [${plan.metricIds.join(', ')}] grouped by [${plan.dimensions.join(', ')}].`,
    `Time range: ${timeRange.start} to ${timeRange.end} (${timeRange.grain}).`,
    `Returned ${rowCount} rows.`,
  ];

  if (outlierCount > 0) {
    parts.push(`${outlierCount} outlier(s) detected via IQR method.`);
  }
  if (policy.decision === 'ALLOW_WITH_CONSTRAINTS') {
    parts.push(`Policy applied constraints: ${JSON.stringify(policy.constraints)}.`);
  }

  return parts.join(' ');
}
