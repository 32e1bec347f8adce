/**
 * Prism - Evidence Pack Tests
 */

import { describe, it, expect } from '@jest/globals';

import { makeEvidencePack, sqlHash } from '../../src/evidence/pack.js';
import type { Plan } from '../../src/dsl/types.js';
import type { PolicyDecision } from '../../src/policy/types.js';

const createPlan = (): Plan => ({
  intent: 'analysis',
  metricIds: ['complaint_volume'],
  dimensions: ['quarter'],
  filters: [],
  timeRange: { start: '2020-01-01', end: '2025-07-01', grain: 'quarter' },
  sort: [{ field: 'quarter', direction: 'asc' }],
  limit: 200,
  privacy: { minGroupSize: 10 },
  export: { format: 'none' },
});

const policy: PolicyDecision = { decision: 'ALLOW', constraints: {}, rationale: 'Request complies with all policies.' };

describe('sqlHash', () => {
  it('should return the first 16 hex characters of the SHA-256', () => {
    expect(sqlHash('SELECT 1')).toBe('e004ebd5b5532a4b');
  });

  it('should differ for different SQL', () => {
    expect(sqlHash('SELECT 2')).not.toBe(sqlHash('SELECT 1'));
    expect(sqlHash('SELECT 2')).toMatch(/^[0-9a-f]{16}$/);
  });
});

describe('makeEvidencePack', () => {
  const now = new Date(Date.UTC(2025, 6, 1, 12, 30, 0));

  it('should bind the run facts into one record', () => {
    const plan = createPlan();
    const quality = [{ dataset: 'dp_complaints', version: '1.3.0', freshness: '2025-06-30', testsPassed: true }];

    const pack = makeEvidencePack(
      { plan, policy, sql: 'SELECT 1', quality, rowCount: 22 },
      { now: () => now, generateId: () => 'pack-1' }
    );

    expect(pack).toEqual({
      evidencePackId: 'pack-1',
      timestamp: '2025-07-01T12:30:00.000Z',
      dslPlan: plan,
      policyDecision: policy,
      sqlHash: 'e004ebd5b5532a4b',
      sql: 'SELECT 1',
      datasetsQuality: quality,
      resultRowCount: 22,
    });
  });

  it('should snapshot the plan', () => {
    const plan = createPlan();
    const pack = makeEvidencePack({ plan, policy, sql: 'SELECT 1', quality: [], rowCount: 0 });

    plan.metricIds.push('net_income');

    expect(pack.dslPlan.metricIds).toEqual(['complaint_volume']);
    expect(Object.isFrozen(pack)).toBe(true);
    expect(Object.isFrozen(pack.dslPlan)).toBe(true);
  });

  it('should generate a fresh id per pack', () => {
    const input = { plan: createPlan(), policy, sql: 'SELECT 1', quality: [], rowCount: 0 };
    const first = makeEvidencePack(input);
    const second = makeEvidencePack(input);

    expect(first.evidencePackId).not.toBe(second.evidencePackId);
    expect(first.sqlHash).toBe(second.sqlHash);
  });
});
