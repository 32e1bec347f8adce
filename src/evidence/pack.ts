/**
 * Prism - Evidence Pack Builder
 *
 * Binds a run's plan, policy decision, executed SQL, dataset quality snapshot
 * and result size into one audit record.
 */

import { createHash } from 'crypto';

import { generateId } from '../utils/helpers.js';
import type { DatasetQuality } from '../catalog/types.js';
import type { Plan } from '../dsl/types.js';
import type { PolicyDecision } from '../policy/types.js';

export interface EvidencePack {
  readonly evidencePackId: string;
  /** Completion time, UTC ISO-8601 */
  readonly timestamp: string;
  readonly dslPlan: Plan;
  readonly policyDecision: PolicyDecision;
  readonly sqlHash: string;
  readonly sql: string;
  readonly datasetsQuality: readonly DatasetQuality[];
  readonly resultRowCount: number;
}

export interface EvidencePackInput {
  plan: Plan;
  policy: PolicyDecision;
  sql: string;
  quality: readonly DatasetQuality[];
  rowCount: number;
}

export interface EvidencePackOptions {
  now?: () => Date;
  generateId?: () => string;
}

const SQL_HASH_LENGTH = 16;

/**
 * First 16 hex characters of the SHA-256 of the SQL text
 */
export function sqlHash(sql: string): string {
  return createHash('sha256').update(sql, 'utf8').digest('hex').slice(0, SQL_HASH_LENGTH);
}

export function makeEvidencePack(input: EvidencePackInput, options: EvidencePackOptions = {}): EvidencePack {
  const now = options.now ?? (() => new Date());
  const nextId = options.generateId ?? generateId;

  return Object.freeze({
    evidencePackId: nextId(),
    timestamp: now().toISOString(),
    dslPlan: Object.freeze(structuredClone(input.plan)),
    policyDecision: input.policy,
    sqlHash: sqlHash(input.sql),
    sql: input.sql,
    datasetsQuality: Object.freeze([...input.quality]),
    resultRowCount: input.rowCount,
  });
}
