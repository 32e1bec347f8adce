/**
 * Prism - Agent Types
 */

import type { Plan } from '../dsl/types.js';
import type { EvidencePack } from '../evidence/pack.js';
import type { PolicyDecision } from '../policy/types.js';
import type { ScalarValue } from '../storage/types.js';

export type AgentStatus = 'success' | 'denied' | 'error';

export type ResultRow = Record<string, ScalarValue>;

export interface DeniedResponse {
  status: 'denied';
  policy: PolicyDecision;
  explanation: string;
  alternative: string;
  dsl: Plan;
}

export interface ErrorResponse {
  status: 'error';
  error: string;
  sql: string;
  dsl: Plan;
}

export interface SuccessResponse {
  status: 'success';
  dsl: Plan;
  policy: PolicyDecision;
  sql: string;
  columns: string[];
  data: ResultRow[];
  outlierIndices: number[];
  evidencePack: EvidencePack;
  explanation: string;
}

export type AgentResponse = SuccessResponse | DeniedResponse | ErrorResponse;

export const DENIED_ALTERNATIVE = 'Try a query without narrative fields, or request access elevation.';
