/**
 * Prism - Analytics DSL Types
 *
 * Structured representation of an analytics request, derived from free text
 * by the intent parser and consumed by the policy engine and SQL compiler.
 */

import type { RequestedField } from '../policy/types.js';

export type PlanIntent = 'analysis' | 'chart' | 'table';

export type TimeGrain = 'month' | 'quarter';

export type SortDirection = 'asc' | 'desc';

export type FilterOperator = '=' | '!=' | '<' | '<=' | '>' | '>=';

export type ExportFormat = 'none' | 'csv';

export interface PlanFilter {
  field: string;
  operator: FilterOperator;
  value: string;
}

export interface TimeRange {
  /** ISO date (YYYY-MM-DD) */
  start: string;
  /** ISO date (YYYY-MM-DD) */
  end: string;
  grain: TimeGrain;
}

export interface SortSpec {
  field: string;
  direction: SortDirection;
}

export interface PrivacySettings {
  minGroupSize: number;
}

/**
 * The DSL plan. `metricIds[0]` decides the source table; every dimension and
 * filter is read from that table.
 */
export interface Plan {
  intent: PlanIntent;
  metricIds: string[];
  dimensions: string[];
  filters: PlanFilter[];
  timeRange: TimeRange;
  sort: SortSpec[];
  limit: number;
  privacy: PrivacySettings;
  export: { format: ExportFormat };
}

/**
 * Parser output: the plan plus the sensitive fields the question asks for
 */
export interface ParsedQuery {
  plan: Plan;
  fieldsRequested: RequestedField[];
}

export const DEFAULT_PLAN_LIMIT = 200;
export const DEFAULT_MIN_GROUP_SIZE = 10;
