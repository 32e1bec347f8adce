/**
 * Prism - Intent Parser
 *
 * Turns a free-text analytics question into a DSL plan using keyword and
 * pattern heuristics. Never fails: every signal has a default.
 */

import { addDays, formatIsoDate } from '../utils/helpers.js';
import type { RequestedField } from '../policy/types.js';
import {
  DEFAULT_MIN_GROUP_SIZE,
  DEFAULT_PLAN_LIMIT,
  type ExportFormat,
  type ParsedQuery,
  type PlanFilter,
  type PlanIntent,
  type TimeRange,
} from './types.js';

// =============================================================================
// Keyword Tables
// =============================================================================

const CHART_KEYWORDS = ['chart', 'trend', 'plot', 'graph', 'visuali'];
const TABLE_KEYWORDS = ['table', 'list', 'export', 'break down', 'breakdown'];

/**
 * Metric synonyms, in registry order. Every match is appended.
 */
const METRIC_KEYWORDS: ReadonlyArray<{ metricId: string; keywords: string[] }> = [
  { metricId: 'net_income', keywords: ['net income'] },
  { metricId: 'complaint_volume', keywords: ['complaint'] },
  { metricId: 'total_assets', keywords: ['asset'] },
  { metricId: 'total_deposits', keywords: ['deposit'] },
  { metricId: 'npa_ratio', keywords: ['npa', 'non-performing'] },
  { metricId: 'tier1_ratio', keywords: ['tier', 'capital'] },
  { metricId: 'complaint_narrative', keywords: ['narrative'] },
];

const DIMENSION_KEYWORDS: ReadonlyArray<{ dimension: string; keywords: string[] }> = [
  { dimension: 'state', keywords: ['state'] },
  { dimension: 'product', keywords: ['product'] },
  { dimension: 'bank_name', keywords: ['company', 'bank'] },
  { dimension: 'quarter', keywords: ['quarter', 'quarterly'] },
];

export const DEFAULT_METRIC_ID = 'complaint_volume';
export const DEFAULT_DIMENSION = 'quarter';
export const DEFAULT_RANGE_START = '2020-01-01';

export const STATE_WHITELIST: ReadonlySet<string> = new Set([
  'CA', 'TX', 'NY', 'FL', 'IL', 'OH', 'PA', 'GA', 'NC', 'MI',
]);

const NARRATIVE_FIELD: RequestedField = { field: 'consumer_complaint_narrative', sensitivity: 'HIGH' };

// =============================================================================
// Detectors
// =============================================================================

const containsAny = (text: string, keywords: readonly string[]): boolean =>
  keywords.some((k) => text.includes(k));

export function detectIntent(query: string): PlanIntent {
  const q = query.toLowerCase();
  if (containsAny(q, CHART_KEYWORDS)) return 'chart';
  if (containsAny(q, TABLE_KEYWORDS)) return 'table';
  return 'analysis';
}

export function detectMetrics(query: string): string[] {
  const q = query.toLowerCase();
  const metrics = METRIC_KEYWORDS.filter(({ keywords }) => containsAny(q, keywords)).map((m) => m.metricId);
  return metrics.length > 0 ? metrics : [DEFAULT_METRIC_ID];
}

export function detectDimensions(query: string): string[] {
  const q = query.toLowerCase();
  const dims = DIMENSION_KEYWORDS.filter(({ keywords }) => containsAny(q, keywords)).map((d) => d.dimension);
  return dims.length > 0 ? dims : [DEFAULT_DIMENSION];
}

/**
 * `since YYYY` wins over `last N months`; otherwise the full history
 */
export function detectTimeRange(query: string, today: Date = new Date()): TimeRange {
  const q = query.toLowerCase();
  const end = formatIsoDate(today);

  const since = /since (\d{4})/.exec(q);
  if (since?.[1]) {
    return { start: `${since[1]}-01-01`, end, grain: 'quarter' };
  }

  const lastMonths = /last (\d+) months?/.exec(q);
  if (lastMonths?.[1]) {
    const months = parseInt(lastMonths[1], 10);
    return { start: formatIsoDate(addDays(today, -30 * months)), end, grain: 'month' };
  }

  return { start: DEFAULT_RANGE_START, end, grain: 'quarter' };
}

/**
 * Only the first two-letter uppercase token is considered, against the
 * text as typed, not the lower-cased copy.
 */
export function detectFilters(query: string): PlanFilter[] {
  const match = /\b([A-Z]{2})\b/.exec(query);
  const token = match?.[1];
  if (token && STATE_WHITELIST.has(token)) {
    return [{ field: 'state', operator: '=', value: token }];
  }
  return [];
}

export function detectExport(query: string): ExportFormat {
  const q = query.toLowerCase();
  return q.includes('export') || q.includes('csv') ? 'csv' : 'none';
}

export function detectSensitiveFields(query: string): RequestedField[] {
  return query.toLowerCase().includes('narrative') ? [{ ...NARRATIVE_FIELD }] : [];
}

// =============================================================================
// Parser
// =============================================================================

export interface ParseOptions {
  /** Reference date for relative time ranges */
  today?: Date;
  /** Row cap written into the plan */
  limit?: number;
}

/**
 * Convert a natural-language analytics request into a DSL plan
 */
export function parseQuery(query: string, options: ParseOptions = {}): ParsedQuery {
  const dimensions = detectDimensions(query);
  const [firstDimension = DEFAULT_DIMENSION] = dimensions;

  return {
    plan: {
      intent: detectIntent(query),
      metricIds: detectMetrics(query),
      dimensions,
      filters: detectFilters(query),
      timeRange: detectTimeRange(query, options.today),
      sort: [{ field: firstDimension, direction: 'asc' }],
      limit: options.limit ?? DEFAULT_PLAN_LIMIT,
      privacy: { minGroupSize: DEFAULT_MIN_GROUP_SIZE },
      export: { format: detectExport(query) },
    },
    fieldsRequested: detectSensitiveFields(query),
  };
}
