/**
 * Prism - Metric Registry
 *
 * Static mapping from metric ids to SQL aggregates, plus the per-table facts
 * the compiler needs (grain, date column, dialect-specific dimension
 * expressions). Built once and handed to the compiler; never mutated.
 */

export type SqlDialect = 'sqlite' | 'postgres';

/**
 * `record` tables hold one row per event and get the minimum group size
 * threshold; `aggregate` tables are already rolled up.
 */
export type TableGrain = 'record' | 'aggregate';

export interface MetricRegistryEntry {
  id: string;
  sourceTable: string;
  sqlExpression: string;
  outputAlias: string;
}

export interface SourceTable {
  name: string;
  grain: TableGrain;
  /** Column the time range is applied to */
  dateColumn: string;
  /** Derived dimension expressions, keyed by dialect then dimension id */
  dimensionOverrides?: Partial<Record<SqlDialect, Readonly<Record<string, string>>>>;
}

export interface MetricRegistry {
  readonly metrics: ReadonlyMap<string, MetricRegistryEntry>;
  readonly tables: ReadonlyMap<string, SourceTable>;
  /** Default dimension id → column mapping */
  readonly dimensionColumns: Readonly<Record<string, string>>;
}

export interface MetricRegistryDefinition {
  metrics: MetricRegistryEntry[];
  tables: SourceTable[];
  dimensionColumns: Record<string, string>;
}

// =============================================================================
// Default Definitions
// =============================================================================

const DEFAULT_METRICS: MetricRegistryEntry[] = [
  { id: 'net_income', sourceTable: 'dp_call_reports', sqlExpression: 'SUM(net_income)', outputAlias: 'total_net_income' },
  { id: 'complaint_volume', sourceTable: 'dp_complaints', sqlExpression: 'COUNT(*)', outputAlias: 'complaint_count' },
  { id: 'total_assets', sourceTable: 'dp_call_reports', sqlExpression: 'SUM(assets)', outputAlias: 'total_assets' },
  { id: 'total_deposits', sourceTable: 'dp_call_reports', sqlExpression: 'SUM(deposits)', outputAlias: 'total_deposits' },
  { id: 'npa_ratio', sourceTable: 'dp_call_reports', sqlExpression: 'AVG(npa)', outputAlias: 'avg_npa' },
  { id: 'tier1_ratio', sourceTable: 'dp_call_reports', sqlExpression: 'AVG(tier1_ratio)', outputAlias: 'avg_tier1_ratio' },
  {
    id: 'complaint_narrative',
    sourceTable: 'dp_complaints',
    sqlExpression: 'consumer_complaint_narrative',
    outputAlias: 'narrative',
  },
];

const DEFAULT_TABLES: SourceTable[] = [
  {
    name: 'dp_call_reports',
    grain: 'aggregate',
    dateColumn: 'quarter',
  },
  {
    name: 'dp_complaints',
    grain: 'record',
    dateColumn: 'date_received',
    dimensionOverrides: {
      postgres: {
        quarter: "CONCAT(EXTRACT(YEAR FROM date_received), '-Q', EXTRACT(QUARTER FROM date_received))",
      },
      sqlite: {
        quarter: "strftime('%Y', date_received) || '-Q' || ((strftime('%m', date_received) + 2) / 3)",
      },
    },
  },
  {
    name: 'dp_macro_rates',
    grain: 'aggregate',
    dateColumn: 'rate_date',
  },
];

const DEFAULT_DIMENSION_COLUMNS: Record<string, string> = {
  quarter: 'quarter',
  state: 'state',
  product: 'product',
  bank_name: 'bank_name',
  date_received: 'date_received',
  company: 'company',
  channel: 'channel',
};

// =============================================================================
// Factory
// =============================================================================

export function createMetricRegistry(definition: MetricRegistryDefinition): MetricRegistry {
  return Object.freeze({
    metrics: new Map(definition.metrics.map((m) => [m.id, Object.freeze({ ...m })])),
    tables: new Map(definition.tables.map((t) => [t.name, Object.freeze({ ...t })])),
    dimensionColumns: Object.freeze({ ...definition.dimensionColumns }),
  });
}

export const DEFAULT_METRIC_REGISTRY: MetricRegistry = createMetricRegistry({
  metrics: DEFAULT_METRICS,
  tables: DEFAULT_TABLES,
  dimensionColumns: DEFAULT_DIMENSION_COLUMNS,
});
