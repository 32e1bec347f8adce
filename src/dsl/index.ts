/**
 * Prism - Analytics DSL Module
 *
 * Free text → plan (parser), plan → validated SQL (compiler, validator).
 */

export {
  parseQuery,
  detectIntent,
  detectMetrics,
  detectDimensions,
  detectTimeRange,
  detectFilters,
  detectExport,
  detectSensitiveFields,
  STATE_WHITELIST,
  type ParseOptions,
} from './parser.js';
export { SqlCompiler, DEFAULT_SQL_COMPILER_CONFIG, type SqlCompilerConfig } from './compiler.js';
export {
  QueryValidator,
  DEFAULT_VALIDATION_CONFIG,
  type ValidationResult,
  type QueryValidationConfig,
} from './validator.js';
export {
  createMetricRegistry,
  DEFAULT_METRIC_REGISTRY,
  type MetricRegistry,
  type MetricRegistryDefinition,
  type MetricRegistryEntry,
  type SourceTable,
  type SqlDialect,
  type TableGrain,
} from './registry.js';
export type {
  Plan,
  ParsedQuery,
  PlanIntent,
  PlanFilter,
  FilterOperator,
  TimeRange,
  TimeGrain,
  SortSpec,
  SortDirection,
  PrivacySettings,
  ExportFormat,
} from './types.js';
export { DEFAULT_PLAN_LIMIT, DEFAULT_MIN_GROUP_SIZE } from './types.js';
