/**
 * Prism - SQL Compiler
 *
 * Translates a DSL plan, merged with policy constraints, into a single SELECT
 * against the metric registry's tables.
 *
 * Filter values and time bounds are interpolated as quoted literals. That is
 * only acceptable because the parser emits a closed vocabulary (whitelisted
 * state codes, ISO dates); do not feed arbitrary user text through here.
 */

import logger from '../utils/logger.js';
import { CompilationValidationError, ValidationError } from '../utils/types.js';
import type { PolicyConstraints } from '../policy/types.js';
import { DEFAULT_METRIC_REGISTRY, type MetricRegistry, type SourceTable, type SqlDialect } from './registry.js';
import { DEFAULT_MIN_GROUP_SIZE, type Plan } from './types.js';
import { QueryValidator, type QueryValidationConfig } from './validator.js';

// =============================================================================
// Configuration
// =============================================================================

export interface SqlCompilerConfig {
  registry: MetricRegistry;
  dialect: SqlDialect;
  validation: Partial<QueryValidationConfig>;
}

export const DEFAULT_SQL_COMPILER_CONFIG: SqlCompilerConfig = {
  registry: DEFAULT_METRIC_REGISTRY,
  dialect: 'sqlite',
  validation: {},
};

// =============================================================================
// SQL Compiler
// =============================================================================

export class SqlCompiler {
  private readonly registry: MetricRegistry;
  private readonly dialect: SqlDialect;
  private readonly validator: QueryValidator;

  constructor(config: Partial<SqlCompilerConfig> = {}) {
    const resolved = { ...DEFAULT_SQL_COMPILER_CONFIG, ...config };
    this.registry = resolved.registry;
    this.dialect = resolved.dialect;
    this.validator = new QueryValidator({
      allowedTables: [...this.registry.tables.keys()],
      ...resolved.validation,
    });
  }

  /**
   * Compile a plan into validated SQL
   */
  compile(plan: Plan, constraints: PolicyConstraints = {}): string {
    const [firstMetric] = plan.metricIds;
    if (firstMetric === undefined) {
      throw new ValidationError('No metrics specified in DSL plan');
    }

    const metric = this.registry.metrics.get(firstMetric);
    if (!metric) {
      throw new ValidationError(`Unknown metric: ${firstMetric}`, [firstMetric]);
    }

    const table = this.resolveTable(metric.sourceTable, metric.id);
    const overrides = table.dimensionOverrides?.[this.dialect] ?? {};
    const isOverridden = (dimension: string): boolean => Object.hasOwn(overrides, dimension);
    const column = (dimension: string): string =>
      Object.hasOwn(this.registry.dimensionColumns, dimension)
        ? (this.registry.dimensionColumns[dimension] ?? dimension)
        : dimension;

    // Overridden dimensions select a derived expression under their own name
    const dimensionExpr = (dimension: string): string =>
      isOverridden(dimension) ? (overrides[dimension] ?? dimension) : column(dimension);
    const dimensionRef = (dimension: string): string => (isOverridden(dimension) ? dimension : column(dimension));

    // SELECT
    const selectParts: string[] = plan.dimensions.map((d) =>
      isOverridden(d) ? `${dimensionExpr(d)} AS ${d}` : dimensionExpr(d)
    );
    for (const metricId of plan.metricIds) {
      const entry = this.registry.metrics.get(metricId);
      if (entry) {
        selectParts.push(`${entry.sqlExpression} AS ${entry.outputAlias}`);
      }
    }

    // WHERE
    const whereParts: string[] = [];
    if (plan.timeRange.start) {
      whereParts.push(`${table.dateColumn} >= '${plan.timeRange.start}'`);
    }
    if (plan.timeRange.end) {
      whereParts.push(`${table.dateColumn} <= '${plan.timeRange.end}'`);
    }
    for (const filter of plan.filters) {
      whereParts.push(`${filter.field} ${filter.operator} '${filter.value}'`);
    }

    // GROUP BY / HAVING
    const groupBy = plan.dimensions.map(dimensionExpr).join(', ');
    const minGroupSize = constraints.minGroupSize ?? plan.privacy.minGroupSize ?? DEFAULT_MIN_GROUP_SIZE;
    const having =
      groupBy && table.grain === 'record' && minGroupSize ? `HAVING COUNT(*) >= ${minGroupSize}` : '';

    // ORDER BY
    const orderBy = plan.sort
      .map((s) => `${dimensionRef(s.field)} ${s.direction.toUpperCase()}`)
      .join(', ');

    let sql = `SELECT ${selectParts.join(', ')} FROM ${table.name}`;
    if (whereParts.length > 0) {
      sql += ` WHERE ${whereParts.join(' AND ')}`;
    }
    if (groupBy) {
      sql += ` GROUP BY ${groupBy}`;
    }
    if (having) {
      sql += ` ${having}`;
    }
    if (orderBy) {
      sql += ` ORDER BY ${orderBy}`;
    }
    if (plan.limit) {
      sql += ` LIMIT ${plan.limit}`;
    }

    const compiled = this.validate(sql);

    logger.debug('Compiled DSL plan', { table: table.name, dialect: this.dialect, sql: compiled });
    return compiled;
  }

  getDialect(): SqlDialect {
    return this.dialect;
  }

  private resolveTable(name: string, metricId: string): SourceTable {
    const table = this.registry.tables.get(name);
    if (!table) {
      throw new ValidationError(`Metric ${metricId} reads unregistered table: ${name}`, [name]);
    }
    return table;
  }

  /**
   * Run the validator and return its normalized SQL
   */
  private validate(sql: string): string {
    const result = this.validator.validate(sql);
    if (!result.valid) {
      throw new CompilationValidationError(result.errors.join('; '), sql);
    }
    if (result.warnings.length > 0) {
      logger.debug('SQL validation warnings', { warnings: result.warnings });
    }
    return result.sanitizedSQL ?? sql;
  }
}
