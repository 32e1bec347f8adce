/**
 * Prism - Query Validator
 *
 * Syntactic and structural checks on compiled SQL before it leaves the
 * compiler.
 */

import { Parser } from 'node-sql-parser';

import { toErrorMessage } from '../utils/helpers.js';

// =============================================================================
// Types
// =============================================================================

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  sanitizedSQL?: string;
}

export interface QueryValidationConfig {
  /**
   * Maximum allowed query length
   */
  maxQueryLength: number;

  /**
   * Maximum allowed result limit
   */
  maxResultLimit: number;

  /**
   * Tables a statement may read; empty allows any table
   */
  allowedTables: string[];

  /**
   * Grammar used by node-sql-parser
   */
  grammar: string;
}

export const DEFAULT_VALIDATION_CONFIG: QueryValidationConfig = {
  maxQueryLength: 5000,
  maxResultLimit: 10000,
  allowedTables: [],
  grammar: 'PostgresQL',
};

// =============================================================================
// Query Validator Class
// =============================================================================

export class QueryValidator {
  private config: QueryValidationConfig;
  private parser = new Parser();

  constructor(config: Partial<QueryValidationConfig> = {}) {
    this.config = { ...DEFAULT_VALIDATION_CONFIG, ...config };
  }

  /**
   * Validate a SQL statement
   */
  validate(sql: string): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (sql.length > this.config.maxQueryLength) {
      errors.push(`Query exceeds maximum length of ${this.config.maxQueryLength} characters`);
    }

    if (sql.includes('--') || sql.includes('/*')) {
      errors.push('SQL comments are not allowed');
    }

    if (sql.includes(';')) {
      errors.push('Multiple SQL statements are not allowed');
    }

    let tables: string[] = [];
    try {
      const { ast, tableList } = this.parser.parse(sql, { database: this.config.grammar });
      const statements = Array.isArray(ast) ? ast : [ast];

      if (statements.length !== 1) {
        errors.push(`Expected exactly one statement, found ${statements.length}`);
      }
      for (const statement of statements) {
        if (statement.type !== 'select') {
          errors.push('Only SELECT queries are allowed');
        }
      }

      tables = this.extractTables(tableList);
    } catch (error) {
      errors.push(`Parse error: ${toErrorMessage(error)}`);
    }

    if (this.config.allowedTables.length > 0) {
      for (const table of tables) {
        if (!this.config.allowedTables.includes(table)) {
          errors.push(`Access to table '${table}' is not allowed`);
        }
      }
    }

    const limitMatch = /LIMIT\s+(\d+)/i.exec(sql);
    if (limitMatch?.[1]) {
      const limit = parseInt(limitMatch[1], 10);
      if (limit > this.config.maxResultLimit) {
        errors.push(`LIMIT exceeds maximum of ${this.config.maxResultLimit}`);
      }
    } else {
      warnings.push('No LIMIT clause - consider adding one to limit results');
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
      sanitizedSQL: errors.length === 0 ? this.sanitize(sql) : undefined,
    };
  }

  /**
   * Table names from node-sql-parser's `type::schema::table` entries
   */
  private extractTables(tableList: string[]): string[] {
    const tables = tableList
      .map((entry) => entry.split('::').pop())
      .filter((name): name is string => typeof name === 'string' && name.length > 0)
      .map((name) => name.toLowerCase());

    return [...new Set(tables)];
  }

  /**
   * Sanitize SQL query
   */
  private sanitize(sql: string): string {
    return sql.replace(/\s+/g, ' ').trim();
  }
}
