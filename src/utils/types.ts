/**
 * Prism - Verifiable Analytics
 * Core Type Definitions
 */

// =============================================================================
// Server Configuration Types
// =============================================================================

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
}

// =============================================================================
// Data Source Configuration Types
// =============================================================================

export type DataSourceDriver = 'sqlite' | 'postgres';

export interface SqliteConfig {
  /** File path, or ':memory:' for an in-process database */
  path: string;
  /** Populate the synthetic data products on startup */
  seed: boolean;
}

export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  poolMin: number;
  poolMax: number;
}

export interface DataSourceConfig {
  driver: DataSourceDriver;
  sqlite: SqliteConfig;
  postgres: PostgresConfig;
}

// =============================================================================
// Catalog, Query & Policy Configuration Types
// =============================================================================

export interface CatalogConfig {
  path: string;
}

export interface QueryConfig {
  defaultLimit: number;
  maxResultLimit: number;
  /** Deadline around query execution in ms; 0 disables it */
  executeTimeoutMs: number;
}

export interface PolicyConfig {
  minGroupSize: number;
  privilegedRoles: string[];
}

// =============================================================================
// Logging Types
// =============================================================================

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'http' | 'debug';
  format: 'json' | 'pretty';
  fileEnabled: boolean;
  filePath: string;
}

// =============================================================================
// Main Configuration Type
// =============================================================================

export interface PrismConfig {
  server: ServerConfig;
  dataSource: DataSourceConfig;
  catalog: CatalogConfig;
  query: QueryConfig;
  policy: PolicyConfig;
  logging: LoggingConfig;
  configFilePath: string;
}

// =============================================================================
// Request Types
// =============================================================================

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /** Assigned by the request id middleware */
      requestId?: string;
      startTime?: number;
    }
  }
}

// =============================================================================
// Error Types
// =============================================================================

export class PrismError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, code = 'INTERNAL_ERROR', isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = 'PrismError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends PrismError {
  constructor(message: string) {
    super(message, 500, 'CONFIGURATION_ERROR', true);
    this.name = 'ConfigurationError';
  }
}

/**
 * A plan that cannot be compiled: no metrics, or a metric the registry does
 * not know.
 */
export class ValidationError extends PrismError {
  public readonly validationErrors: string[];

  constructor(message: string, validationErrors: string[] = []) {
    super(message, 400, 'VALIDATION_ERROR', true);
    this.name = 'ValidationError';
    this.validationErrors = validationErrors;
  }
}

/**
 * Generated SQL rejected by the validator. Points at a template or mapping
 * bug, never at user input.
 */
export class CompilationValidationError extends PrismError {
  public readonly diagnostic: string;
  public readonly sql: string;

  constructor(diagnostic: string, sql: string) {
    super(`Generated SQL failed validation: ${diagnostic}`, 500, 'COMPILATION_VALIDATION_ERROR', false);
    this.name = 'CompilationValidationError';
    this.diagnostic = diagnostic;
    this.sql = sql;
  }
}

export class ExecutionError extends PrismError {
  constructor(message: string) {
    super(message, 502, 'EXECUTION_ERROR', true);
    this.name = 'ExecutionError';
  }
}
