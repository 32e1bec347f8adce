/**
 * Prism - Configuration Schema
 * Zod-based validation schemas for service configuration
 */

import { z } from 'zod';

// =============================================================================
// Server Configuration Schema
// =============================================================================

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(8080),
  host: z.string().default('0.0.0.0'),
});

// =============================================================================
// Data Source Configuration Schema
// =============================================================================

export const DataSourceDriverSchema = z.enum(['sqlite', 'postgres']);

export const SqliteConfigSchema = z.object({
  path: z.string().min(1).default(':memory:'),
  seed: z.boolean().default(true),
});

export const PostgresConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().int().min(1).max(65535).default(5432),
  database: z.string().default('prism'),
  user: z.string().default('prism_user'),
  password: z.string().default('dev_password'),
  ssl: z.boolean().default(false),
  poolMin: z.number().int().min(1).default(2),
  poolMax: z.number().int().min(1).default(10),
});

export const DataSourceConfigSchema = z.object({
  driver: DataSourceDriverSchema.default('sqlite'),
  sqlite: SqliteConfigSchema.default({}),
  postgres: PostgresConfigSchema.default({}),
});

// =============================================================================
// Catalog, Query & Policy Configuration Schemas
// =============================================================================

export const CatalogConfigSchema = z.object({
  path: z.string().min(1).default('./data/metrics_catalog.yaml'),
});

export const QueryConfigSchema = z
  .object({
    defaultLimit: z.number().int().min(1).default(200),
    maxResultLimit: z.number().int().min(1).default(10000),
    executeTimeoutMs: z.number().int().min(0).default(0),
  })
  .refine((query) => query.defaultLimit <= query.maxResultLimit, {
    message: 'defaultLimit must not exceed maxResultLimit',
    path: ['defaultLimit'],
  });

export const PolicyConfigSchema = z.object({
  minGroupSize: z.number().int().min(1).default(10),
  privilegedRoles: z.array(z.string().min(1)).default(['compliance_officer', 'admin']),
});

// =============================================================================
// Logging Configuration Schema
// =============================================================================

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'debug']);

export const LogFormatSchema = z.enum(['json', 'pretty']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('pretty'),
  fileEnabled: z.boolean().default(false),
  filePath: z.string().default('./logs/prism.log'),
});

// =============================================================================
// Root Schema
// =============================================================================

export const ConfigFileSchema = z.object({
  server: ServerConfigSchema.default({}),
  dataSource: DataSourceConfigSchema.default({}),
  catalog: CatalogConfigSchema.default({}),
  query: QueryConfigSchema.default({}),
  policy: PolicyConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// =============================================================================
// Exported Types from Schemas
// =============================================================================

export type ConfigFileInput = z.input<typeof ConfigFileSchema>;
export type ConfigFileOutput = z.output<typeof ConfigFileSchema>;

// =============================================================================
// Validation Helper Functions
// =============================================================================

/**
 * Safely validate configuration file content (returns result object)
 */
export function safeValidateConfigFile(
  config: unknown
): z.SafeParseReturnType<ConfigFileInput, ConfigFileOutput> {
  return ConfigFileSchema.safeParse(config);
}

/**
 * Format Zod validation errors into readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
