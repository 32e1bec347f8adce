/**
 * Prism - Configuration Module
 *
 * Barrel export file for configuration management
 */

export {
  ServerConfigSchema,
  DataSourceConfigSchema,
  SqliteConfigSchema,
  PostgresConfigSchema,
  CatalogConfigSchema,
  QueryConfigSchema,
  PolicyConfigSchema,
  LoggingConfigSchema,
  ConfigFileSchema,
  safeValidateConfigFile,
  formatValidationErrors,
} from './schema.js';

export type {
  ConfigFileInput,
  ConfigFileOutput,
} from './schema.js';

export { ConfigLoader, loadConfig, getConfig, getConfigLoader, DEFAULT_CONFIG_PATH } from './loader.js';
