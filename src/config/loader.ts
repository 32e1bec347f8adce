/**
 * Prism - Configuration Loader
 * Loads an optional YAML/JSON file, validates it and applies environment overrides
 */

import fs from 'fs';
import path from 'path';

import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';

import logger, { logConfig } from '../utils/logger.js';
import { toErrorMessage } from '../utils/helpers.js';
import type { PrismConfig } from '../utils/types.js';
import { ConfigurationError } from '../utils/types.js';
import {
  DataSourceDriverSchema,
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  formatValidationErrors,
  safeValidateConfigFile,
  type ConfigFileOutput,
} from './schema.js';

export const DEFAULT_CONFIG_PATH = './config/prism.config.yaml';

// =============================================================================
// Environment Variable Helpers
// =============================================================================

function getEnvString(key: string, defaultValue?: string): string | undefined {
  return process.env[key] ?? defaultValue;
}

function getEnvInt(key: string, defaultValue?: number): number | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBool(key: string, defaultValue?: boolean): boolean | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvList(key: string): string[] | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Read an enum-valued variable; unrecognized values are ignored with a warning
 */
function getEnvEnum<T extends string>(key: string, schema: z.ZodType<T>): T | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    logger.warn('Ignoring invalid environment value', { key, value });
    return undefined;
  }
  return result.data;
}

// =============================================================================
// Configuration Loader Class
// =============================================================================

export class ConfigLoader {
  private configPath: string;
  private currentConfig: PrismConfig | null = null;

  constructor(configPath?: string) {
    this.configPath = configPath ?? getEnvString('CONFIG_FILE_PATH', DEFAULT_CONFIG_PATH) ?? DEFAULT_CONFIG_PATH;
  }

  /**
   * Load configuration from file and environment variables
   */
  public load(): PrismConfig {
    const fileConfig = this.validate(this.readFile(), this.configPath);
    // Environment values are checked against the same schema as the file
    const merged = this.validate(this.applyEnvironment(fileConfig), `${this.configPath} with environment overrides`);
    const nodeEnv = getEnvEnum('NODE_ENV', NodeEnvSchema) ?? 'development';

    const config: PrismConfig = {
      ...merged,
      server: { ...merged.server, nodeEnv },
      configFilePath: this.configPath,
    };

    this.currentConfig = config;
    return config;
  }

  /**
   * Parse the config file; a missing or unreadable file yields defaults
   */
  private readFile(): unknown {
    if (!fs.existsSync(this.configPath)) {
      logConfig('No config file found, using defaults and environment variables', {
        path: this.configPath,
      });
      return {};
    }

    const extension = path.extname(this.configPath).toLowerCase();
    if (extension !== '.yaml' && extension !== '.yml' && extension !== '.json') {
      throw new ConfigurationError(`Unsupported config file format: ${extension}`);
    }

    try {
      const fileContent = fs.readFileSync(this.configPath, 'utf-8');
      const parsed: unknown = extension === '.json' ? JSON.parse(fileContent) : parseYaml(fileContent);
      logConfig('Configuration file loaded', { path: this.configPath });
      return parsed ?? {};
    } catch (error) {
      logger.warn('Failed to load config file, using defaults', {
        path: this.configPath,
        error: toErrorMessage(error),
      });
      return {};
    }
  }

  private validate(raw: unknown, source: string): ConfigFileOutput {
    const result = safeValidateConfigFile(raw);
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid configuration in ${source}: ${formatValidationErrors(result.error).join('; ')}`
      );
    }
    return result.data;
  }

  /**
   * Layer environment variable overrides over the file values
   */
  private applyEnvironment(fileConfig: ConfigFileOutput): ConfigFileOutput {
    const { server, dataSource, catalog, query, policy, logging } = fileConfig;

    return {
      server: {
        port: getEnvInt('PORT') ?? server.port,
        host: getEnvString('HOST') ?? server.host,
      },

      dataSource: {
        driver: getEnvEnum('DATA_SOURCE_DRIVER', DataSourceDriverSchema) ?? dataSource.driver,
        sqlite: {
          path: getEnvString('SQLITE_PATH') ?? dataSource.sqlite.path,
          seed: getEnvBool('SQLITE_SEED') ?? dataSource.sqlite.seed,
        },
        postgres: {
          host: getEnvString('POSTGRES_HOST') ?? dataSource.postgres.host,
          port: getEnvInt('POSTGRES_PORT') ?? dataSource.postgres.port,
          database: getEnvString('POSTGRES_DB') ?? dataSource.postgres.database,
          user: getEnvString('POSTGRES_USER') ?? dataSource.postgres.user,
          password: getEnvString('POSTGRES_PASSWORD') ?? dataSource.postgres.password,
          ssl: getEnvBool('POSTGRES_SSL') ?? dataSource.postgres.ssl,
          poolMin: getEnvInt('POSTGRES_POOL_MIN') ?? dataSource.postgres.poolMin,
          poolMax: getEnvInt('POSTGRES_POOL_MAX') ?? dataSource.postgres.poolMax,
        },
      },

      catalog: {
        path: getEnvString('CATALOG_PATH') ?? catalog.path,
      },

      query: {
        defaultLimit: getEnvInt('QUERY_DEFAULT_LIMIT') ?? query.defaultLimit,
        maxResultLimit: getEnvInt('QUERY_MAX_RESULT_LIMIT') ?? query.maxResultLimit,
        executeTimeoutMs: getEnvInt('QUERY_EXECUTE_TIMEOUT_MS') ?? query.executeTimeoutMs,
      },

      policy: {
        minGroupSize: getEnvInt('POLICY_MIN_GROUP_SIZE') ?? policy.minGroupSize,
        privilegedRoles: getEnvList('POLICY_PRIVILEGED_ROLES') ?? policy.privilegedRoles,
      },

      logging: {
        level: getEnvEnum('LOG_LEVEL', LogLevelSchema) ?? logging.level,
        format: getEnvEnum('LOG_FORMAT', LogFormatSchema) ?? logging.format,
        fileEnabled: getEnvBool('LOG_FILE_ENABLED') ?? logging.fileEnabled,
        filePath: getEnvString('LOG_FILE_PATH') ?? logging.filePath,
      },
    };
  }

  /**
   * Get current configuration
   */
  public getConfig(): PrismConfig {
    if (this.currentConfig === null) {
      throw new ConfigurationError('Configuration not loaded. Call load() first.');
    }
    return this.currentConfig;
  }
}

// =============================================================================
// Singleton Instance
// =============================================================================

let configLoaderInstance: ConfigLoader | null = null;

export function getConfigLoader(configPath?: string): ConfigLoader {
  if (configLoaderInstance === null) {
    configLoaderInstance = new ConfigLoader(configPath);
  }
  return configLoaderInstance;
}

export function loadConfig(configPath?: string): PrismConfig {
  return getConfigLoader(configPath).load();
}

export function getConfig(): PrismConfig {
  return getConfigLoader().getConfig();
}

export default ConfigLoader;
