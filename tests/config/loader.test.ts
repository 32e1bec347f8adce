/**
 * Prism - Configuration Loader Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

import { describe, it, expect, beforeEach, afterEach, afterAll } from '@jest/globals';

import { ConfigLoader } from '../../src/config/loader.js';
import { ConfigurationError } from '../../src/utils/types.js';

// =============================================================================
// Test Setup
// =============================================================================

const OVERRIDE_KEYS = [
  'CONFIG_FILE_PATH',
  'PORT',
  'HOST',
  'DATA_SOURCE_DRIVER',
  'SQLITE_PATH',
  'SQLITE_SEED',
  'POSTGRES_HOST',
  'POSTGRES_PORT',
  'POSTGRES_DB',
  'POSTGRES_USER',
  'POSTGRES_PASSWORD',
  'POSTGRES_SSL',
  'POSTGRES_POOL_MIN',
  'POSTGRES_POOL_MAX',
  'CATALOG_PATH',
  'QUERY_DEFAULT_LIMIT',
  'QUERY_MAX_RESULT_LIMIT',
  'QUERY_EXECUTE_TIMEOUT_MS',
  'POLICY_MIN_GROUP_SIZE',
  'POLICY_PRIVILEGED_ROLES',
  'LOG_LEVEL',
  'LOG_FORMAT',
  'LOG_FILE_ENABLED',
  'LOG_FILE_PATH',
];

const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'prism-config-'));

function writeConfig(name: string, content: string): string {
  const file = path.join(tempDir, name);
  fs.writeFileSync(file, content, 'utf-8');
  return file;
}

describe('ConfigLoader', () => {
  let savedEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    savedEnv = { ...process.env };
    for (const key of OVERRIDE_KEYS) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    process.env = savedEnv;
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should fall back to defaults when the file is missing', () => {
    const config = new ConfigLoader(path.join(tempDir, 'missing.yaml')).load();

    expect(config.server.port).toBe(8080);
    expect(config.server.host).toBe('0.0.0.0');
    expect(config.dataSource.driver).toBe('sqlite');
    expect(config.dataSource.sqlite).toEqual({ path: ':memory:', seed: true });
    expect(config.catalog.path).toBe('./data/metrics_catalog.yaml');
    expect(config.query).toEqual({ defaultLimit: 200, maxResultLimit: 10000, executeTimeoutMs: 0 });
    expect(config.policy).toEqual({ minGroupSize: 10, privilegedRoles: ['compliance_officer', 'admin'] });
    expect(config.logging.level).toBe('info');
  });

  it('should merge file values over defaults', () => {
    const file = writeConfig(
      'merge.yaml',
      ['server:', '  port: 9000', 'query:', '  executeTimeoutMs: 500', 'policy:', '  minGroupSize: 15', ''].join('\n')
    );

    const config = new ConfigLoader(file).load();

    expect(config.server.port).toBe(9000);
    expect(config.server.host).toBe('0.0.0.0');
    expect(config.query.executeTimeoutMs).toBe(500);
    expect(config.query.defaultLimit).toBe(200);
    expect(config.policy.minGroupSize).toBe(15);
    expect(config.configFilePath).toBe(file);
  });

  it('should read JSON files', () => {
    const file = writeConfig('config.json', JSON.stringify({ dataSource: { driver: 'postgres' } }));
    expect(new ConfigLoader(file).load().dataSource.driver).toBe('postgres');
  });

  it('should let environment variables win over the file', () => {
    const file = writeConfig('env.yaml', ['server:', '  port: 9000', ''].join('\n'));
    process.env['PORT'] = '7000';
    process.env['POLICY_PRIVILEGED_ROLES'] = 'auditor, admin';
    process.env['SQLITE_SEED'] = 'false';
    process.env['QUERY_DEFAULT_LIMIT'] = '25';

    const config = new ConfigLoader(file).load();

    expect(config.server.port).toBe(7000);
    expect(config.policy.privilegedRoles).toEqual(['auditor', 'admin']);
    expect(config.dataSource.sqlite.seed).toBe(false);
    expect(config.query.defaultLimit).toBe(25);
  });

  it('should ignore invalid enum values from the environment', () => {
    process.env['LOG_LEVEL'] = 'verbose';
    process.env['DATA_SOURCE_DRIVER'] = 'oracle';

    const config = new ConfigLoader(path.join(tempDir, 'missing.yaml')).load();

    expect(config.logging.level).toBe('info');
    expect(config.dataSource.driver).toBe('sqlite');
  });

  it('should take the path from CONFIG_FILE_PATH', () => {
    const file = writeConfig('from-env.yaml', ['catalog:', '  path: ./elsewhere.yaml', ''].join('\n'));
    process.env['CONFIG_FILE_PATH'] = file;

    const config = new ConfigLoader().load();

    expect(config.configFilePath).toBe(file);
    expect(config.catalog.path).toBe('./elsewhere.yaml');
  });

  it('should reject invalid values', () => {
    const file = writeConfig('invalid.yaml', ['server:', '  port: abc', ''].join('\n'));
    expect(() => new ConfigLoader(file).load()).toThrow(ConfigurationError);
  });

  it('should reject a default limit above the result cap in the file', () => {
    const file = writeConfig(
      'limits.yaml',
      ['query:', '  defaultLimit: 500', '  maxResultLimit: 100', ''].join('\n')
    );

    expect(() => new ConfigLoader(file).load()).toThrow(
      `Invalid configuration in ${file}: query.defaultLimit: defaultLimit must not exceed maxResultLimit`
    );
  });

  it('should reject a default limit above the result cap from the environment', () => {
    const file = path.join(tempDir, 'missing.yaml');
    process.env['QUERY_DEFAULT_LIMIT'] = '20000';

    expect(() => new ConfigLoader(file).load()).toThrow(
      `Invalid configuration in ${file} with environment overrides: ` +
        'query.defaultLimit: defaultLimit must not exceed maxResultLimit'
    );
  });

  it('should validate environment overrides against the schema', () => {
    const file = path.join(tempDir, 'missing.yaml');

    process.env['QUERY_DEFAULT_LIMIT'] = '0';
    expect(() => new ConfigLoader(file).load()).toThrow(ConfigurationError);

    delete process.env['QUERY_DEFAULT_LIMIT'];
    process.env['POLICY_MIN_GROUP_SIZE'] = '-5';
    expect(() => new ConfigLoader(file).load()).toThrow(/policy\.minGroupSize/);
  });

  it('should reject unsupported file formats', () => {
    const file = writeConfig('config.toml', 'port = 1');
    expect(() => new ConfigLoader(file).load()).toThrow('Unsupported config file format: .toml');
  });

  it('should use defaults when the file cannot be parsed', () => {
    const file = writeConfig('broken.json', '{ not json');
    expect(new ConfigLoader(file).load().server.port).toBe(8080);
  });

  it('should require load before getConfig', () => {
    const loader = new ConfigLoader(path.join(tempDir, 'missing.yaml'));
    expect(() => loader.getConfig()).toThrow(ConfigurationError);

    const config = loader.load();
    expect(loader.getConfig()).toBe(config);
  });
});
