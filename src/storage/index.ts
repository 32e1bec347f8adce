/**
 * Prism - Storage Module
 *
 * Barrel export file for query executors and the demo seeder
 */

export { SqliteExecutor } from './sqlite.js';
export { PostgresExecutor } from './postgres.js';
export { seedDatabase } from './seed.js';
export { toScalar } from './types.js';

export type { SeedSummary } from './seed.js';
export type { QueryExecutor, QueryExecutionResult, ScalarValue } from './types.js';

import { PostgresExecutor } from './postgres.js';
import { seedDatabase } from './seed.js';
import { SqliteExecutor } from './sqlite.js';
import type { QueryExecutor } from './types.js';
import type { DataSourceConfig } from '../utils/types.js';
import logger from '../utils/logger.js';

/**
 * Build and connect the executor selected by configuration
 */
export async function createExecutor(config: DataSourceConfig): Promise<QueryExecutor> {
  if (config.driver === 'postgres') {
    const executor = new PostgresExecutor(config.postgres);
    await executor.connect();
    return executor;
  }

  const executor = SqliteExecutor.open(config.sqlite.path);
  if (config.sqlite.seed) {
    seedDatabase(executor.getDatabase());
  }

  logger.info('SQLite data source ready', { path: config.sqlite.path, seeded: config.sqlite.seed });
  return executor;
}
