/**
 * Prism - PostgreSQL Query Executor
 * Runs compiled SQL against a PostgreSQL warehouse through a pg-promise pool
 */

import pgPromise, { type IDatabase, type IMain } from 'pg-promise';

import logger from '../utils/logger.js';
import { toErrorMessage } from '../utils/helpers.js';
import type { PostgresConfig } from '../utils/types.js';
import { ExecutionError } from '../utils/types.js';
import { toScalar, type QueryExecutionResult, type QueryExecutor, type ScalarValue } from './types.js';

// int8 and numeric arrive as strings by default
const PG_INT8_OID = 20;
const PG_NUMERIC_OID = 1700;

export class PostgresExecutor implements QueryExecutor {
  private pgp: IMain;
  private db: IDatabase<object>;
  private config: PostgresConfig;

  constructor(config: PostgresConfig) {
    this.config = config;

    this.pgp = pgPromise({
      capSQL: true,

      query(e) {
        logger.debug('PostgreSQL query', {
          query: e.query.substring(0, 200),
        });
      },

      error(err, e) {
        logger.error('PostgreSQL error', {
          error: toErrorMessage(err),
          query: e.query?.substring(0, 200),
        });
      },
    });

    this.pgp.pg.types.setTypeParser(PG_INT8_OID, (value: string) => parseInt(value, 10));
    this.pgp.pg.types.setTypeParser(PG_NUMERIC_OID, (value: string) => parseFloat(value));

    this.db = this.pgp({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: config.poolMax,
      min: config.poolMin,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });
  }

  /**
   * Test database connection
   */
  public async connect(): Promise<void> {
    try {
      const connection = await this.db.connect();
      void connection.done();
      logger.info('PostgreSQL connection pool initialized', {
        host: this.config.host,
        port: this.config.port,
        database: this.config.database,
      });
    } catch (error) {
      const message = toErrorMessage(error);
      logger.error('Failed to connect to PostgreSQL', {
        host: this.config.host,
        port: this.config.port,
        error: message,
      });
      throw new ExecutionError(`Failed to connect to PostgreSQL: ${message}`);
    }
  }

  public async execute(sql: string): Promise<QueryExecutionResult> {
    try {
      const result = await this.db.result(sql);
      const columns = result.fields.map((field) => field.name);
      const rawRows: unknown[] = result.rows;

      const rows: ScalarValue[][] = rawRows.map((row) => {
        if (typeof row !== 'object' || row === null) return [];
        const values = new Map<string, unknown>(Object.entries(row));
        return columns.map((column) => toScalar(values.get(column)));
      });

      return { columns, rows };
    } catch (error) {
      throw new ExecutionError(toErrorMessage(error));
    }
  }

  public async close(): Promise<void> {
    this.pgp.end();
    logger.info('PostgreSQL connection pool closed');
  }
}
