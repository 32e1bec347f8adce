/**
 * Prism - SQLite Query Executor
 * In-process data source backed by better-sqlite3
 */

import Database from 'better-sqlite3';

import logger from '../utils/logger.js';
import { toErrorMessage } from '../utils/helpers.js';
import { ExecutionError } from '../utils/types.js';
import { toScalar, type QueryExecutionResult, type QueryExecutor, type ScalarValue } from './types.js';

export class SqliteExecutor implements QueryExecutor {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Open a database file, or an in-memory database for ':memory:'
   */
  static open(path = ':memory:'): SqliteExecutor {
    const db = new Database(path);
    logger.debug('SQLite database opened', { path });
    return new SqliteExecutor(db);
  }

  async execute(sql: string): Promise<QueryExecutionResult> {
    const startTime = Date.now();

    try {
      const statement = this.db.prepare(sql);
      if (!statement.reader) {
        throw new ExecutionError('Statement does not return rows');
      }

      const columns = statement.columns().map((c) => c.name);
      const rawRows: unknown[] = statement.raw(true).all();
      const rows: ScalarValue[][] = rawRows.map((row) => (Array.isArray(row) ? row.map(toScalar) : []));

      logger.debug('SQLite query executed', { rowCount: rows.length, durationMs: Date.now() - startTime });
      return { columns, rows };
    } catch (error) {
      if (error instanceof ExecutionError) throw error;
      throw new ExecutionError(toErrorMessage(error));
    }
  }

  /**
   * The underlying connection, for seeding
   */
  getDatabase(): Database.Database {
    return this.db;
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
      logger.debug('SQLite database closed');
    }
  }
}
