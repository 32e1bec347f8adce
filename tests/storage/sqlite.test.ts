/**
 * Prism - SQLite Executor and Seeder Tests
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';

import { seedDatabase } from '../../src/storage/seed.js';
import { SqliteExecutor } from '../../src/storage/sqlite.js';
import { toScalar } from '../../src/storage/types.js';
import { ExecutionError } from '../../src/utils/types.js';

// =============================================================================
// Seeder
// =============================================================================

describe('seedDatabase', () => {
  let executor: SqliteExecutor;

  beforeAll(() => {
    executor = SqliteExecutor.open();
  });

  afterAll(async () => {
    await executor.close();
  });

  it('should fill all three demo tables', () => {
    const summary = seedDatabase(executor.getDatabase());

    expect(summary.callReports).toBe(132);
    expect(summary.macroRates).toBe(2008);
    expect(summary.complaints).toBeGreaterThanOrEqual(66 * 30);
    expect(summary.complaints).toBeLessThanOrEqual(66 * 80);
  });

  it('should produce identical data on every run', async () => {
    const other = SqliteExecutor.open();
    const first = seedDatabase(executor.getDatabase());
    const second = seedDatabase(other.getDatabase());

    const sql = 'SELECT complaint_id, date_received, product, state FROM dp_complaints ORDER BY complaint_id LIMIT 25';
    expect(second).toEqual(first);
    expect(await other.execute(sql)).toEqual(await executor.execute(sql));

    await other.close();
  });

  it('should replace rather than append when reseeded', async () => {
    const summary = seedDatabase(executor.getDatabase());
    const result = await executor.execute('SELECT COUNT(*) AS n FROM dp_complaints');

    expect(result.rows).toEqual([[summary.complaints]]);
  });

  it('should cover the date window', async () => {
    const result = await executor.execute(
      'SELECT MIN(date_received), MAX(date_received) FROM dp_complaints'
    );
    const [[min, max] = []] = result.rows;

    expect(typeof min === 'string' && min.startsWith('2020-01-')).toBe(true);
    expect(typeof max === 'string' && max.startsWith('2025-06-')).toBe(true);
  });

  it('should use quarter labels and date bounds from the seeded window', async () => {
    const quarters = await executor.execute('SELECT MIN(quarter), MAX(quarter) FROM dp_call_reports');
    const rates = await executor.execute('SELECT MIN(rate_date), MAX(rate_date) FROM dp_macro_rates');

    expect(quarters.rows).toEqual([['2020-Q1', '2025-Q2']]);
    expect(rates.rows).toEqual([['2020-01-01', '2025-06-30']]);
  });

  it('should leave narratives empty', async () => {
    const result = await executor.execute(
      'SELECT COUNT(*) FROM dp_complaints WHERE consumer_complaint_narrative IS NOT NULL'
    );
    expect(result.rows).toEqual([[0]]);
  });
});

// =============================================================================
// Executor
// =============================================================================

describe('SqliteExecutor', () => {
  let executor: SqliteExecutor;

  beforeAll(() => {
    executor = SqliteExecutor.open();
  });

  afterAll(async () => {
    await executor.close();
  });

  it('should return column names and positional rows', async () => {
    const result = await executor.execute("SELECT 1 AS one, 'a' AS letter, NULL AS missing");

    expect(result).toEqual({ columns: ['one', 'letter', 'missing'], rows: [[1, 'a', null]] });
  });

  it('should reject statements that return no rows', async () => {
    await expect(executor.execute('CREATE TABLE t (x INTEGER)')).rejects.toThrow(
      new ExecutionError('Statement does not return rows')
    );
  });

  it('should wrap driver errors', async () => {
    await expect(executor.execute('SELECT * FROM dp_nowhere')).rejects.toBeInstanceOf(ExecutionError);
    await expect(executor.execute('SELECT * FROM dp_nowhere')).rejects.toThrow('no such table: dp_nowhere');
  });

  it('should tolerate closing twice', async () => {
    const temp = SqliteExecutor.open();
    await temp.close();
    await expect(temp.close()).resolves.toBeUndefined();
  });
});

describe('toScalar', () => {
  it('should pass scalars through', () => {
    expect(toScalar(3)).toBe(3);
    expect(toScalar('x')).toBe('x');
    expect(toScalar(false)).toBe(false);
    expect(toScalar(null)).toBeNull();
    expect(toScalar(undefined)).toBeNull();
  });

  it('should coerce driver types', () => {
    expect(toScalar(BigInt(42))).toBe(42);
    expect(toScalar(new Date(Date.UTC(2025, 0, 2)))).toBe('2025-01-02T00:00:00.000Z');
    expect(toScalar(Buffer.from('ab'))).toBe('6162');
    expect(toScalar({ toString: () => 'obj' })).toBe('obj');
  });
});
