/**
 * Prism - Analytics Agent Tests
 * End-to-end runs against a seeded in-memory SQLite database
 */

import path from 'path';

import { describe, it, expect, beforeAll, afterAll, jest } from '@jest/globals';

import { AnalyticsAgent, runAgent } from '../../src/agent/pipeline.js';
import { DENIED_ALTERNATIVE, type AgentResponse, type SuccessResponse } from '../../src/agent/types.js';
import { Catalog } from '../../src/catalog/catalog.js';
import { sqlHash } from '../../src/evidence/pack.js';
import { SqlCompiler } from '../../src/dsl/compiler.js';
import { createMetricRegistry } from '../../src/dsl/registry.js';
import { seedDatabase } from '../../src/storage/seed.js';
import { SqliteExecutor } from '../../src/storage/sqlite.js';
import type { QueryExecutor } from '../../src/storage/types.js';
import { ExecutionError, ValidationError } from '../../src/utils/types.js';

// =============================================================================
// Test Setup
// =============================================================================

const CATALOG_PATH = path.resolve(__dirname, '../../data/metrics_catalog.yaml');
const TODAY = new Date(2025, 6, 1);

const NET_INCOME_QUESTION = 'Show quarterly net income trend for US banks since 2020 and highlight outliers.';
const NARRATIVE_QUESTION = 'Can I see complaint narratives?';

function expectSuccess(response: AgentResponse): SuccessResponse {
  if (response.status !== 'success') {
    throw new Error(`Expected success, got ${response.status}`);
  }
  return response;
}

function createStubExecutor(execute: QueryExecutor['execute']): QueryExecutor {
  return { execute, close: async () => undefined };
}

describe('AnalyticsAgent', () => {
  let executor: SqliteExecutor;
  let catalog: Catalog;
  let agent: AnalyticsAgent;

  beforeAll(() => {
    executor = SqliteExecutor.open();
    seedDatabase(executor.getDatabase());
    catalog = Catalog.load(CATALOG_PATH);
    agent = new AnalyticsAgent({ catalog, clock: () => TODAY });
  });

  afterAll(async () => {
    await executor.close();
  });

  // ===========================================================================
  // Success
  // ===========================================================================

  describe('successful runs', () => {
    it('should answer a quarterly trend question', async () => {
      const response = expectSuccess(await agent.run(NET_INCOME_QUESTION, executor));

      expect(response.sql).toBe(
        "SELECT bank_name, quarter, SUM(net_income) AS total_net_income FROM dp_call_reports " +
          "WHERE quarter >= '2020-01-01' AND quarter <= '2025-07-01' " +
          'GROUP BY bank_name, quarter ORDER BY bank_name ASC LIMIT 200'
      );
      expect(response.columns).toEqual(['bank_name', 'quarter', 'total_net_income']);
      // 6 banks x 20 quarters; 2025 labels sort after the end date
      expect(response.data).toHaveLength(120);
      expect(response.policy.decision).toBe('ALLOW');
      expect(response.dsl.intent).toBe('chart');
    });

    it('should return rows keyed by column', async () => {
      const response = expectSuccess(await agent.run(NET_INCOME_QUESTION, executor));
      const [first] = response.data;

      expect(first).toBeDefined();
      expect(Object.keys(first ?? {})).toEqual(['bank_name', 'quarter', 'total_net_income']);
      expect(first?.['bank_name']).toBe('Bank of America');
      expect(typeof first?.['total_net_income']).toBe('number');
    });

    it('should build an evidence pack for the run', async () => {
      const response = expectSuccess(await agent.run(NET_INCOME_QUESTION, executor));
      const pack = response.evidencePack;

      expect(pack.sql).toBe(response.sql);
      expect(pack.sqlHash).toBe(sqlHash(response.sql));
      expect(pack.resultRowCount).toBe(120);
      expect(pack.timestamp).toBe(TODAY.toISOString());
      expect(pack.dslPlan).toEqual(response.dsl);
      expect(pack.datasetsQuality.map((q) => q.dataset)).toEqual(['dp_call_reports', 'dp_macro_rates']);
    });

    it('should give identical questions the same hash and distinct ids', async () => {
      const first = expectSuccess(await agent.run(NET_INCOME_QUESTION, executor));
      const second = expectSuccess(await agent.run(NET_INCOME_QUESTION, executor));

      expect(second.evidencePack.sqlHash).toBe(first.evidencePack.sqlHash);
      expect(second.evidencePack.evidencePackId).not.toBe(first.evidencePack.evidencePackId);
    });

    it('should apply a state filter', async () => {
      const response = expectSuccess(await agent.run('Break down complaints by product and state in CA', executor));

      expect(response.columns).toEqual(['state', 'product', 'complaint_count']);
      expect(response.data.length).toBeGreaterThan(0);
      expect(response.data.length).toBeLessThanOrEqual(6);
      expect(response.data.every((row) => row['state'] === 'CA')).toBe(true);
      expect(response.sql).toContain("AND state = 'CA'");
      expect(response.sql).toContain('HAVING COUNT(*) >= 10');
    });

    it('should explain the result', async () => {
      const response = expectSuccess(await agent.run(NET_INCOME_QUESTION, executor));

      expect(response.explanation).toContain(
        'Produced a chart for metric(s) [net_income] grouped by [bank_name, quarter].'
      );
      expect(response.explanation).toContain('Returned 120 rows.');
    });

    it('should keep outlier indices inside the result', async () => {
      const response = expectSuccess(await agent.run(NET_INCOME_QUESTION, executor));
      expect(response.outlierIndices.every((i) => i >= 0 && i < response.data.length)).toBe(true);
    });

    it('should flag outliers in the metric column and mention them', async () => {
      const values = [10, 12, 11, 13, 12, 90];
      const execute = jest.fn<QueryExecutor['execute']>().mockResolvedValue({
        columns: ['bank_name', 'quarter', 'total_net_income'],
        rows: values.map((value, index) => ['Bank of America', `2020-Q${index + 1}`, value]),
      });

      const response = expectSuccess(await agent.run(NET_INCOME_QUESTION, createStubExecutor(execute)));

      expect(response.outlierIndices).toEqual([5]);
      expect(response.data[5]).toEqual({ bank_name: 'Bank of America', quarter: '2020-Q6', total_net_income: 90 });
      expect(response.explanation).toContain('Returned 6 rows. 1 outlier(s) detected via IQR method.');
    });

    it('should honour the configured default limit', async () => {
      const limited = new AnalyticsAgent({ catalog, clock: () => TODAY, defaultLimit: 5 });
      const response = expectSuccess(await limited.run(NET_INCOME_QUESTION, executor));

      expect(response.dsl.limit).toBe(5);
      expect(response.data).toHaveLength(5);
    });
  });

  // ===========================================================================
  // Policy
  // ===========================================================================

  describe('denied runs', () => {
    it('should deny narratives for an analyst without touching the data source', async () => {
      const execute = jest.fn<QueryExecutor['execute']>();
      const response = await agent.run(NARRATIVE_QUESTION, createStubExecutor(execute));

      expect(response.status).toBe('denied');
      expect(execute).not.toHaveBeenCalled();
      expect('sql' in response).toBe(false);
      if (response.status === 'denied') {
        expect(response.policy.decision).toBe('DENY');
        expect(response.explanation).toBe(response.policy.rationale);
        expect(response.alternative).toBe(DENIED_ALTERNATIVE);
        expect(response.dsl.metricIds).toEqual(['complaint_volume', 'complaint_narrative']);
      }
    });

    it('should allow narratives for a compliance officer', async () => {
      const response = expectSuccess(await agent.run(NARRATIVE_QUESTION, executor, 'compliance_officer'));

      expect(response.policy.decision).toBe('ALLOW');
      expect(response.columns).toEqual(['quarter', 'complaint_count', 'narrative']);
      expect(response.data).toHaveLength(22);
      expect(response.data[0]?.['quarter']).toBe('2020-Q1');
      expect(response.sql).toContain('HAVING COUNT(*) >= 10');
    });
  });

  // ===========================================================================
  // Failures
  // ===========================================================================

  describe('failed runs', () => {
    it('should turn execution errors into an error response', async () => {
      const response = await agent.run('Show complaint volume by company', executor);

      expect(response.status).toBe('error');
      if (response.status === 'error') {
        expect(response.error).toBe('no such column: bank_name');
        expect(response.sql).toContain('FROM dp_complaints');
        expect(response.dsl.dimensions).toEqual(['bank_name']);
      }
    });

    it('should surface data source failures', async () => {
      const execute = jest
        .fn<QueryExecutor['execute']>()
        .mockRejectedValue(new ExecutionError('connection refused'));
      const response = await agent.run(NET_INCOME_QUESTION, createStubExecutor(execute));

      expect(execute).toHaveBeenCalledTimes(1);
      expect(response).toMatchObject({ status: 'error', error: 'connection refused' });
    });

    it('should time out slow executions', async () => {
      const slow = new AnalyticsAgent({ catalog, clock: () => TODAY, executeTimeoutMs: 20 });
      const never = createStubExecutor(() => new Promise(() => undefined));

      const response = await slow.run(NET_INCOME_QUESTION, never);

      expect(response).toMatchObject({ status: 'error', error: 'Query execution timed out after 20ms' });
    });

    it('should propagate compilation errors', async () => {
      const empty = createMetricRegistry({ metrics: [], tables: [], dimensionColumns: {} });
      const broken = new AnalyticsAgent({ catalog, compiler: new SqlCompiler({ registry: empty }) });

      await expect(broken.run(NET_INCOME_QUESTION, executor)).rejects.toThrow(
        new ValidationError('Unknown metric: net_income')
      );
    });
  });

  it('should report the compiler dialect', () => {
    expect(agent.getDialect()).toBe('sqlite');
  });
});

describe('runAgent', () => {
  it('should run with a default agent', async () => {
    const executor = SqliteExecutor.open();
    seedDatabase(executor.getDatabase());

    const response = await runAgent('complaints by state', executor, undefined, Catalog.load(CATALOG_PATH));

    expect(response.status).toBe('success');
    await executor.close();
  });
});
