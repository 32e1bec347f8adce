/**
 * Prism - Analytics Agent
 *
 * Orchestrates one question end to end:
 * PARSE → POLICY → (DENIED | COMPILE) → EXECUTE → (ERROR | POSTPROCESS) → DONE
 *
 * A DENY decision returns before any SQL exists. Compilation errors propagate
 * to the caller; execution failures become an error response.
 */

import { Catalog, datasetNames } from '../catalog/catalog.js';
import { SqlCompiler } from '../dsl/compiler.js';
import { parseQuery } from '../dsl/parser.js';
import type { SqlDialect } from '../dsl/registry.js';
import { makeEvidencePack, type EvidencePackOptions } from '../evidence/pack.js';
import { DEFAULT_ROLE, PolicyEngine } from '../policy/engine.js';
import type { QueryExecutionResult, QueryExecutor } from '../storage/types.js';
import { logPipeline } from '../utils/logger.js';
import { generateId, toErrorMessage } from '../utils/helpers.js';
import { ExecutionError } from '../utils/types.js';
import { buildExplanation } from './explanation.js';
import { detectOutliers } from './outliers.js';
import { DENIED_ALTERNATIVE, type AgentResponse, type ResultRow } from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export interface AnalyticsAgentDeps {
  catalog: Catalog;
  policyEngine?: PolicyEngine;
  compiler?: SqlCompiler;
  /** Source of "today" for relative time ranges and evidence timestamps */
  clock?: () => Date;
  /** Deadline around query execution in ms; 0 disables it */
  executeTimeoutMs?: number;
  /** Row cap for parsed plans */
  defaultLimit?: number;
  generateId?: () => string;
}

// =============================================================================
// Analytics Agent
// =============================================================================

export class AnalyticsAgent {
  private readonly catalog: Catalog;
  private readonly policyEngine: PolicyEngine;
  private readonly compiler: SqlCompiler;
  private readonly clock: () => Date;
  private readonly executeTimeoutMs: number;
  private readonly defaultLimit: number | undefined;
  private readonly evidenceOptions: EvidencePackOptions;

  constructor(deps: AnalyticsAgentDeps) {
    this.catalog = deps.catalog;
    this.policyEngine = deps.policyEngine ?? new PolicyEngine();
    this.compiler = deps.compiler ?? new SqlCompiler();
    this.clock = deps.clock ?? (() => new Date());
    this.executeTimeoutMs = deps.executeTimeoutMs ?? 0;
    this.defaultLimit = deps.defaultLimit;
    this.evidenceOptions = { now: this.clock, generateId: deps.generateId ?? generateId };
  }

  /**
   * Answer a natural-language question against the given data source
   */
  async run(question: string, executor: QueryExecutor, role: string = DEFAULT_ROLE): Promise<AgentResponse> {
    const runId = generateId();
    const startTime = Date.now();

    // PARSE
    const { plan, fieldsRequested } = parseQuery(question, { today: this.clock(), limit: this.defaultLimit });
    const datasets = datasetNames(this.catalog.search(question));
    logPipeline({ runId, stage: 'parse', role });

    // POLICY
    const policy = this.policyEngine.evaluate({
      userAttributes: { role },
      fieldsRequested,
      privacy: { minGroupSize: plan.privacy.minGroupSize },
    });
    logPipeline({ runId, stage: 'policy', role, decision: policy.decision });

    if (policy.decision === 'DENY') {
      logPipeline({ runId, stage: 'denied', role, decision: policy.decision, durationMs: Date.now() - startTime });
      return {
        status: 'denied',
        policy,
        explanation: policy.rationale,
        alternative: DENIED_ALTERNATIVE,
        dsl: plan,
      };
    }

    // COMPILE
    const sql = this.compiler.compile(plan, policy.constraints);
    logPipeline({ runId, stage: 'compile', role });

    // EXECUTE
    let result: QueryExecutionResult;
    try {
      result = await this.executeWithTimeout(executor, sql);
    } catch (error) {
      const message = toErrorMessage(error);
      logPipeline({ runId, stage: 'error', role, error: message, durationMs: Date.now() - startTime });
      return { status: 'error', error: message, sql, dsl: plan };
    }
    logPipeline({ runId, stage: 'execute', role, rowCount: result.rows.length });

    // POSTPROCESS
    const { columns, rows } = result;
    const outlierIndices = detectOutliers(columns, rows);
    const data: ResultRow[] = rows.map((row) =>
      Object.fromEntries(columns.map((column, index) => [column, row[index] ?? null]))
    );
    const evidencePack = makeEvidencePack(
      { plan, policy, sql, quality: this.catalog.quality(datasets), rowCount: rows.length },
      this.evidenceOptions
    );
    logPipeline({ runId, stage: 'postprocess', role, sqlHash: evidencePack.sqlHash });

    logPipeline({
      runId,
      stage: 'done',
      role,
      decision: policy.decision,
      sqlHash: evidencePack.sqlHash,
      rowCount: rows.length,
      durationMs: Date.now() - startTime,
    });

    return {
      status: 'success',
      dsl: plan,
      policy,
      sql,
      columns,
      data,
      outlierIndices,
      evidencePack,
      explanation: buildExplanation(plan, rows.length, outlierIndices.length, policy),
    };
  }

  /**
   * SQL dialect the agent compiles for
   */
  getDialect(): SqlDialect {
    return this.compiler.getDialect();
  }

  private async executeWithTimeout(executor: QueryExecutor, sql: string): Promise<QueryExecutionResult> {
    if (this.executeTimeoutMs <= 0) {
      return executor.execute(sql);
    }

    let timeoutId: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timeoutId = setTimeout(
        () => reject(new ExecutionError(`Query execution timed out after ${this.executeTimeoutMs}ms`)),
        this.executeTimeoutMs
      );
    });

    try {
      return await Promise.race([executor.execute(sql), timeout]);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Run a question through a default agent
 */
export async function runAgent(
  question: string,
  executor: QueryExecutor,
  role: string = DEFAULT_ROLE,
  catalog: Catalog = Catalog.load()
): Promise<AgentResponse> {
  return new AnalyticsAgent({ catalog }).run(question, executor, role);
}
