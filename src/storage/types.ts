/**
 * Prism - Storage Types
 */

export type ScalarValue = number | string | boolean | null;

export interface QueryExecutionResult {
  columns: string[];
  rows: ScalarValue[][];
}

/**
 * Runs compiled SQL against a data source. Implementations raise
 * ExecutionError on malformed SQL, schema mismatches or connection failures.
 * The caller owns the executor and serializes access to it if shared.
 */
export interface QueryExecutor {
  execute(sql: string): Promise<QueryExecutionResult>;
  close(): Promise<void>;
}

/**
 * Coerce a driver value into the scalar set the pipeline works with
 */
export function toScalar(value: unknown): ScalarValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString('hex');
  return String(value);
}
