/**
 * Prism - CSV Export
 */

import type { ScalarValue } from '../storage/types.js';
import type { SuccessResponse } from './types.js';

const BOM = '\uFEFF';

function escapeField(value: ScalarValue | undefined): string {
  const str = value === null || value === undefined ? '' : String(value);
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return '"' + str.replace(/"/g, '""') + '"';
  }
  return str;
}

/**
 * Render rows as RFC 4180 CSV with a UTF-8 BOM and CRLF line endings
 */
export function toCsv(columns: readonly string[], rows: readonly Record<string, ScalarValue>[]): string {
  const headerLine = columns.map((c) => escapeField(c)).join(',');
  const dataLines = rows.map((row) => columns.map((c) => escapeField(row[c])).join(','));

  return BOM + [headerLine, ...dataLines].join('\r\n') + '\r\n';
}

/**
 * CSV body for a successful agent run
 */
export function responseToCsv(response: SuccessResponse): string {
  return toCsv(response.columns, response.data);
}

/**
 * Download name derived from the evidence pack, so an export can be traced
 * back to its audit record
 */
export function exportFileName(response: SuccessResponse): string {
  return `prism-${response.evidencePack.sqlHash}.csv`;
}
