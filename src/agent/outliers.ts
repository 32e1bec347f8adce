/**
 * Prism - Outlier Detection
 */

import type { ScalarValue } from '../storage/types.js';

const IQR_MULTIPLIER = 1.5;
const MIN_ROWS = 4;

function isNumber(value: ScalarValue | undefined): value is number {
  return typeof value === 'number';
}

/**
 * Flag rows whose metric value falls outside the Tukey fences.
 *
 * The metric column is the last column holding a number in the first row.
 * Returns row indices in ascending order; empty for fewer than four rows.
 */
export function detectOutliers(columns: readonly string[], rows: readonly (readonly ScalarValue[])[]): number[] {
  const firstRow = rows[0];
  if (!firstRow || rows.length < MIN_ROWS) return [];

  let metricIndex = -1;
  columns.forEach((_column, index) => {
    if (isNumber(firstRow[index])) metricIndex = index;
  });
  if (metricIndex < 0) return [];

  const values = rows
    .map((row) => row[metricIndex])
    .filter(isNumber)
    .sort((a, b) => a - b);

  const q1 = values[Math.floor(values.length / 4)];
  const q3 = values[Math.floor((3 * values.length) / 4)];
  if (q1 === undefined || q3 === undefined) return [];

  const iqr = q3 - q1;
  const low = q1 - IQR_MULTIPLIER * iqr;
  const high = q3 + IQR_MULTIPLIER * iqr;

  const outliers: number[] = [];
  rows.forEach((row, index) => {
    const value = row[metricIndex];
    if (isNumber(value) && (value < low || value > high)) {
      outliers.push(index);
    }
  });
  return outliers;
}
