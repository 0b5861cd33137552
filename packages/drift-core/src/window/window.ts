// ---------------------------------------------------------------------------
// Windows: construction, schema checks, column extraction
// ---------------------------------------------------------------------------

import { SchemaMismatchError } from '../errors.js';
import type {
  CategoryLabel,
  CellValue,
  DataRecord,
  FeaturePartition,
  Window,
  WindowRole,
} from '../types.js';

/** null, undefined and NaN are missing values. */
export function isNull(value: CellValue): value is null | undefined {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

function sameColumns(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

/**
 * Build a window from plain records. The schema is `columns` when given,
 * otherwise the key order of the first record. Every record must carry
 * exactly the schema's keys.
 */
export function windowFromRecords(
  records: readonly DataRecord[],
  columns?: readonly string[],
): Window {
  const schema = columns ?? Object.keys(records[0] ?? {});
  const expected = new Set(schema);
  if (expected.size !== schema.length) {
    throw new SchemaMismatchError('Window schema lists a column more than once');
  }

  records.forEach((record, index) => {
    const keys = Object.keys(record);
    const extra = keys.find((k) => !expected.has(k));
    const missing = schema.find((c) => !(c in record));
    if (extra !== undefined || missing !== undefined) {
      const feature = extra ?? missing;
      throw new SchemaMismatchError(
        `Record ${index} ${extra !== undefined ? 'has unexpected' : 'is missing'} column "${feature}"`,
        feature,
      );
    }
  });

  return { columns: [...schema], rows: records };
}

/**
 * Fail fast unless both windows share one ordered schema and every
 * partitioned feature exists in it with values of a usable type.
 */
export function assertCompatibleWindows(
  baseline: Window,
  comparison: Window,
  partition: FeaturePartition,
): void {
  if (!sameColumns(baseline.columns, comparison.columns)) {
    const inComparison = new Set(comparison.columns);
    const inBaseline = new Set(baseline.columns);
    const missingInComparison = baseline.columns.find((c) => !inComparison.has(c));
    const missingInBaseline = comparison.columns.find((c) => !inBaseline.has(c));
    if (missingInComparison !== undefined) {
      throw new SchemaMismatchError(
        `Column "${missingInComparison}" is missing from the comparison window`,
        missingInComparison,
        'comparison',
      );
    }
    if (missingInBaseline !== undefined) {
      throw new SchemaMismatchError(
        `Column "${missingInBaseline}" is missing from the baseline window`,
        missingInBaseline,
        'baseline',
      );
    }
    throw new SchemaMismatchError('Windows list the same columns in a different order');
  }

  assertFeaturesPresent(baseline, comparison, [...partition.numeric, ...partition.categorical]);

  for (const name of partition.numeric) {
    assertNumericColumn(baseline, name, 'baseline');
    assertNumericColumn(comparison, name, 'comparison');
  }
}

/** Fail unless every feature is a column of both windows. */
export function assertFeaturesPresent(
  baseline: Window,
  comparison: Window,
  features: readonly string[],
): void {
  for (const name of features) {
    if (!baseline.columns.includes(name)) {
      throw new SchemaMismatchError(`Feature "${name}" is missing from the baseline window`, name, 'baseline');
    }
    if (!comparison.columns.includes(name)) {
      throw new SchemaMismatchError(`Feature "${name}" is missing from the comparison window`, name, 'comparison');
    }
  }
}

function assertNumericColumn(window: Window, feature: string, role: WindowRole): void {
  for (const row of window.rows) {
    const value = row[feature];
    if (!isNull(value) && typeof value !== 'number') {
      throw new SchemaMismatchError(
        `Numeric feature "${feature}" holds a ${typeof value} value in the ${role} window`,
        feature,
        role,
      );
    }
  }
}

/** Non-null numeric values of a column, in row order. */
export function numericValues(window: Window, feature: string): number[] {
  const out: number[] = [];
  for (const row of window.rows) {
    const value = row[feature];
    if (typeof value === 'number' && !Number.isNaN(value)) out.push(value);
  }
  return out;
}

/** Every value of a column, with missing values folded to null. */
export function categoryValues(window: Window, feature: string): CategoryLabel[] {
  return window.rows.map((row) => {
    const value = row[feature];
    return isNull(value) ? null : value;
  });
}

/** Count of missing values in a column. */
export function nullCount(window: Window, feature: string): number {
  let count = 0;
  for (const row of window.rows) {
    if (isNull(row[feature])) count++;
  }
  return count;
}
