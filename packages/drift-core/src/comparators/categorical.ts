// ---------------------------------------------------------------------------
// Categorical Comparator — chi-squared on window × category counts
// ---------------------------------------------------------------------------
//
// Two tests over the same 2×K table, and they answer different questions:
//
// - compareCategorical: test of independence between window membership
//   and category. Only proportions matter, so a window that is uniformly
//   smaller is not drift.
// - compareCategoricalGoodnessOfFit: comparison counts against the raw
//   baseline counts as expected frequencies. Totals matter, so a halved
//   window with unchanged proportions is flagged.
//
// Missing values (null, undefined, NaN) are counted as their own category.
// ---------------------------------------------------------------------------

import { chiSquaredContingency, chiSquaredGoodnessOfFit } from '@driftwatch/stats-core';
import { InsufficientDataError } from '../errors.js';
import type { CategoryLabel, ContingencyTable, TestResult } from '../types.js';

type CategoricalInput = readonly (CategoryLabel | undefined)[];

// NaN reads as missing.
function toLabel(value: CategoryLabel | undefined): CategoryLabel {
  return value === undefined || (typeof value === 'number' && Number.isNaN(value)) ? null : value;
}

// JSON keeps 1 and "1" apart but writes ±Infinity as null.
function categoryKey(label: CategoryLabel): string {
  return typeof label === 'number' && !Number.isFinite(label) ? String(label) : JSON.stringify(label);
}

function countByCategory(values: CategoricalInput): Map<string, number> {
  const counts = new Map<string, number>();
  for (const v of values) {
    const key = categoryKey(toLabel(v));
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/**
 * Build the 2×K table over the union of categories seen in either window.
 * Columns are ordered by category key; a category absent from one window
 * has count 0 in that row.
 */
export function buildContingencyTable(
  baseline: CategoricalInput,
  comparison: CategoricalInput,
): ContingencyTable {
  const baseCounts = countByCategory(baseline);
  const compCounts = countByCategory(comparison);

  const labels = new Map<string, CategoryLabel>();
  for (const v of [...baseline, ...comparison]) {
    const label = toLabel(v);
    labels.set(categoryKey(label), label);
  }
  const keys = [...labels.keys()].sort();

  return {
    categories: keys.map((k) => labels.get(k) ?? null),
    baseline: keys.map((k) => baseCounts.get(k) ?? 0),
    comparison: keys.map((k) => compCounts.get(k) ?? 0),
  };
}

function assertTestable(table: ContingencyTable, feature: string | undefined): void {
  const label = feature !== undefined ? `"${feature}"` : 'categorical feature';
  const total = (row: readonly number[]): number => row.reduce((s, c) => s + c, 0);

  if (total(table.baseline) === 0) {
    throw new InsufficientDataError(`${label} has no observations in the baseline window`, feature);
  }
  if (total(table.comparison) === 0) {
    throw new InsufficientDataError(`${label} has no observations in the comparison window`, feature);
  }
  if (table.categories.length < 2) {
    throw new InsufficientDataError(
      `${label} has ${table.categories.length} distinct category across both windows; need 2`,
      feature,
    );
  }
}

/**
 * Chi-squared test of independence on the window × category table, with
 * Yates' correction when there are exactly two categories.
 * Drift when `pValue < correctedAlpha`.
 *
 * @throws InsufficientDataError for an empty window or fewer than two categories
 */
export function compareCategorical(
  baseline: CategoricalInput,
  comparison: CategoricalInput,
  correctedAlpha: number,
  feature?: string,
): TestResult {
  const table = buildContingencyTable(baseline, comparison);
  assertTestable(table, feature);

  const { statistic, pValue } = chiSquaredContingency([table.baseline, table.comparison]);
  return Object.freeze({
    statistic,
    pValue,
    correctedAlpha,
    isDrift: pValue < correctedAlpha,
  });
}

/**
 * One-way goodness-of-fit of the comparison counts against the raw
 * baseline counts. Not a substitute for compareCategorical: it reacts to
 * a change in window size as well as to a change in proportions.
 * Drift when `pValue < correctedAlpha`.
 *
 * @throws InsufficientDataError for an empty window or fewer than two categories
 */
export function compareCategoricalGoodnessOfFit(
  baseline: CategoricalInput,
  comparison: CategoricalInput,
  correctedAlpha: number,
  feature?: string,
): TestResult {
  const table = buildContingencyTable(baseline, comparison);
  assertTestable(table, feature);

  const { statistic, pValue } = chiSquaredGoodnessOfFit(table.comparison, table.baseline);
  return Object.freeze({
    statistic,
    pValue,
    correctedAlpha,
    isDrift: pValue < correctedAlpha,
  });
}
