// ---------------------------------------------------------------------------
// Percent change in summary statistics
// ---------------------------------------------------------------------------
//
// 100 · |a - b| / (|a| + ε) per describe() statistic, a the baseline value.
// A magnitude diagnostic with no verdict; it never raises a drift event.
// ---------------------------------------------------------------------------

import { describe } from '@driftwatch/stats-core';
import type { DescribeStatistic, DescriptiveSummary } from '@driftwatch/stats-core';
import { assertFeaturesPresent, numericValues } from '../window/window.js';
import type { PercentChangeTable, Window } from '../types.js';

/** Keeps a zero baseline statistic from dividing by zero. */
export const PERCENT_CHANGE_EPSILON = 1e-100;

export function percentDelta(a: number, b: number): number {
  return (100 * Math.abs(a - b)) / (Math.abs(a) + PERCENT_CHANGE_EPSILON);
}

function compareSummaries(
  a: DescriptiveSummary,
  b: DescriptiveSummary,
): Record<DescribeStatistic, number> {
  return {
    count: percentDelta(a.count, b.count),
    mean: percentDelta(a.mean, b.mean),
    std: percentDelta(a.std, b.std),
    min: percentDelta(a.min, b.min),
    '25%': percentDelta(a['25%'], b['25%']),
    '50%': percentDelta(a['50%'], b['50%']),
    '75%': percentDelta(a['75%'], b['75%']),
    max: percentDelta(a.max, b.max),
  };
}

/**
 * Per numeric feature, the percent change of each describe() statistic
 * from the baseline to the comparison window. Missing values are left out
 * of the statistics. Statistics undefined for a window come out NaN.
 */
export function percentChange(
  baseline: Window,
  comparison: Window,
  numericFeatures: readonly string[],
): PercentChangeTable {
  assertFeaturesPresent(baseline, comparison, numericFeatures);

  const table: PercentChangeTable = {};
  for (const feature of numericFeatures) {
    table[feature] = compareSummaries(
      describe(numericValues(baseline, feature)),
      describe(numericValues(comparison, feature)),
    );
  }
  return table;
}
