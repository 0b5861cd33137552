import { assertFeaturesPresent, nullCount } from '../window/window.js';
import type { NullRateTable, Window } from '../types.js';

function nullPercent(window: Window, feature: string): number {
  // An empty window has no missing values to report.
  if (window.rows.length === 0) return 0;
  return (100 * nullCount(window, feature)) / window.rows.length;
}

/**
 * Percentage of missing values per feature in each window. Descriptive
 * only: a shift in null rate complements, and is not covered by, the
 * comparators.
 */
export function nullRateDelta(
  baseline: Window,
  comparison: Window,
  features: readonly string[],
): NullRateTable {
  assertFeaturesPresent(baseline, comparison, features);

  const table: NullRateTable = {};
  for (const feature of features) {
    table[feature] = {
      baseline: nullPercent(baseline, feature),
      comparison: nullPercent(comparison, feature),
    };
  }
  return table;
}
