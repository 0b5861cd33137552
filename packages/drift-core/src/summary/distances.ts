// ---------------------------------------------------------------------------
// Jensen-Shannon distance diagnostic
// ---------------------------------------------------------------------------
//
// Base-2 distance between equal-width histograms on the pooled range of
// both windows. Bounded by [0, 1] and unaffected by sample size, unlike the
// KS p-value. Flags a feature when the distance exceeds the threshold but
// never raises a drift event.
// ---------------------------------------------------------------------------

import { sampleJensenShannonDistance } from '@driftwatch/stats-core';
import { assertFeaturesPresent, numericValues } from '../window/window.js';
import type { DistanceTable, Window } from '../types.js';

export const DEFAULT_JS_BINS = 20;
export const DEFAULT_JS_THRESHOLD = 0.2;

export interface JensenShannonOptions {
  bins?: number;
  threshold?: number;
}

/**
 * Distance per numeric feature. A feature with no values in either window
 * gets distance NaN and is not flagged.
 */
export function jensenShannonDrift(
  baseline: Window,
  comparison: Window,
  numericFeatures: readonly string[],
  options: JensenShannonOptions = {},
): DistanceTable {
  assertFeaturesPresent(baseline, comparison, numericFeatures);
  const bins = options.bins ?? DEFAULT_JS_BINS;
  const threshold = options.threshold ?? DEFAULT_JS_THRESHOLD;

  const table: DistanceTable = {};
  for (const feature of numericFeatures) {
    const distance = sampleJensenShannonDistance(
      numericValues(baseline, feature),
      numericValues(comparison, feature),
      bins,
    );
    table[feature] = { distance, threshold, exceeded: distance > threshold };
  }
  return table;
}
