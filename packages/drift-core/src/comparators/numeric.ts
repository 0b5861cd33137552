// ---------------------------------------------------------------------------
// Numeric Comparator — two-sample Kolmogorov-Smirnov
// ---------------------------------------------------------------------------
//
// Uses the asymptotic Kolmogorov distribution, so larger windows give
// smaller p-values for the same true difference. That is the power of the
// test growing with n; thresholds are not rescaled for it.
// ---------------------------------------------------------------------------

import { ksTwoSample } from '@driftwatch/stats-core';
import { InsufficientDataError } from '../errors.js';
import type { TestResult } from '../types.js';

export const MIN_NUMERIC_OBSERVATIONS = 2;

type NumericInput = readonly (number | null | undefined)[];

function present(values: NumericInput): number[] {
  const out: number[] = [];
  for (const v of values) {
    if (typeof v === 'number' && !Number.isNaN(v)) out.push(v);
  }
  return out;
}

/**
 * Compare two numeric samples. Missing values are dropped before testing.
 * Drift when `pValue <= correctedAlpha`.
 *
 * @throws InsufficientDataError when either window has fewer than two values left
 */
export function compareNumeric(
  baseline: NumericInput,
  comparison: NumericInput,
  correctedAlpha: number,
  feature?: string,
): TestResult {
  const a = present(baseline);
  const b = present(comparison);
  const label = feature !== undefined ? `"${feature}"` : 'numeric feature';

  if (a.length < MIN_NUMERIC_OBSERVATIONS) {
    throw new InsufficientDataError(
      `${label} has ${a.length} non-null value(s) in the baseline window; need ${MIN_NUMERIC_OBSERVATIONS}`,
      feature,
    );
  }
  if (b.length < MIN_NUMERIC_OBSERVATIONS) {
    throw new InsufficientDataError(
      `${label} has ${b.length} non-null value(s) in the comparison window; need ${MIN_NUMERIC_OBSERVATIONS}`,
      feature,
    );
  }

  const { statistic, pValue } = ksTwoSample(a, b);
  return Object.freeze({
    statistic,
    pValue,
    correctedAlpha,
    isDrift: pValue <= correctedAlpha,
  });
}
