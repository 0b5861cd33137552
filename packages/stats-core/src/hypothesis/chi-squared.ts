// ---------------------------------------------------------------------------
// Pearson Chi-Squared Tests
// ---------------------------------------------------------------------------
//
// - Test of independence on an r×c contingency table, with Yates'
//   continuity correction for tables with a single degree of freedom.
// - One-way goodness-of-fit of observed counts against expected counts.
// ---------------------------------------------------------------------------

import type { ChiSquaredResult, ContingencyOptions, ContingencyResult } from '../types.js';
import { chiSquaredSurvival } from '../special/gamma.js';

/**
 * Expected cell counts under independence: E_ij = rowSum_i · colSum_j / N.
 */
export function expectedFrequencies(observed: readonly (readonly number[])[]): number[][] {
  const rows = observed.length;
  const cols = observed[0]?.length ?? 0;

  const rowSums = new Array<number>(rows).fill(0);
  const colSums = new Array<number>(cols).fill(0);
  let total = 0;
  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < cols; j++) {
      const o = observed[i]?.[j] ?? 0;
      rowSums[i] = (rowSums[i] ?? 0) + o;
      colSums[j] = (colSums[j] ?? 0) + o;
      total += o;
    }
  }

  const expected: number[][] = [];
  for (let i = 0; i < rows; i++) {
    const row = new Array<number>(cols);
    for (let j = 0; j < cols; j++) {
      row[j] = total > 0 ? ((rowSums[i] ?? 0) * (colSums[j] ?? 0)) / total : 0;
    }
    expected.push(row);
  }
  return expected;
}

/**
 * Chi-squared test of independence for an r×c table of counts.
 *
 * Degrees of freedom are (r-1)(c-1). With one degree of freedom and
 * `correction` on, each |O - E| is shrunk by min(0.5, |O - E|) (Yates).
 * A table with an empty row or column has zero expected cells; the
 * statistic and p-value are NaN in that case.
 */
export function chiSquaredContingency(
  observed: readonly (readonly number[])[],
  options: ContingencyOptions = {},
): ContingencyResult {
  const correction = options.correction ?? true;
  const rows = observed.length;
  const cols = observed[0]?.length ?? 0;
  const expected = expectedFrequencies(observed);
  const degreesOfFreedom = Math.max(0, (rows - 1) * (cols - 1));

  if (degreesOfFreedom === 0) {
    return { statistic: 0, pValue: 1, degreesOfFreedom, expected, corrected: false };
  }

  for (const row of expected) {
    if (row.some((e) => !(e > 0))) {
      return { statistic: NaN, pValue: NaN, degreesOfFreedom, expected, corrected: false };
    }
  }

  const corrected = correction && degreesOfFreedom === 1;
  let statistic = 0;
  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < cols; j++) {
      const e = expected[i]?.[j] ?? 0;
      let diff = Math.abs((observed[i]?.[j] ?? 0) - e);
      if (corrected) diff -= Math.min(0.5, diff);
      statistic += (diff * diff) / e;
    }
  }

  return {
    statistic,
    pValue: chiSquaredSurvival(statistic, degreesOfFreedom),
    degreesOfFreedom,
    expected,
    corrected,
  };
}

/**
 * One-way chi-squared goodness-of-fit: Σ (O_i - E_i)² / E_i with k-1
 * degrees of freedom. Expected counts are used as given, not rescaled to
 * the observed total. A cell with zero expected and positive observed count
 * makes the statistic infinite; a cell where both are zero contributes 0.
 */
export function chiSquaredGoodnessOfFit(
  observed: readonly number[],
  expected: readonly number[],
): ChiSquaredResult {
  const k = Math.min(observed.length, expected.length);
  const degreesOfFreedom = Math.max(0, k - 1);

  let statistic = 0;
  for (let i = 0; i < k; i++) {
    const o = observed[i] ?? 0;
    const e = expected[i] ?? 0;
    if (e > 0) {
      statistic += ((o - e) * (o - e)) / e;
    } else if (o !== 0) {
      statistic = Infinity;
    }
  }

  return {
    statistic,
    pValue: chiSquaredSurvival(statistic, degreesOfFreedom),
    degreesOfFreedom,
  };
}
