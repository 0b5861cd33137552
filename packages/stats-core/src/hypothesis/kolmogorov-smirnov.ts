// ---------------------------------------------------------------------------
// Two-Sample Kolmogorov-Smirnov Test (asymptotic)
// ---------------------------------------------------------------------------
//
// D = sup_x |F_1(x) - F_2(x)| over the two empirical CDFs. Under the null
// hypothesis that both samples share one continuous distribution,
// √(n·m/(n+m)) · D converges to the Kolmogorov distribution, which gives
// the two-sided p-value. No exact small-sample correction is applied, so
// p-values shrink as sample sizes grow for a fixed true difference.
// ---------------------------------------------------------------------------

import type { KSTestResult } from '../types.js';
import { kolmogorovSurvival } from '../special/kolmogorov.js';

/**
 * Largest absolute gap between the empirical CDFs of two samples.
 * Ties are stepped over together so that equal values never open a gap.
 */
export function ksStatistic(sample1: readonly number[], sample2: readonly number[]): number {
  const n1 = sample1.length;
  const n2 = sample2.length;
  if (n1 === 0 || n2 === 0) return NaN;

  const a = [...sample1].sort((x, y) => x - y);
  const b = [...sample2].sort((x, y) => x - y);

  let i = 0;
  let j = 0;
  let d = 0;
  while (i < n1 && j < n2) {
    const ai = a[i] ?? 0;
    const bj = b[j] ?? 0;
    const x = ai <= bj ? ai : bj;
    while (i < n1 && (a[i] ?? 0) === x) i++;
    while (j < n2 && (b[j] ?? 0) === x) j++;
    const gap = Math.abs(i / n1 - j / n2);
    if (gap > d) d = gap;
  }
  // Once one sample is exhausted its CDF is 1; the other only climbs toward 1.
  return d;
}

/**
 * Two-sided two-sample KS test using the asymptotic Kolmogorov distribution.
 * Empty input yields NaN statistic and p-value.
 */
export function ksTwoSample(sample1: readonly number[], sample2: readonly number[]): KSTestResult {
  const n1 = sample1.length;
  const n2 = sample2.length;
  if (n1 === 0 || n2 === 0) {
    return { statistic: NaN, pValue: NaN, effectiveN: 0 };
  }

  const statistic = ksStatistic(sample1, sample2);
  const effectiveN = (n1 * n2) / (n1 + n2);
  const pValue = kolmogorovSurvival(Math.sqrt(effectiveN) * statistic);

  return { statistic, pValue, effectiveN };
}
