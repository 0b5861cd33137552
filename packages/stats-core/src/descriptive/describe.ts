// ---------------------------------------------------------------------------
// Descriptive Statistics
// ---------------------------------------------------------------------------

import type { DescriptiveSummary } from '../types.js';

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Sample standard deviation (n - 1 denominator). NaN below two values. */
export function sampleStd(values: readonly number[], mu: number = mean(values)): number {
  const n = values.length;
  if (n < 2) return NaN;
  let ss = 0;
  for (const v of values) ss += (v - mu) * (v - mu);
  return Math.sqrt(ss / (n - 1));
}

/**
 * Quantile of already-sorted values with linear interpolation between
 * the closest ranks: position (n - 1) · q.
 */
export function quantileSorted(sorted: readonly number[], q: number): number {
  const n = sorted.length;
  if (n === 0) return NaN;
  const pos = (n - 1) * Math.max(0, Math.min(1, q));
  const lo = Math.floor(pos);
  const hi = Math.min(n - 1, lo + 1);
  const frac = pos - lo;
  const a = sorted[lo] ?? NaN;
  const b = sorted[hi] ?? NaN;
  return a + (b - a) * frac;
}

/**
 * count / mean / std / min / quartiles / max of a numeric column.
 * Every statistic but `count` is NaN for an empty column.
 */
export function describe(values: readonly number[]): DescriptiveSummary {
  const sorted = [...values].sort((a, b) => a - b);
  const mu = mean(sorted);
  return {
    count: sorted.length,
    mean: mu,
    std: sampleStd(sorted, mu),
    min: sorted.length > 0 ? (sorted[0] ?? NaN) : NaN,
    '25%': quantileSorted(sorted, 0.25),
    '50%': quantileSorted(sorted, 0.5),
    '75%': quantileSorted(sorted, 0.75),
    max: sorted.length > 0 ? (sorted[sorted.length - 1] ?? NaN) : NaN,
  };
}
