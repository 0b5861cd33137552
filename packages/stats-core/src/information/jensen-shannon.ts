// ---------------------------------------------------------------------------
// Jensen-Shannon Distance
// ---------------------------------------------------------------------------
//
// JSD(P || Q) = ½ KL(P || M) + ½ KL(Q || M),  M = ½ (P + Q)
// The distance is √JSD. In base 2 it lies in [0, 1].
// ---------------------------------------------------------------------------

import type { Histogram } from '../types.js';

function normalize(weights: readonly number[]): number[] {
  let total = 0;
  for (const w of weights) total += w;
  if (!(total > 0)) return weights.map(() => 0);
  return weights.map((w) => w / total);
}

/** KL(P || M) restricted to the support of P, in the given log base. */
function relativeEntropy(p: readonly number[], m: readonly number[], logBase: number): number {
  let kl = 0;
  for (let i = 0; i < p.length; i++) {
    const pi = p[i] ?? 0;
    const mi = m[i] ?? 0;
    if (pi > 0 && mi > 0) kl += pi * Math.log(pi / mi);
  }
  return kl / logBase;
}

/**
 * Jensen-Shannon distance between two weight vectors. Both are normalized
 * to sum to 1 first, so raw counts can be passed directly.
 *
 * @param base - Logarithm base (2 bounds the result by 1)
 */
export function jensenShannonDistance(
  p: readonly number[],
  q: readonly number[],
  base: number = 2,
): number {
  const n = Math.min(p.length, q.length);
  if (n === 0) return NaN;

  const pn = normalize(p.slice(0, n));
  const qn = normalize(q.slice(0, n));
  const m = pn.map((pi, i) => 0.5 * (pi + (qn[i] ?? 0)));

  const logBase = Math.log(base);
  const jsd = 0.5 * relativeEntropy(pn, m, logBase) + 0.5 * relativeEntropy(qn, m, logBase);
  // Rounding can push a zero divergence slightly negative.
  return Math.sqrt(Math.max(0, jsd));
}

/**
 * Equal-width histogram on [min, max] with `nBins` bins. The last bin is
 * closed on the right. Values outside the range are clamped into the end bins.
 */
export function histogram(
  samples: readonly number[],
  nBins: number,
  min: number,
  max: number,
): Histogram {
  const bins = Math.max(1, Math.floor(nBins));
  const width = (max - min) / bins;
  const edges = Array.from({ length: bins + 1 }, (_, i) => min + i * width);
  const counts = new Array<number>(bins).fill(0);

  for (const v of samples) {
    let bin = width > 0 ? Math.floor((v - min) / width) : 0;
    bin = Math.max(0, Math.min(bins - 1, bin));
    counts[bin] = (counts[bin] ?? 0) + 1;
  }
  return { edges, counts };
}

/**
 * Jensen-Shannon distance between two samples, binned on a shared grid
 * spanning both samples' pooled range.
 */
export function sampleJensenShannonDistance(
  sample1: readonly number[],
  sample2: readonly number[],
  nBins: number,
): number {
  if (sample1.length === 0 || sample2.length === 0) return NaN;

  let min = Infinity;
  let max = -Infinity;
  for (const v of sample1) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  for (const v of sample2) {
    if (v < min) min = v;
    if (v > max) max = v;
  }

  const h1 = histogram(sample1, nBins, min, max);
  const h2 = histogram(sample2, nBins, min, max);
  return jensenShannonDistance(h1.counts, h2.counts, 2);
}
