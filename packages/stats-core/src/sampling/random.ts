// ---------------------------------------------------------------------------
// Seeded Sampling
// ---------------------------------------------------------------------------

import type { PRNG } from '../types.js';

/** Seedable PRNG — mulberry32. */
export function createPRNG(seed: number): PRNG {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Sample from the standard normal using Box-Muller. */
export function normalSample(rng: PRNG): number {
  const u1 = rng();
  const u2 = rng();
  return Math.sqrt(-2 * Math.log(Math.max(u1, 1e-15))) * Math.cos(2 * Math.PI * u2);
}

/** `n` draws from N(mean, sd²). */
export function normalSamples(rng: PRNG, n: number, mean: number = 0, sd: number = 1): number[] {
  return Array.from({ length: n }, () => mean + sd * normalSample(rng));
}

export interface TruncatedNormalOptions {
  mean?: number;
  sd?: number;
  low: number;
  high: number;
}

/**
 * `n` draws from N(mean, sd²) restricted to [low, high], by rejection.
 * Suited to bounds that keep a reasonable share of the mass; a window
 * holding almost none of it will spin for a long time.
 */
export function truncatedNormalSamples(
  rng: PRNG,
  n: number,
  options: TruncatedNormalOptions,
): number[] {
  const mu = options.mean ?? 0;
  const sd = options.sd ?? 1;
  const out: number[] = [];
  while (out.length < n) {
    const x = mu + sd * normalSample(rng);
    if (x >= options.low && x <= options.high) out.push(x);
  }
  return out;
}
