// ---------------------------------------------------------------------------
// Kolmogorov distribution
// ---------------------------------------------------------------------------
//
// Limiting distribution of √n · D_n. Survival function
//   Q(λ) = 2 Σ_{k≥1} (-1)^{k-1} exp(-2 k² λ²)
// The alternating series converges slowly for small λ, so below λ = 1.18
// the CDF is evaluated with the Jacobi theta form instead:
//   K(λ) = √(2π)/λ · Σ_{k≥1} exp(-(2k-1)² π² / (8 λ²))
// ---------------------------------------------------------------------------

const SWITCH_POINT = 1.18;
const MAX_TERMS = 100;

/** P(K <= λ) for the Kolmogorov distribution. */
export function kolmogorovCdf(lambda: number): number {
  if (!(lambda > 0)) return 0;
  if (lambda >= SWITCH_POINT) return 1 - kolmogorovSurvival(lambda);

  const w = (Math.PI * Math.PI) / (8 * lambda * lambda);
  let sum = 0;
  for (let k = 1; k <= MAX_TERMS; k++) {
    const odd = 2 * k - 1;
    const term = Math.exp(-odd * odd * w);
    sum += term;
    if (term < 1e-17 * sum) break;
  }
  return Math.max(0, Math.min(1, (Math.sqrt(2 * Math.PI) / lambda) * sum));
}

/** P(K > λ) for the Kolmogorov distribution. */
export function kolmogorovSurvival(lambda: number): number {
  if (!(lambda > 0)) return 1;
  if (lambda < SWITCH_POINT) return 1 - kolmogorovCdf(lambda);

  const l2 = lambda * lambda;
  let sum = 0;
  for (let k = 1; k <= MAX_TERMS; k++) {
    const term = Math.exp(-2 * k * k * l2);
    sum += k % 2 === 1 ? term : -term;
    if (term < 1e-17) break;
  }
  return Math.max(0, Math.min(1, 2 * sum));
}
