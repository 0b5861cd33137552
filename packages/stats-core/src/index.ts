// ---------------------------------------------------------------------------
// @driftwatch/stats-core — Statistical Kernels
// ---------------------------------------------------------------------------

// Types
export * from './types.js';

// Special functions
export { lnGamma, regularizedGammaP, regularizedGammaQ, chiSquaredSurvival } from './special/gamma.js';
export { kolmogorovCdf, kolmogorovSurvival } from './special/kolmogorov.js';

// Hypothesis tests
export { ksStatistic, ksTwoSample } from './hypothesis/kolmogorov-smirnov.js';
export {
  expectedFrequencies,
  chiSquaredContingency,
  chiSquaredGoodnessOfFit,
} from './hypothesis/chi-squared.js';

// Descriptive statistics
export { mean, sampleStd, quantileSorted, describe } from './descriptive/describe.js';

// Information theory
export {
  jensenShannonDistance,
  histogram,
  sampleJensenShannonDistance,
} from './information/jensen-shannon.js';

// Sampling
export {
  createPRNG,
  normalSample,
  normalSamples,
  truncatedNormalSamples,
  type TruncatedNormalOptions,
} from './sampling/random.js';
