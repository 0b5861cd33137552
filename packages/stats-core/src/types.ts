// ---------------------------------------------------------------------------
// Statistical Kernels — Core Types
// ---------------------------------------------------------------------------

/** Seedable PRNG function returning values in [0, 1). */
export type PRNG = () => number;

// ---------------------------------------------------------------------------
// Hypothesis Tests
// ---------------------------------------------------------------------------

/** Outcome of a two-sample Kolmogorov-Smirnov test. */
export interface KSTestResult {
  statistic: number;   // sup |F_1(x) - F_2(x)|
  pValue: number;
  effectiveN: number;  // n*m / (n+m)
}

export interface ChiSquaredResult {
  statistic: number;
  pValue: number;
  degreesOfFreedom: number;
}

export interface ContingencyResult extends ChiSquaredResult {
  expected: number[][];
  corrected: boolean;  // Yates' continuity correction applied
}

export interface ContingencyOptions {
  /** Apply Yates' correction when the table has one degree of freedom (default true). */
  correction?: boolean;
}

// ---------------------------------------------------------------------------
// Descriptive Statistics
// ---------------------------------------------------------------------------

export const DESCRIBE_STATISTICS = [
  'count',
  'mean',
  'std',
  'min',
  '25%',
  '50%',
  '75%',
  'max',
] as const;

export type DescribeStatistic = (typeof DESCRIBE_STATISTICS)[number];

/** Column summary in the layout of a dataframe `describe()`. */
export type DescriptiveSummary = Record<DescribeStatistic, number>;

// ---------------------------------------------------------------------------
// Information Theory
// ---------------------------------------------------------------------------

export interface Histogram {
  edges: number[];   // nBins + 1 edges
  counts: number[];
}
