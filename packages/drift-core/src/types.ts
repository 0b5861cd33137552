// ---------------------------------------------------------------------------
// Drift Engine — Core Types
// ---------------------------------------------------------------------------

import type { DescribeStatistic } from '@driftwatch/stats-core';

// ---------------------------------------------------------------------------
// Data Model
// ---------------------------------------------------------------------------

/** One cell. `undefined` and `NaN` are read as null. */
export type CellValue = number | string | boolean | null | undefined;

export type DataRecord = Readonly<Record<string, CellValue>>;

/** A time-delimited sample of records with an ordered schema. */
export interface Window {
  readonly columns: readonly string[];
  readonly rows: readonly DataRecord[];
}

export type WindowRole = 'baseline' | 'comparison';

export type FeatureKind = 'numeric' | 'categorical';

export interface FeatureDescriptor {
  readonly name: string;
  readonly kind: FeatureKind;
}

/** Externally supplied split of (a subset of) the schema. */
export interface FeaturePartition {
  readonly numeric: readonly string[];
  readonly categorical: readonly string[];
}

/** Category value as observed; null is a category of its own. */
export type CategoryLabel = string | number | boolean | null;

/** 2×K table: one count row per window, one column per category. */
export interface ContingencyTable {
  readonly categories: readonly CategoryLabel[];
  readonly baseline: readonly number[];
  readonly comparison: readonly number[];
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface TestResult {
  readonly statistic: number;
  readonly pValue: number;
  readonly correctedAlpha: number;
  readonly isDrift: boolean;
}

export type TestKind =
  | 'kolmogorov-smirnov'
  | 'chi-squared-contingency'
  | 'chi-squared-goodness-of-fit';

/** Unit handed to whatever reacts to drift. */
export interface DriftEvent {
  readonly featureName: string;
  readonly testKind: TestKind;
  readonly result: TestResult;
}

export type FeatureOutcome =
  | {
      readonly status: 'drift' | 'stable';
      readonly descriptor: FeatureDescriptor;
      readonly testKind: TestKind;
      readonly result: TestResult;
    }
  | {
      readonly status: 'skipped';
      readonly descriptor: FeatureDescriptor;
      readonly testKind: TestKind;
      readonly reason: string;
    };

export interface FamilyReport {
  readonly kind: FeatureKind;
  /** Null when the family is empty and no correction was computed. */
  readonly correctedAlpha: number | null;
  readonly outcomes: readonly FeatureOutcome[];
}

export interface MonitorReport {
  readonly familyAlpha: number;
  readonly numeric: FamilyReport;
  readonly categorical: FamilyReport;
  /** Drift events in input order, numeric family first. */
  readonly events: readonly DriftEvent[];
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

export type PercentChangeTable = Record<string, Record<DescribeStatistic, number>>;

export interface NullRate {
  readonly baseline: number;    // percent of rows
  readonly comparison: number;
}

export type NullRateTable = Record<string, NullRate>;

export interface DistanceDiagnostic {
  readonly distance: number;
  readonly threshold: number;
  readonly exceeded: boolean;
}

export type DistanceTable = Record<string, DistanceDiagnostic>;

export interface MonitorSummary {
  readonly percentChange: PercentChangeTable;
  readonly nullRates: NullRateTable;
}
