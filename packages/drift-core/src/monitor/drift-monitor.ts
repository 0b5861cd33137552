// ---------------------------------------------------------------------------
// Drift Monitor
// ---------------------------------------------------------------------------
//
// Compares a baseline window against a comparison window feature by
// feature. Numeric features form one test family (Kolmogorov-Smirnov),
// categorical features another (chi-squared); each family gets its own
// Bonferroni-corrected threshold. Drift is reported as returned events,
// never through a callback, so the caller decides how to react.
// ---------------------------------------------------------------------------

import { compareNumeric } from '../comparators/numeric.js';
import { compareCategorical, compareCategoricalGoodnessOfFit } from '../comparators/categorical.js';
import { correctedAlpha } from '../correction/bonferroni.js';
import { DEFAULT_CONFIG, type DriftConfig } from '../config/env.js';
import {
  distanceOptionsSchema,
  featurePartitionSchema,
  monitorOptionsSchema,
  parseConfig,
  type CategoricalTest,
  type DistanceOptions,
} from '../config/schemas.js';
import { InsufficientDataError } from '../errors.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { percentChange } from '../summary/percent-change.js';
import { nullRateDelta } from '../summary/null-rates.js';
import { jensenShannonDrift } from '../summary/distances.js';
import { assertCompatibleWindows, categoryValues, numericValues } from '../window/window.js';
import type {
  DistanceTable,
  DriftEvent,
  FamilyReport,
  FeatureDescriptor,
  FeatureKind,
  FeatureOutcome,
  FeaturePartition,
  MonitorReport,
  MonitorSummary,
  TestKind,
  TestResult,
  Window,
} from '../types.js';

export interface DriftMonitorOptions {
  /** Family-wide significance level; defaults to `config.alpha`. */
  alpha?: number;
  /** Test for the categorical family (default 'contingency'). */
  categoricalTest?: CategoricalTest;
  logger?: Logger;
  /** Fallbacks for alpha, log level and distance options (default DEFAULT_CONFIG). */
  config?: DriftConfig;
}

type Comparator = (
  baseline: Window,
  comparison: Window,
  feature: string,
  threshold: number,
) => TestResult;

/**
 * DriftMonitor holds two windows and a feature partition for one run
 * configuration. Windows are only read.
 *
 * Usage:
 *   const monitor = new DriftMonitor(lastWeek, thisWeek, {
 *     numeric: ['price', 'bedrooms'],
 *     categorical: ['room_type'],
 *   });
 *   for (const event of monitor.run()) { // alert, schedule retraining, ... }
 */
export class DriftMonitor {
  private readonly baseline: Window;
  private readonly comparison: Window;
  private readonly partition: FeaturePartition;
  private readonly alpha: number;
  private readonly categoricalTest: CategoricalTest;
  private readonly config: DriftConfig;
  private readonly logger: Logger;

  /**
   * @param baseline - Reference window
   * @param comparison - Window checked against the reference; same ordered columns
   * @param partition - Numeric and categorical feature names, evaluated in list order
   * @throws InvalidConfigurationError for an out-of-range alpha or a feature listed twice
   */
  constructor(
    baseline: Window,
    comparison: Window,
    partition: FeaturePartition,
    options: DriftMonitorOptions = {},
  ) {
    const parsed = parseConfig(
      monitorOptionsSchema,
      { alpha: options.alpha, categoricalTest: options.categoricalTest },
      'monitor options',
    );
    const features = parseConfig(featurePartitionSchema, partition, 'feature partition');

    this.config = options.config ?? DEFAULT_CONFIG;
    this.baseline = baseline;
    this.comparison = comparison;
    this.partition = Object.freeze({
      numeric: Object.freeze([...features.numeric]),
      categorical: Object.freeze([...features.categorical]),
    });
    this.alpha = parsed.alpha ?? this.config.alpha;
    this.categoricalTest = parsed.categoricalTest ?? 'contingency';
    this.logger = options.logger ?? createLogger({
      level: this.config.logLevel,
      bindings: { component: 'drift-monitor' },
    });
  }

  /** Family-wide significance level in effect for this monitor. */
  get familyAlpha(): number {
    return this.alpha;
  }

  /**
   * Run every test and return the drift events, in input order with the
   * numeric family first.
   *
   * @throws SchemaMismatchError before any test runs if the windows are incompatible
   */
  run(): DriftEvent[] {
    return [...this.evaluate().events];
  }

  /** Run every test and return each feature's outcome, skipped ones included. */
  evaluate(): MonitorReport {
    assertCompatibleWindows(this.baseline, this.comparison, this.partition);

    const numeric = this.evaluateFamily(
      'numeric',
      this.partition.numeric,
      'kolmogorov-smirnov',
      (b, c, feature, threshold) =>
        compareNumeric(numericValues(b, feature), numericValues(c, feature), threshold, feature),
    );

    const categoricalCompare =
      this.categoricalTest === 'contingency' ? compareCategorical : compareCategoricalGoodnessOfFit;
    const categorical = this.evaluateFamily(
      'categorical',
      this.partition.categorical,
      this.categoricalTest === 'contingency' ? 'chi-squared-contingency' : 'chi-squared-goodness-of-fit',
      (b, c, feature, threshold) =>
        categoricalCompare(categoryValues(b, feature), categoryValues(c, feature), threshold, feature),
    );

    const events: DriftEvent[] = [];
    for (const outcome of [...numeric.outcomes, ...categorical.outcomes]) {
      if (outcome.status === 'drift') {
        events.push(Object.freeze({
          featureName: outcome.descriptor.name,
          testKind: outcome.testKind,
          result: outcome.result,
        }));
      }
    }

    const skipped = [...numeric.outcomes, ...categorical.outcomes]
      .filter((o) => o.status === 'skipped').length;
    this.logger.debug('drift run complete', {
      familyAlpha: this.alpha,
      numericTests: numeric.outcomes.length,
      categoricalTests: categorical.outcomes.length,
      drifted: events.length,
      skipped,
    });

    return { familyAlpha: this.alpha, numeric, categorical, events };
  }

  /** Percent change of summary statistics and null rates for every column. */
  summary(): MonitorSummary {
    assertCompatibleWindows(this.baseline, this.comparison, this.partition);
    return {
      percentChange: percentChange(this.baseline, this.comparison, this.partition.numeric),
      nullRates: nullRateDelta(this.baseline, this.comparison, this.baseline.columns),
    };
  }

  /** Jensen-Shannon distance per numeric feature; bins and threshold default to config. */
  distances(options: DistanceOptions = {}): DistanceTable {
    const parsed = parseConfig(distanceOptionsSchema, options, 'distance options');
    assertCompatibleWindows(this.baseline, this.comparison, this.partition);
    return jensenShannonDrift(this.baseline, this.comparison, this.partition.numeric, {
      bins: parsed.bins ?? this.config.jsBins,
      threshold: parsed.threshold ?? this.config.jsThreshold,
    });
  }

  // ---- Internal Methods ----

  private evaluateFamily(
    kind: FeatureKind,
    features: readonly string[],
    testKind: TestKind,
    compare: Comparator,
  ): FamilyReport {
    if (features.length === 0) {
      return { kind, correctedAlpha: null, outcomes: [] };
    }

    // One threshold for the whole family.
    const threshold = correctedAlpha(this.alpha, features.length);
    const outcomes = features.map((name) =>
      this.evaluateFeature({ name, kind }, testKind, threshold, compare),
    );
    return { kind, correctedAlpha: threshold, outcomes };
  }

  private evaluateFeature(
    descriptor: FeatureDescriptor,
    testKind: TestKind,
    threshold: number,
    compare: Comparator,
  ): FeatureOutcome {
    let result: TestResult;
    try {
      result = compare(this.baseline, this.comparison, descriptor.name, threshold);
    } catch (err) {
      if (err instanceof InsufficientDataError) {
        this.logger.warn('feature skipped', {
          feature: descriptor.name,
          testKind,
          reason: err.message,
        });
        return { status: 'skipped', descriptor, testKind, reason: err.message };
      }
      throw err;
    }

    if (result.isDrift) {
      this.logger.info('drift detected', {
        feature: descriptor.name,
        testKind,
        statistic: result.statistic,
        pValue: result.pValue,
        correctedAlpha: result.correctedAlpha,
      });
      return { status: 'drift', descriptor, testKind, result };
    }
    return { status: 'stable', descriptor, testKind, result };
  }
}
