// ---------------------------------------------------------------------------
// Tests for the drift monitor
// ---------------------------------------------------------------------------

import { afterEach, describe, it, expect, vi } from 'vitest';
import { createPRNG, normalSamples } from '@driftwatch/stats-core';
import { DriftMonitor } from '../monitor/drift-monitor.js';
import { DEFAULT_CONFIG, loadConfig } from '../config/env.js';
import { InvalidConfigurationError, SchemaMismatchError } from '../errors.js';
import type { FeaturePartition, Window } from '../types.js';
import { captureLogger, evenlySpaced, repeat, windowFromColumns } from './helpers.js';

const config = loadConfig({});

function quietMonitor(
  baseline: Window,
  comparison: Window,
  partition: FeaturePartition,
  alpha?: number,
): DriftMonitor {
  const { logger } = captureLogger('warn');
  return new DriftMonitor(baseline, comparison, partition, { alpha, logger, config });
}

// Price and rating drift, room_type shifts, city and beds stay put.
function listingWindows(): { baseline: Window; comparison: Window } {
  const rng = createPRNG(1);
  const price = normalSamples(rng, 1000, 100, 10);
  const beds = Array.from({ length: 1000 }, (_, i) => (i % 4) + 1);
  const rating = Array.from({ length: 1000 }, (_, i) => 60 + (i % 41));
  const city = Array.from({ length: 1000 }, (_, i) => (i % 3 === 0 ? 'north' : 'south'));

  const baseline = windowFromColumns({
    price,
    beds,
    rating,
    room_type: [...repeat('entire', 500), ...repeat('private', 500)],
    city,
  });
  const comparison = windowFromColumns({
    price: price.map((p) => 2 * p),
    beds: [...beds],
    rating: rating.map((r) => r / 20),
    room_type: [...repeat('entire', 800), ...repeat('private', 200)],
    city: [...city],
  });
  return { baseline, comparison };
}

// ---------------------------------------------------------------------------
// run()
// ---------------------------------------------------------------------------

describe('DriftMonitor.run', () => {
  it('flags a doubled normal price column', () => {
    const { baseline, comparison } = listingWindows();
    const monitor = quietMonitor(baseline, comparison, { numeric: ['price'], categorical: [] });
    const events = monitor.run();

    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event?.featureName).toBe('price');
    expect(event?.testKind).toBe('kolmogorov-smirnov');
    expect(event?.result.isDrift).toBe(true);
    expect(event?.result.pValue).toBeLessThan(event?.result.correctedAlpha ?? 0);
  });

  it('reports only drifted features, numeric family first, in input order', () => {
    const { baseline, comparison } = listingWindows();
    const monitor = quietMonitor(baseline, comparison, {
      numeric: ['rating', 'beds', 'price'],
      categorical: ['city', 'room_type'],
    });

    const events = monitor.run();
    expect(events.map((e) => e.featureName)).toEqual(['rating', 'price', 'room_type']);
    expect(events.map((e) => e.testKind)).toEqual([
      'kolmogorov-smirnov',
      'kolmogorov-smirnov',
      'chi-squared-contingency',
    ]);
  });

  it('shares one corrected alpha per family', () => {
    const { baseline, comparison } = listingWindows();
    const monitor = quietMonitor(baseline, comparison, {
      numeric: ['rating', 'beds', 'price'],
      categorical: ['city', 'room_type'],
    });

    const report = monitor.evaluate();
    expect(report.numeric.correctedAlpha).toBeCloseTo(0.05 / 3, 15);
    expect(report.categorical.correctedAlpha).toBeCloseTo(0.025, 15);
    for (const outcome of report.numeric.outcomes) {
      if (outcome.status !== 'skipped') {
        expect(outcome.result.correctedAlpha).toBe(report.numeric.correctedAlpha);
      }
    }
  });

  it('returns no events for identical windows', () => {
    const { baseline } = listingWindows();
    const monitor = quietMonitor(baseline, baseline, {
      numeric: ['price', 'beds', 'rating'],
      categorical: ['room_type', 'city'],
    });
    expect(monitor.run()).toEqual([]);
  });

  it('uses a caller-supplied alpha over the configured one', () => {
    const { baseline, comparison } = listingWindows();
    const monitor = quietMonitor(baseline, comparison, { numeric: ['price'], categorical: [] }, 0.01);
    expect(monitor.familyAlpha).toBe(0.01);
    expect(monitor.evaluate().numeric.correctedAlpha).toBe(0.01);
  });

  it('falls back to the configured alpha', () => {
    const { baseline, comparison } = listingWindows();
    const monitor = new DriftMonitor(baseline, comparison, { numeric: ['price'], categorical: [] }, {
      config: loadConfig({ DRIFT_ALPHA: '0.2', DRIFT_LOG_LEVEL: 'silent' }),
    });
    expect(monitor.familyAlpha).toBe(0.2);
  });

  describe('without a config', () => {
    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it('ignores DRIFT_* variables and uses the built-in defaults', () => {
      vi.stubEnv('DRIFT_ALPHA', '0.9');
      vi.stubEnv('DRIFT_JS_BINS', 'abc');
      const { baseline, comparison } = listingWindows();
      const { logger } = captureLogger('warn');
      const monitor = new DriftMonitor(baseline, comparison, { numeric: ['price'], categorical: [] }, { logger });

      expect(monitor.familyAlpha).toBe(DEFAULT_CONFIG.alpha);
      expect(monitor.familyAlpha).toBe(0.05);
      expect(monitor.run().map((e) => e.featureName)).toEqual(['price']);
      expect(monitor.distances().price?.threshold).toBe(0.2);
    });

    it('still validates an explicit alpha', () => {
      vi.stubEnv('DRIFT_ALPHA', 'abc');
      const { baseline, comparison } = listingWindows();
      const { logger } = captureLogger('warn');
      const monitor = new DriftMonitor(baseline, comparison, { numeric: ['price'], categorical: [] }, {
        alpha: 0.01,
        logger,
      });
      expect(monitor.familyAlpha).toBe(0.01);
    });
  });

  it('skips an empty family without computing a correction', () => {
    const { baseline, comparison } = listingWindows();
    const report = quietMonitor(baseline, comparison, { numeric: [], categorical: ['room_type'] }).evaluate();
    expect(report.numeric.correctedAlpha).toBeNull();
    expect(report.numeric.outcomes).toEqual([]);
    expect(report.events.map((e) => e.featureName)).toEqual(['room_type']);
  });

  it('can test the categorical family against raw baseline counts', () => {
    const baseline = windowFromColumns({ kind: [...repeat('a', 40), ...repeat('b', 60)] });
    const comparison = windowFromColumns({ kind: [...repeat('a', 20), ...repeat('b', 30)] });
    const partition = { numeric: [], categorical: ['kind'] };
    const { logger } = captureLogger('warn');

    const twoWay = new DriftMonitor(baseline, comparison, partition, { logger, config });
    const oneWay = new DriftMonitor(baseline, comparison, partition, {
      logger,
      config,
      categoricalTest: 'goodness-of-fit',
    });

    expect(twoWay.run()).toEqual([]);
    const events = oneWay.run();
    expect(events).toHaveLength(1);
    expect(events[0]?.testKind).toBe('chi-squared-goodness-of-fit');
  });
});

// ---------------------------------------------------------------------------
// Skipped features
// ---------------------------------------------------------------------------

describe('DriftMonitor skipped features', () => {
  const baseline = windowFromColumns({
    sparse: [1, 2, 3, 4],
    shift: evenlySpaced(4, 0),
    constant: ['a', 'a', 'a', 'a'],
  });
  const comparison = windowFromColumns({
    sparse: [null, null, null, 5],
    shift: evenlySpaced(4, 10),
    constant: ['a', 'a', 'a', 'a'],
  });

  it('records insufficient data as skipped and keeps going', () => {
    const { logger, entries } = captureLogger('warn');
    const monitor = new DriftMonitor(
      baseline,
      comparison,
      { numeric: ['sparse', 'shift'], categorical: ['constant'] },
      { logger, config },
    );

    const report = monitor.evaluate();
    expect(report.numeric.outcomes.map((o) => o.status)).toEqual(['skipped', 'stable']);
    expect(report.categorical.outcomes.map((o) => o.status)).toEqual(['skipped']);
    expect(report.numeric.correctedAlpha).toBeCloseTo(0.025, 15);

    const skipped = report.numeric.outcomes[0];
    expect(skipped?.status === 'skipped' ? skipped.reason : '').toBe(
      '"sparse" has 1 non-null value(s) in the comparison window; need 2',
    );
    expect(entries.map((e) => [e.level, e.msg, e.feature])).toEqual([
      ['warn', 'feature skipped', 'sparse'],
      ['warn', 'feature skipped', 'constant'],
    ]);
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe('DriftMonitor failures', () => {
  const baseline = windowFromColumns({ price: [1, 2, 3], room_type: ['a', 'b', 'a'] });

  it('raises SchemaMismatchError when the comparison window lacks a column', () => {
    const comparison = windowFromColumns({ price: [4, 5, 6] });
    const { logger, entries } = captureLogger('debug');
    const monitor = new DriftMonitor(
      baseline,
      comparison,
      { numeric: ['price'], categorical: [] },
      { logger, config },
    );

    expect(() => monitor.run()).toThrow(SchemaMismatchError);
    try {
      monitor.run();
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaMismatchError);
      if (err instanceof SchemaMismatchError) {
        expect(err.feature).toBe('room_type');
        expect(err.window).toBe('comparison');
        expect(err.message).toBe('Column "room_type" is missing from the comparison window');
      }
    }
    // Nothing ran, so nothing was logged.
    expect(entries).toEqual([]);
  });

  it('raises SchemaMismatchError when columns come in a different order', () => {
    const comparison = windowFromColumns({ room_type: ['a'], price: [1] });
    const monitor = quietMonitor(baseline, comparison, { numeric: ['price'], categorical: [] });
    expect(() => monitor.run()).toThrow('Windows list the same columns in a different order');
  });

  it('raises SchemaMismatchError for a feature neither window has', () => {
    const monitor = quietMonitor(baseline, baseline, { numeric: ['price', 'bedrooms'], categorical: [] });
    expect(() => monitor.run()).toThrow('Feature "bedrooms" is missing from the baseline window');
  });

  it('raises SchemaMismatchError for text in a numeric feature', () => {
    const monitor = quietMonitor(baseline, baseline, { numeric: ['room_type'], categorical: [] });
    expect(() => monitor.run()).toThrow(
      'Numeric feature "room_type" holds a string value in the baseline window',
    );
  });

  it('rejects a feature listed in both families', () => {
    expect(() => quietMonitor(baseline, baseline, { numeric: ['price'], categorical: ['price'] }))
      .toThrow(InvalidConfigurationError);
  });

  it('rejects an alpha outside (0, 1]', () => {
    const partition = { numeric: ['price'], categorical: [] };
    expect(() => quietMonitor(baseline, baseline, partition, 0)).toThrow(InvalidConfigurationError);
    expect(() => quietMonitor(baseline, baseline, partition, 1.01)).toThrow(InvalidConfigurationError);
  });
});

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

describe('DriftMonitor logging', () => {
  it('logs each drift at info and a run summary at debug', () => {
    const { baseline, comparison } = listingWindows();
    const { logger, entries } = captureLogger('debug');
    const monitor = new DriftMonitor(
      baseline,
      comparison,
      { numeric: ['price', 'beds'], categorical: [] },
      { logger, config },
    );
    monitor.run();

    expect(entries.map((e) => e.msg)).toEqual(['drift detected', 'drift run complete']);
    expect(entries[0]?.level).toBe('info');
    expect(entries[0]?.feature).toBe('price');
    expect(entries[1]).toMatchObject({
      level: 'debug',
      numericTests: 2,
      categoricalTests: 0,
      drifted: 1,
      skipped: 0,
    });
  });
});

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

describe('DriftMonitor diagnostics', () => {
  const baseline = windowFromColumns({ price: [1, 2, 3, 4], note: ['a', null, 'b', 'c'] });
  const comparison = windowFromColumns({ price: [2, 4, 6, 8], note: [null, null, 'b', 'c'] });

  it('summarizes percent change and null rates', () => {
    const monitor = quietMonitor(baseline, comparison, { numeric: ['price'], categorical: ['note'] });
    const summary = monitor.summary();

    expect(Object.keys(summary.percentChange)).toEqual(['price']);
    expect(summary.percentChange.price?.count).toBe(0);
    expect(summary.percentChange.price?.mean).toBeCloseTo(100, 10);
    expect(summary.nullRates).toEqual({
      price: { baseline: 0, comparison: 0 },
      note: { baseline: 25, comparison: 50 },
    });
  });

  it('reports Jensen-Shannon distances with config defaults', () => {
    const far = windowFromColumns({ price: [11, 12, 13, 14], note: ['a', 'b', 'c', 'd'] });
    const monitor = quietMonitor(baseline, far, { numeric: ['price'], categorical: [] });

    const table = monitor.distances();
    expect(table.price?.threshold).toBe(0.2);
    expect(table.price?.distance).toBeCloseTo(1, 12);
    expect(table.price?.exceeded).toBe(true);
    // One bin holds both windows whole.
    expect(monitor.distances({ bins: 1 }).price).toEqual({ distance: 0, threshold: 0.2, exceeded: false });
  });

  it('validates distance options', () => {
    const monitor = quietMonitor(baseline, comparison, { numeric: ['price'], categorical: [] });
    expect(() => monitor.distances({ bins: 0 })).toThrow(InvalidConfigurationError);
  });
});
