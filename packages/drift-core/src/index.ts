// ---------------------------------------------------------------------------
// @driftwatch/drift-core — Two-Window Drift Detection
// ---------------------------------------------------------------------------

// Types
export * from './types.js';

// Errors
export {
  DriftError,
  SchemaMismatchError,
  InsufficientDataError,
  InvalidConfigurationError,
  isDriftError,
  type DriftErrorCode,
} from './errors.js';

// Configuration + logging
export { DEFAULT_CONFIG, loadConfig, type DriftConfig } from './config/env.js';
export {
  alphaSchema,
  featurePartitionSchema,
  monitorOptionsSchema,
  distanceOptionsSchema,
  categoricalTestSchema,
  envSchema,
  parseConfig,
  DEFAULT_ALPHA,
  LOG_LEVELS,
  type CategoricalTest,
  type DistanceOptions,
} from './config/schemas.js';
export {
  createLogger,
  stdoutSink,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogFields,
  type LogSink,
  type LoggerOptions,
} from './logging/logger.js';

// Windows
export {
  windowFromRecords,
  assertCompatibleWindows,
  assertFeaturesPresent,
  numericValues,
  categoryValues,
  nullCount,
  isNull,
} from './window/window.js';

// Comparators
export { compareNumeric, MIN_NUMERIC_OBSERVATIONS } from './comparators/numeric.js';
export {
  buildContingencyTable,
  compareCategorical,
  compareCategoricalGoodnessOfFit,
} from './comparators/categorical.js';

// Multiple-comparison correction
export { correctedAlpha } from './correction/bonferroni.js';

// Summary reporter
export { percentChange, percentDelta, PERCENT_CHANGE_EPSILON } from './summary/percent-change.js';
export { nullRateDelta } from './summary/null-rates.js';
export {
  jensenShannonDrift,
  DEFAULT_JS_BINS,
  DEFAULT_JS_THRESHOLD,
  type JensenShannonOptions,
} from './summary/distances.js';

// Orchestration
export { DriftMonitor, type DriftMonitorOptions } from './monitor/drift-monitor.js';
