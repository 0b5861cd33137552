/**
 * Monitor defaults from environment variables.
 *
 * Every variable is optional. A present but invalid value fails fast with
 * an InvalidConfigurationError naming the variable. Nothing reads the
 * environment implicitly: pass `loadConfig()` as a monitor's `config`.
 *
 * | Variable             | Default | Meaning                                  |
 * |----------------------|---------|------------------------------------------|
 * | DRIFT_ALPHA          | 0.05    | Family-wide significance level, (0, 1]   |
 * | DRIFT_LOG_LEVEL      | info    | debug, info, warn, error or silent       |
 * | DRIFT_JS_BINS        | 20      | Histogram bins for Jensen-Shannon        |
 * | DRIFT_JS_THRESHOLD   | 0.2     | Jensen-Shannon distance flag level       |
 */

import { DEFAULT_ALPHA, envSchema, parseConfig } from './schemas.js';
import { DEFAULT_JS_BINS, DEFAULT_JS_THRESHOLD } from '../summary/distances.js';
import type { LogLevel } from '../logging/logger.js';

export interface DriftConfig {
  readonly alpha: number;
  readonly logLevel: LogLevel;
  readonly jsBins: number;
  readonly jsThreshold: number;
}

/** Built-in defaults, used when a monitor is given no config. */
export const DEFAULT_CONFIG: DriftConfig = {
  alpha: DEFAULT_ALPHA,
  logLevel: 'info',
  jsBins: DEFAULT_JS_BINS,
  jsThreshold: DEFAULT_JS_THRESHOLD,
};

type Env = Readonly<Record<string, string | undefined>>;

function pick(env: Env, key: string): string | undefined {
  const val = env[key];
  // Blank values count as unset.
  return val === undefined || val.trim() === '' ? undefined : val.trim();
}

export function loadConfig(env: Env = process.env): DriftConfig {
  const parsed = parseConfig(
    envSchema,
    {
      DRIFT_ALPHA: pick(env, 'DRIFT_ALPHA'),
      DRIFT_LOG_LEVEL: pick(env, 'DRIFT_LOG_LEVEL'),
      DRIFT_JS_BINS: pick(env, 'DRIFT_JS_BINS'),
      DRIFT_JS_THRESHOLD: pick(env, 'DRIFT_JS_THRESHOLD'),
    },
    'environment configuration',
  );

  return {
    alpha: parsed.DRIFT_ALPHA,
    logLevel: parsed.DRIFT_LOG_LEVEL,
    jsBins: parsed.DRIFT_JS_BINS,
    jsThreshold: parsed.DRIFT_JS_THRESHOLD,
  };
}
