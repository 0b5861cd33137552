/**
 * Error taxonomy for drift monitoring runs.
 *
 * SchemaMismatchError and InvalidConfigurationError abort a run.
 * InsufficientDataError is scoped to one feature and is recorded by the
 * monitor as a skipped outcome.
 */

export type DriftErrorCode = 'SCHEMA_MISMATCH' | 'INSUFFICIENT_DATA' | 'INVALID_CONFIGURATION';

/** Base class for every error raised by the drift engine. */
export abstract class DriftError extends Error {
  abstract readonly code: DriftErrorCode;
}

/** Window schemas differ, or a requested feature is missing or mistyped. */
export class SchemaMismatchError extends DriftError {
  readonly code = 'SCHEMA_MISMATCH';

  constructor(
    message: string,
    public readonly feature?: string,
    public readonly window?: 'baseline' | 'comparison',
  ) {
    super(message);
    this.name = 'SchemaMismatchError';
  }
}

/** A feature has too few observations for its test. */
export class InsufficientDataError extends DriftError {
  readonly code = 'INSUFFICIENT_DATA';

  constructor(message: string, public readonly feature?: string) {
    super(message);
    this.name = 'InsufficientDataError';
  }
}

/** Bad alpha, test count, partition or environment setting. */
export class InvalidConfigurationError extends DriftError {
  readonly code = 'INVALID_CONFIGURATION';

  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'InvalidConfigurationError';
  }
}

export function isDriftError(value: unknown): value is DriftError {
  return value instanceof DriftError;
}
