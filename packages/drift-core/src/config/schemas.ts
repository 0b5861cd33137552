import { z } from 'zod';
import { InvalidConfigurationError } from '../errors.js';
import { DEFAULT_JS_BINS, DEFAULT_JS_THRESHOLD } from '../summary/distances.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export const DEFAULT_ALPHA = 0.05;

export const alphaSchema = z
  .number({ invalid_type_error: 'Alpha must be a number' })
  .gt(0, 'Alpha must be greater than 0')
  .lte(1, 'Alpha must be at most 1');

export const featurePartitionSchema = z
  .object({
    numeric: z.array(z.string().min(1, 'Feature name is required')),
    categorical: z.array(z.string().min(1, 'Feature name is required')),
  })
  .superRefine((partition, ctx) => {
    const seen = new Set<string>();
    for (const name of [...partition.numeric, ...partition.categorical]) {
      if (seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Feature "${name}" is listed more than once`,
        });
      }
      seen.add(name);
    }
  });

export const categoricalTestSchema = z.enum(['contingency', 'goodness-of-fit']);

export const monitorOptionsSchema = z.object({
  alpha: alphaSchema.optional(),
  categoricalTest: categoricalTestSchema.optional(),
});

export const distanceOptionsSchema = z.object({
  bins: z.number().int().positive().optional(),
  threshold: z.number().min(0).max(1).optional(),
});

export const envSchema = z.object({
  DRIFT_ALPHA: z.coerce.number().pipe(alphaSchema).default(DEFAULT_ALPHA),
  DRIFT_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  DRIFT_JS_BINS: z.coerce.number().int().positive().default(DEFAULT_JS_BINS),
  DRIFT_JS_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_JS_THRESHOLD),
});

export type CategoricalTest = z.infer<typeof categoricalTestSchema>;
export type FeaturePartitionInput = z.infer<typeof featurePartitionSchema>;
export type DistanceOptions = z.infer<typeof distanceOptionsSchema>;
export type EnvInput = z.infer<typeof envSchema>;

/** Parse with a schema; throw InvalidConfigurationError listing every issue. */
export function parseConfig<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  context: string,
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new InvalidConfigurationError(`Invalid ${context}`, issues);
  }
  return result.data;
}
