import { InvalidConfigurationError } from '../errors.js';

/**
 * Bonferroni-corrected per-test threshold for a family of simultaneous tests.
 * Compute once per family and share it across every test in that family.
 *
 * @throws InvalidConfigurationError unless familyAlpha ∈ (0, 1] and testCount is a positive integer
 */
export function correctedAlpha(familyAlpha: number, testCount: number): number {
  const issues: string[] = [];
  if (!(familyAlpha > 0 && familyAlpha <= 1)) {
    issues.push(`family alpha must be in (0, 1], got ${familyAlpha}`);
  }
  if (!Number.isInteger(testCount) || testCount <= 0) {
    issues.push(`test count must be a positive integer, got ${testCount}`);
  }
  if (issues.length > 0) {
    throw new InvalidConfigurationError('Cannot correct significance level', issues);
  }
  return familyAlpha / testCount;
}
