/**
 * Two-proportion z-test arithmetic
 */

import { ExperimentError, ErrorCode } from '../core/errors';
import { normalCdf } from '../core/math/normal';
import type { AltHypothesis } from '../domain/types';

export const ALT_HYPOTHESES: readonly AltHypothesis[] = ['one_tailed', 'two_tailed'];

export interface ZTestStatistics {
  propNull: number;
  propAlt: number;
  pooledProp: number;
  standardError: number;
  /** NaN when standardError is 0 */
  statistic: number;
}

/**
 * Normalise and check a hypothesis name
 */
export function parseAltHypothesis(value: string): AltHypothesis {
  const normalized = value.toLowerCase();
  const match = ALT_HYPOTHESES.find((hypothesis) => hypothesis === normalized);
  if (!match) {
    throw new ExperimentError(
      ErrorCode.INVALID_CONFIG,
      `Invalid hypothesis type: ${value}. Choose from ${ALT_HYPOTHESES.join(', ')}.`,
      { altHypothesis: value }
    );
  }
  return match;
}

/**
 * Check that alpha (or any significance threshold) lies in (0, 1)
 */
export function validateAlpha(alpha: number, name: string = 'alpha'): void {
  if (typeof alpha !== 'number' || !(alpha > 0 && alpha < 1)) {
    throw new ExperimentError(
      ErrorCode.INVALID_CONFIG,
      `${name} should be between 0 and 1, but got ${alpha}.`,
      { [name]: alpha }
    );
  }
}

/**
 * Check raw counts for one arm: non-negative integers, success <= trials, trials > 0
 */
export function validateCounts(success: number, trials: number, arm: 'null' | 'alt'): void {
  if (!Number.isInteger(success) || !Number.isInteger(trials) || success < 0 || trials < 0) {
    throw new ExperimentError(
      ErrorCode.INVALID_INPUT,
      `Counts for the ${arm} arm must be non-negative integers, got ${success}/${trials}`,
      { arm, success, trials }
    );
  }
  if (success > trials) {
    throw new ExperimentError(
      ErrorCode.INVALID_INPUT,
      `The ${arm} arm has more successes (${success}) than trials (${trials})`,
      { arm, success, trials }
    );
  }
  if (trials === 0) {
    throw new ExperimentError(
      ErrorCode.DIVISION_BY_ZERO,
      `The ${arm} arm has zero trials; its proportion is undefined`,
      { arm, success, trials }
    );
  }
}

/**
 * Pooled two-proportion z statistic. Counts may be fractional (sequential replay).
 */
export function twoProportionZ(
  successNull: number,
  trialsNull: number,
  successAlt: number,
  trialsAlt: number
): ZTestStatistics {
  const propNull = successNull / trialsNull;
  const propAlt = successAlt / trialsAlt;

  const pooledProp = (successNull + successAlt) / (trialsNull + trialsAlt);
  const standardError = Math.sqrt(
    pooledProp * (1 - pooledProp) * (1 / trialsNull + 1 / trialsAlt)
  );

  const statistic = standardError === 0 ? NaN : (propAlt - propNull) / standardError;

  return { propNull, propAlt, pooledProp, standardError, statistic };
}

/**
 * p-value of a z statistic.
 * two_tailed: 2(1 - Φ(|z|)); one_tailed: 1 - Φ(|z|) for z > 0, else Φ(z).
 */
export function calculatePValue(statistic: number, altHypothesis: AltHypothesis): number {
  if (Number.isNaN(statistic)) return NaN;

  if (altHypothesis === 'one_tailed') {
    return statistic > 0 ? 1 - normalCdf(Math.abs(statistic)) : normalCdf(statistic);
  }
  return 2 * (1 - normalCdf(Math.abs(statistic)));
}
