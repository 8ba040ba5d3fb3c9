// src/frequentist/PowerCurve.ts
/**
 * Power of the two-proportion z-test across a grid of effect sizes.
 *
 * Assumes the control proportion holds under the null and computes, for each
 * absolute effect size, the probability of rejecting at level alpha:
 *
 *   se    = sqrt(p0 (1 - p0) (1/n0 + 1/n1))
 *   zα    = Φ⁻¹(1 - α/2) two-tailed, Φ⁻¹(1 - α) one-tailed
 *   power = 1 - Φ(zα - effect / se)
 */

import { ExperimentError, ErrorCode } from '../core/errors';
import { normalCdf, normalInv } from '../core/math/normal';
import type { AltHypothesis } from '../domain/types';
import { parseAltHypothesis, validateAlpha } from './calculations';
import type { EffectSizeGrid, PowerPoint } from './types';

export const DEFAULT_EFFECT_GRID: Readonly<EffectSizeGrid> = Object.freeze({
  start: 0,
  stop: 0.2,
  step: 0.005,
});

// Grid arithmetic is rounded to this many decimals to keep 0.005 * k exact-looking
const GRID_PRECISION = 1e12;

/**
 * Critical value zα for a significance level and tail
 */
export function criticalValue(alpha: number, altHypothesis: AltHypothesis): number {
  return altHypothesis === 'two_tailed' ? normalInv(1 - alpha / 2) : normalInv(1 - alpha);
}

/**
 * Power at a single effect size
 */
export function calculatePower(
  propNull: number,
  trialsNull: number,
  trialsAlt: number,
  effectSize: number,
  alpha: number,
  altHypothesis: AltHypothesis
): number {
  const standardError = Math.sqrt(propNull * (1 - propNull) * (1 / trialsNull + 1 / trialsAlt));
  const zAlpha = criticalValue(alpha, altHypothesis);
  const zEffect = effectSize / standardError;
  return 1 - normalCdf(zAlpha - zEffect);
}

/**
 * Lazy, finite power curve. Every iteration recomputes from the start,
 * so the same instance can be walked any number of times.
 */
export class PowerCurve implements Iterable<PowerPoint> {
  private readonly altHypothesis: AltHypothesis;

  constructor(
    private readonly propNull: number,
    private readonly trialsNull: number,
    private readonly trialsAlt: number,
    private readonly alpha: number,
    altHypothesis: AltHypothesis | string,
    private readonly grid: Readonly<EffectSizeGrid> = DEFAULT_EFFECT_GRID
  ) {
    validateAlpha(alpha);
    this.altHypothesis = parseAltHypothesis(altHypothesis);
    validatePowerInputs(propNull, trialsNull, trialsAlt);
    validateGrid(grid);
  }

  /**
   * Number of points on the grid
   */
  get length(): number {
    const { start, stop, step } = this.grid;
    return Math.ceil(roundGrid((stop - start) / step));
  }

  *[Symbol.iterator](): Iterator<PowerPoint> {
    const { start, step } = this.grid;
    const count = this.length;
    for (let i = 0; i < count; i++) {
      const effectSize = roundGrid(start + i * step);
      yield Object.freeze({
        effectSize,
        power: calculatePower(
          this.propNull,
          this.trialsNull,
          this.trialsAlt,
          effectSize,
          this.alpha,
          this.altHypothesis
        ),
      });
    }
  }

  toArray(): PowerPoint[] {
    return Array.from(this);
  }

  /**
   * Effect sizes and powers as parallel arrays, the shape a plotting layer takes
   */
  toSeries(): { effectSizes: number[]; powers: number[] } {
    const effectSizes: number[] = [];
    const powers: number[] = [];
    for (const point of this) {
      effectSizes.push(point.effectSize);
      powers.push(point.power);
    }
    return { effectSizes, powers };
  }

  /**
   * Smallest grid effect size whose power reaches the target, or null
   */
  minimumDetectableEffect(targetPower: number = 0.8): number | null {
    for (const point of this) {
      if (point.power >= targetPower) {
        return point.effectSize;
      }
    }
    return null;
  }
}

/**
 * Build a power curve over the default grid (0 to 0.2 in 0.005 steps)
 */
export function powerCurve(
  propNull: number,
  trialsNull: number,
  trialsAlt: number,
  alpha: number,
  altHypothesis: AltHypothesis | string,
  grid: Readonly<EffectSizeGrid> = DEFAULT_EFFECT_GRID
): PowerCurve {
  return new PowerCurve(propNull, trialsNull, trialsAlt, alpha, altHypothesis, grid);
}

function roundGrid(value: number): number {
  return Math.round(value * GRID_PRECISION) / GRID_PRECISION;
}

function validatePowerInputs(propNull: number, trialsNull: number, trialsAlt: number): void {
  if (!(propNull >= 0 && propNull <= 1)) {
    throw new ExperimentError(
      ErrorCode.INVALID_INPUT,
      `Control proportion must lie in [0, 1], got ${propNull}`,
      { propNull }
    );
  }
  if (!(trialsNull > 0) || !(trialsAlt > 0)) {
    throw new ExperimentError(
      ErrorCode.DIVISION_BY_ZERO,
      'Power needs a positive number of trials in both arms',
      { trialsNull, trialsAlt }
    );
  }
}

function validateGrid(grid: Readonly<EffectSizeGrid>): void {
  const { start, stop, step } = grid;
  if (![start, stop, step].every(Number.isFinite) || step <= 0 || stop <= start) {
    throw new ExperimentError(
      ErrorCode.INVALID_CONFIG,
      `Invalid effect-size grid: start=${start}, stop=${stop}, step=${step}`,
      { start, stop, step }
    );
  }
}
