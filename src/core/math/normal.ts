// src/core/math/normal.ts
/**
 * Standard normal helpers backed by jstat
 */

import jStat from 'jstat';

/**
 * Standard normal CDF, Φ(z). NaN in, NaN out.
 */
export function normalCdf(z: number): number {
  if (Number.isNaN(z)) return NaN;
  if (z === Infinity) return 1;
  if (z === -Infinity) return 0;
  return jStat.normal.cdf(z, 0, 1);
}

/**
 * Standard normal quantile, Φ⁻¹(p) for p in (0, 1)
 */
export function normalInv(p: number): number {
  if (Number.isNaN(p) || p < 0 || p > 1) return NaN;
  if (p === 0) return -Infinity;
  if (p === 1) return Infinity;
  return jStat.normal.inv(p, 0, 1);
}
