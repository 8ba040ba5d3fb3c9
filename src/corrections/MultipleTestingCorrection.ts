/**
 * Multiple-testing correction
 *
 * Running one test per treatment group raises the chance that at least one of
 * them comes out significant by accident. These adjustments rescale the family
 * of p-values so the chosen error rate holds across the whole family:
 *
 * - bonferroni: family-wise error rate, single-step
 * - holm: family-wise error rate, step-down, never larger than Bonferroni
 * - fdr_bh: false discovery rate (Benjamini–Hochberg), never larger than Holm
 *
 * Tied p-values receive the same adjusted value.
 */

import { ExperimentError, ErrorCode } from '../core/errors';
import type { CorrectionMethod } from '../domain/types';

export const CORRECTION_METHODS: readonly CorrectionMethod[] = ['bonferroni', 'holm', 'fdr_bh'];

export interface NamedPValue {
  readonly groupName: string;
  readonly pValue: number;
}

export interface CorrectionResult {
  readonly groupName: string;
  readonly originalPValue: number;
  readonly correctedPValue: number;
}

/**
 * Check a correction method name
 */
export function parseCorrectionMethod(method: string): CorrectionMethod {
  const match = CORRECTION_METHODS.find((candidate) => candidate === method);
  if (!match) {
    throw new ExperimentError(
      ErrorCode.UNSUPPORTED_CORRECTION,
      `Unsupported correction method: ${method}. Choose from ${CORRECTION_METHODS.join(', ')}.`,
      { method }
    );
  }
  return match;
}

/**
 * Adjust bare p-values; output keeps the input order
 */
export function adjustPValues(
  pValues: readonly number[],
  method: CorrectionMethod | string
): number[] {
  const correctionMethod = parseCorrectionMethod(method);
  validatePValues(pValues);

  switch (correctionMethod) {
    case 'bonferroni':
      return bonferroni(pValues);
    case 'holm':
      return holm(pValues);
    case 'fdr_bh':
      return benjaminiHochberg(pValues);
  }
}

/**
 * Adjust the p-values of named groups; output keeps the input order
 *
 * @example
 * ```typescript
 * correct(
 *   [{ groupName: 'test1', pValue: 0.01 }, { groupName: 'test2', pValue: 0.04 }],
 *   'holm'
 * );
 * // [{ groupName: 'test1', originalPValue: 0.01, correctedPValue: 0.02 },
 * //  { groupName: 'test2', originalPValue: 0.04, correctedPValue: 0.04 }]
 * ```
 */
export function correct(
  pValues: readonly NamedPValue[],
  method: CorrectionMethod | string
): CorrectionResult[] {
  const corrected = adjustPValues(
    pValues.map((entry) => entry.pValue),
    method
  );

  return pValues.map((entry, i) =>
    Object.freeze({
      groupName: entry.groupName,
      originalPValue: entry.pValue,
      correctedPValue: corrected[i],
    })
  );
}

/**
 * min(p · m, 1)
 */
function bonferroni(pValues: readonly number[]): number[] {
  const m = pValues.length;
  return pValues.map((p) => Math.min(p * m, 1));
}

/**
 * k-th smallest p times (m - k + 1), running maximum over ascending rank, capped at 1
 */
function holm(pValues: readonly number[]): number[] {
  const m = pValues.length;
  const order = ascendingOrder(pValues);
  const corrected = new Array<number>(m);

  let runningMax = 0;
  order.forEach((originalIndex, rank) => {
    const scaled = pValues[originalIndex] * (m - rank);
    runningMax = Math.max(runningMax, scaled);
    corrected[originalIndex] = Math.min(runningMax, 1);
  });

  return corrected;
}

/**
 * k-th smallest p times m / k, running minimum from the largest rank down, capped at 1
 */
function benjaminiHochberg(pValues: readonly number[]): number[] {
  const m = pValues.length;
  const order = ascendingOrder(pValues);
  const corrected = new Array<number>(m);

  let runningMin = Infinity;
  for (let rank = m; rank >= 1; rank--) {
    const originalIndex = order[rank - 1];
    const scaled = (pValues[originalIndex] * m) / rank;
    runningMin = Math.min(runningMin, scaled);
    corrected[originalIndex] = Math.min(runningMin, 1);
  }

  return corrected;
}

/**
 * Indices sorted by ascending p-value; ties keep input order
 */
function ascendingOrder(pValues: readonly number[]): number[] {
  return pValues
    .map((_, index) => index)
    .sort((a, b) => pValues[a] - pValues[b] || a - b);
}

function validatePValues(pValues: readonly number[]): void {
  pValues.forEach((p, index) => {
    if (typeof p !== 'number' || !(p >= 0 && p <= 1)) {
      throw new ExperimentError(
        ErrorCode.INVALID_PVALUE,
        `p-value at position ${index} must be a number in [0, 1], got ${p}`,
        { index, pValue: p }
      );
    }
  });
}
