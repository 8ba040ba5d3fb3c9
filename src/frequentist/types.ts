/**
 * Types for the two-proportion z-test
 */

import type { AltHypothesis, Outcome } from '../domain/types';

export interface FrequentistConfig {
  /** Significance level in (0, 1) */
  alpha: number;
  /** Accepted case-insensitively */
  altHypothesis: AltHypothesis | string;
}

/**
 * One point of a power curve
 */
export interface PowerPoint {
  readonly effectSize: number;
  readonly power: number;
}

/**
 * Effect-size grid for a power curve, [start, stop) in steps of `step`
 */
export interface EffectSizeGrid {
  start: number;
  stop: number;
  step: number;
}

/**
 * Outcome of a two-proportion z-test against the control arm
 */
export interface FrequentistResult {
  readonly groupName: string;
  readonly successNull: number;
  readonly trialsNull: number;
  readonly successAlt: number;
  readonly trialsAlt: number;
  readonly propNull: number;
  readonly propAlt: number;
  /** z statistic; NaN when the pooled standard error is 0 */
  readonly statistic: number;
  /** NaN when the statistic is NaN */
  readonly pvalue: number;
  readonly significant: boolean;
  /** True when the pooled proportion is 0 or 1 and no statistic exists */
  readonly degenerate: boolean;
  readonly alpha: number;
  readonly altHypothesis: AltHypothesis;
  /** propAlt - propNull */
  readonly observedEffectSize: number;
  readonly powerCurve: readonly PowerPoint[];
}

/**
 * Result of a sequential test, reported at the step where it stopped
 */
export interface SequentialResult extends FrequentistResult {
  readonly stoppedEarly: boolean;
  /** 1-based arrival index the statistics were computed at */
  readonly stoppingStep: number;
  /** Arrivals in the full sample; null when a stream was left unread after stopping */
  readonly totalSteps: number | null;
  readonly stoppingThreshold: number;
}

/**
 * One arrival in a streaming test
 */
export interface StreamObservation {
  readonly arm: 'null' | 'alt';
  readonly outcome: Outcome;
}

/**
 * Narrow a comparison result to the sequential variant
 */
export function isSequentialResult(result: FrequentistResult): result is SequentialResult {
  return 'stoppedEarly' in result;
}
