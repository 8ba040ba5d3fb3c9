/**
 * Shared capability of every engine that compares a treatment arm to control
 */

import type { GroupAggregate } from './experiment';

export type EngineKind = 'frequentist' | 'bayesian';

export interface PairwiseTest<TResult> {
  /** Which engine family produced the result */
  readonly kind: EngineKind;

  /**
   * Compare one treatment group with the control group.
   * Holds no state between calls; comparisons may run concurrently.
   */
  compare(control: GroupAggregate, treatment: GroupAggregate): Promise<TResult>;
}
