/**
 * Frequentist A/B testing: two-sample proportion z-test
 *
 * Each call returns a new frozen result; the engine keeps only its
 * configuration, so one instance can serve concurrent comparisons.
 *
 * @example
 * ```typescript
 * const engine = new FrequentistEngine({ alpha: 0.05, altHypothesis: 'two_tailed' });
 * const result = engine.conduct(300, 1000, 350, 1000);
 * result.statistic; // 2.387
 * result.pvalue;    // 0.0170
 * ```
 */

import { ExperimentError, ErrorCode } from '../core/errors';
import { createLogger } from '../core/logging/logger';
import type { AltHypothesis, GroupAggregate } from '../domain/types';
import type { PairwiseTest } from '../domain/types/pairwise';
import {
  calculatePValue,
  parseAltHypothesis,
  twoProportionZ,
  validateAlpha,
  validateCounts,
} from './calculations';
import { powerCurve } from './PowerCurve';
import type {
  EffectSizeGrid,
  FrequentistConfig,
  FrequentistResult,
  SequentialResult,
  StreamObservation,
} from './types';

const logger = createLogger('frequentist');

const DEFAULT_GROUP_NAME = 'treatment';

interface RunningCounts {
  successNull: number;
  trialsNull: number;
  successAlt: number;
  trialsAlt: number;
}

export class FrequentistEngine implements PairwiseTest<FrequentistResult> {
  readonly kind = 'frequentist';
  readonly alpha: number;
  readonly altHypothesis: AltHypothesis;

  constructor(
    config: FrequentistConfig,
    private readonly effectGrid?: Readonly<EffectSizeGrid>
  ) {
    validateAlpha(config.alpha);
    this.alpha = config.alpha;
    this.altHypothesis = parseAltHypothesis(config.altHypothesis);
  }

  /**
   * Batch test on final counts
   *
   * @throws ExperimentError DIVISION_BY_ZERO when either arm has zero trials
   */
  conduct(
    successNull: number,
    trialsNull: number,
    successAlt: number,
    trialsAlt: number,
    groupName: string = DEFAULT_GROUP_NAME
  ): FrequentistResult {
    validateCounts(successNull, trialsNull, 'null');
    validateCounts(successAlt, trialsAlt, 'alt');

    const counts = { successNull, trialsNull, successAlt, trialsAlt };
    return this.buildResult(groupName, counts, counts);
  }

  /**
   * Sequential test with early stopping, replaying the observed totals as a
   * stream of trialsNull + trialsAlt arrivals.
   *
   * At step i the null arm has received round(i·tN/(tN+tA)) arrivals and the
   * alt arm the rest; each arm's successes accrue at its observed rate. The
   * test stops at the first step whose p-value is below stoppingThreshold and
   * reports the statistics at that step. Steps where either arm is still empty
   * are skipped. If the threshold is never crossed the full totals are reported.
   *
   * Caveat: looking at the p-value after every arrival without correcting for
   * the repeated looks inflates the false-positive rate well above alpha
   * (optional-stopping bias). Treat an early stop as a signal to investigate,
   * not as a significant result at level alpha.
   */
  conductSequential(
    successNull: number,
    trialsNull: number,
    successAlt: number,
    trialsAlt: number,
    stoppingThreshold: number = 0.05,
    groupName: string = DEFAULT_GROUP_NAME
  ): SequentialResult {
    validateCounts(successNull, trialsNull, 'null');
    validateCounts(successAlt, trialsAlt, 'alt');
    validateAlpha(stoppingThreshold, 'stoppingThreshold');

    const finalCounts = { successNull, trialsNull, successAlt, trialsAlt };
    const totalSteps = trialsNull + trialsAlt;

    for (let step = 1; step <= totalSteps; step++) {
      const nullArrivals = Math.round((step * trialsNull) / totalSteps);
      const altArrivals = step - nullArrivals;
      if (nullArrivals === 0 || altArrivals === 0) continue;

      const running: RunningCounts = {
        successNull: (successNull * nullArrivals) / trialsNull,
        trialsNull: nullArrivals,
        successAlt: (successAlt * altArrivals) / trialsAlt,
        trialsAlt: altArrivals,
      };

      const { statistic } = twoProportionZ(
        running.successNull,
        running.trialsNull,
        running.successAlt,
        running.trialsAlt
      );
      const pvalue = calculatePValue(statistic, this.altHypothesis);

      if (pvalue < stoppingThreshold && step < totalSteps) {
        logger.warn({ groupName, step, totalSteps, pvalue }, 'sequential test stopped early');
        return this.sequentialResult(groupName, running, finalCounts, {
          stoppedEarly: true,
          stoppingStep: step,
          totalSteps,
          stoppingThreshold,
        });
      }
    }

    return this.sequentialResult(groupName, finalCounts, finalCounts, {
      stoppedEarly: false,
      stoppingStep: totalSteps,
      totalSteps,
      stoppingThreshold,
    });
  }

  /**
   * Sequential test over real arrivals. Reads the stream one observation at a
   * time and stops reading at the first step whose p-value is below
   * stoppingThreshold. The optional-stopping caveat of conductSequential applies.
   *
   * @throws ExperimentError DIVISION_BY_ZERO when the stream ends with an empty arm
   */
  conductStreaming(
    observations: Iterable<StreamObservation>,
    stoppingThreshold: number = 0.05,
    groupName: string = DEFAULT_GROUP_NAME
  ): SequentialResult {
    validateAlpha(stoppingThreshold, 'stoppingThreshold');

    const running: RunningCounts = { successNull: 0, trialsNull: 0, successAlt: 0, trialsAlt: 0 };
    let step = 0;

    for (const observation of observations) {
      step++;
      addObservation(running, observation, step);
      if (running.trialsNull === 0 || running.trialsAlt === 0) continue;

      const { statistic } = twoProportionZ(
        running.successNull,
        running.trialsNull,
        running.successAlt,
        running.trialsAlt
      );
      const pvalue = calculatePValue(statistic, this.altHypothesis);

      if (pvalue < stoppingThreshold) {
        logger.warn({ groupName, step, pvalue }, 'streaming test stopped early');
        const snapshot = { ...running };
        return this.sequentialResult(groupName, snapshot, snapshot, {
          stoppedEarly: true,
          stoppingStep: step,
          totalSteps: null,
          stoppingThreshold,
        });
      }
    }

    validateCounts(running.successNull, running.trialsNull, 'null');
    validateCounts(running.successAlt, running.trialsAlt, 'alt');

    return this.sequentialResult(groupName, running, running, {
      stoppedEarly: false,
      stoppingStep: step,
      totalSteps: step,
      stoppingThreshold,
    });
  }

  /**
   * Compare a treatment aggregate against the control aggregate
   */
  async compare(control: GroupAggregate, treatment: GroupAggregate): Promise<FrequentistResult> {
    return this.conduct(
      control.successCount,
      control.trialCount,
      treatment.successCount,
      treatment.trialCount,
      treatment.groupName
    );
  }

  private buildResult(
    groupName: string,
    counts: RunningCounts,
    powerBasis: RunningCounts
  ): FrequentistResult {
    const { successNull, trialsNull, successAlt, trialsAlt } = counts;
    const { propNull, propAlt, statistic } = twoProportionZ(
      successNull,
      trialsNull,
      successAlt,
      trialsAlt
    );
    const pvalue = calculatePValue(statistic, this.altHypothesis);
    const degenerate = Number.isNaN(statistic);

    if (degenerate) {
      logger.warn(
        { groupName, successNull, trialsNull, successAlt, trialsAlt },
        'pooled standard error is zero; z statistic is undefined'
      );
    }

    const curve = powerCurve(
      powerBasis.successNull / powerBasis.trialsNull,
      powerBasis.trialsNull,
      powerBasis.trialsAlt,
      this.alpha,
      this.altHypothesis,
      this.effectGrid
    );

    return Object.freeze({
      groupName,
      successNull,
      trialsNull,
      successAlt,
      trialsAlt,
      propNull,
      propAlt,
      statistic,
      pvalue,
      significant: pvalue < this.alpha,
      degenerate,
      alpha: this.alpha,
      altHypothesis: this.altHypothesis,
      observedEffectSize: propAlt - propNull,
      powerCurve: Object.freeze(curve.toArray()),
    });
  }

  private sequentialResult(
    groupName: string,
    counts: RunningCounts,
    powerBasis: RunningCounts,
    sequential: Pick<
      SequentialResult,
      'stoppedEarly' | 'stoppingStep' | 'totalSteps' | 'stoppingThreshold'
    >
  ): SequentialResult {
    return Object.freeze({
      ...this.buildResult(groupName, counts, powerBasis),
      ...sequential,
    });
  }
}

function addObservation(
  running: RunningCounts,
  observation: StreamObservation,
  step: number
): void {
  const { arm, outcome } = observation;
  if ((arm !== 'null' && arm !== 'alt') || (outcome !== 0 && outcome !== 1)) {
    throw new ExperimentError(
      ErrorCode.INVALID_INPUT,
      `Observation ${step} must have arm 'null' or 'alt' and outcome 0 or 1`,
      { step, arm, outcome }
    );
  }

  if (arm === 'null') {
    running.trialsNull += 1;
    running.successNull += outcome;
  } else {
    running.trialsAlt += 1;
    running.successAlt += outcome;
  }
}
