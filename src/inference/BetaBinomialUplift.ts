/**
 * Beta-Binomial uplift
 * Bayesian comparison of two binary-outcome arms
 */

import jStat from 'jstat';
import { ExperimentError, ErrorCode } from '../core/errors';
import type { GroupAggregate, UpliftMethod } from '../domain/types';
import type { PairwiseTest } from '../domain/types/pairwise';

export const UPLIFT_METHODS: readonly UpliftMethod[] = ['percent', 'ratio', 'difference'];

export interface BayesianConfig {
  /** Successes observed in historical data, used as the prior */
  priorSuccesses: number;
  /** Trials in historical data */
  priorTrials: number;
  /** Posterior draws per arm */
  numSamples: number;
  upliftMethod: UpliftMethod;
}

/**
 * Posterior summary of the uplift of a treatment over control
 */
export interface UpliftSummary {
  readonly groupName: string;
  readonly method: UpliftMethod;
  readonly controlSuccess: number;
  readonly controlTrials: number;
  readonly treatmentSuccess: number;
  readonly treatmentTrials: number;
  readonly posteriorMeanControl: number;
  readonly posteriorMeanTreatment: number;
  /** Mean of the uplift draws */
  readonly mean: number;
  /** Central 95% interval of the uplift draws */
  readonly credibleInterval: readonly [number, number];
  /** 1 for ratio uplift, 0 otherwise */
  readonly cutoff: number;
  /** Share of draws with uplift >= cutoff */
  readonly probabilityAboveCutoff: number;
  readonly samples: readonly number[];
}

/**
 * Anything that turns two arms' counts into an uplift summary
 */
export interface BayesianCollaborator {
  summarize(control: GroupAggregate, treatment: GroupAggregate): Promise<UpliftSummary>;
}

/**
 * Beta posterior distribution wrapper
 */
export class BetaPosterior {
  constructor(
    readonly alpha: number,
    readonly beta: number
  ) {
    if (!(alpha > 0) || !(beta > 0)) {
      throw new ExperimentError(
        ErrorCode.INVALID_INPUT,
        `Invalid Beta parameters: alpha=${alpha}, beta=${beta}. Both must be positive.`,
        { alpha, beta }
      );
    }
  }

  mean(): number {
    return this.alpha / (this.alpha + this.beta);
  }

  variance(): number {
    const n = this.alpha + this.beta;
    return (this.alpha * this.beta) / (n * n * (n + 1));
  }

  sample(n: number): number[] {
    const draws = new Array<number>(n);
    for (let i = 0; i < n; i++) {
      draws[i] = jStat.beta.sample(this.alpha, this.beta);
    }
    return draws;
  }

  credibleInterval(level: number = 0.95): [number, number] {
    const tail = (1 - level) / 2;
    return [
      jStat.beta.inv(tail, this.alpha, this.beta),
      jStat.beta.inv(1 - tail, this.alpha, this.beta),
    ];
  }
}

/**
 * Beta-Binomial conjugate uplift engine
 *
 * Prior per arm: Beta(priorSuccesses + 1, priorTrials - priorSuccesses + 1).
 * Model: successes ~ Binomial(trials, p), so the posterior is
 * Beta(priorSuccesses + 1 + successes, priorFailures + 1 + failures).
 * Uplift draws pair the i-th control draw with the i-th treatment draw.
 */
export class BetaBinomialUplift implements BayesianCollaborator, PairwiseTest<UpliftSummary> {
  readonly kind = 'bayesian';

  constructor(private readonly config: BayesianConfig) {
    validateBayesianConfig(config);
  }

  posterior(aggregateForGroup: GroupAggregate): BetaPosterior {
    const { successCount, trialCount } = aggregateForGroup;
    if (
      !Number.isInteger(successCount) ||
      !Number.isInteger(trialCount) ||
      successCount < 0 ||
      successCount > trialCount
    ) {
      throw new ExperimentError(
        ErrorCode.INVALID_INPUT,
        `Group '${aggregateForGroup.groupName}' has invalid counts ${successCount}/${trialCount}`,
        { groupName: aggregateForGroup.groupName, successCount, trialCount }
      );
    }

    const { priorSuccesses, priorTrials } = this.config;
    const priorFailures = priorTrials - priorSuccesses;
    return new BetaPosterior(
      priorSuccesses + 1 + successCount,
      priorFailures + 1 + (trialCount - successCount)
    );
  }

  async summarize(control: GroupAggregate, treatment: GroupAggregate): Promise<UpliftSummary> {
    const { numSamples, upliftMethod } = this.config;
    const controlPosterior = this.posterior(control);
    const treatmentPosterior = this.posterior(treatment);

    const controlDraws = controlPosterior.sample(numSamples);
    const treatmentDraws = treatmentPosterior.sample(numSamples);
    const samples = controlDraws.map((a, i) => uplift(a, treatmentDraws[i], upliftMethod));

    const cutoff = upliftMethod === 'ratio' ? 1 : 0;
    const aboveCutoff = samples.filter((value) => value >= cutoff).length;

    return Object.freeze({
      groupName: treatment.groupName,
      method: upliftMethod,
      controlSuccess: control.successCount,
      controlTrials: control.trialCount,
      treatmentSuccess: treatment.successCount,
      treatmentTrials: treatment.trialCount,
      posteriorMeanControl: controlPosterior.mean(),
      posteriorMeanTreatment: treatmentPosterior.mean(),
      mean: jStat.mean(samples),
      credibleInterval: Object.freeze([
        jStat.percentile(samples, 0.025),
        jStat.percentile(samples, 0.975),
      ] as const),
      cutoff,
      probabilityAboveCutoff: aboveCutoff / samples.length,
      samples: Object.freeze(samples),
    });
  }

  compare(control: GroupAggregate, treatment: GroupAggregate): Promise<UpliftSummary> {
    return this.summarize(control, treatment);
  }
}

function uplift(control: number, treatment: number, method: UpliftMethod): number {
  switch (method) {
    case 'percent':
      return (treatment - control) / control;
    case 'ratio':
      return treatment / control;
    case 'difference':
      return treatment - control;
  }
}

function validateBayesianConfig(config: BayesianConfig): void {
  const { priorSuccesses, priorTrials, numSamples, upliftMethod } = config;

  if (
    !Number.isInteger(priorSuccesses) ||
    !Number.isInteger(priorTrials) ||
    priorSuccesses < 0 ||
    priorSuccesses > priorTrials
  ) {
    throw new ExperimentError(
      ErrorCode.INVALID_CONFIG,
      `Prior must satisfy 0 <= priorSuccesses <= priorTrials, got ${priorSuccesses}/${priorTrials}`,
      { priorSuccesses, priorTrials }
    );
  }
  if (!Number.isInteger(numSamples) || numSamples <= 0) {
    throw new ExperimentError(
      ErrorCode.INVALID_CONFIG,
      `numSamples must be a positive integer, got ${numSamples}`,
      { numSamples }
    );
  }
  if (!UPLIFT_METHODS.includes(upliftMethod)) {
    throw new ExperimentError(
      ErrorCode.INVALID_CONFIG,
      `Invalid uplift method: ${upliftMethod}. Use ${UPLIFT_METHODS.join(', ')}.`,
      { upliftMethod }
    );
  }
}
