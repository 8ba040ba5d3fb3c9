/**
 * Default experiment settings
 */

import type { AltHypothesis, CorrectionMethod, UpliftMethod } from '../domain/types';

export interface FrequentistDefaults {
  readonly alpha: number;
  readonly altHypothesis: AltHypothesis;
  readonly correction: CorrectionMethod;
  readonly stoppingThreshold: number;
}

export interface BayesianDefaults {
  readonly priorSuccesses: number;
  readonly priorTrials: number;
  readonly numSamples: number;
  readonly upliftMethod: UpliftMethod;
}

export const FREQUENTIST_DEFAULTS: FrequentistDefaults = Object.freeze({
  alpha: 0.05,
  altHypothesis: 'two_tailed',
  correction: 'holm',
  stoppingThreshold: 0.05,
});

export const BAYESIAN_DEFAULTS: BayesianDefaults = Object.freeze({
  priorSuccesses: 30,
  priorTrials: 100,
  numSamples: 2000,
  upliftMethod: 'percent',
});

export const DEFAULT_METHOD = 'frequentist';
