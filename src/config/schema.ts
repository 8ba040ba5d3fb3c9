/**
 * Experiment configuration schemas
 *
 * Plain objects from a CLI, HTTP body or file are validated here into a typed,
 * fully defaulted ExperimentConfig. The method field selects the engine.
 */

import { z } from 'zod';
import { ExperimentError, ErrorCode } from '../core/errors';
import { parseCorrectionMethod } from '../corrections/MultipleTestingCorrection';
import type { AltHypothesis, CorrectionMethod, UpliftMethod } from '../domain/types';
import { BAYESIAN_DEFAULTS, DEFAULT_METHOD, FREQUENTIST_DEFAULTS } from './defaults';

const probability = z.number().gt(0).lt(1);

export const frequentistConfigSchema = z.object({
  method: z.literal('frequentist'),
  alpha: probability.default(FREQUENTIST_DEFAULTS.alpha),
  altHypothesis: z
    .string()
    .toLowerCase()
    .pipe(z.enum(['one_tailed', 'two_tailed']))
    .default(FREQUENTIST_DEFAULTS.altHypothesis),
  // Checked after parsing so an unknown name surfaces as a correction error
  correction: z.string().default(FREQUENTIST_DEFAULTS.correction),
  sequential: z
    .object({
      stoppingThreshold: probability.default(FREQUENTIST_DEFAULTS.stoppingThreshold),
    })
    .optional(),
});

export const bayesianConfigSchema = z.object({
  method: z.literal('bayesian'),
  priorSuccesses: z.number().int().nonnegative().default(BAYESIAN_DEFAULTS.priorSuccesses),
  priorTrials: z.number().int().nonnegative().default(BAYESIAN_DEFAULTS.priorTrials),
  numSamples: z.number().int().positive().default(BAYESIAN_DEFAULTS.numSamples),
  upliftMethod: z
    .enum(['percent', 'ratio', 'difference'])
    .default(BAYESIAN_DEFAULTS.upliftMethod),
});

export const experimentConfigSchema = z.discriminatedUnion('method', [
  frequentistConfigSchema,
  bayesianConfigSchema,
]);

export interface FrequentistRunConfig {
  readonly method: 'frequentist';
  readonly alpha: number;
  readonly altHypothesis: AltHypothesis;
  readonly correction: CorrectionMethod;
  /** Present when each comparison runs as a sequential early-stopping test */
  readonly sequential?: { readonly stoppingThreshold: number };
}

export interface BayesianRunConfig {
  readonly method: 'bayesian';
  readonly priorSuccesses: number;
  readonly priorTrials: number;
  readonly numSamples: number;
  readonly upliftMethod: UpliftMethod;
}

export type ExperimentConfig = FrequentistRunConfig | BayesianRunConfig;

export type ExperimentConfigInput = z.input<typeof experimentConfigSchema>;

/**
 * Validate and default an experiment configuration.
 * A missing method means frequentist.
 *
 * @throws ExperimentError INVALID_CONFIG with the zod issues in context
 * @throws ExperimentError UNSUPPORTED_CORRECTION for an unknown correction name
 */
export function resolveExperimentConfig(input: unknown): ExperimentConfig {
  const withMethod =
    isPlainObject(input) && input.method === undefined
      ? { ...input, method: DEFAULT_METHOD }
      : input;

  const parsed = experimentConfigSchema.safeParse(withMethod);
  if (!parsed.success) {
    throw new ExperimentError(ErrorCode.INVALID_CONFIG, 'Invalid experiment configuration', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  const config = parsed.data;
  if (config.method === 'bayesian') {
    return Object.freeze({ ...config });
  }

  return Object.freeze({
    ...config,
    correction: parseCorrectionMethod(config.correction),
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
