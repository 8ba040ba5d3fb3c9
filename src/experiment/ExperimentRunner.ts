/**
 * Experiment runner
 *
 * records → aggregate → one comparison per treatment group → correction
 *
 * Aggregation finishes before any comparison starts, comparisons against
 * control run concurrently, and correction waits for every p-value.
 */

import { aggregate, type GroupAggregates } from '../aggregation/Aggregator';
import type { GroupBucketMap } from '../bucketing/GroupBucketMap';
import {
  resolveExperimentConfig,
  type BayesianRunConfig,
  type ExperimentConfig,
  type FrequentistRunConfig,
} from '../config/schema';
import { ExperimentError, ErrorCode } from '../core/errors';
import { createLogger, type Logger } from '../core/logging/logger';
import { correct, type CorrectionResult } from '../corrections/MultipleTestingCorrection';
import { CONTROL_GROUP, type GroupAggregate, type SubjectRecord } from '../domain/types';
import {
  ExperimentResult,
  type BayesianComparison,
  type FrequentistComparison,
  type GroupComparison,
} from '../domain/results';
import { FrequentistEngine } from '../frequentist/FrequentistEngine';
import type { FrequentistResult } from '../frequentist/types';
import { BetaBinomialUplift, type BayesianCollaborator } from '../inference/BetaBinomialUplift';

export interface RunOptions {
  /** Logger to report progress on; defaults to the 'experiment' component logger */
  logger?: Logger;
  /** Replaces the default Beta-Binomial engine for Bayesian runs */
  bayesianCollaborator?: BayesianCollaborator;
}

/**
 * Evaluate an experiment over collected subject records
 *
 * @param config - validated ExperimentConfig, or a plain object to validate
 *
 * @example
 * ```typescript
 * const groups = createGroupBucketMap({
 *   control: { start: 0, end: 50 },
 *   test1: { start: 50, end: 100 },
 * });
 * const result = await runExperiment(records, groups, { method: 'frequentist', alpha: 0.05 });
 * result.significantGroups();
 * ```
 */
export async function runExperiment(
  records: Iterable<SubjectRecord>,
  groupBucketMap: GroupBucketMap,
  config: ExperimentConfig | Record<string, unknown>,
  options: RunOptions = {}
): Promise<ExperimentResult> {
  const resolved = resolveExperimentConfig(config);
  const logger = options.logger ?? createLogger('experiment');
  const startedAt = Date.now();

  logger.info(
    { method: resolved.method, groups: groupBucketMap.getGroupNames() },
    'experiment run started'
  );

  const aggregates = aggregate(records, groupBucketMap);
  const control = requireControl(aggregates);
  const treatments = groupBucketMap
    .getTreatmentNames()
    .map((groupName) => requireAggregate(aggregates, groupName));

  const sampleSize = Array.from(aggregates.values()).reduce(
    (sum, group) => sum + group.trialCount,
    0
  );

  let result: ExperimentResult;
  if (resolved.method === 'frequentist') {
    const { comparisons, warnings } = await runFrequentist(resolved, control, treatments, logger);
    result = new ExperimentResult(
      aggregates,
      comparisons,
      {
        timestamp: new Date(),
        method: 'frequentist',
        computeTime: Date.now() - startedAt,
        sampleSize,
        warnings,
      },
      { method: resolved.correction, alpha: resolved.alpha }
    );
  } else {
    const comparisons = await runBayesian(
      resolved,
      control,
      treatments,
      logger,
      options.bayesianCollaborator
    );
    result = new ExperimentResult(aggregates, comparisons, {
      timestamp: new Date(),
      method: 'bayesian',
      computeTime: Date.now() - startedAt,
      sampleSize,
      warnings: [],
    });
  }

  logger.info(
    { method: resolved.method, sampleSize, computeTime: result.getMetadata().computeTime },
    'experiment run finished'
  );
  return result;
}

async function runFrequentist(
  config: FrequentistRunConfig,
  control: GroupAggregate,
  treatments: GroupAggregate[],
  logger: Logger
): Promise<{ comparisons: Map<string, GroupComparison>; warnings: string[] }> {
  const engine = new FrequentistEngine({
    alpha: config.alpha,
    altHypothesis: config.altHypothesis,
  });
  const { sequential } = config;

  const results: FrequentistResult[] = await Promise.all(
    treatments.map(async (treatment) => {
      logger.debug({ group: treatment.groupName }, 'comparing against control');
      if (sequential) {
        return engine.conductSequential(
          control.successCount,
          control.trialCount,
          treatment.successCount,
          treatment.trialCount,
          sequential.stoppingThreshold,
          treatment.groupName
        );
      }
      return engine.compare(control, treatment);
    })
  );

  const warnings: string[] = [];
  const family = results.filter((result) => {
    if (result.degenerate) {
      warnings.push(
        `Group '${result.groupName}' has a zero pooled standard error; its test is undefined`
      );
      return false;
    }
    return true;
  });

  const corrected = new Map<string, CorrectionResult>(
    correct(
      family.map((result) => ({ groupName: result.groupName, pValue: result.pvalue })),
      config.correction
    ).map((correction): [string, CorrectionResult] => [correction.groupName, correction])
  );

  const comparisons = new Map<string, GroupComparison>();
  for (const result of results) {
    const comparison: FrequentistComparison = {
      kind: 'frequentist',
      result,
      correction: corrected.get(result.groupName) ?? {
        groupName: result.groupName,
        originalPValue: result.pvalue,
        correctedPValue: NaN,
      },
    };
    comparisons.set(result.groupName, comparison);
  }

  for (const warning of warnings) {
    logger.warn(warning);
  }

  return { comparisons, warnings };
}

async function runBayesian(
  config: BayesianRunConfig,
  control: GroupAggregate,
  treatments: GroupAggregate[],
  logger: Logger,
  collaborator: BayesianCollaborator = new BetaBinomialUplift(config)
): Promise<Map<string, GroupComparison>> {
  const summaries = await Promise.all(
    treatments.map((treatment) => {
      logger.debug({ group: treatment.groupName }, 'summarizing uplift against control');
      return collaborator.summarize(control, treatment);
    })
  );

  const comparisons = new Map<string, GroupComparison>();
  for (const summary of summaries) {
    const comparison: BayesianComparison = { kind: 'bayesian', result: summary };
    comparisons.set(summary.groupName, comparison);
  }
  return comparisons;
}

function requireControl(aggregates: GroupAggregates): GroupAggregate {
  return requireAggregate(aggregates, CONTROL_GROUP);
}

function requireAggregate(aggregates: GroupAggregates, groupName: string): GroupAggregate {
  const found = aggregates.get(groupName);
  if (!found) {
    throw new ExperimentError(ErrorCode.INTERNAL_ERROR, `No aggregate for group '${groupName}'`, {
      groupName,
    });
  }
  return found;
}
