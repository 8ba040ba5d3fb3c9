/**
 * Result of evaluating one experiment: aggregates, one comparison per
 * treatment group and, for frequentist runs, the corrected p-values
 */

import type { CorrectionResult } from '../../corrections/MultipleTestingCorrection';
import type { FrequentistResult } from '../../frequentist/types';
import type { UpliftSummary } from '../../inference/BetaBinomialUplift';
import { CONTROL_GROUP, type CorrectionMethod, type GroupAggregate } from '../types';
import { AnalysisResult, formatCsvCell } from './AnalysisResult';
import type { ResultMetadata } from './ResultMetadata';

const COUNT_COLUMNS = [
  'group',
  'control_success',
  'control_trials',
  'treatment_success',
  'treatment_trials',
] as const;

const FREQUENTIST_CSV_HEADER = [
  ...COUNT_COLUMNS,
  'statistic',
  'pvalue',
  'corrected_pvalue',
  'significant',
] as const;

const BAYESIAN_CSV_HEADER = [
  ...COUNT_COLUMNS,
  'uplift_method',
  'uplift_mean',
  'ci_lower',
  'ci_upper',
  'probability_above_cutoff',
] as const;

export interface FrequentistComparison {
  readonly kind: 'frequentist';
  readonly result: FrequentistResult;
  /** Corrected p-value; NaN for degenerate tests, which sit outside the family */
  readonly correction: CorrectionResult;
}

export interface BayesianComparison {
  readonly kind: 'bayesian';
  readonly result: UpliftSummary;
}

export type GroupComparison = FrequentistComparison | BayesianComparison;

export interface CorrectionSummary {
  readonly method: CorrectionMethod;
  readonly alpha: number;
}

export class ExperimentResult extends AnalysisResult {
  constructor(
    private readonly aggregates: ReadonlyMap<string, GroupAggregate>,
    private readonly comparisons: ReadonlyMap<string, GroupComparison>,
    metadata: ResultMetadata,
    private readonly correctionSummary?: CorrectionSummary
  ) {
    super(metadata);
  }

  getAggregates(): ReadonlyMap<string, GroupAggregate> {
    return this.aggregates;
  }

  getControlAggregate(): GroupAggregate | undefined {
    return this.aggregates.get(CONTROL_GROUP);
  }

  /**
   * Comparison for one treatment group
   */
  getGroupResult(groupName: string): GroupComparison | undefined {
    return this.comparisons.get(groupName);
  }

  /**
   * Treatment group names in group-map order
   */
  getTreatmentNames(): string[] {
    return Array.from(this.comparisons.keys());
  }

  getCorrectionSummary(): CorrectionSummary | undefined {
    return this.correctionSummary;
  }

  /**
   * Corrected p-values in treatment order; empty for Bayesian runs
   */
  getCorrections(): CorrectionResult[] {
    const corrections: CorrectionResult[] = [];
    for (const comparison of this.comparisons.values()) {
      if (comparison.kind === 'frequentist') {
        corrections.push(comparison.correction);
      }
    }
    return corrections;
  }

  /**
   * Treatment groups whose corrected p-value is below alpha
   */
  significantGroups(): string[] {
    if (!this.correctionSummary) return [];
    const { alpha } = this.correctionSummary;
    return this.getCorrections()
      .filter((correction) => correction.correctedPValue < alpha)
      .map((correction) => correction.groupName);
  }

  toJSON(): object {
    const groups: Record<string, object> = {};
    for (const [groupName, comparison] of this.comparisons) {
      groups[groupName] =
        comparison.kind === 'frequentist'
          ? {
              kind: comparison.kind,
              ...comparison.result,
              correctedPValue: comparison.correction.correctedPValue,
            }
          : {
              kind: comparison.kind,
              ...comparison.result,
              samples: comparison.result.samples.length,
            };
    }

    return {
      metadata: this.metadata,
      correction: this.correctionSummary ?? null,
      aggregates: Object.fromEntries(this.aggregates),
      groups,
    };
  }

  /**
   * One row per treatment group
   */
  protected exportCSV(): string {
    if (this.metadata.method === 'frequentist') {
      const rows = [FREQUENTIST_CSV_HEADER.join(',')];
      for (const [groupName, comparison] of this.comparisons) {
        if (comparison.kind !== 'frequentist') continue;
        const { result, correction } = comparison;
        rows.push(
          [
            groupName,
            result.successNull,
            result.trialsNull,
            result.successAlt,
            result.trialsAlt,
            result.statistic,
            result.pvalue,
            correction.correctedPValue,
            result.significant,
          ]
            .map(formatCsvCell)
            .join(',')
        );
      }
      return rows.join('\n');
    }

    const rows = [BAYESIAN_CSV_HEADER.join(',')];
    for (const [groupName, comparison] of this.comparisons) {
      if (comparison.kind !== 'bayesian') continue;
      const { result } = comparison;
      rows.push(
        [
          groupName,
          result.controlSuccess,
          result.controlTrials,
          result.treatmentSuccess,
          result.treatmentTrials,
          result.method,
          result.mean,
          result.credibleInterval[0],
          result.credibleInterval[1],
          result.probabilityAboveCutoff,
        ]
          .map(formatCsvCell)
          .join(',')
      );
    }
    return rows.join('\n');
  }
}
