/**
 * Experiment Data Structures
 *
 * Value objects that flow through a single experiment evaluation:
 * subject records in, per-group counts and test results out.
 */

/**
 * Binary outcome for one subject
 */
export type Outcome = 0 | 1;

/**
 * One collected subject and whether it converted
 */
export interface SubjectRecord {
  readonly subjectId: string | number;
  readonly outcome: Outcome;
}

/**
 * Half-open bucket range [start, end)
 */
export interface BucketRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Success and trial counts for one group
 */
export interface GroupAggregate {
  readonly groupName: string;
  readonly successCount: number;
  readonly trialCount: number;
}

export type AltHypothesis = 'one_tailed' | 'two_tailed';

export type CorrectionMethod = 'bonferroni' | 'holm' | 'fdr_bh';

export type UpliftMethod = 'percent' | 'ratio' | 'difference';

/**
 * Name of the reference arm every treatment is compared against
 */
export const CONTROL_GROUP = 'control';
