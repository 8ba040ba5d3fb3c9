/**
 * splitstat - deterministic experiment bucketing and significance testing
 *
 * Assigns subjects to groups by hashing, folds outcomes into per-group counts,
 * tests each treatment against control and corrects the family of p-values.
 */

// Error handling
export {
  ExperimentError,
  ErrorCode,
  errorCategory,
  isExperimentError,
  wrapError,
} from './core/errors';
export type { ErrorCategory } from './core/errors';

// Logging
export { createLogger, resetLoggerCache } from './core/logging/logger';
export type { Logger } from './core/logging/logger';

// Math
export { normalCdf, normalInv } from './core/math/normal';

// Domain types
export { CONTROL_GROUP } from './domain/types';
export type {
  Outcome,
  SubjectRecord,
  BucketRange,
  GroupAggregate,
  AltHypothesis,
  CorrectionMethod,
  UpliftMethod,
  EngineKind,
  PairwiseTest,
} from './domain/types';
export { RecordValidator, subjectRecordSchema } from './domain/validation';

// Bucketing and assignment
export {
  bucket,
  canonicalSubjectId,
  DEFAULT_BUCKET_COUNT,
  GroupBucketMap,
  createGroupBucketMap,
  assign,
} from './bucketing';
export type { GroupBucketInput } from './bucketing';

// Aggregation
export { aggregate, mergeAggregates } from './aggregation';
export type { GroupAggregates } from './aggregation';

// Frequentist testing
export {
  FrequentistEngine,
  PowerCurve,
  powerCurve,
  calculatePower,
  criticalValue,
  calculatePValue,
  twoProportionZ,
  DEFAULT_EFFECT_GRID,
  isSequentialResult,
} from './frequentist';
export type {
  FrequentistConfig,
  FrequentistResult,
  SequentialResult,
  StreamObservation,
  PowerPoint,
  EffectSizeGrid,
} from './frequentist';

// Multiple-testing correction
export { correct, adjustPValues, CORRECTION_METHODS } from './corrections';
export type { NamedPValue, CorrectionResult } from './corrections';

// Bayesian collaborator
export { BetaBinomialUplift, BetaPosterior } from './inference';
export type { BayesianCollaborator, BayesianConfig, UpliftSummary } from './inference';

// Configuration
export {
  resolveExperimentConfig,
  FREQUENTIST_DEFAULTS,
  BAYESIAN_DEFAULTS,
} from './config';
export type {
  ExperimentConfig,
  ExperimentConfigInput,
  FrequentistRunConfig,
  BayesianRunConfig,
} from './config';

// Results
export { AnalysisResult, ExperimentResult } from './domain/results';
export type {
  ResultMetadata,
  GroupComparison,
  FrequentistComparison,
  BayesianComparison,
  CorrectionSummary,
} from './domain/results';

// Experiment runs
export { runExperiment } from './experiment';
export type { RunOptions } from './experiment';

export const VERSION = '0.1.0';
