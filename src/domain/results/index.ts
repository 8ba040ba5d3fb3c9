/**
 * Result objects for experiment evaluation
 */

export { AnalysisResult, formatCsvCell } from './AnalysisResult';
export type { ResultMetadata } from './ResultMetadata';
export { ExperimentResult } from './ExperimentResult';
export type {
  GroupComparison,
  FrequentistComparison,
  BayesianComparison,
  CorrectionSummary,
} from './ExperimentResult';
