export {
  ExperimentError,
  ErrorCode,
  errorCategory,
  isExperimentError,
  wrapError,
} from './ExperimentError';
export type { ErrorCategory } from './ExperimentError';
