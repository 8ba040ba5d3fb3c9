export {
  correct,
  adjustPValues,
  parseCorrectionMethod,
  CORRECTION_METHODS,
} from './MultipleTestingCorrection';
export type { NamedPValue, CorrectionResult } from './MultipleTestingCorrection';
