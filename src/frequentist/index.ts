export { FrequentistEngine } from './FrequentistEngine';
export {
  PowerCurve,
  powerCurve,
  calculatePower,
  criticalValue,
  DEFAULT_EFFECT_GRID,
} from './PowerCurve';
export {
  twoProportionZ,
  calculatePValue,
  parseAltHypothesis,
  validateAlpha,
  ALT_HYPOTHESES,
} from './calculations';
export type { ZTestStatistics } from './calculations';
export { isSequentialResult } from './types';
export type {
  FrequentistConfig,
  FrequentistResult,
  SequentialResult,
  StreamObservation,
  PowerPoint,
  EffectSizeGrid,
} from './types';
