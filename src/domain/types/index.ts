export type {
  Outcome,
  SubjectRecord,
  BucketRange,
  GroupAggregate,
  AltHypothesis,
  CorrectionMethod,
  UpliftMethod,
} from './experiment';
export { CONTROL_GROUP } from './experiment';
export type { EngineKind, PairwiseTest } from './pairwise';
