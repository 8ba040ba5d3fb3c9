export { runExperiment } from './ExperimentRunner';
export type { RunOptions } from './ExperimentRunner';
