export {
  resolveExperimentConfig,
  experimentConfigSchema,
  frequentistConfigSchema,
  bayesianConfigSchema,
} from './schema';
export type {
  ExperimentConfig,
  ExperimentConfigInput,
  FrequentistRunConfig,
  BayesianRunConfig,
} from './schema';
export { FREQUENTIST_DEFAULTS, BAYESIAN_DEFAULTS, DEFAULT_METHOD } from './defaults';
export type { FrequentistDefaults, BayesianDefaults } from './defaults';
