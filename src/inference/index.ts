export { BetaBinomialUplift, BetaPosterior, UPLIFT_METHODS } from './BetaBinomialUplift';
export type { BayesianCollaborator, BayesianConfig, UpliftSummary } from './BetaBinomialUplift';
