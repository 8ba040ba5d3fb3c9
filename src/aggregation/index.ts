export { aggregate, mergeAggregates } from './Aggregator';
export type { GroupAggregates } from './Aggregator';
