export { bucket, canonicalSubjectId, validateBucketCount, DEFAULT_BUCKET_COUNT } from './Bucketer';
export { GroupBucketMap, createGroupBucketMap } from './GroupBucketMap';
export type { GroupBucketInput } from './GroupBucketMap';
export { assign } from './GroupAssigner';
