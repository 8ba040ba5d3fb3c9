/**
 * Subject to group assignment
 */

import { ExperimentError, ErrorCode } from '../core/errors';
import { bucket, canonicalSubjectId } from './Bucketer';
import type { GroupBucketMap } from './GroupBucketMap';

/**
 * Assign a subject to the group whose bucket range contains its bucket.
 * Throws UNASSIGNED_BUCKET when the bucket falls in a coverage gap.
 */
export function assign(subjectId: string | number, groupBucketMap: GroupBucketMap): string {
  const subjectBucket = bucket(subjectId, groupBucketMap.bucketCount);
  const groupName = groupBucketMap.findGroup(subjectBucket);

  if (groupName === undefined) {
    const id = canonicalSubjectId(subjectId);
    throw new ExperimentError(
      ErrorCode.UNASSIGNED_BUCKET,
      `Subject '${id}' falls in bucket ${subjectBucket}, which no group covers`,
      { subjectId: id, bucket: subjectBucket }
    );
  }

  return groupName;
}
