/**
 * Deterministic subject bucketing
 *
 * bucket = SHA-256(UTF-8(String(subjectId))) mod bucketCount, with the digest
 * read as an unsigned big-endian integer. Any platform that hashes the same
 * bytes with SHA-256 gets the same bucket.
 */

import { createHash } from 'node:crypto';
import { ExperimentError, ErrorCode } from '../core/errors';

export const DEFAULT_BUCKET_COUNT = 100;

/**
 * Check that a bucket count is a positive safe integer
 */
export function validateBucketCount(bucketCount: number): void {
  if (!Number.isSafeInteger(bucketCount) || bucketCount <= 0) {
    throw new ExperimentError(
      ErrorCode.INVALID_CONFIG,
      `Bucket count must be a positive integer, got ${bucketCount}`,
      { bucketCount }
    );
  }
}

/**
 * Canonical string form of a subject identifier: the string itself, or the
 * decimal digits of a safe integer. Other numbers have no single decimal form.
 */
export function canonicalSubjectId(subjectId: string | number): string {
  if (typeof subjectId === 'number' && !Number.isSafeInteger(subjectId)) {
    throw new ExperimentError(
      ErrorCode.INVALID_INPUT,
      `Numeric subject id must be a safe integer, got ${subjectId}`,
      { subjectId }
    );
  }
  return String(subjectId);
}

/**
 * Map a subject to a bucket in [0, bucketCount)
 */
export function bucket(
  subjectId: string | number,
  bucketCount: number = DEFAULT_BUCKET_COUNT
): number {
  validateBucketCount(bucketCount);

  const digest = createHash('sha256')
    .update(canonicalSubjectId(subjectId), 'utf8')
    .digest('hex');
  return Number(BigInt(`0x${digest}`) % BigInt(bucketCount));
}
