/**
 * Group Bucket Map
 *
 * Partition of the bucket space into named groups. Construction rejects
 * malformed and overlapping ranges and a missing control group. Gaps in
 * coverage are allowed here and surface when a subject lands in one.
 */

import { ExperimentError, ErrorCode } from '../core/errors';
import { type BucketRange, CONTROL_GROUP } from '../domain/types';
import { DEFAULT_BUCKET_COUNT, validateBucketCount } from './Bucketer';

export type GroupBucketInput =
  | Readonly<Record<string, BucketRange>>
  | Iterable<readonly [string, BucketRange]>;

export class GroupBucketMap {
  private constructor(
    private readonly ranges: ReadonlyMap<string, BucketRange>,
    readonly bucketCount: number
  ) {}

  /**
   * Build and validate a map
   *
   * Definition order is the iteration order of the input. A plain object
   * iterates integer-like keys first in ascending order, so `{ control, '2', '1' }`
   * yields `['1', '2', 'control']`; pass an array of entries or a Map to keep
   * such names in the order written.
   *
   * @example
   * ```typescript
   * const map = GroupBucketMap.create({
   *   control: { start: 0, end: 50 },
   *   test1: { start: 50, end: 100 },
   * });
   * ```
   */
  static create(
    input: GroupBucketInput,
    bucketCount: number = DEFAULT_BUCKET_COUNT
  ): GroupBucketMap {
    validateBucketCount(bucketCount);

    const ranges = new Map<string, BucketRange>();
    for (const [groupName, range] of toEntries(input)) {
      if (ranges.has(groupName)) {
        throw new ExperimentError(
          ErrorCode.INVALID_CONFIG,
          `Group '${groupName}' is defined twice`,
          { groupName }
        );
      }
      validateRange(groupName, range, bucketCount);
      ranges.set(groupName, Object.freeze({ start: range.start, end: range.end }));
    }

    validateDisjoint(ranges);

    if (!ranges.has(CONTROL_GROUP)) {
      throw new ExperimentError(
        ErrorCode.MISSING_CONTROL,
        `Group bucket map must contain a '${CONTROL_GROUP}' group`,
        { groups: Array.from(ranges.keys()) }
      );
    }

    return new GroupBucketMap(ranges, bucketCount);
  }

  /**
   * Group names in definition order
   */
  getGroupNames(): string[] {
    return Array.from(this.ranges.keys());
  }

  /**
   * Group names other than control, in definition order
   */
  getTreatmentNames(): string[] {
    return this.getGroupNames().filter((name) => name !== CONTROL_GROUP);
  }

  getRange(groupName: string): BucketRange | undefined {
    return this.ranges.get(groupName);
  }

  entries(): IterableIterator<[string, BucketRange]> {
    return this.ranges.entries();
  }

  /**
   * First group, in definition order, whose range contains the bucket
   */
  findGroup(bucketIndex: number): string | undefined {
    for (const [groupName, range] of this.ranges) {
      if (bucketIndex >= range.start && bucketIndex < range.end) {
        return groupName;
      }
    }
    return undefined;
  }

  /**
   * Buckets in [0, bucketCount) that no group covers
   */
  uncoveredBuckets(): number[] {
    const uncovered: number[] = [];
    for (let b = 0; b < this.bucketCount; b++) {
      if (this.findGroup(b) === undefined) {
        uncovered.push(b);
      }
    }
    return uncovered;
  }

  toJSON(): Record<string, BucketRange> {
    return Object.fromEntries(this.ranges);
  }
}

/**
 * Shorthand for GroupBucketMap.create
 */
export function createGroupBucketMap(
  input: GroupBucketInput,
  bucketCount: number = DEFAULT_BUCKET_COUNT
): GroupBucketMap {
  return GroupBucketMap.create(input, bucketCount);
}

function isEntryIterable(
  input: GroupBucketInput
): input is Iterable<readonly [string, BucketRange]> {
  return Symbol.iterator in input;
}

function toEntries(input: GroupBucketInput): Iterable<readonly [string, BucketRange]> {
  return isEntryIterable(input) ? input : Object.entries(input);
}

function validateRange(groupName: string, range: BucketRange, bucketCount: number): void {
  const { start, end } = range;
  const valid =
    Number.isInteger(start) &&
    Number.isInteger(end) &&
    start >= 0 &&
    start < end &&
    end <= bucketCount;

  if (!valid) {
    throw new ExperimentError(
      ErrorCode.INVALID_BUCKET_RANGE,
      `Group '${groupName}' has invalid bucket range [${start}, ${end}); ` +
        `expected integers with 0 <= start < end <= ${bucketCount}`,
      { groupName, start, end, bucketCount }
    );
  }
}

function validateDisjoint(ranges: ReadonlyMap<string, BucketRange>): void {
  const sorted = Array.from(ranges.entries()).sort(([, a], [, b]) => a.start - b.start);

  for (let i = 1; i < sorted.length; i++) {
    const [previousName, previous] = sorted[i - 1];
    const [currentName, current] = sorted[i];
    if (current.start < previous.end) {
      throw new ExperimentError(
        ErrorCode.OVERLAPPING_BUCKETS,
        `Groups '${previousName}' and '${currentName}' have overlapping bucket ranges`,
        {
          groups: [previousName, currentName],
          ranges: [previous, current],
        }
      );
    }
  }
}
